import { ConverterOptions } from './pyx/types.js';
import { extendTypeMapping, parseMappingEntry } from './pyx/type-mapping.js';
import { resolveOptions } from './pyx/generator.js';

export interface CLIOptions {
  output?: string;
  stdout?: boolean;
  cpdef?: boolean;
  typedLocals?: boolean;
  strict?: boolean;
  map?: string[];
  build?: boolean;
  verbose?: boolean;
}

export function collectMapping(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function toConverterOptions(options: CLIOptions): ConverterOptions {
  const entries = (options.map ?? []).map(parseMappingEntry);

  return resolveOptions({
    functionKeyword: options.cpdef ? 'cpdef' : 'cdef',
    typedLocals: options.typedLocals ?? false,
    strict: options.strict ?? false,
    ...(entries.length > 0 ? { typeMapping: extendTypeMapping(entries) } : {}),
  });
}
