import { ConfigError } from '../utils/error-handler.js';

export type TypeMapping = ReadonlyMap<string, string>;

const PYTHON_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_.]*$/;
const C_TYPE_REGEX = /^[a-zA-Z_][a-zA-Z0-9_ ]*\**$/;

/**
 * Python annotation names with a native Cython counterpart.
 */
export const DEFAULT_TYPE_MAPPING: TypeMapping = new Map([
  ['int', 'int'],
  ['float', 'double'],
  ['bool', 'bint'],
  ['str', 'str'],
  ['bytes', 'bytes'],
  ['complex', 'double complex'],
]);

export function mapType(
  typeName: string,
  mapping: TypeMapping = DEFAULT_TYPE_MAPPING
): string | undefined {
  return mapping.get(typeName.trim());
}

/**
 * Build a new mapping with extra or overriding entries. The mapping passed
 * in is left untouched.
 */
export function extendTypeMapping(
  entries: Iterable<readonly [string, string]>,
  base: TypeMapping = DEFAULT_TYPE_MAPPING
): TypeMapping {
  const extended = new Map(base);
  for (const [pythonType, nativeType] of entries) {
    extended.set(pythonType, nativeType);
  }
  return extended;
}

/**
 * Parse a `name=ctype` entry as given on the command line.
 */
export function parseMappingEntry(entry: string): [string, string] {
  const equalsIndex = entry.indexOf('=');
  if (equalsIndex === -1) {
    throw new ConfigError(
      `Invalid type mapping: ${entry}`,
      'Type mappings are written as <python-type>=<c-type>, e.g. --map long=long.'
    );
  }

  const pythonType = entry.slice(0, equalsIndex).trim();
  const nativeType = entry.slice(equalsIndex + 1).trim().replace(/\s+/g, ' ');

  if (!PYTHON_NAME_REGEX.test(pythonType)) {
    throw new ConfigError(`Invalid Python type name in mapping: ${pythonType}`);
  }
  if (!C_TYPE_REGEX.test(nativeType)) {
    throw new ConfigError(`Invalid native type in mapping: ${nativeType}`);
  }

  return [pythonType, nativeType];
}
