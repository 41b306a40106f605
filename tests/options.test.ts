import { describe, expect, it } from 'vitest';
import { collectMapping, toConverterOptions } from '../src/options.js';
import { DEFAULT_TYPE_MAPPING } from '../src/pyx/type-mapping.js';
import { ConfigError } from '../src/utils/error-handler.js';

describe('toConverterOptions', () => {
  it('uses the defaults when no flags are given', () => {
    expect(toConverterOptions({})).toEqual({
      functionKeyword: 'cdef',
      typedLocals: false,
      strict: false,
      typeMapping: DEFAULT_TYPE_MAPPING,
    });
  });

  it('maps command line flags onto converter options', () => {
    const options = toConverterOptions({
      cpdef: true,
      typedLocals: true,
      strict: true,
      map: ['long=long', 'size_t=unsigned long'],
    });

    expect(options.functionKeyword).toBe('cpdef');
    expect(options.typedLocals).toBe(true);
    expect(options.strict).toBe(true);
    expect(options.typeMapping.get('long')).toBe('long');
    expect(options.typeMapping.get('size_t')).toBe('unsigned long');
    expect(options.typeMapping.get('int')).toBe('int');
  });

  it('rejects malformed mappings', () => {
    expect(() => toConverterOptions({ map: ['long'] })).toThrow(ConfigError);
  });
});

describe('collectMapping', () => {
  it('accumulates repeated options', () => {
    expect(collectMapping('a=b', ['x=y'])).toEqual(['x=y', 'a=b']);
  });
});
