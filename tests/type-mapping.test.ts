import { describe, expect, it } from 'vitest';
import {
  DEFAULT_TYPE_MAPPING,
  extendTypeMapping,
  mapType,
  parseMappingEntry,
} from '../src/pyx/type-mapping.js';
import { ConfigError } from '../src/utils/error-handler.js';

describe('mapType', () => {
  it('maps the built-in scalar types', () => {
    expect(mapType('int')).toBe('int');
    expect(mapType('float')).toBe('double');
    expect(mapType(' bool ')).toBe('bint');
    expect(mapType('complex')).toBe('double complex');
  });

  it('returns undefined for unknown names', () => {
    expect(mapType('Point')).toBeUndefined();
    expect(mapType('list[int]')).toBeUndefined();
  });
});

describe('extendTypeMapping', () => {
  it('returns a new mapping and leaves the default alone', () => {
    const extended = extendTypeMapping([['long', 'long']]);
    expect(mapType('long', extended)).toBe('long');
    expect(mapType('int', extended)).toBe('int');
    expect(DEFAULT_TYPE_MAPPING.has('long')).toBe(false);
  });

  it('overrides existing entries', () => {
    const extended = extendTypeMapping([['float', 'float']]);
    expect(mapType('float', extended)).toBe('float');
    expect(mapType('float')).toBe('double');
  });
});

describe('parseMappingEntry', () => {
  it('splits and normalises an entry', () => {
    expect(parseMappingEntry('long = long')).toEqual(['long', 'long']);
    expect(parseMappingEntry('size=unsigned   long')).toEqual([
      'size',
      'unsigned long',
    ]);
  });

  it('rejects malformed entries', () => {
    expect(() => parseMappingEntry('nonsense')).toThrow(ConfigError);
    expect(() => parseMappingEntry('1x=int')).toThrow(
      'Invalid Python type name in mapping: 1x'
    );
    expect(() => parseMappingEntry('x=int;')).toThrow(
      'Invalid native type in mapping: int;'
    );
  });
});
