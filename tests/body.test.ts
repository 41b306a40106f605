import { describe, expect, it } from 'vitest';
import { substitutePlaceholder, transformBody } from '../src/pyx/body.js';

describe('substitutePlaceholder', () => {
  it('replaces pass and keeps indentation and comments', () => {
    expect(substitutePlaceholder('        pass')).toBe('        ...');
    expect(substitutePlaceholder('pass  # nothing yet')).toBe(
      '...  # nothing yet'
    );
  });

  it('replaces pass after a block header', () => {
    expect(substitutePlaceholder('    else: pass')).toBe('    else: ...');
    expect(substitutePlaceholder('for k, v in d.items(): pass  # skip')).toBe(
      'for k, v in d.items(): ...  # skip'
    );
  });

  it('leaves lines that only contain the word alone', () => {
    expect(substitutePlaceholder('passed = 1')).toBe('passed = 1');
    expect(substitutePlaceholder('x = pass_count')).toBe('x = pass_count');
  });
});

describe('transformBody', () => {
  it('copies lines and rewrites placeholders', () => {
    expect(
      transformBody([
        '    for _ in range(3):',
        '        pass',
        '    return 1',
      ])
    ).toEqual(['    for _ in range(3):', '        ...', '    return 1']);
  });

  it('copies annotated locals by default', () => {
    expect(transformBody(['    total: int = 0'])).toEqual([
      '    total: int = 0',
    ]);
  });

  it('declares annotated locals with typedLocals', () => {
    expect(
      transformBody(['    total: int = 0', '    name: Point = p', '    ratio: float'], {
        typedLocals: true,
      })
    ).toEqual(['    cdef int total = 0', '    name: Point = p', '    cdef double ratio']);
  });

  it('keeps annotated names inside loops and brackets as they are', () => {
    expect(
      transformBody(
        [
          '    count: int = 0',
          '    while count < 3:',
          '        step: int = 1',
          '    limits = dict(',
          '        low: float',
          '    )',
        ],
        { typedLocals: true }
      )
    ).toEqual([
      '    cdef int count = 0',
      '    while count < 3:',
      '        step: int = 1',
      '    limits = dict(',
      '        low: float',
      '    )',
    ]);
  });

  it('converts nested definitions', () => {
    expect(
      transformBody(['    def inner(x: int) -> int:', '        return x'])
    ).toEqual(['    cdef int inner(int x):', '        return x']);
  });
});
