import { describe, expect, test } from 'vitest';

import { PropertyPathError } from '../../errors';
import {
  comparePropertyPaths,
  formatPropertyPath,
  isReservedKey,
  parsePropertyPath,
  type PropertyPath
} from '../property-path';

describe('Property paths', () => {
  describe('formatPropertyPath', () => {
    const scenarios: Array<{ id: string; input: PropertyPath; expected: string }> = [
      { id: 'Single Key', input: ['name'], expected: 'name' },
      { id: 'Nested', input: ['tests', 2, 'nested'], expected: 'tests[2].nested' },
      { id: 'Leading Index', input: [0, 'a'], expected: '[0].a' },
      { id: 'Quoted Key', input: ['tags', 'kubernetes.io/name'], expected: 'tags["kubernetes.io/name"]' },
      { id: 'Escaped Quote', input: ['say "hi"'], expected: '["say \\"hi\\""]' },
      { id: 'Empty', input: [], expected: '' }
    ];

    test.for(scenarios)('[$id] formats $expected', ({ input, expected }) => {
      expect(formatPropertyPath(input)).toBe(expected);
    });
  });

  describe('parsePropertyPath', () => {
    const scenarios: Array<{ id: string; input: string; expected: PropertyPath }> = [
      { id: 'Nested', input: 'tests[2].nested', expected: ['tests', 2, 'nested'] },
      { id: 'Quoted Key', input: 'tags["a.b"]', expected: ['tags', 'a.b'] },
      { id: 'Quoted Bracket', input: 'tags["x]y"].z', expected: ['tags', 'x]y', 'z'] },
      { id: 'Bracket Wildcard', input: 'rules[*].port', expected: ['rules', '*', 'port'] },
      { id: 'Dotted Wildcard', input: 'tags.*', expected: ['tags', '*'] },
      { id: 'Loose Key', input: 'tags.my-key', expected: ['tags', 'my-key'] }
    ];

    test.for(scenarios)('[$id] parses $input', ({ input, expected }) => {
      expect(parsePropertyPath(input)).toStrictEqual(expected);
    });

    const malformed = ['', '.name', 'a..b', 'a.', 'tags[', 'a]', 'list[x]', 'tags["open]'];

    test.for(malformed)('rejects "%s"', input => {
      expect(() => parsePropertyPath(input)).toThrow(PropertyPathError);
    });

    test('formats back to the same text', () => {
      const text = 'a.b[2]["c d"].e';
      expect(formatPropertyPath(parsePropertyPath(text))).toBe(text);
    });
  });

  test('isReservedKey matches top-level properties only', () => {
    expect(isReservedKey(['__meta'])).toBe(true);
    expect(isReservedKey(['__defaults'])).toBe(true);
    expect(isReservedKey(['tags', '__defaults'])).toBe(false);
    expect(isReservedKey(['__meta', 'x'])).toBe(false);
    expect(isReservedKey([])).toBe(false);
  });

  test('comparePropertyPaths orders indices numerically and prefixes first', () => {
    const paths: PropertyPath[] = [['b'], ['a', 10], ['a', 2], ['a'], ['a', 'x'], ['a', 2, 'c']];
    expect([...paths].sort(comparePropertyPaths)).toStrictEqual([
      ['a'],
      ['a', 2],
      ['a', 2, 'c'],
      ['a', 10],
      ['a', 'x'],
      ['b']
    ]);
  });
});
