import { describe, expect, test } from 'vitest';

import { SchemaDefinitionError } from '../../errors';
import {
  block,
  defineResourceSchema,
  dynamic,
  list,
  map,
  number,
  set,
  string
} from '../define';
import { hasForceNewDescendant, isSingleton, lookupSchema, lookupSchemaChain } from '../lookup';
import type { SchemaNode } from '../types';

const port = number({ optional: true, forceNew: true });
const rule = block({ port });
const name = string({ required: true });
const tags = map(string(), { optional: true });
const singletonRule = list(rule, { optional: true, singleton: true });
const rules = list(block({ port: number({ optional: true }) }), { optional: true });
const meta = dynamic({ optional: true });

const resource = defineResourceSchema({
  token: 'test:index:Gateway',
  fields: { name, tags, rule: singletonRule, rules, meta }
});

describe('Schema definition', () => {
  const invalid: Array<{ id: string; fields: Record<string, SchemaNode>; message: string }> = [
    {
      id: 'Required and Optional',
      fields: { name: string({ required: true, optional: true }) },
      message: 'invalid schema at name: a field cannot be both required and optional'
    },
    {
      id: 'Required and Computed',
      fields: { name: string({ required: true, computed: true }) },
      message: 'invalid schema at name: a field cannot be both required and computed'
    },
    {
      id: 'Scalar Singleton',
      fields: { ids: list(string(), { singleton: true }) },
      message: 'invalid schema at ids: singleton collections must hold blocks'
    },
    {
      id: 'Wide Singleton',
      fields: { rule: set(block({}), { singleton: true, maxItems: 2 }) },
      message: 'invalid schema at rule: singleton collections hold at most one element'
    },
    {
      id: 'Zero Max Items',
      fields: { ids: list(string(), { maxItems: 0 }) },
      message: 'invalid schema at ids: maxItems must be a positive integer'
    },
    {
      id: 'Nested Field',
      fields: { outer: block({ inner: number({ required: true, computed: true }) }) },
      message: 'invalid schema at outer.inner: a field cannot be both required and computed'
    }
  ];

  test.for(invalid)('[$id] is rejected', ({ fields, message }) => {
    expect(() => defineResourceSchema({ token: 'test:index:Bad', fields })).toThrow(
      SchemaDefinitionError
    );
    expect(() => defineResourceSchema({ token: 'test:index:Bad', fields })).toThrow(message);
  });

  test('the defined schema is frozen', () => {
    expect(Object.isFrozen(resource)).toBe(true);
    expect(Object.isFrozen(resource.fields)).toBe(true);
    expect(Object.isFrozen(port)).toBe(true);
  });

  test('isSingleton only accepts collections of blocks flagged singleton', () => {
    expect(isSingleton(singletonRule)).toBe(true);
    expect(isSingleton(rules)).toBe(false);
    expect(isSingleton(tags)).toBe(false);
  });
});

describe('Schema lookup', () => {
  const scenarios: Array<{
    id: string;
    path: Array<string | number>;
    expected: SchemaNode[] | undefined;
  }> = [
    { id: 'Root Field', path: ['name'], expected: [name] },
    { id: 'Map Value', path: ['tags', 'env'], expected: [tags, tags.elem] },
    { id: 'Singleton Field', path: ['rule', 'port'], expected: [singletonRule, rule, port] },
    { id: 'List Element', path: ['rules', 0], expected: [rules, rules.elem] },
    { id: 'Dynamic Absorbs', path: ['meta', 'a', 3], expected: [meta] },
    { id: 'Unknown Field', path: ['missing'], expected: undefined },
    { id: 'Scalar Descent', path: ['name', 'x'], expected: undefined },
    { id: 'Index On Map', path: ['tags', 0], expected: undefined },
    { id: 'Leading Index', path: [0], expected: undefined }
  ];

  test.for(scenarios)('[$id] resolves the chain', ({ path, expected }) => {
    expect(lookupSchemaChain(resource, path)).toStrictEqual(expected);
  });

  test('lookupSchema returns the last node of the chain', () => {
    expect(lookupSchema(resource, ['rule', 'port'])).toBe(port);
    expect(lookupSchema(resource, ['missing'])).toBeUndefined();
  });

  test('hasForceNewDescendant looks strictly below the node', () => {
    expect(hasForceNewDescendant(singletonRule)).toBe(true);
    expect(hasForceNewDescendant(port)).toBe(false);
    expect(hasForceNewDescendant(rules)).toBe(false);
  });
});
