import { SchemaDefinitionError } from '../errors';
import type { PropertyPath } from '../path/property-path';
import { appendPath } from '../path/property-path';
import type {
  BlockSchema,
  DynamicSchema,
  ListSchema,
  MapSchema,
  ResourceSchema,
  ScalarSchema,
  ScalarType,
  SchemaNode,
  SetSchema
} from './types';

type Flags<T extends SchemaNode> = Omit<T, 'kind' | 'type' | 'elem' | 'fields'>;

/*
 * Node builders. Thin wrappers that keep schema literals readable:
 *
 *   defineResourceSchema({
 *     token: 'test:index:Thing',
 *     fields: {
 *       name: string({ required: true, forceNew: true }),
 *       tags: map(string(), { optional: true }),
 *       rule: list(block({ port: number({ optional: true }) }), { singleton: true })
 *     }
 *   });
 */

export function scalar(type: ScalarType, flags: Flags<ScalarSchema> = {}): ScalarSchema {
  return { kind: 'scalar', type, ...flags };
}

export function string(flags: Flags<ScalarSchema> = {}): ScalarSchema {
  return scalar('string', flags);
}

export function number(flags: Flags<ScalarSchema> = {}): ScalarSchema {
  return scalar('number', flags);
}

export function bool(flags: Flags<ScalarSchema> = {}): ScalarSchema {
  return scalar('bool', flags);
}

export function list(elem: SchemaNode, flags: Flags<ListSchema> = {}): ListSchema {
  return { kind: 'list', elem, ...flags };
}

export function set(elem: SchemaNode, flags: Flags<SetSchema> = {}): SetSchema {
  return { kind: 'set', elem, ...flags };
}

export function map(elem: SchemaNode, flags: Flags<MapSchema> = {}): MapSchema {
  return { kind: 'map', elem, ...flags };
}

export function block(
  fields: Readonly<Record<string, SchemaNode>>,
  flags: Flags<BlockSchema> = {}
): BlockSchema {
  return { kind: 'block', fields, ...flags };
}

export function dynamic(flags: Flags<DynamicSchema> = {}): DynamicSchema {
  return { kind: 'dynamic', ...flags };
}

/**
 * Validates a resource schema and freezes it.
 *
 * The returned object is immutable and safe to share across concurrent diff
 * requests for the resource type.
 *
 * Rules checked on every node:
 * 1. `required` excludes both `optional` and `computed`.
 * 2. `singleton` is only valid on a list/set whose element is a block, and
 *    only with `maxItems` unset or 1.
 * 3. `maxItems` must be a positive integer.
 *
 * @throws {SchemaDefinitionError} naming the offending path.
 */
export function defineResourceSchema(definition: ResourceSchema): ResourceSchema {
  for (const [name, node] of Object.entries(definition.fields)) {
    assertValidNode(node, [name]);
  }
  return deepFreeze(definition);
}

function assertValidNode(node: SchemaNode, path: PropertyPath): void {
  if (node.required && node.optional) {
    throw new SchemaDefinitionError(path, 'a field cannot be both required and optional');
  }
  if (node.required && node.computed) {
    throw new SchemaDefinitionError(path, 'a field cannot be both required and computed');
  }

  switch (node.kind) {
    case 'list':
    case 'set': {
      if (node.maxItems !== undefined && (!Number.isInteger(node.maxItems) || node.maxItems < 1)) {
        throw new SchemaDefinitionError(path, 'maxItems must be a positive integer');
      }
      if (node.singleton) {
        if (node.elem.kind !== 'block') {
          throw new SchemaDefinitionError(path, 'singleton collections must hold blocks');
        }
        if (node.maxItems !== undefined && node.maxItems > 1) {
          throw new SchemaDefinitionError(path, 'singleton collections hold at most one element');
        }
      }
      assertValidNode(node.elem, appendPath(path, '*'));
      return;
    }
    case 'map':
      assertValidNode(node.elem, appendPath(path, '*'));
      return;
    case 'block':
      for (const [name, field] of Object.entries(node.fields)) {
        assertValidNode(field, appendPath(path, name));
      }
      return;
    case 'scalar':
    case 'dynamic':
      return;
  }
}

/**
 * Recursively freezes plain schema objects. Validators and hash functions are
 * left untouched; they belong to their libraries.
 */
function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  if (isValidatorObject(value)) return value;

  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

function isValidatorObject(value: object): boolean {
  return '~standard' in value;
}
