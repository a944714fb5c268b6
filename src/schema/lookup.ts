import type { PropertyPath } from '../path/property-path';
import { isNumber, isString } from '../utils/type-guards';
import type {
  BlockSchema,
  CollectionSchema,
  ResourceSchema,
  SchemaNode
} from './types';

/**
 * A list/set of blocks that the value model represents as a single object.
 */
export type SingletonSchema = CollectionSchema & {
  readonly singleton: true;
  readonly elem: BlockSchema;
};

export function isSingleton(node: SchemaNode): node is SingletonSchema {
  return (
    (node.kind === 'list' || node.kind === 'set') &&
    node.singleton === true &&
    node.elem.kind === 'block'
  );
}

/**
 * Resolves the chain of schema nodes a property path passes through.
 *
 * The returned array starts at the root field and ends at the node the path
 * addresses. Singleton collections contribute two nodes (the collection and
 * its block) for a single path step, since the collapsed representation has
 * no index step.
 *
 * Resolution per node kind:
 * - `block`: the next segment must be a field name.
 * - `list` / `set`: the next segment must be an index (synthetic for sets),
 *   unless the collection is a singleton.
 * - `map`: the next segment is any string key.
 * - `dynamic`: absorbs the rest of the path.
 * - `scalar`: cannot be descended into.
 *
 * @returns the chain, or `undefined` when the path leaves the schema.
 */
export function lookupSchemaChain(
  resource: ResourceSchema,
  path: PropertyPath
): SchemaNode[] | undefined {
  const [root, ...rest] = path;
  if (!isString(root)) return undefined;

  const rootNode = resource.fields[root];
  if (!rootNode) return undefined;

  const chain: SchemaNode[] = [rootNode];
  let current: SchemaNode = rootNode;

  for (const segment of rest) {
    if (isSingleton(current)) {
      current = current.elem;
      chain.push(current);
    }

    const next = childSchema(current, segment);
    if (next === null) return chain;
    if (next === undefined) return undefined;

    current = next;
    chain.push(current);
  }

  return chain;
}

/**
 * Resolves the node a path addresses. See {@link lookupSchemaChain}.
 */
export function lookupSchema(
  resource: ResourceSchema,
  path: PropertyPath
): SchemaNode | undefined {
  const chain = lookupSchemaChain(resource, path);
  return chain?.[chain.length - 1];
}

/**
 * One step down from `node`.
 *
 * @returns the child node, `null` when `node` absorbs the remaining path
 *   (dynamic values), or `undefined` when the step is invalid.
 */
function childSchema(
  node: SchemaNode,
  segment: string | number
): SchemaNode | null | undefined {
  switch (node.kind) {
    case 'block':
      return isString(segment) ? node.fields[segment] : undefined;
    case 'list':
    case 'set':
      return isNumber(segment) ? node.elem : undefined;
    case 'map':
      return isString(segment) ? node.elem : undefined;
    case 'dynamic':
      return null;
    case 'scalar':
      return undefined;
  }
}

/**
 * Every schema node strictly below `node`.
 */
export function* descendantSchemas(node: SchemaNode): Generator<SchemaNode> {
  switch (node.kind) {
    case 'list':
    case 'set':
    case 'map':
      yield node.elem;
      yield* descendantSchemas(node.elem);
      return;
    case 'block':
      for (const field of Object.values(node.fields)) {
        yield field;
        yield* descendantSchemas(field);
      }
      return;
    case 'scalar':
    case 'dynamic':
      return;
  }
}

/**
 * `true` when any node strictly below `node` is `forceNew`.
 */
export function hasForceNewDescendant(node: SchemaNode): boolean {
  for (const descendant of descendantSchemas(node)) {
    if (descendant.forceNew) return true;
  }
  return false;
}
