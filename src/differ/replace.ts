import { lookupSchemaChain, hasForceNewDescendant, isSingleton } from '../schema/lookup';
import type { ResourceSchema, SchemaNode } from '../schema/types';
import { nullValue } from '../value/builders';
import { containsUnknown } from '../value/inspect';
import type { ValueTree } from '../value/types';
import type { DiffEntry, DiffResult, RawDiffEntry } from './types';

/**
 * Key of the synthetic entry carrying a forced replacement when no property
 * change replaces on its own.
 */
export const META_KEY = '__meta';

/**
 * Decides, for every raw entry, whether it forces replacement of the
 * resource, then applies the caller's override.
 *
 * Logic:
 * 1. Ancestry: an entry replaces when any schema node on its path (root field
 *    down to the changed node, singleton blocks included) is `forceNew`.
 * 2. Subtree: an entry also replaces when the subtree it adds, deletes or
 *    updates carries a value under a `forceNew` descendant. A pending
 *    (unknown) side counts every `forceNew` descendant, since its eventual
 *    content is not known.
 * 3. Override `true`: when nothing replaces, a `__meta` `UPDATE` entry with
 *    the replace bit is appended.
 * 4. Override `false`: every entry is demoted to a non-replacing change.
 *
 * Paths the schema does not describe (fields only present in persisted
 * state) never replace.
 */
export function resolveReplacements(
  resource: ResourceSchema,
  entries: readonly RawDiffEntry[],
  replaceOverride: boolean | undefined
): DiffResult {
  const resolved: DiffEntry[] = entries.map(entry => ({
    ...entry,
    replace: replaceOverride === false ? false : entryTriggersReplacement(resource, entry)
  }));

  if (replaceOverride === true && !resolved.some(entry => entry.replace)) {
    resolved.push({
      path: [META_KEY],
      key: META_KEY,
      kind: 'UPDATE',
      secret: false,
      oldValue: nullValue(),
      newValue: nullValue(),
      replace: true
    });
  }

  return {
    entries: resolved,
    replace: resolved.some(entry => entry.replace)
  };
}

/**
 * Evaluates steps 1 and 2 of {@link resolveReplacements} for a single entry.
 */
export function entryTriggersReplacement(
  resource: ResourceSchema,
  entry: RawDiffEntry
): boolean {
  const chain = lookupSchemaChain(resource, entry.path);
  if (!chain) return false;
  if (chain.some(node => node.forceNew)) return true;

  const node = chain[chain.length - 1];
  if (!node) return false;

  switch (entry.kind) {
    case 'ADD':
      return reachesForceNew(node, entry.newValue);
    case 'DELETE':
      return reachesForceNew(node, entry.oldValue);
    case 'UPDATE':
      return (
        (containsUnknown(entry.oldValue) || containsUnknown(entry.newValue)) &&
        hasForceNewDescendant(node)
      );
  }
}

/**
 * `true` when `value` holds a non-null value at a `forceNew` node strictly
 * below `node`.
 */
function reachesForceNew(node: SchemaNode, value: ValueTree): boolean {
  if (value.kind === 'null') return false;
  if (value.kind === 'unknown') return hasForceNewDescendant(node);

  return childPairs(node, value).some(
    ([child, childValue]) =>
      childValue.kind !== 'null' && (child.forceNew === true || reachesForceNew(child, childValue))
  );
}

const DYNAMIC: SchemaNode = { kind: 'dynamic' };

type SchemaValuePair = [SchemaNode, ValueTree];

function childPairs(node: SchemaNode, value: ValueTree): SchemaValuePair[] {
  if (isSingleton(node) && value.kind === 'object') {
    return [[node.elem, value]];
  }

  switch (node.kind) {
    case 'list':
    case 'set':
      if (value.kind === 'list') return value.items.map((item): SchemaValuePair => [node.elem, item]);
      if (value.kind === 'set') return value.items.map((element): SchemaValuePair => [node.elem, element.value]);
      return [];
    case 'map':
      return value.kind === 'map'
        ? [...value.entries.values()].map((child): SchemaValuePair => [node.elem, child])
        : [];
    case 'block':
      return value.kind === 'object'
        ? [...value.fields].map(([key, child]): SchemaValuePair => [node.fields[key] ?? DYNAMIC, child])
        : [];
    case 'scalar':
    case 'dynamic':
      return [];
  }
}
