import type { ValueTree } from './types';

/**
 * Immediate children of a value, in a stable order.
 */
export function childValues(value: ValueTree): readonly ValueTree[] {
  switch (value.kind) {
    case 'list':
      return value.items;
    case 'set':
      return value.items.map(element => element.value);
    case 'map':
      return [...value.entries.values()];
    case 'object':
      return [...value.fields.values()];
    default:
      return [];
  }
}

/**
 * `true` when `value` is unknown or holds an unknown anywhere below it.
 */
export function containsUnknown(value: ValueTree): boolean {
  if (value.kind === 'unknown') return true;
  return childValues(value).some(containsUnknown);
}

/**
 * `true` when `value` or anything below it carries the secret bit.
 */
export function containsSecret(value: ValueTree): boolean {
  if (value.secret) return true;
  return childValues(value).some(containsSecret);
}

/**
 * `null` and absent are the same thing in a value tree.
 */
export function isNullValue(value: ValueTree | undefined): boolean {
  return value === undefined || value.kind === 'null';
}

/**
 * Structural equality under each kind's rule.
 *
 * - scalars: value equality (`0` equals `-0`);
 * - sets: equal hash multisets, order ignored;
 * - lists: pairwise, same length;
 * - maps and objects: key-wise, a missing key equals null;
 * - `unknown` equals `unknown`.
 *
 * The secret bit never participates.
 */
export function valuesEqual(left: ValueTree, right: ValueTree): boolean {
  if (left === right) return true;

  switch (left.kind) {
    case 'null':
    case 'unknown':
      return right.kind === left.kind;

    case 'scalar':
      return right.kind === 'scalar' && left.value === right.value;

    case 'list':
      return (
        right.kind === 'list' &&
        left.items.length === right.items.length &&
        left.items.every((item, index) => {
          const other = right.items[index];
          return other !== undefined && valuesEqual(item, other);
        })
      );

    case 'set': {
      if (right.kind !== 'set' || left.items.length !== right.items.length) {
        return false;
      }
      const leftHashes = left.items.map(element => element.hash).sort();
      const rightHashes = right.items.map(element => element.hash).sort();
      return leftHashes.every((hash, index) => hash === rightHashes[index]);
    }

    case 'map':
      return right.kind === 'map' && entriesEqual(left.entries, right.entries);

    case 'object':
      return right.kind === 'object' && entriesEqual(left.fields, right.fields);
  }
}

/**
 * Key-wise comparison over the union of keys; a key holding null equals a
 * missing key.
 */
function entriesEqual(
  left: ReadonlyMap<string, ValueTree>,
  right: ReadonlyMap<string, ValueTree>
): boolean {
  const keys = new Set([...left.keys(), ...right.keys()]);
  for (const key of keys) {
    const leftChild = left.get(key);
    const rightChild = right.get(key);
    if (isNullValue(leftChild) && isNullValue(rightChild)) continue;
    if (!leftChild || !rightChild || !valuesEqual(leftChild, rightChild)) {
      return false;
    }
  }
  return true;
}
