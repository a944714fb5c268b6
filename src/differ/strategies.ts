import { appendPath, type PropertyPath } from '../path/property-path';
import type { ListSchema, MapSchema, SetSchema } from '../schema/types';
import { nullValue } from '../value/builders';
import { containsUnknown, valuesEqual } from '../value/inspect';
import type { ListValue, MapValue, SetElement, SetValue } from '../value/types';
import type { RawDiffEntry } from './types';
import { type ChildDiffer, createEntry } from './utils';

/**
 * Diffs two lists position by position.
 *
 * Logic:
 * 1. Common prefix: skips leading positions whose elements are equal.
 * 2. Common suffix: within the overlapping range, skips trailing positions
 *    whose elements are equal. Alignment stays positional; an insertion at
 *    the front surfaces as updates at every shifted index.
 * 3. Middle: every remaining overlapping index is diffed recursively.
 * 4. Tail: indices past the shorter list become `ADD` (new is longer) or
 *    `DELETE` (old is longer) through the same recursion.
 *
 * Trace Example:
 * _`["a", "b"]` → `["x", "a", "b"]`_
 * - Prefix: `"a"` vs `"x"` differ; prefix is empty.
 * - Suffix (overlap 2): `"b"` vs `"a"` differ; suffix is empty.
 * - Middle: `[0]` UPDATE `"a" → "x"`, `[1]` UPDATE `"b" → "a"`.
 * - Tail: `[2]` ADD `"b"`.
 */
export function diffListItems(
  node: ListSchema,
  path: PropertyPath,
  previous: ListValue,
  current: ListValue,
  secret: boolean,
  diffChild: ChildDiffer
): RawDiffEntry[] {
  const before = previous.items;
  const after = current.items;
  const overlap = Math.min(before.length, after.length);
  const longest = Math.max(before.length, after.length);

  let start = 0;
  while (start < overlap && isSameAt(before, after, start)) start++;

  let end = overlap;
  while (end > start && isSameAt(before, after, end - 1)) end--;

  const entries: RawDiffEntry[] = [];
  for (let index = start; index < end; index++) {
    entries.push(...diffAt(node, path, previous, current, index, secret, diffChild));
  }
  for (let index = overlap; index < longest; index++) {
    entries.push(...diffAt(node, path, previous, current, index, secret, diffChild));
  }
  return entries;
}

function isSameAt(
  before: ListValue['items'],
  after: ListValue['items'],
  index: number
): boolean {
  const left = before[index];
  const right = after[index];
  return left !== undefined && right !== undefined && valuesEqual(left, right);
}

function diffAt(
  node: ListSchema,
  path: PropertyPath,
  previous: ListValue,
  current: ListValue,
  index: number,
  secret: boolean,
  diffChild: ChildDiffer
): RawDiffEntry[] {
  return diffChild(
    node.elem,
    appendPath(path, index),
    previous.items[index] ?? nullValue(),
    current.items[index] ?? nullValue(),
    secret
  );
}

/**
 * Diffs two sets by element identity.
 *
 * Logic:
 * 1. Pending members: when either side holds an element containing an
 *    unknown, identities cannot be settled; the whole set is reported as a
 *    single `UPDATE` at its own path.
 * 2. Leftovers: members whose hash is absent from the other side, each side
 *    ordered by hash.
 * 3. Pairing: the i-th removed member is paired with the i-th added member
 *    and diffed recursively at the synthetic index `[i]`, which yields the
 *    field-level changes of an element edit.
 * 4. Surplus: unpaired added members become `ADD` at `[i]`, unpaired removed
 *    members `DELETE` at `[i]`.
 *
 * Element order never matters; members present on both sides never produce
 * entries.
 */
export function diffSetMembers(
  node: SetSchema,
  path: PropertyPath,
  previous: SetValue,
  current: SetValue,
  secret: boolean,
  diffChild: ChildDiffer
): RawDiffEntry[] {
  if (hasPendingMember(previous) || hasPendingMember(current)) {
    return [createEntry(path, 'UPDATE', previous, current, secret)];
  }

  const removed = leftovers(previous, current);
  const added = leftovers(current, previous);
  const count = Math.max(removed.length, added.length);

  const entries: RawDiffEntry[] = [];
  for (let index = 0; index < count; index++) {
    entries.push(
      ...diffChild(
        node.elem,
        appendPath(path, index),
        removed[index]?.value ?? nullValue(),
        added[index]?.value ?? nullValue(),
        secret
      )
    );
  }
  return entries;
}

function hasPendingMember(value: SetValue): boolean {
  return value.items.some(element => containsUnknown(element.value));
}

/**
 * Members of `source` whose hash does not occur in `other`, sorted by hash.
 */
function leftovers(source: SetValue, other: SetValue): SetElement[] {
  const otherHashes = new Set(other.items.map(element => element.hash));
  return source.items
    .filter(element => !otherHashes.has(element.hash))
    .sort((left, right) => (left.hash < right.hash ? -1 : left.hash > right.hash ? 1 : 0));
}

/**
 * Diffs two maps over the sorted union of their keys; a missing key is
 * Null.
 */
export function diffMapEntries(
  node: MapSchema,
  path: PropertyPath,
  previous: MapValue,
  current: MapValue,
  secret: boolean,
  diffChild: ChildDiffer
): RawDiffEntry[] {
  const keys = [...new Set([...previous.entries.keys(), ...current.entries.keys()])].sort();

  return keys.flatMap(key =>
    diffChild(
      node.elem,
      appendPath(path, key),
      previous.entries.get(key) ?? nullValue(),
      current.entries.get(key) ?? nullValue(),
      secret
    )
  );
}
