import type { PropertyPath } from '../path/property-path';
import type { SchemaNode } from '../schema/types';
import type { ValueTree } from '../value/types';
import type { RawDiffEntry } from './types';
import { createEntry } from './utils';

/**
 * `true` when the provider, not the user, owns the value at this node:
 * the schema marks it computed (and not required) and the new config leaves
 * it out. Such nodes never produce an entry, whatever the prior state holds.
 */
export function isLeftToProvider(node: SchemaNode, current: ValueTree): boolean {
  return node.computed === true && node.required !== true && current.kind === 'null';
}

/**
 * Classifies a pair where at least one side is Null or Unknown.
 *
 * Logic:
 * 1. Both Null, or both Unknown: no change.
 * 2. New side Unknown: `ADD` when the old side is Null, `UPDATE` otherwise.
 *    The change is never reported as absent while the value is pending.
 * 3. Old side Unknown (new side known): `UPDATE`.
 * 4. Old side Null: `ADD`.
 * 5. New side Null: `DELETE`.
 *
 * @returns the entries for the pair, or `undefined` when both sides are known
 *   and the caller must compare them structurally.
 */
export function classifyAbsentOrPending(
  path: PropertyPath,
  previous: ValueTree,
  current: ValueTree,
  secret: boolean
): RawDiffEntry[] | undefined {
  if (previous.kind === current.kind && (current.kind === 'null' || current.kind === 'unknown')) {
    return [];
  }

  if (current.kind === 'unknown') {
    return [createEntry(path, previous.kind === 'null' ? 'ADD' : 'UPDATE', previous, current, secret)];
  }
  if (previous.kind === 'unknown') {
    return [createEntry(path, 'UPDATE', previous, current, secret)];
  }
  if (previous.kind === 'null') {
    return [createEntry(path, 'ADD', previous, current, secret)];
  }
  if (current.kind === 'null') {
    return [createEntry(path, 'DELETE', previous, current, secret)];
  }

  return undefined;
}
