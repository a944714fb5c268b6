import type { SchemaNode } from '../schema/types';
import { containsSecret } from '../value/inspect';
import type { ValueTree } from '../value/types';

/**
 * Secrecy threaded down the diff walk.
 *
 * A node is secret when an ancestor was, when its schema declares it
 * sensitive, or when the caller marked either side of it secret. The flag is
 * OR-ed at every level and never cleared further down.
 */
export function deriveSecrecy(
  inherited: boolean,
  node: SchemaNode,
  previous: ValueTree,
  current: ValueTree
): boolean {
  return (
    inherited ||
    node.sensitive === true ||
    previous.secret ||
    current.secret
  );
}

/**
 * Final secrecy of a diff entry: the walk's flag, or a secret anywhere in the
 * subtrees the entry covers.
 */
export function entrySecrecy(
  inherited: boolean,
  previous: ValueTree,
  current: ValueTree
): boolean {
  return inherited || containsSecret(previous) || containsSecret(current);
}
