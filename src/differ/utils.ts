import { UnexpectedTypeError } from '../errors';
import type { PropertyPath } from '../path/property-path';
import { formatPropertyPath } from '../path/property-path';
import type { SchemaNode } from '../schema/types';
import { nullValue, withSecret } from '../value/builders';
import type { ValueTree } from '../value/types';
import { entrySecrecy } from './secrets';
import type { DiffKind, DiffOptions, RawDiffEntry } from './types';

/**
 * Recursion hook handed to the kind-specific differs, so that list, set and
 * map diffing can descend into elements without importing the dispatcher.
 */
export type ChildDiffer = (
  node: SchemaNode,
  path: PropertyPath,
  previous: ValueTree,
  current: ValueTree,
  secret: boolean
) => RawDiffEntry[];

/**
 * Merges the provided partial options with the engine defaults.
 *
 * Default settings:
 * - `ignoreChanges`: `[]` (nothing ignored).
 * - `replaceOverride`: `undefined` (the computed decision stands).
 *
 * @param options - The caller-provided partial options.
 * @returns A complete `DiffOptions` object.
 */
export function normalizeOptions(options: Partial<DiffOptions>): DiffOptions {
  return {
    ignoreChanges: [],
    ...options
  };
}

/**
 * Factory for a {@link RawDiffEntry}. Computes the textual key and folds the
 * secrecy of both sides into the entry's `secret` bit.
 *
 * @param path - Full path to the changed node.
 * @param kind - Base classification.
 * @param previous - Old side (Null for `ADD`).
 * @param current - New side (Null for `DELETE`).
 * @param secret - Secrecy inherited from the walk.
 */
export function createEntry(
  path: PropertyPath,
  kind: DiffKind,
  previous: ValueTree,
  current: ValueTree,
  secret: boolean
): RawDiffEntry {
  return {
    path,
    key: formatPropertyPath(path),
    kind,
    secret: entrySecrecy(secret, previous, current),
    oldValue: previous,
    newValue: current
  };
}

/**
 * Schema kind → value kind a known value must have.
 */
const EXPECTED_VALUE_KIND = {
  scalar: 'scalar',
  list: 'list',
  set: 'set',
  map: 'map',
  block: 'object'
} as const;

/**
 * Verifies that a known value matches the shape its schema declares.
 * Null and Unknown fit every schema; dynamic nodes accept anything.
 *
 * @throws {UnexpectedTypeError}
 */
export function assertValueShape(
  node: SchemaNode,
  value: ValueTree,
  path: PropertyPath
): void {
  if (value.kind === 'null' || value.kind === 'unknown' || node.kind === 'dynamic') {
    return;
  }

  const expected = EXPECTED_VALUE_KIND[node.kind];
  if (value.kind !== expected) {
    throw new UnexpectedTypeError(path, expected, value.kind);
  }

  if (node.kind === 'scalar' && value.kind === 'scalar') {
    const actual = typeof value.value === 'boolean' ? 'bool' : typeof value.value;
    if (actual !== node.type) {
      throw new UnexpectedTypeError(path, node.type, actual);
    }
  }
}

/**
 * Unwraps a singleton collection's value to its only element.
 *
 * - A list/set with no element becomes Null.
 * - A list/set with one element becomes that element; the container's secret
 *   bit carries over.
 * - Anything else (the already-collapsed object, Null, Unknown) is returned
 *   unchanged.
 *
 * @throws {UnexpectedTypeError} when the collection holds several elements.
 */
export function unwrapSingleton(value: ValueTree, path: PropertyPath): ValueTree {
  if (value.kind !== 'list' && value.kind !== 'set') return value;

  const items: readonly ValueTree[] =
    value.kind === 'list' ? value.items : value.items.map(element => element.value);

  if (items.length > 1) {
    throw new UnexpectedTypeError(path, 'at most one element', `${value.kind} of ${items.length}`);
  }

  const [only] = items;
  if (!only) return nullValue(value.secret);
  return withSecret(only, only.secret || value.secret);
}
