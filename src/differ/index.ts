import {
  appendPath,
  comparePropertyPaths,
  isReservedKey,
  type PropertyPath
} from '../path/property-path';
import { isSingleton } from '../schema/lookup';
import type { ResourceSchema, SchemaNode } from '../schema/types';
import { nullValue } from '../value/builders';
import { valuesEqual } from '../value/inspect';
import type { ObjectValue, ValueTree } from '../value/types';
import { applyIgnoreChanges } from './ignore-changes';
import { resolveReplacements } from './replace';
import { deriveSecrecy } from './secrets';
import { diffListItems, diffMapEntries, diffSetMembers } from './strategies';
import type { DiffOptions, DiffResult, RawDiffEntry } from './types';
import { classifyAbsentOrPending, isLeftToProvider } from './unknowns';
import {
  assertValueShape,
  createEntry,
  normalizeOptions,
  unwrapSingleton
} from './utils';

const DYNAMIC: SchemaNode = { kind: 'dynamic' };

/**
 * Computes the detailed diff between a resource's persisted state and its
 * newly configured inputs.
 *
 * Pipeline:
 * 1. Options are normalized; ignored paths carry their old values into the
 *    new tree.
 * 2. The schema-guided walk collects raw entries (see {@link diffValues}).
 * 3. Every entry is classified for replacement and the override applied.
 * 4. Entries are sorted by path.
 *
 * The function is pure: equal inputs yield equal results, and nothing is
 * shared between calls.
 *
 * @param resource - Schema of the resource type.
 * @param previous - Persisted state (an empty object when creating).
 * @param current - Newly configured inputs.
 * @param options - Ignored paths and replace override.
 * @throws {UnexpectedTypeError} when a value disagrees with its schema.
 * @throws {PropertyPathError} when an ignored path is malformed.
 */
export function diffResource(
  resource: ResourceSchema,
  previous: ObjectValue,
  current: ObjectValue,
  options: Partial<DiffOptions> = {}
): DiffResult {
  const normalizedOptions = normalizeOptions(options);
  const effective = applyIgnoreChanges(previous, current, normalizedOptions.ignoreChanges);

  const raw = diffFields(resource.fields, [], previous, effective, false);
  const result = resolveReplacements(resource, raw, normalizedOptions.replaceOverride);

  return {
    ...result,
    entries: [...result.entries].sort((a, b) => comparePropertyPaths(a.path, b.path))
  };
}

/**
 * Diffs one schema node's old and new values, returning the raw entries at
 * and below `path`.
 *
 * Evaluation order for every node:
 * 1. Reserved top-level keys (`__meta`, `__defaults`) are skipped.
 * 2. Singleton collections are unwrapped to their block element.
 * 3. Known values must match the schema's shape.
 * 4. A computed attribute the config leaves out yields nothing.
 * 5. Null and Unknown sides are classified directly
 *    (see {@link classifyAbsentOrPending}).
 * 6. Deeply equal values yield nothing.
 * 7. Otherwise the node's kind decides: scalars and dynamic values become a
 *    single `UPDATE`; lists, sets, maps and blocks recurse through their
 *    strategy.
 *
 * Trace Example:
 * _`{ tags: { env: "dev" } }` → `{ tags: { env: "prod", team: "core" } }`_
 * - `tags` (map): both known, not equal; recurse over keys `env`, `team`.
 * - `tags.env`: scalars differ → `UPDATE`.
 * - `tags.team`: old Null → `ADD`.
 *
 * @param secret - Secrecy inherited from the enclosing nodes.
 */
export function diffValues(
  node: SchemaNode,
  path: PropertyPath,
  previous: ValueTree,
  current: ValueTree,
  secret = false
): RawDiffEntry[] {
  if (isReservedKey(path)) return [];

  let shape: SchemaNode = node;
  let before = previous;
  let after = current;
  if (isSingleton(node)) {
    shape = node.elem;
    before = unwrapSingleton(previous, path);
    after = unwrapSingleton(current, path);
  }

  assertValueShape(shape, before, path);
  assertValueShape(shape, after, path);

  if (isLeftToProvider(node, after)) return [];

  const nodeSecret = deriveSecrecy(secret, node, before, after);

  const direct = classifyAbsentOrPending(path, before, after, nodeSecret);
  if (direct) return direct;

  if (valuesEqual(before, after)) return [];

  switch (shape.kind) {
    case 'scalar':
    case 'dynamic':
      return [createEntry(path, 'UPDATE', before, after, nodeSecret)];

    case 'list':
      if (before.kind === 'list' && after.kind === 'list') {
        return diffListItems(shape, path, before, after, nodeSecret, diffValues);
      }
      break;

    case 'set':
      if (before.kind === 'set' && after.kind === 'set') {
        return diffSetMembers(shape, path, before, after, nodeSecret, diffValues);
      }
      break;

    case 'map':
      if (before.kind === 'map' && after.kind === 'map') {
        return diffMapEntries(shape, path, before, after, nodeSecret, diffValues);
      }
      break;

    case 'block':
      if (before.kind === 'object' && after.kind === 'object') {
        return diffFields(shape.fields, path, before, after, nodeSecret);
      }
      break;
  }

  // Unreachable once both shapes are asserted.
  return [createEntry(path, 'UPDATE', before, after, nodeSecret)];
}

/**
 * Diffs the fields of two objects over the sorted union of their keys.
 * Fields the schema does not declare are diffed as dynamic values.
 */
function diffFields(
  fields: Readonly<Record<string, SchemaNode>>,
  path: PropertyPath,
  previous: ObjectValue,
  current: ObjectValue,
  secret: boolean
): RawDiffEntry[] {
  const keys = [...new Set([...previous.fields.keys(), ...current.fields.keys()])].sort();

  return keys.flatMap(key =>
    diffValues(
      fields[key] ?? DYNAMIC,
      appendPath(path, key),
      previous.fields.get(key) ?? nullValue(),
      current.fields.get(key) ?? nullValue(),
      secret
    )
  );
}

export type { DiffEntry, DiffKind, DiffOptions, DiffResult, RawDiffEntry } from './types';
