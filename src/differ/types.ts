import type { PropertyPath } from '../path/property-path';
import type { ValueTree } from '../value/types';

/**
 * Base classification of one changed path.
 */
export type DiffKind = 'ADD' | 'DELETE' | 'UPDATE';

/**
 * One changed node, as produced by the structural walk before replacement
 * is resolved.
 */
export type RawDiffEntry = {
  /**
   * Logical path from the resource root to the changed node
   * (e.g. `["tests", 2, "nested"]`).
   */
  path: PropertyPath;

  /**
   * Canonical textual form of `path` (e.g. `tests[2].nested`); unique within
   * a result.
   */
  key: string;

  kind: DiffKind;

  /**
   * Whether the node or any input contributing to it is secret.
   */
  secret: boolean;

  /**
   * Old side of the change; Null for `ADD`.
   */
  oldValue: ValueTree;

  /**
   * New side of the change; Null for `DELETE`.
   */
  newValue: ValueTree;
};

/**
 * A fully resolved diff entry.
 */
export type DiffEntry = RawDiffEntry & {
  /**
   * Set when the change is governed by a `forceNew` schema node.
   */
  replace: boolean;
};

/**
 * Outcome of one resource diff.
 */
export type DiffResult = {
  /**
   * Changed paths, sorted by path. A path appears at most once.
   */
  entries: DiffEntry[];

  /**
   * Logical OR of every entry's `replace` bit.
   */
  replace: boolean;
};

export type DiffOptions = {
  /**
   * Property paths (textual form, wildcards allowed) whose changes are
   * ignored: the old value is carried into the new tree before diffing.
   */
  ignoreChanges: readonly string[];

  /**
   * Overrides the replace decision.
   *
   * - `true`: the result is always a replace; when no entry replaces, a
   *   `__meta` entry carrying the replace is added.
   * - `false`: every entry is demoted to a non-replacing change.
   * - `undefined`: the computed decision stands.
   */
  replaceOverride?: boolean;
};
