import { META_KEY } from '../differ/replace';
import type { DiffEntry, DiffResult } from '../differ/types';
import type { ResourceSchema } from '../schema/types';

/**
 * Wire classification of one changed property.
 */
export type PropertyDiffKind =
  | 'ADD'
  | 'ADD_REPLACE'
  | 'DELETE'
  | 'DELETE_REPLACE'
  | 'UPDATE'
  | 'UPDATE_REPLACE';

/**
 * `kind` is omitted for `ADD`, the wire format's default.
 */
export type PropertyDiff = {
  kind?: Exclude<PropertyDiffKind, 'ADD'>;
};

export type DetailedDiff = Record<string, PropertyDiff>;

export type DiffChanges = 'DIFF_NONE' | 'DIFF_SOME';

/**
 * Response of a diff call, as the host engine expects it.
 */
export type DiffResponse = {
  changes: DiffChanges;
  /**
   * Top-level property names with at least one change.
   */
  diffs: string[];
  /**
   * Top-level property names with at least one replacing change.
   */
  replaces: string[];
  deleteBeforeReplace: boolean;
  detailedDiff: DetailedDiff;
  hasDetailedDiff: true;
};

export function entryDiffKind(entry: DiffEntry): PropertyDiffKind {
  return entry.replace ? `${entry.kind}_REPLACE` : entry.kind;
}

export function toPropertyDiff(kind: PropertyDiffKind): PropertyDiff {
  return kind === 'ADD' ? {} : { kind };
}

/**
 * Reads a wire entry's classification back, defaulting to `ADD`.
 */
export function propertyDiffKind(diff: PropertyDiff): PropertyDiffKind {
  return diff.kind ?? 'ADD';
}

/**
 * Converts a diff result into the wire map keyed by textual property path.
 */
export function toDetailedDiff(result: DiffResult): DetailedDiff {
  const detailedDiff: DetailedDiff = {};
  for (const entry of result.entries) {
    detailedDiff[entry.key] = toPropertyDiff(entryDiffKind(entry));
  }
  return detailedDiff;
}

/**
 * Builds the full diff response for a resource.
 *
 * `diffs` and `replaces` name top-level properties in first-seen order of the
 * sorted entries; the synthetic `__meta` entry contributes to `replaces`
 * only.
 */
export function toDiffResponse(resource: ResourceSchema, result: DiffResult): DiffResponse {
  const diffs = new Set<string>();
  const replaces = new Set<string>();

  for (const entry of result.entries) {
    const [root] = entry.path;
    if (root === undefined) continue;
    const name = String(root);
    if (entry.replace) replaces.add(name);
    if (name !== META_KEY) diffs.add(name);
  }

  return {
    changes: result.entries.length > 0 ? 'DIFF_SOME' : 'DIFF_NONE',
    diffs: [...diffs],
    replaces: [...replaces],
    deleteBeforeReplace: result.replace && resource.deleteBeforeReplace === true,
    detailedDiff: toDetailedDiff(result),
    hasDetailedDiff: true
  };
}
