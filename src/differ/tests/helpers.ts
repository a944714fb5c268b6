import { diffResource } from '..';
import type { DiffOptions } from '../types';
import { entryDiffKind, type PropertyDiffKind } from '../../render/wire';
import type { ResourceSchema } from '../../schema/types';
import { decodeResource } from '../../value/codec';

/**
 * Diff Input
 * Plain (wire-level) old state and new inputs for one resource.
 */
export type DiffInput = {
  /**
   * Persisted state (previous).
   */
  previous: Record<string, unknown>;

  /**
   * Newly configured inputs (current).
   */
  current: Record<string, unknown>;

  /**
   * Optional per-scenario overrides for diff configuration.
   */
  options?: Partial<DiffOptions>;
};

/**
 * One entry reduced to what the wire format carries.
 */
export type EntrySummary = {
  key: string;
  kind: PropertyDiffKind;
};

export type DiffSummary = {
  entries: EntrySummary[];
  replace: boolean;
};

/**
 * Diff Runner
 * Represents a configured diff execution function used in tests.
 */
export type DiffRunner = (input: DiffInput) => DiffSummary;

/**
 * Creates a diff runner bound to a resource schema.
 *
 * Inputs are decoded through the schema, so scenarios can use the wire
 * sentinels for unknown and secret values. Per-scenario options are merged
 * first, so the base options win.
 *
 * @param resource - The schema every run diffs against.
 * @param baseOptions - The configuration to apply for all runs of this runner.
 */
export function createDiffRunner(
  resource: ResourceSchema,
  baseOptions: Partial<DiffOptions> = {}
): DiffRunner {
  return (input: DiffInput) => {
    const result = diffResource(
      resource,
      decodeResource(resource, input.previous),
      decodeResource(resource, input.current),
      { ...input.options, ...baseOptions }
    );

    return {
      entries: result.entries.map(entry => ({ key: entry.key, kind: entryDiffKind(entry) })),
      replace: result.replace
    };
  };
}

/**
 * Creates a runner reporting each entry's secret bit instead of its kind.
 */
export function createSecrecyRunner(
  resource: ResourceSchema
): (input: DiffInput) => Array<{ key: string; secret: boolean }> {
  return (input: DiffInput) =>
    diffResource(
      resource,
      decodeResource(resource, input.previous),
      decodeResource(resource, input.current),
      input.options
    ).entries.map(entry => ({ key: entry.key, secret: entry.secret }));
}
