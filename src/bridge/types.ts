import type { CheckFailure } from '../check/check';
import type { PlainObject } from '../value/types';

/**
 * One resource type of the wrapped provider. Receives and returns plain
 * values with secrets stripped; the bridge re-applies secrecy.
 */
export interface WrappedResource {
  create(inputs: PlainObject): Promise<{ id: string; outputs: PlainObject }>;
  update(id: string, olds: PlainObject, news: PlainObject): Promise<PlainObject>;
}

type ResourceRequest = {
  /**
   * Logical name of the resource instance, used in logs only.
   */
  name: string;
};

export type CheckRequest = ResourceRequest & {
  news: unknown;
  olds?: unknown;
};

export type CheckResponse = {
  inputs?: PlainObject;
  failures: CheckFailure[];
};

export type DiffRequest = ResourceRequest & {
  id: string;
  /**
   * Persisted state.
   */
  olds: unknown;
  /**
   * Checked inputs.
   */
  news: unknown;
  ignoreChanges?: readonly string[];
  replaceOverride?: boolean;
};

export type CreateRequest = ResourceRequest & {
  inputs: unknown;
  /**
   * Plan only: the provider is not called and computed outputs are unknown.
   */
  preview: boolean;
};

export type CreateResponse = {
  /**
   * Empty during preview.
   */
  id: string;
  properties: PlainObject;
};

export type UpdateRequest = ResourceRequest & {
  id: string;
  olds: unknown;
  news: unknown;
  preview: boolean;
};

export type UpdateResponse = {
  properties: PlainObject;
};
