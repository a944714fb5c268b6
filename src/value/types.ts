import type { ScalarPayload } from '../schema/types';

/**
 * Shared properties of every value node.
 */
type ValueBase = {
  /**
   * Set when the caller marked this value (or an enclosing one) as secret.
   * Never part of equality or hashing.
   */
  readonly secret: boolean;
};

export type NullValue = ValueBase & {
  readonly kind: 'null';
};

/**
 * A value that is not known yet (e.g. depends on another resource's output).
 */
export type UnknownValue = ValueBase & {
  readonly kind: 'unknown';
};

export type ScalarValue = ValueBase & {
  readonly kind: 'scalar';
  readonly value: ScalarPayload;
};

export type ListValue = ValueBase & {
  readonly kind: 'list';
  readonly items: readonly ValueTree[];
};

/**
 * One member of a set, with its content hash.
 */
export type SetElement = {
  readonly hash: string;
  readonly value: ValueTree;
};

/**
 * Unordered collection identified by content hash. Never holds two elements
 * with the same hash (duplicates collapse on construction), except elements
 * that contain unknowns, whose identity is not settled yet.
 */
export type SetValue = ValueBase & {
  readonly kind: 'set';
  readonly items: readonly SetElement[];
};

export type MapValue = ValueBase & {
  readonly kind: 'map';
  readonly entries: ReadonlyMap<string, ValueTree>;
};

/**
 * Block instance. A field missing from `fields` is equivalent to null.
 */
export type ObjectValue = ValueBase & {
  readonly kind: 'object';
  readonly fields: ReadonlyMap<string, ValueTree>;
};

export type KnownValue =
  | ScalarValue
  | ListValue
  | SetValue
  | MapValue
  | ObjectValue;

/**
 * Runtime representation of a concrete input/state tree.
 */
export type ValueTree = NullValue | UnknownValue | KnownValue;

export type ValueKind = ValueTree['kind'];

/**
 * Plain, wire-level representation: what the surrounding RPC layer carries.
 */
export type PlainValue =
  | null
  | string
  | number
  | boolean
  | PlainValue[]
  | { [key: string]: PlainValue };

export type PlainObject = { [key: string]: PlainValue };
