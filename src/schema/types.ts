import type { StandardSchemaV1 } from '@standard-schema/spec';

/**
 * Scalar leaf types of the wrapped provider's type system.
 */
export type ScalarType = 'string' | 'number' | 'bool';

/**
 * Plain scalar payload carried by a known scalar value.
 */
export type ScalarPayload = string | number | boolean;

/**
 * Field-level validator. Any Standard Schema V1 implementation (Zod,
 * Valibot, ArkType, ...) can be attached; it must validate synchronously.
 */
export type FieldValidator = StandardSchemaV1;

/**
 * Computes a set element's identity from its plain (wire) form.
 * Mirrors provider-defined set hashing; the default is a structural hash.
 */
export type SetHashFunction = (element: unknown) => string | number;

/**
 * Flags shared by every schema node.
 */
type SchemaFlags = {
  /**
   * The user must supply a value.
   */
  readonly required?: boolean;
  /**
   * The user may supply a value.
   */
  readonly optional?: boolean;
  /**
   * The provider fills the value when the user leaves it out.
   */
  readonly computed?: boolean;
  /**
   * Any structural change reachable through this node replaces the owning
   * resource.
   */
  readonly forceNew?: boolean;
  /**
   * Persisted values under this node are always wrapped as secrets.
   */
  readonly sensitive?: boolean;
  /**
   * Validator run by Check on known values.
   */
  readonly validate?: FieldValidator;
};

export type ScalarSchema = SchemaFlags & {
  readonly kind: 'scalar';
  readonly type: ScalarType;
  /**
   * Applied by Check when the configured value is null.
   */
  readonly default?: ScalarPayload;
};

export type ListSchema = SchemaFlags & {
  readonly kind: 'list';
  readonly elem: SchemaNode;
  /**
   * Collapse the (at most one element) list of blocks into a single object.
   */
  readonly singleton?: boolean;
  readonly maxItems?: number;
};

export type SetSchema = SchemaFlags & {
  readonly kind: 'set';
  readonly elem: SchemaNode;
  readonly singleton?: boolean;
  readonly maxItems?: number;
  readonly hash?: SetHashFunction;
};

export type MapSchema = SchemaFlags & {
  readonly kind: 'map';
  readonly elem: SchemaNode;
};

export type BlockSchema = SchemaFlags & {
  readonly kind: 'block';
  readonly fields: Readonly<Record<string, SchemaNode>>;
};

/**
 * A value with no declared shape. Compared by deep equality and diffed as a
 * single unit; also used for persisted fields the schema no longer knows.
 */
export type DynamicSchema = SchemaFlags & {
  readonly kind: 'dynamic';
};

export type CollectionSchema = ListSchema | SetSchema;

/**
 * Static, read-only description of one node of a resource's shape.
 */
export type SchemaNode =
  | ScalarSchema
  | ListSchema
  | SetSchema
  | MapSchema
  | BlockSchema
  | DynamicSchema;

export type SchemaKind = SchemaNode['kind'];

/**
 * Top-level description of a resource type.
 */
export type ResourceSchema = {
  /**
   * Resource type token, e.g. `test:index:Thing`.
   */
  readonly token: string;
  readonly fields: Readonly<Record<string, SchemaNode>>;
  /**
   * Reported on replace decisions: the old resource must be deleted before
   * its replacement is created.
   */
  readonly deleteBeforeReplace?: boolean;
};
