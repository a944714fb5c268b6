import type { PropertyPath } from './path/property-path';
import { formatPropertyPath } from './path/property-path';

/**
 * Machine-readable error categories raised by the engine and the host layer.
 */
export const ErrorCode = {
  UnexpectedType: 'UNEXPECTED_TYPE',
  SetHash: 'SET_HASH',
  SchemaDefinition: 'SCHEMA_DEFINITION',
  PropertyPath: 'PROPERTY_PATH',
  Configuration: 'CONFIGURATION',
  ResourceEvaluation: 'RESOURCE_EVALUATION'
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type BridgeErrorContext = {
  /**
   * Property path the failure is attached to, when there is one.
   */
  path?: PropertyPath;
  /**
   * Additional structured details, copied into `toJSON()`.
   */
  details?: Record<string, unknown>;
  /**
   * Underlying error, kept as the standard `cause`.
   */
  cause?: unknown;
};

export type SerializedBridgeError = {
  name: string;
  code: ErrorCode;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

/**
 * Base class of every error the bridge raises on purpose.
 *
 * All of them are scoped to a single resource evaluation: nothing here is
 * retried, since the engine is a pure function of its inputs.
 */
export abstract class BridgeError extends Error {
  readonly code: ErrorCode;
  readonly path: PropertyPath | undefined;
  readonly details: Record<string, unknown>;

  protected constructor(
    message: string,
    code: ErrorCode,
    context: BridgeErrorContext = {}
  ) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.code = code;
    this.path = context.path;
    this.details = context.details ?? {};
  }

  toJSON(): SerializedBridgeError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.path ? { path: formatPropertyPath(this.path) } : {}),
      ...(Object.keys(this.details).length > 0 ? { details: this.details } : {})
    };
  }
}

/**
 * A configured or persisted value does not have the shape its schema declares
 * (e.g. a scalar where a list is expected). Values are never coerced.
 */
export class UnexpectedTypeError extends BridgeError {
  readonly expected: string;
  readonly actual: string;

  constructor(path: PropertyPath, expected: string, actual: string) {
    super(
      `unexpected type at field ${formatPropertyPath(path) || '<root>'}: expected ${expected}, got ${actual}`,
      ErrorCode.UnexpectedType,
      { path, details: { expected, actual } }
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A set element's identity could not be computed.
 */
export class SetHashError extends BridgeError {
  constructor(path: PropertyPath, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `cannot compute set element hash at field ${formatPropertyPath(path) || '<root>'}: ${reason}`,
      ErrorCode.SetHash,
      { path, cause }
    );
  }
}

export class SchemaDefinitionError extends BridgeError {
  constructor(path: PropertyPath, reason: string) {
    super(
      `invalid schema at ${formatPropertyPath(path) || '<root>'}: ${reason}`,
      ErrorCode.SchemaDefinition,
      { path }
    );
  }
}

export class PropertyPathError extends BridgeError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`invalid property path "${input}": ${reason}`, ErrorCode.PropertyPath, {
      details: { input }
    });
    this.input = input;
  }
}

export class ConfigurationError extends BridgeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, ErrorCode.Configuration, { details });
  }
}

/**
 * Host-layer wrapper naming the resource whose evaluation failed.
 * The original error is preserved as `cause`.
 */
export class ResourceEvaluationError extends BridgeError {
  readonly resource: string;
  readonly operation: string;

  constructor(resource: string, operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed for ${resource}: ${reason}`, ErrorCode.ResourceEvaluation, {
      cause,
      details: { resource, operation }
    });
    this.resource = resource;
    this.operation = operation;
  }
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}
