import { UnexpectedTypeError } from '../errors';
import {
  appendPath,
  formatPropertyPath,
  isReservedKey,
  type PropertyPath
} from '../path/property-path';
import { isSingleton } from '../schema/lookup';
import type { ResourceSchema, SchemaNode } from '../schema/types';
import { propagateInputSecrets } from '../secrets/outputs';
import { isAbsent } from '../utils/type-guards';
import { listValue, mapValue, objectValue, scalarValue } from '../value/builders';
import { decodeResource, encodeValue } from '../value/codec';
import { containsUnknown } from '../value/inspect';
import type { ObjectValue, ValueTree } from '../value/types';
import { validateField } from './validator';

export type CheckFailureReason = 'MISC' | 'INVALID_KEY' | 'MISSING_KEY';

export type CheckFailure = {
  /**
   * Textual path of the offending property; empty for the whole resource.
   */
  property: string;
  reason: CheckFailureReason;
  message: string;
};

type CheckReport = Pick<CheckResult, 'failures' | 'dropped'>;

export type CheckResult = {
  /**
   * Checked inputs; absent when the configuration could not be decoded.
   */
  inputs?: ObjectValue;
  failures: CheckFailure[];
  /**
   * Computed inputs removed because their validator rejected them.
   */
  dropped: string[];
};

/**
 * Validates a resource configuration against its schema and prepares it for
 * diffing.
 *
 * Logic:
 * 1. Decode: a shape mismatch is reported as a `MISC` failure and ends the
 *    check.
 * 2. Unknown keys: top-level properties the schema does not declare are
 *    `INVALID_KEY` failures.
 * 3. Per field, depth first through present blocks:
 *    - a scalar `default` fills a Null value;
 *    - a required field left Null is a `MISSING_KEY` failure (Unknown is
 *      accepted);
 *    - a validator runs on fully known values. When it rejects a computed,
 *      non-required field the value is dropped (left to the provider);
 *      other rejections are `MISC` failures.
 * 4. Secrecy of the prior inputs carries over to the checked inputs.
 *
 * @param news - Plain configuration.
 * @param olds - Plain prior inputs, when the resource exists.
 * @throws {SetHashError} when a set member cannot be hashed.
 */
export function checkResource(
  resource: ResourceSchema,
  news: unknown,
  olds?: unknown
): CheckResult {
  let decoded: ObjectValue;
  try {
    decoded = decodeResource(resource, news);
  } catch (error) {
    if (error instanceof UnexpectedTypeError) {
      return {
        failures: [
          {
            property: error.path ? formatPropertyPath(error.path) : '',
            reason: 'MISC',
            message: error.message
          }
        ],
        dropped: []
      };
    }
    throw error;
  }

  const report: CheckReport = { failures: [], dropped: [] };
  const { failures } = report;

  for (const key of decoded.fields.keys()) {
    if (isReservedKey([key]) || resource.fields[key]) continue;
    failures.push({
      property: key,
      reason: 'INVALID_KEY',
      message: `"${key}" is not a valid property`
    });
  }

  const checked = checkFields(resource.fields, decoded, [], report);
  const inputs = isAbsent(olds)
    ? checked
    : propagateInputSecrets(resource, checked, decodeResource(resource, olds));

  return { inputs, ...report };
}

function checkFields(
  fields: Readonly<Record<string, SchemaNode>>,
  value: ObjectValue,
  path: PropertyPath,
  report: CheckReport
): ObjectValue {
  const next = new Map(value.fields);

  for (const [key, node] of Object.entries(fields)) {
    const checked = checkField(node, next.get(key), appendPath(path, key), report);
    if (checked === undefined) next.delete(key);
    else next.set(key, checked);
  }

  return objectValue(next, value.secret);
}

/**
 * Checks one field.
 *
 * @returns the checked value, or `undefined` when the field is absent or
 *   dropped.
 */
function checkField(
  node: SchemaNode,
  value: ValueTree | undefined,
  path: PropertyPath,
  report: CheckReport
): ValueTree | undefined {
  const property = formatPropertyPath(path);
  let current = value;

  if ((!current || current.kind === 'null') && node.kind === 'scalar' && node.default !== undefined) {
    current = scalarValue(node.default);
  }

  if (!current || current.kind === 'null') {
    if (node.required) {
      report.failures.push({
        property,
        reason: 'MISSING_KEY',
        message: `Missing required property '${property}'`
      });
    }
    return current;
  }

  if (current.kind === 'unknown') return current;

  if (node.validate && !containsUnknown(current)) {
    const outcome = validateField(node.validate, encodeValue(current, { secrets: 'strip' }), property);
    if (!outcome.valid) {
      if (node.computed && !node.required) {
        report.dropped.push(property);
        return undefined;
      }
      report.failures.push({ property, reason: 'MISC', message: outcome.message });
      return current;
    }
  }

  return checkChildren(node, current, path, report);
}

function checkChildren(
  node: SchemaNode,
  value: ValueTree,
  path: PropertyPath,
  report: CheckReport
): ValueTree {
  if (isSingleton(node) && value.kind === 'object') {
    return checkFields(node.elem.fields, value, path, report);
  }

  switch (node.kind) {
    case 'block':
      return value.kind === 'object' ? checkFields(node.fields, value, path, report) : value;

    case 'list':
      if (value.kind !== 'list' || node.elem.kind !== 'block') return value;
      return listValue(
        value.items.map((item, index) => checkElement(node.elem, item, appendPath(path, index), report)),
        value.secret
      );

    case 'map':
      if (value.kind !== 'map' || node.elem.kind !== 'block') return value;
      return mapValue(
        new Map(
          [...value.entries].map(([key, child]): [string, ValueTree] => [
            key,
            checkElement(node.elem, child, appendPath(path, key), report)
          ])
        ),
        value.secret
      );

    // Set members keep their identity; defaults are not injected into them.
    case 'set':
    case 'scalar':
    case 'dynamic':
      return value;
  }
}

function checkElement(
  node: SchemaNode,
  value: ValueTree,
  path: PropertyPath,
  report: CheckReport
): ValueTree {
  if (node.kind !== 'block' || value.kind !== 'object') return value;
  return checkFields(node.fields, value, path, report);
}
