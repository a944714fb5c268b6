import { SetHashError, UnexpectedTypeError } from '../errors';
import type { PropertyPath } from '../path/property-path';
import { appendPath } from '../path/property-path';
import { isSingleton } from '../schema/lookup';
import type {
  ResourceSchema,
  ScalarSchema,
  SchemaNode,
  SetSchema
} from '../schema/types';
import {
  isAbsent,
  isArray,
  isBoolean,
  isNumber,
  isObject,
  isString
} from '../utils/type-guards';
import type { ElementHasher } from './builders';
import {
  listValue,
  mapValue,
  markSecret,
  nullValue,
  objectValue,
  scalarValue,
  setValue,
  unknownValue
} from './builders';
import { hashValue } from './hash';
import {
  isSecretSentinel,
  isUnknownSentinel,
  UNKNOWN_SENTINEL,
  wrapSecret
} from './sentinels';
import type { ObjectValue, PlainObject, PlainValue, ValueTree } from './types';

const DYNAMIC: SchemaNode = { kind: 'dynamic' };

/**
 * Describes a plain value's shape for error messages.
 */
export function describePlain(plain: unknown): string {
  if (isAbsent(plain)) return 'null';
  if (isString(plain)) return 'string';
  if (isNumber(plain)) return 'number';
  if (isBoolean(plain)) return 'bool';
  if (isArray(plain)) return 'list';
  if (isObject(plain)) return 'object';
  return typeof plain;
}

/**
 * Converts a plain (wire) value into a {@link ValueTree} shaped by `node`.
 *
 * Decoding rules:
 * 1. `null` / `undefined` become Null; the unknown sentinel becomes Unknown.
 * 2. A secret sentinel decodes its inner value and sets the secret bit.
 * 3. Arrays become lists or sets, objects become maps or blocks, following
 *    the schema; set members are hashed (custom schema hash when declared).
 * 4. Singleton collections accept the collapsed object, or an array of at
 *    most one element which is unwrapped.
 * 5. Block fields the schema does not declare decode as dynamic values.
 *
 * @throws {UnexpectedTypeError} when the plain shape disagrees with the schema.
 * @throws {SetHashError} when a custom set hash fails.
 */
export function decodeValue(
  node: SchemaNode,
  plain: unknown,
  path: PropertyPath = []
): ValueTree {
  if (isAbsent(plain)) return nullValue();
  if (isUnknownSentinel(plain)) return unknownValue();
  if (isSecretSentinel(plain)) {
    return markSecret(decodeValue(node, plain.value, path));
  }

  if (isSingleton(node)) {
    return decodeSingleton(node.elem, plain, path);
  }

  switch (node.kind) {
    case 'scalar':
      return decodeScalar(node, plain, path);

    case 'list': {
      if (!isArray(plain)) {
        throw new UnexpectedTypeError(path, 'list', describePlain(plain));
      }
      return listValue(
        plain.map((item, index) => decodeValue(node.elem, item, appendPath(path, index)))
      );
    }

    case 'set': {
      if (!isArray(plain)) {
        throw new UnexpectedTypeError(path, 'set', describePlain(plain));
      }
      const items = plain.map((item, index) =>
        decodeValue(node.elem, item, appendPath(path, index))
      );
      return setValue(items, false, setHasherFor(node, path));
    }

    case 'map': {
      if (!isObject(plain)) {
        throw new UnexpectedTypeError(path, 'map', describePlain(plain));
      }
      const entries = new Map<string, ValueTree>();
      for (const [key, child] of Object.entries(plain)) {
        entries.set(key, decodeValue(node.elem, child, appendPath(path, key)));
      }
      return mapValue(entries);
    }

    case 'block': {
      if (!isObject(plain)) {
        throw new UnexpectedTypeError(path, 'object', describePlain(plain));
      }
      return decodeFields(node.fields, plain, path);
    }

    case 'dynamic':
      return decodeDynamic(plain, path);
  }
}

/**
 * Decodes a whole resource property bag.
 */
export function decodeResource(
  resource: ResourceSchema,
  plain: unknown
): ObjectValue {
  if (isAbsent(plain)) return objectValue(new Map());
  if (!isObject(plain)) {
    throw new UnexpectedTypeError([], 'object', describePlain(plain));
  }
  return decodeFields(resource.fields, plain, []);
}

function decodeFields(
  fields: Readonly<Record<string, SchemaNode>>,
  plain: Record<string, unknown>,
  path: PropertyPath
): ObjectValue {
  const decoded = new Map<string, ValueTree>();
  for (const [key, child] of Object.entries(plain)) {
    decoded.set(key, decodeValue(fields[key] ?? DYNAMIC, child, appendPath(path, key)));
  }
  return objectValue(decoded);
}

function decodeSingleton(
  elem: SchemaNode,
  plain: unknown,
  path: PropertyPath
): ValueTree {
  if (isArray(plain)) {
    const [first] = plain;
    if (plain.length > 1) {
      throw new UnexpectedTypeError(path, 'at most one element', `list of ${plain.length}`);
    }
    return plain.length === 0 ? nullValue() : decodeValue(elem, first, path);
  }
  return decodeValue(elem, plain, path);
}

function decodeScalar(
  node: ScalarSchema,
  plain: unknown,
  path: PropertyPath
): ValueTree {
  switch (node.type) {
    case 'string':
      if (isString(plain)) return scalarValue(plain);
      break;
    case 'number':
      if (isNumber(plain)) return scalarValue(plain);
      break;
    case 'bool':
      if (isBoolean(plain)) return scalarValue(plain);
      break;
  }
  throw new UnexpectedTypeError(path, node.type, describePlain(plain));
}

function decodeDynamic(plain: unknown, path: PropertyPath): ValueTree {
  if (isString(plain) || isNumber(plain) || isBoolean(plain)) {
    return scalarValue(plain);
  }
  if (isArray(plain)) {
    return listValue(plain.map((item, index) => decodeValue(DYNAMIC, item, appendPath(path, index))));
  }
  if (isObject(plain)) {
    const entries = new Map<string, ValueTree>();
    for (const [key, child] of Object.entries(plain)) {
      entries.set(key, decodeValue(DYNAMIC, child, appendPath(path, key)));
    }
    return mapValue(entries);
  }
  throw new UnexpectedTypeError(path, 'plain value', describePlain(plain));
}

/**
 * Element identity for a set schema. A custom hash sees the element's plain
 * form with secrets stripped.
 */
export function setHasherFor(node: SetSchema, path: PropertyPath): ElementHasher {
  const customHash = node.hash;
  if (!customHash) return hashValue;

  return value => {
    let result: unknown;
    try {
      result = customHash(encodeValue(value, { secrets: 'strip' }));
    } catch (error) {
      throw new SetHashError(path, error);
    }
    if (isString(result)) return result;
    if (isNumber(result) && Number.isFinite(result)) return String(result);
    throw new SetHashError(path, `hash returned ${describePlain(result)}`);
  };
}

export type EncodeOptions = {
  /**
   * - `'wrap'`: secret nodes become secret sentinels (persisted form).
   * - `'strip'`: secret bits are dropped.
   */
  secrets: 'wrap' | 'strip';
};

/**
 * Converts a {@link ValueTree} back to its plain (wire) form.
 *
 * Unknowns become the unknown sentinel. A secret node is wrapped once; its
 * children are encoded without further wrapping.
 */
export function encodeValue(value: ValueTree, options: EncodeOptions): PlainValue {
  if (options.secrets === 'wrap' && value.secret) {
    return wrapSecret(encodeValue(value, { secrets: 'strip' }));
  }

  switch (value.kind) {
    case 'null':
      return null;
    case 'unknown':
      return UNKNOWN_SENTINEL;
    case 'scalar':
      return value.value;
    case 'list':
      return value.items.map(item => encodeValue(item, options));
    case 'set':
      return value.items.map(element => encodeValue(element.value, options));
    case 'map':
      return encodeEntries(value.entries, options);
    case 'object':
      return encodeEntries(value.fields, options);
  }
}

/**
 * Encodes a resource property bag.
 */
export function encodeResource(value: ObjectValue, options: EncodeOptions): PlainObject {
  return encodeEntries(value.fields, options);
}

function encodeEntries(
  entries: ReadonlyMap<string, ValueTree>,
  options: EncodeOptions
): PlainObject {
  const result: PlainObject = {};
  for (const [key, child] of entries) {
    result[key] = encodeValue(child, options);
  }
  return result;
}
