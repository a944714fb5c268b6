import type { ScalarPayload } from '../schema/types';
import { hashValue } from './hash';
import { containsUnknown } from './inspect';
import type {
  ListValue,
  MapValue,
  NullValue,
  ObjectValue,
  ScalarValue,
  SetElement,
  SetValue,
  UnknownValue,
  ValueTree
} from './types';

/**
 * Computes the identity of a set member. Defaults to {@link hashValue}.
 */
export type ElementHasher = (value: ValueTree) => string;

type Entries = ReadonlyMap<string, ValueTree> | Readonly<Record<string, ValueTree>>;

export function nullValue(secret = false): NullValue {
  return { kind: 'null', secret };
}

export function unknownValue(secret = false): UnknownValue {
  return { kind: 'unknown', secret };
}

export function scalarValue(value: ScalarPayload, secret = false): ScalarValue {
  return { kind: 'scalar', value, secret };
}

export function listValue(items: readonly ValueTree[], secret = false): ListValue {
  return { kind: 'list', items, secret };
}

export function mapValue(entries: Entries, secret = false): MapValue {
  return { kind: 'map', entries: toMap(entries), secret };
}

export function objectValue(fields: Entries, secret = false): ObjectValue {
  return { kind: 'object', fields: toMap(fields), secret };
}

/**
 * Builds a set, collapsing members with equal hashes.
 *
 * Collapse rules:
 * 1. The first occurrence keeps its position; later duplicates only
 *    contribute their secret bits.
 * 2. Members containing an unknown are kept as-is (never collapsed): two
 *    unknowns may resolve to different values.
 *
 * @param items  Members in caller order.
 * @param hasher Identity function; throws propagate to the caller.
 */
export function setValue(
  items: readonly ValueTree[],
  secret = false,
  hasher: ElementHasher = hashValue
): SetValue {
  const elements: SetElement[] = [];
  const positionByHash = new Map<string, number>();

  for (const item of items) {
    const hash = hasher(item);

    if (containsUnknown(item)) {
      elements.push({ hash, value: item });
      continue;
    }

    const position = positionByHash.get(hash);
    const existing = position === undefined ? undefined : elements[position];
    if (position === undefined || !existing) {
      positionByHash.set(hash, elements.length);
      elements.push({ hash, value: item });
      continue;
    }

    elements[position] = { hash, value: mergeSecretBits(existing.value, item) };
  }

  return { kind: 'set', items: elements, secret };
}

/**
 * Returns `value` with its own secret bit set to `secret`.
 */
export function withSecret<T extends ValueTree>(value: T, secret: boolean): T {
  if (value.secret === secret) return value;
  return { ...value, secret };
}

/**
 * Marks a value (not its children) as secret.
 */
export function markSecret<T extends ValueTree>(value: T): T {
  return withSecret(value, true);
}

/**
 * ORs the secret bits of two structurally equal values into `target`'s shape.
 * Where the shapes diverge, `target`'s children are kept as they are.
 */
export function mergeSecretBits(target: ValueTree, source: ValueTree): ValueTree {
  const secret = target.secret || source.secret;

  if (target.kind === 'list' && source.kind === 'list') {
    const items = target.items.map((item, index) => {
      const other = source.items[index];
      return other ? mergeSecretBits(item, other) : item;
    });
    return listValue(items, secret);
  }

  if (target.kind === 'set' && source.kind === 'set') {
    const sourceByHash = new Map(
      source.items.map((element): [string, ValueTree] => [element.hash, element.value])
    );
    const items = target.items.map(element => {
      const other = sourceByHash.get(element.hash);
      return other ? { hash: element.hash, value: mergeSecretBits(element.value, other) } : element;
    });
    return { kind: 'set', items, secret };
  }

  if (target.kind === 'map' && source.kind === 'map') {
    return mapValue(mergeEntries(target.entries, source.entries), secret);
  }

  if (target.kind === 'object' && source.kind === 'object') {
    return objectValue(mergeEntries(target.fields, source.fields), secret);
  }

  return withSecret(target, secret);
}

function mergeEntries(
  target: ReadonlyMap<string, ValueTree>,
  source: ReadonlyMap<string, ValueTree>
): Map<string, ValueTree> {
  const merged = new Map<string, ValueTree>();
  for (const [key, child] of target) {
    const other = source.get(key);
    merged.set(key, other ? mergeSecretBits(child, other) : child);
  }
  return merged;
}

function toMap(entries: Entries): ReadonlyMap<string, ValueTree> {
  if (isReadonlyMap(entries)) return entries;
  return new Map(Object.entries(entries));
}

function isReadonlyMap(entries: Entries): entries is ReadonlyMap<string, ValueTree> {
  return entries instanceof Map;
}
