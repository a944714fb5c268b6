import {
  type PropertyPath,
  parsePropertyPath,
  WILDCARD
} from '../path/property-path';
import { listValue, mapValue, objectValue } from '../value/builders';
import type { ListValue, ObjectValue, ValueTree } from '../value/types';

/**
 * Carries the old values at the given paths into the new tree, so that
 * changes there produce no diff entries.
 *
 * Paths use the textual form (`a.b[0].c`); `*` matches every list index or
 * every map/object key at its position. A path whose target is missing on
 * the old side removes the target from the new side.
 *
 * @throws {PropertyPathError} when a path is malformed.
 */
export function applyIgnoreChanges(
  previous: ObjectValue,
  current: ObjectValue,
  paths: readonly string[]
): ObjectValue {
  let result: ValueTree = current;
  for (const text of paths) {
    result = applyIgnorePath(parsePropertyPath(text), previous, result);
  }
  return result.kind === 'object' ? result : current;
}

/**
 * Copies `source` into `target` along `path`.
 *
 * Logic:
 * 1. Empty path: the source value replaces the target.
 * 2. Wildcard: recurses with every index (lists, up to the shorter length)
 *    or every key present on either side (maps, objects).
 * 3. Key: when only one side holds the key at the last step, the target
 *    takes the source's presence (added or removed); when both hold it, the
 *    remaining path is applied beneath.
 * 4. Index: applied only when both lists hold the position.
 */
function applyIgnorePath(path: PropertyPath, source: ValueTree, target: ValueTree): ValueTree {
  const [head, ...rest] = path;
  if (head === undefined) return source;

  if (head === WILDCARD) {
    if (source.kind === 'list' && target.kind === 'list') {
      let result: ValueTree = target;
      const count = Math.min(source.items.length, target.items.length);
      for (let index = 0; index < count; index++) {
        result = applyIgnorePath([index, ...rest], source, result);
      }
      return result;
    }

    const sourceEntries = keyedEntries(source);
    const targetEntries = keyedEntries(target);
    if (!sourceEntries || !targetEntries) return target;

    let result: ValueTree = target;
    for (const key of new Set([...sourceEntries.keys(), ...targetEntries.keys()])) {
      result = applyIgnorePath([key, ...rest], source, result);
    }
    return result;
  }

  if (typeof head === 'number') {
    if (source.kind !== 'list' || target.kind !== 'list') return target;
    const sourceItem = source.items[head];
    const targetItem = target.items[head];
    if (!sourceItem || !targetItem) return target;
    return replaceItem(target, head, applyIgnorePath(rest, sourceItem, targetItem));
  }

  const sourceEntries = keyedEntries(source);
  const targetEntries = keyedEntries(target);
  if (!sourceEntries || !targetEntries) return target;

  const sourceChild = presentChild(sourceEntries, head);
  const targetChild = presentChild(targetEntries, head);

  if (rest.length === 0 && targetChild && !sourceChild) {
    return withEntries(target, deleteKey(targetEntries, head));
  }
  if (rest.length === 0 && sourceChild && !targetChild) {
    return withEntries(target, setKey(targetEntries, head, sourceChild));
  }
  if (!sourceChild || !targetChild) return target;

  return withEntries(target, setKey(targetEntries, head, applyIgnorePath(rest, sourceChild, targetChild)));
}

function keyedEntries(value: ValueTree): ReadonlyMap<string, ValueTree> | undefined {
  if (value.kind === 'map') return value.entries;
  if (value.kind === 'object') return value.fields;
  return undefined;
}

function presentChild(entries: ReadonlyMap<string, ValueTree>, key: string): ValueTree | undefined {
  const child = entries.get(key);
  return child && child.kind !== 'null' ? child : undefined;
}

function withEntries(target: ValueTree, entries: ReadonlyMap<string, ValueTree>): ValueTree {
  if (target.kind === 'map') return mapValue(entries, target.secret);
  if (target.kind === 'object') return objectValue(entries, target.secret);
  return target;
}

function setKey(
  entries: ReadonlyMap<string, ValueTree>,
  key: string,
  value: ValueTree
): Map<string, ValueTree> {
  const next = new Map(entries);
  next.set(key, value);
  return next;
}

function deleteKey(entries: ReadonlyMap<string, ValueTree>, key: string): Map<string, ValueTree> {
  const next = new Map(entries);
  next.delete(key);
  return next;
}

function replaceItem(target: ListValue, index: number, value: ValueTree): ListValue {
  const items = [...target.items];
  items[index] = value;
  return listValue(items, target.secret);
}
