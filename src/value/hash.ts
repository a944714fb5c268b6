import { createHash } from 'node:crypto';

import type { ValueTree } from './types';

/**
 * Canonical encoding used for content hashing.
 *
 * Properties:
 * 1. Deterministic: map/object keys are sorted, set members are encoded by
 *    their sorted hashes, so insertion order never matters.
 * 2. Null-transparent maps and objects: null entries are omitted, making a
 *    missing key and an explicit null hash alike.
 * 3. Secret-blind: the secret bit is not encoded.
 *
 * Tags keep kinds apart (`s:"1"` vs `n:1`, list vs set vs map).
 */
export function canonicalEncoding(value: ValueTree): string {
  switch (value.kind) {
    case 'null':
      return 'null';
    case 'unknown':
      return '?';
    case 'scalar':
      switch (typeof value.value) {
        case 'string':
          return `s:${JSON.stringify(value.value)}`;
        case 'number':
          return `n:${encodeNumber(value.value)}`;
        default:
          return `b:${value.value}`;
      }
    case 'list':
      return `l[${value.items.map(canonicalEncoding).join(',')}]`;
    case 'set':
      return `s{${value.items
        .map(element => element.hash)
        .sort()
        .join(',')}}`;
    case 'map':
      return `m{${encodeEntries(value.entries)}}`;
    case 'object':
      return `o{${encodeEntries(value.fields)}}`;
  }
}

function encodeEntries(
  entries: ReadonlyMap<string, ValueTree>
): string {
  const parts: string[] = [];
  for (const key of [...entries.keys()].sort()) {
    const child = entries.get(key);
    if (!child || child.kind === 'null') continue;
    parts.push(`${JSON.stringify(key)}:${canonicalEncoding(child)}`);
  }
  return parts.join(',');
}

/**
 * `-0` and `0` are the same configuration value.
 */
function encodeNumber(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}

/**
 * Deterministic structural hash of a value: sha-256 over its
 * {@link canonicalEncoding}, hex encoded.
 */
export function hashValue(value: ValueTree): string {
  return createHash('sha256').update(canonicalEncoding(value)).digest('hex');
}
