import { PropertyPathError } from '../errors';
import { isNumber, isString } from '../utils/type-guards';

/**
 * PropertyPath segments: a string key (object field or map key) or a numeric
 * index (list element, or synthetic set position).
 */
export type PropertyPathSegment = string | number;

/**
 * A logical address of one node in a value tree, e.g. `["tests", 2, "nested"]`.
 */
export type PropertyPath = readonly PropertyPathSegment[];

/**
 * Wildcard segment accepted by {@link parsePropertyPath} (`[*]` / `.*`).
 */
export const WILDCARD = '*';

/**
 * Keys the host engine reserves for its own bookkeeping. Never diffed.
 */
const RESERVED_KEYS: ReadonlySet<string> = new Set(['__meta', '__defaults']);

const SIMPLE_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Textual addressing of a node
 * ----------------------------
 * The detailed-diff wire format keys every entry by a dotted/bracketed path:
 *
 *   tests[2].nested
 *   tags["kubernetes.io/name"]
 *
 * Encoding rules:
 * 1. Numeric segments render as `[n]`.
 * 2. String segments that are simple identifiers render as `.key`
 *    (without the dot when leading).
 * 3. Any other string renders as `["..."]` with JSON string escaping,
 *    which keeps the encoding injective.
 *
 * @param path
 *   Logical path to format.
 * @returns
 *   The canonical textual key. The empty path formats as `""`.
 */
export function formatPropertyPath(path: PropertyPath): string {
  let result = '';
  for (const segment of path) {
    if (isNumber(segment)) {
      result += `[${segment}]`;
    } else if (SIMPLE_KEY.test(segment)) {
      result += result.length === 0 ? segment : `.${segment}`;
    } else {
      result += `[${JSON.stringify(segment)}]`;
    }
  }
  return result;
}

/**
 * Parses the textual form produced by {@link formatPropertyPath}.
 *
 * Also accepted, for user-authored paths (e.g. ignore-changes lists):
 * - dotted keys that are not simple identifiers, as long as they contain no
 *   `.`, `[` or `]` (e.g. `tags.my-key`);
 * - the wildcard `*` as `.*` or `[*]`.
 *
 * @throws {PropertyPathError} on empty input, unterminated brackets,
 *   empty keys or trailing dots.
 */
export function parsePropertyPath(text: string): PropertyPathSegment[] {
  if (text.length === 0) {
    throw new PropertyPathError(text, 'path is empty');
  }

  const segments: PropertyPathSegment[] = [];
  let index = 0;

  while (index < text.length) {
    const char = text[index];

    if (char === '[') {
      const [segment, next] = readBracketSegment(text, index);
      segments.push(segment);
      index = next;
      continue;
    }

    if (char === '.') {
      if (segments.length === 0) {
        throw new PropertyPathError(text, 'path cannot start with "."');
      }
      index += 1;
    }

    const start = index;
    while (index < text.length && text[index] !== '.' && text[index] !== '[') {
      if (text[index] === ']') {
        throw new PropertyPathError(text, `unexpected "]" at ${index}`);
      }
      index += 1;
    }
    if (index === start) {
      throw new PropertyPathError(text, `empty key at ${start}`);
    }
    segments.push(text.slice(start, index));
  }

  return segments;
}

/**
 * Reads one `[...]` segment starting at `open`.
 *
 * @returns the segment and the index just past the closing bracket.
 */
function readBracketSegment(
  text: string,
  open: number
): [PropertyPathSegment, number] {
  const close = findClosingBracket(text, open);
  const body = text.slice(open + 1, close);

  if (body === WILDCARD) return [WILDCARD, close + 1];

  if (/^\d+$/.test(body)) return [Number(body), close + 1];

  if (body.startsWith('"')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new PropertyPathError(text, `malformed quoted key at ${open}`);
    }
    if (!isString(parsed)) {
      throw new PropertyPathError(text, `malformed quoted key at ${open}`);
    }
    return [parsed, close + 1];
  }

  throw new PropertyPathError(
    text,
    `expected an index, "*" or a quoted key at ${open}`
  );
}

/**
 * Finds the `]` matching the `[` at `open`, skipping over quoted strings
 * (which may themselves contain brackets).
 */
function findClosingBracket(text: string, open: number): number {
  let inString = false;
  for (let index = open + 1; index < text.length; index++) {
    const char = text[index];
    if (inString) {
      if (char === '\\') {
        index += 1;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') inString = true;
    else if (char === ']') return index;
  }
  throw new PropertyPathError(text, `unterminated "[" at ${open}`);
}

/**
 * Returns a new path with `segment` appended. Does not mutate `path`.
 */
export function appendPath(
  path: PropertyPath,
  segment: PropertyPathSegment
): PropertyPath {
  return [...path, segment];
}

/**
 * `true` when `path` is a top-level property reserved by the host engine.
 * Nested keys with the same names are ordinary user data.
 */
export function isReservedKey(path: PropertyPath): boolean {
  const [root] = path;
  return path.length === 1 && isString(root) && RESERVED_KEYS.has(root);
}

/**
 * Orders paths segment-wise: indices numerically, keys by code unit,
 * an index before a key, a prefix before its extensions.
 */
export function comparePropertyPaths(a: PropertyPath, b: PropertyPath): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === right || left === undefined || right === undefined) continue;
    if (isNumber(left) && isNumber(right)) return left - right;
    if (isNumber(left)) return -1;
    if (isNumber(right)) return 1;
    return left < right ? -1 : 1;
  }
  return a.length - b.length;
}
