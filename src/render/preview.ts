import { Chalk, type ChalkInstance } from 'chalk';

import { diffResource } from '../differ';
import { META_KEY } from '../differ/replace';
import type { DiffEntry, DiffOptions, DiffResult } from '../differ/types';
import type { PropertyPathSegment } from '../path/property-path';
import type { ResourceSchema } from '../schema/types';
import { isAbsent } from '../utils/type-guards';
import { objectValue } from '../value/builders';
import { decodeResource } from '../value/codec';
import type { ValueTree } from '../value/types';

export type PreviewOperation = 'create' | 'update' | 'replace' | 'delete' | 'same';

/**
 * One resource block of a preview.
 */
export type ResourcePreview = {
  token: string;
  name: string;
  operation: PreviewOperation;
  result: DiffResult;
};

export type PreviewOptions = {
  /**
   * Colour the action markers with ANSI escapes.
   */
  color: boolean;
};

const OPERATION_MARKERS: Record<PreviewOperation, string> = {
  create: '+',
  update: '~',
  replace: '+-',
  delete: '-',
  same: ' '
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * A node of the path tree built from a result's entries. Inner nodes exist
 * only to group the entries below them.
 */
type PreviewNode = {
  label: string;
  entry?: DiffEntry;
  children: Map<string, PreviewNode>;
};

/**
 * Renders resources into the line-oriented preview text.
 *
 * Layout per resource, in the order given:
 * 1. Header: `<marker> <token> <name> (<operation>)`.
 * 2. One line per path node, indented `4 + 4 * depth` spaces.
 *    - entries: `<marker> <label>: <value>`, with `old => new` for updates;
 *    - inner nodes: `~ <label>`, or `+- <label>` when an entry below
 *      replaces.
 *
 * Markers: `+` add, `-` delete, `~` update, `+-` replace. Secret values
 * render as `[secret]`, pending ones as `[unknown]`.
 */
export function renderPreview(
  resources: readonly ResourcePreview[],
  options: PreviewOptions
): string {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const lines: string[] = [];

  for (const resource of resources) {
    const marker = OPERATION_MARKERS[resource.operation];
    lines.push(
      `${paintMarker(chalk, marker)} ${resource.token} ${resource.name} (${resource.operation})`
    );

    const root = buildTree(resource.result.entries);
    for (const child of root.children.values()) {
      renderNode(chalk, child, 0, lines);
    }
  }

  return lines.join('\n');
}

/**
 * Derives the operation shown in a resource header.
 */
export function previewOperation(
  result: DiffResult,
  state: { created?: boolean; deleted?: boolean } = {}
): PreviewOperation {
  if (state.created) return 'create';
  if (state.deleted) return 'delete';
  if (result.replace) return 'replace';
  return result.entries.length > 0 ? 'update' : 'same';
}

/**
 * Decodes, diffs and renders a single resource.
 *
 * A missing old state previews a create; missing new inputs preview a
 * delete.
 */
export function previewResourceDiff(
  resource: ResourceSchema,
  name: string,
  previous: unknown,
  current: unknown,
  options: PreviewOptions & Partial<DiffOptions>
): string {
  const { color, ...diffOptions } = options;
  const created = isAbsent(previous);
  const deleted = isAbsent(current);

  const result = diffResource(
    resource,
    created ? objectValue(new Map()) : decodeResource(resource, previous),
    deleted ? objectValue(new Map()) : decodeResource(resource, current),
    diffOptions
  );

  return renderPreview(
    [
      {
        token: resource.token,
        name,
        operation: previewOperation(result, { created, deleted }),
        result
      }
    ],
    { color }
  );
}

function buildTree(entries: readonly DiffEntry[]): PreviewNode {
  const root: PreviewNode = { label: '', children: new Map() };

  for (const entry of entries) {
    if (entry.key === META_KEY) continue;

    let node = root;
    for (const segment of entry.path) {
      const label = segmentLabel(segment);
      let child = node.children.get(label);
      if (!child) {
        child = { label, children: new Map() };
        node.children.set(label, child);
      }
      node = child;
    }
    node.entry = entry;
  }

  return root;
}

function renderNode(chalk: ChalkInstance, node: PreviewNode, depth: number, lines: string[]): void {
  const indent = ' '.repeat(4 + 4 * depth);
  const { entry } = node;

  if (entry) {
    const marker = entryMarker(entry);
    lines.push(`${indent}${paintMarker(chalk, marker)} ${node.label}: ${entryValue(entry)}`);
    return;
  }

  const marker = subtreeReplaces(node) ? '+-' : '~';
  lines.push(`${indent}${paintMarker(chalk, marker)} ${node.label}`);
  for (const child of node.children.values()) {
    renderNode(chalk, child, depth + 1, lines);
  }
}

function entryMarker(entry: DiffEntry): string {
  if (entry.replace) return '+-';
  switch (entry.kind) {
    case 'ADD':
      return '+';
    case 'DELETE':
      return '-';
    case 'UPDATE':
      return '~';
  }
}

function entryValue(entry: DiffEntry): string {
  if (entry.secret) {
    return entry.kind === 'UPDATE' ? '[secret] => [secret]' : '[secret]';
  }
  switch (entry.kind) {
    case 'ADD':
      return formatValue(entry.newValue);
    case 'DELETE':
      return formatValue(entry.oldValue);
    case 'UPDATE':
      return `${formatValue(entry.oldValue)} => ${formatValue(entry.newValue)}`;
  }
}

function subtreeReplaces(node: PreviewNode): boolean {
  if (node.entry?.replace) return true;
  for (const child of node.children.values()) {
    if (subtreeReplaces(child)) return true;
  }
  return false;
}

function paintMarker(chalk: ChalkInstance, marker: string): string {
  switch (marker) {
    case '+':
      return chalk.green(marker);
    case '-':
      return chalk.red(marker);
    case '~':
      return chalk.yellow(marker);
    case '+-':
      return chalk.magenta(marker);
    default:
      return marker;
  }
}

function segmentLabel(segment: PropertyPathSegment): string {
  if (typeof segment === 'number') return `[${segment}]`;
  return IDENTIFIER.test(segment) ? segment : JSON.stringify(segment);
}

/**
 * Compact single-line rendering of a value. Set members are ordered by hash,
 * so permuted sets render alike.
 */
export function formatValue(value: ValueTree): string {
  if (value.secret) return '[secret]';

  switch (value.kind) {
    case 'null':
      return 'null';
    case 'unknown':
      return '[unknown]';
    case 'scalar':
      return typeof value.value === 'string' ? JSON.stringify(value.value) : String(value.value);
    case 'list':
      return `[${value.items.map(formatValue).join(', ')}]`;
    case 'set':
      return `[${[...value.items]
        .sort((left, right) => (left.hash < right.hash ? -1 : left.hash > right.hash ? 1 : 0))
        .map(element => formatValue(element.value))
        .join(', ')}]`;
    case 'map':
      return formatEntries(value.entries);
    case 'object':
      return formatEntries(value.fields);
  }
}

function formatEntries(entries: ReadonlyMap<string, ValueTree>): string {
  const keys = [...entries.keys()].sort();
  const parts = keys.map(key => {
    const child = entries.get(key);
    return `${segmentLabel(key)}: ${child ? formatValue(child) : 'null'}`;
  });
  return `{${parts.join(', ')}}`;
}
