import { isSingleton } from '../schema/lookup';
import type { ResourceSchema, SchemaNode } from '../schema/types';
import { listValue, mapValue, objectValue, withSecret } from '../value/builders';
import type { ObjectValue, SetValue, ValueTree } from '../value/types';

const DYNAMIC: SchemaNode = { kind: 'dynamic' };

export type OutputSecretSources = {
  /**
   * Checked inputs of the current operation.
   */
  inputs: ObjectValue;
  /**
   * Persisted outputs from the previous operation, when there is one.
   */
  prior?: ObjectValue;
  /**
   * Outputs the provider returned.
   */
  outputs: ObjectValue;
};

/**
 * Marks provider outputs secret wherever a secret must survive the round
 * trip through the provider.
 *
 * An output node becomes secret when:
 * 1. its schema node is `sensitive`;
 * 2. the corresponding input node is secret;
 * 3. the corresponding prior output node was secret.
 *
 * Correspondence follows the value shape: object fields and map keys by
 * name, list items by index, set members by content hash. Secrecy is only
 * ever added, never cleared.
 */
export function propagateOutputSecrets(
  resource: ResourceSchema,
  sources: OutputSecretSources
): ObjectValue {
  const references = sources.prior ? [sources.inputs, sources.prior] : [sources.inputs];
  return propagateFields(resource.fields, sources.outputs, references, true);
}

/**
 * Marks checked inputs secret wherever the prior inputs were secret, so that
 * secrecy the user set once keeps applying to later configurations.
 */
export function propagateInputSecrets(
  resource: ResourceSchema,
  inputs: ObjectValue,
  priorInputs: ObjectValue | undefined
): ObjectValue {
  if (!priorInputs) return inputs;
  return propagateFields(resource.fields, inputs, [priorInputs], false);
}

function propagateFields(
  fields: Readonly<Record<string, SchemaNode>>,
  target: ObjectValue,
  references: readonly ValueTree[],
  honorSensitive: boolean
): ObjectValue {
  const next = new Map<string, ValueTree>();
  for (const [key, child] of target.fields) {
    next.set(
      key,
      propagate(fields[key] ?? DYNAMIC, child, childrenByKey(references, key), honorSensitive)
    );
  }
  return objectValue(next, target.secret);
}

/**
 * Rebuilds `target` with the secret bits derived from `references`.
 */
function propagate(
  node: SchemaNode,
  target: ValueTree,
  references: readonly ValueTree[],
  honorSensitive: boolean
): ValueTree {
  const secret =
    target.secret ||
    (honorSensitive && node.sensitive === true) ||
    references.some(reference => reference.secret);

  const shape = isSingleton(node) ? node.elem : node;
  const elem = 'elem' in shape ? shape.elem : DYNAMIC;

  switch (target.kind) {
    case 'null':
    case 'unknown':
    case 'scalar':
      return withSecret(target, secret);

    case 'list':
      return listValue(
        target.items.map((item, index) =>
          propagate(elem, item, childrenByIndex(references, index), honorSensitive)
        ),
        secret
      );

    case 'set':
      return propagateSet(elem, target, references, secret, honorSensitive);

    case 'map': {
      const entries = new Map<string, ValueTree>();
      for (const [key, child] of target.entries) {
        entries.set(key, propagate(elem, child, childrenByKey(references, key), honorSensitive));
      }
      return mapValue(entries, secret);
    }

    case 'object': {
      const fields = shape.kind === 'block' ? shape.fields : {};
      return withSecret(propagateFields(fields, target, references, honorSensitive), secret);
    }
  }
}

function propagateSet(
  elem: SchemaNode,
  target: SetValue,
  references: readonly ValueTree[],
  secret: boolean,
  honorSensitive: boolean
): SetValue {
  const items = target.items.map(element => ({
    hash: element.hash,
    value: propagate(elem, element.value, childrenByHash(references, element.hash), honorSensitive)
  }));
  return { kind: 'set', items, secret };
}

function childrenByKey(references: readonly ValueTree[], key: string): ValueTree[] {
  const children: ValueTree[] = [];
  for (const reference of references) {
    const child =
      reference.kind === 'object'
        ? reference.fields.get(key)
        : reference.kind === 'map'
          ? reference.entries.get(key)
          : undefined;
    if (child) children.push(child);
  }
  return children;
}

function childrenByIndex(references: readonly ValueTree[], index: number): ValueTree[] {
  const children: ValueTree[] = [];
  for (const reference of references) {
    const child = reference.kind === 'list' ? reference.items[index] : undefined;
    if (child) children.push(child);
  }
  return children;
}

function childrenByHash(references: readonly ValueTree[], hash: string): ValueTree[] {
  const children: ValueTree[] = [];
  for (const reference of references) {
    if (reference.kind !== 'set') continue;
    const match = reference.items.find(element => element.hash === hash);
    if (match) children.push(match.value);
  }
  return children;
}
