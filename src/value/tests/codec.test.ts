import { describe, expect, test } from 'vitest';

import {
  block,
  defineResourceSchema,
  list,
  map,
  number,
  set,
  string
} from '../../schema/define';
import { listValue, objectValue, scalarValue, unknownValue } from '../builders';
import { decodeResource, decodeValue, encodeResource, encodeValue } from '../codec';
import {
  SECRET_SIGNATURE_KEY,
  SECRET_SIGNATURE_VALUE,
  UNKNOWN_SENTINEL,
  wrapSecret
} from '../sentinels';

const resource = defineResourceSchema({
  token: 'test:index:Queue',
  fields: {
    name: string({ optional: true }),
    retries: number({ optional: true }),
    tags: map(string(), { optional: true }),
    zones: set(string(), { optional: true }),
    policy: list(block({ ttl: number({ optional: true }) }), { optional: true, singleton: true }),
    regions: set(string(), { optional: true, hash: element => String(element).toLowerCase() })
  }
});

describe('Value codec', () => {
  describe('decodeValue', () => {
    test('absent and null values decode to Null', () => {
      expect(decodeValue(string(), undefined)).toStrictEqual({ kind: 'null', secret: false });
      expect(decodeValue(string(), null)).toStrictEqual({ kind: 'null', secret: false });
    });

    test('the unknown sentinel decodes to Unknown', () => {
      expect(decodeValue(string(), UNKNOWN_SENTINEL)).toStrictEqual(unknownValue());
    });

    test('a secret sentinel marks the decoded value secret', () => {
      expect(decodeValue(string(), wrapSecret('test-secret'))).toStrictEqual(
        scalarValue('test-secret', true)
      );
    });

    test('lists keep order', () => {
      expect(decodeValue(list(number()), [3, 1])).toStrictEqual(
        listValue([scalarValue(3), scalarValue(1)])
      );
    });

    test('undeclared fields decode as plain values', () => {
      const decoded = decodeResource(resource, { extra: [1, 'a'] });
      expect(decoded.fields.get('extra')).toStrictEqual(listValue([scalarValue(1), scalarValue('a')]));
    });

    test('a missing resource decodes to an empty object', () => {
      expect(decodeResource(resource, undefined)).toStrictEqual(objectValue(new Map()));
    });
  });

  describe('sets', () => {
    test('duplicate members collapse', () => {
      const decoded = decodeValue(set(string()), ['a', 'b', 'a']);
      expect(decoded.kind === 'set' ? decoded.items.length : -1).toBe(2);
    });

    test('secret bits of collapsed duplicates are merged', () => {
      const decoded = decodeValue(set(string()), ['a', wrapSecret('a')]);
      expect(decoded.kind === 'set' ? decoded.items.map(element => element.value) : []).toStrictEqual([
        scalarValue('a', true)
      ]);
    });

    test('unknown members are never collapsed', () => {
      const decoded = decodeValue(set(string()), [UNKNOWN_SENTINEL, UNKNOWN_SENTINEL]);
      expect(decoded.kind === 'set' ? decoded.items.length : -1).toBe(2);
    });

    test('a custom hash decides identity', () => {
      const decoded = decodeResource(resource, { regions: ['North', 'north'] });
      const regions = decoded.fields.get('regions');
      expect(regions?.kind === 'set' ? regions.items.map(element => element.hash) : []).toStrictEqual([
        'north'
      ]);
    });
  });

  describe('encodeValue', () => {
    test('wraps secret values once, without nested wrapping', () => {
      const decoded = decodeResource(resource, {
        tags: wrapSecret({ env: wrapSecret('prod') })
      });

      expect(encodeResource(decoded, { secrets: 'wrap' })).toStrictEqual({
        tags: {
          [SECRET_SIGNATURE_KEY]: SECRET_SIGNATURE_VALUE,
          value: { env: 'prod' }
        }
      });
    });

    test('strips secrets and restores sentinels for unknowns', () => {
      const decoded = decodeResource(resource, {
        name: wrapSecret('test-secret'),
        retries: UNKNOWN_SENTINEL
      });

      expect(encodeResource(decoded, { secrets: 'strip' })).toStrictEqual({
        name: 'test-secret',
        retries: UNKNOWN_SENTINEL
      });
    });

    test('singletons encode as the collapsed object', () => {
      const decoded = decodeResource(resource, { policy: [{ ttl: 30 }] });
      expect(encodeResource(decoded, { secrets: 'wrap' })).toStrictEqual({ policy: { ttl: 30 } });
    });

    test('sets encode as arrays', () => {
      expect(encodeValue(decodeValue(set(string()), ['x']), { secrets: 'wrap' })).toStrictEqual(['x']);
    });
  });
});
