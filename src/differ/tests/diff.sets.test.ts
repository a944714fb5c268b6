import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import type { DiffInput, DiffSummary } from './helpers';
import { createDiffRunner } from './helpers';
import { block, defineResourceSchema, number, set, string } from '../../schema/define';
import { UNKNOWN_SENTINEL } from '../../value/sentinels';

const ruleBlock = block({
  port: number({ optional: true }),
  proto: string({ optional: true })
});

const group = defineResourceSchema({
  token: 'test:index:SecurityGroup',
  fields: {
    members: set(string(), { optional: true }),
    ingress: set(ruleBlock, { optional: true }),
    rules: set(ruleBlock, { optional: true, forceNew: true })
  }
});

describe('Sets: permutation invariance, dedup, insertion, hash-rank pairing, pending members.', () => {
  const run = createDiffRunner(group);

  describe('Identity', () => {
    const scenarios: Array<TestScenario<DiffInput, DiffSummary>> = [
      {
        id: 'Permutation',
        description: 'Reordering members is not a change.',
        input: {
          previous: { members: ['a', 'b', 'c'] },
          current: { members: ['c', 'a', 'b'] }
        },
        expected: { entries: [], replace: false }
      },
      {
        id: 'Duplicate',
        description: 'A repeated member collapses into the existing one.',
        input: {
          previous: { members: ['a', 'b'] },
          current: { members: ['a', 'b', 'a'] }
        },
        expected: { entries: [], replace: false }
      },
      {
        id: 'Block Permutation',
        description: 'Block members are identified by content, not position.',
        input: {
          previous: { ingress: [{ port: 22, proto: 'tcp' }, { port: 80, proto: 'tcp' }] },
          current: { ingress: [{ port: 80, proto: 'tcp' }, { port: 22, proto: 'tcp' }] }
        },
        expected: { entries: [], replace: false }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Membership Changes', () => {
    const scenarios: Array<TestScenario<DiffInput, DiffSummary>> = [
      {
        id: 'Insert',
        description: 'A new member is a single ADD, with no positional shift.',
        input: {
          previous: { members: ['val2', 'val3'] },
          current: { members: ['val1', 'val2', 'val3'] }
        },
        expected: { entries: [{ key: 'members[0]', kind: 'ADD' }], replace: false }
      },
      {
        id: 'Insert Any Order',
        description: 'The literal order of the new members does not matter.',
        input: {
          previous: { members: ['val2', 'val3'] },
          current: { members: ['val3', 'val1', 'val2'] }
        },
        expected: { entries: [{ key: 'members[0]', kind: 'ADD' }], replace: false }
      },
      {
        id: 'Remove',
        description: 'A vanished member is a single DELETE.',
        input: {
          previous: { members: ['a', 'b'] },
          current: { members: ['a'] }
        },
        expected: { entries: [{ key: 'members[0]', kind: 'DELETE' }], replace: false }
      },
      {
        id: 'Swap Member',
        description: 'One removed and one added member pair into an UPDATE.',
        input: {
          previous: { members: ['a', 'b'] },
          current: { members: ['a', 'c'] }
        },
        expected: { entries: [{ key: 'members[0]', kind: 'UPDATE' }], replace: false }
      },
      {
        id: 'Surplus Removed',
        description: 'Removed members beyond the added ones are DELETEs after the pairs.',
        input: {
          previous: { members: ['a', 'b', 'c'] },
          current: { members: ['a', 'd'] }
        },
        expected: {
          entries: [
            { key: 'members[0]', kind: 'UPDATE' },
            { key: 'members[1]', kind: 'DELETE' }
          ],
          replace: false
        }
      },
      {
        id: 'Element Field',
        description: 'A paired block member reports the field that changed.',
        input: {
          previous: { ingress: [{ port: 80, proto: 'tcp' }, { port: 22, proto: 'tcp' }] },
          current: { ingress: [{ port: 80, proto: 'tcp' }, { port: 22, proto: 'udp' }] }
        },
        expected: { entries: [{ key: 'ingress[0].proto', kind: 'UPDATE' }], replace: false }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Pending Members and ForceNew', () => {
    const scenarios: Array<TestScenario<DiffInput, DiffSummary>> = [
      {
        id: 'Unknown Member',
        description: 'A member that is not known yet collapses the set to one UPDATE.',
        input: {
          previous: { members: ['a'] },
          current: { members: ['a', UNKNOWN_SENTINEL] }
        },
        expected: { entries: [{ key: 'members', kind: 'UPDATE' }], replace: false }
      },
      {
        id: 'ForceNew Element Changed',
        description: 'Changing a member of a forceNew set replaces the resource.',
        input: {
          previous: { rules: [{ port: 80, proto: 'tcp' }] },
          current: { rules: [{ port: 8080, proto: 'tcp' }] }
        },
        expected: { entries: [{ key: 'rules[0].port', kind: 'UPDATE_REPLACE' }], replace: true }
      },
      {
        id: 'ForceNew Permutation',
        description: 'Reordering a forceNew set is still no change.',
        input: {
          previous: { rules: [{ port: 80 }, { port: 443 }] },
          current: { rules: [{ port: 443 }, { port: 80 }] }
        },
        expected: { entries: [], replace: false }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });
});
