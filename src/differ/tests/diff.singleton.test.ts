import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import type { DiffInput, DiffSummary } from './helpers';
import { createDiffRunner } from './helpers';
import { block, defineResourceSchema, list, number, string } from '../../schema/define';

const listener = defineResourceSchema({
  token: 'test:index:Listener',
  fields: {
    rule: list(
      block({
        port: number({ optional: true }),
        proto: string({ optional: true, forceNew: true })
      }),
      { optional: true, singleton: true, maxItems: 1 }
    )
  }
});

describe('Singleton collapse: collapsed and array forms, empty <-> populated transitions.', () => {
  const run = createDiffRunner(listener);

  const scenarios: Array<TestScenario<DiffInput, DiffSummary>> = [
    {
      id: 'Collapsed Field',
      description: 'Fields of the collapsed block are addressed without an index.',
      input: {
        previous: { rule: { port: 80 } },
        current: { rule: { port: 443 } }
      },
      expected: { entries: [{ key: 'rule.port', kind: 'UPDATE' }], replace: false }
    },
    {
      id: 'Array Form',
      description: 'A one-element array is the same value as the collapsed object.',
      input: {
        previous: { rule: [{ port: 80 }] },
        current: { rule: { port: 443 } }
      },
      expected: { entries: [{ key: 'rule.port', kind: 'UPDATE' }], replace: false }
    },
    {
      id: 'Same Value Both Forms',
      description: 'Array and collapsed forms of equal content are not a change.',
      input: {
        previous: { rule: [{ port: 80 }] },
        current: { rule: { port: 80 } }
      },
      expected: { entries: [], replace: false }
    },
    {
      id: 'Empty To Populated',
      description: 'Populating an empty singleton is one ADD at the collection path.',
      input: {
        previous: { rule: [] },
        current: { rule: { port: 80 } }
      },
      expected: { entries: [{ key: 'rule', kind: 'ADD' }], replace: false }
    },
    {
      id: 'Populated To Absent',
      description: 'Removing the element is one DELETE at the collection path.',
      input: {
        previous: { rule: { port: 80 } },
        current: {}
      },
      expected: { entries: [{ key: 'rule', kind: 'DELETE' }], replace: false }
    },
    {
      id: 'ForceNew Inside',
      description: 'A forceNew field of the collapsed block replaces.',
      input: {
        previous: { rule: { proto: 'tcp' } },
        current: { rule: { proto: 'udp' } }
      },
      expected: { entries: [{ key: 'rule.proto', kind: 'UPDATE_REPLACE' }], replace: true }
    },
    {
      id: 'Added With ForceNew Value',
      description: 'Adding the element with a forceNew field set replaces.',
      input: {
        previous: {},
        current: { rule: { proto: 'tcp' } }
      },
      expected: { entries: [{ key: 'rule', kind: 'ADD_REPLACE' }], replace: true }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
  });
});
