import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import type { WalkInput } from './helpers';
import { createWalkRunner } from './helpers';
import { markSorted } from '../ordering';

class Version {
  major: number;

  constructor(major: number) {
    this.major = major;
  }

  compareTo(other: unknown): number {
    return other instanceof Version ? this.major - other.major : 0;
  }
}

const registerBuiltins: WalkInput['setup'] = walker =>
  walker.registerBuiltinAdapters();

/**
 * Maps and sets.
 * Focus: entry keys, key ordering, set ordering, nulls, cadence.
 */
describe('Maps and Sets: keys, ordering, nulls, cadence.', () => {
  const run = createWalkRunner();

  describe('Maps', () => {
    const scenarios: Array<TestScenario<WalkInput, string[]>> = [
      {
        id: 'Sorted Keys',
        description: 'Entries are reported in key order by default.',
        input: () => ({
          value: new Map([
            ['b', 1],
            ['a', 2]
          ])
        }),
        expected: [
          'MAP:ENTER',
          'entry:a',
          'float64(2)',
          'entry:b',
          'float64(1)',
          'MAP:LEAVE'
        ]
      },
      {
        id: 'Insertion Order',
        description: 'With keysSorted off, insertion order is kept.',
        input: () => ({
          value: new Map([
            ['b', 1],
            ['a', 2]
          ]),
          options: { keysSorted: false }
        }),
        expected: [
          'MAP:ENTER',
          'entry:b',
          'float64(1)',
          'entry:a',
          'float64(2)',
          'MAP:LEAVE'
        ]
      },
      {
        id: 'NaN Key',
        description: 'A NaN key sorts after every number.',
        input: () => ({
          value: new Map([
            [2, 'b'],
            [Number.NaN, 'n'],
            [1, 'a']
          ])
        }),
        expected: [
          'MAP:ENTER',
          'entry:1',
          'string(a)',
          'entry:2',
          'string(b)',
          'entry:NaN',
          'string(n)',
          'MAP:LEAVE'
        ]
      },
      {
        id: 'Numeric Keys',
        description: 'Numbers sort numerically, not as strings.',
        input: () => ({
          value: new Map([
            [10, 'ten'],
            [9, 'nine']
          ])
        }),
        expected: [
          'MAP:ENTER',
          'entry:9',
          'string(nine)',
          'entry:10',
          'string(ten)',
          'MAP:LEAVE'
        ]
      },
      {
        id: 'Mixed Keys',
        description:
          'Keys of different kinds fall back to comparing their string forms.',
        input: () => ({
          value: new Map<unknown, string>([
            [2, 'x'],
            ['10', 'y'],
            [1, 'z']
          ])
        }),
        expected: [
          'MAP:ENTER',
          'entry:1',
          'string(z)',
          'entry:10',
          'string(y)',
          'entry:2',
          'string(x)',
          'MAP:LEAVE'
        ]
      },
      {
        id: 'Null Value Excluded',
        description: 'An entry with a null value disappears with its key.',
        input: () => ({
          value: new Map<string, number | null>([
            ['a', null],
            ['b', 1]
          ])
        }),
        expected: ['MAP:ENTER', 'entry:b', 'float64(1)', 'MAP:LEAVE']
      },
      {
        id: 'Object Key',
        description: 'Keys are reported as-is, whatever their type.',
        input: () => ({ value: new Map([[{}, true]]) }),
        expected: [
          'MAP:ENTER',
          'entry:[object Object]',
          'boolean(true)',
          'MAP:LEAVE'
        ]
      },
      {
        id: 'Nested Map',
        description: 'Map values are walked like any other value.',
        input: () => ({ value: new Map([['inner', new Map([['x', 1n]])]]) }),
        expected: [
          'MAP:ENTER',
          'entry:inner',
          'MAP:ENTER',
          'entry:x',
          'int64(1)',
          'MAP:LEAVE',
          'MAP:LEAVE'
        ]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });

    test('entries follow the keyed cadence', () => {
      const runAll = createWalkRunner({}, 'all');

      expect(
        runAll({
          value: new Map([
            ['a', 1],
            ['b', 2]
          ])
        })
      ).toStrictEqual([
        'MAP:ENTER',
        'MAP:BEFORE_CHILD',
        'entry:a',
        'float64(1)',
        'MAP:AFTER_CHILD',
        'MAP:BETWEEN_CHILDREN',
        'MAP:BEFORE_CHILD',
        'entry:b',
        'float64(2)',
        'MAP:AFTER_CHILD',
        'MAP:LEAVE'
      ]);
    });
  });

  describe('Sets', () => {
    const scenarios: Array<TestScenario<WalkInput, string[]>> = [
      {
        id: 'Sorted',
        description: 'Sets are walked as sequences in natural order.',
        input: () => ({ value: new Set([3, 1, 2]) }),
        expected: [
          'SEQUENCE:ENTER',
          'float64(1)',
          'float64(2)',
          'float64(3)',
          'SEQUENCE:LEAVE'
        ]
      },
      {
        id: 'Unsorted',
        description: 'With setsSorted off, insertion order is kept.',
        input: () => ({
          value: new Set([3, 1, 2]),
          options: { setsSorted: false }
        }),
        expected: [
          'SEQUENCE:ENTER',
          'float64(3)',
          'float64(1)',
          'float64(2)',
          'SEQUENCE:LEAVE'
        ]
      },
      {
        id: 'Marked Sorted',
        description: 'A set marked as already ordered keeps its order.',
        input: () => ({ value: markSorted(new Set(['b', 'a'])) }),
        expected: [
          'SEQUENCE:ENTER',
          'string(b)',
          'string(a)',
          'SEQUENCE:LEAVE'
        ]
      },
      {
        id: 'Not Mutually Comparable',
        description: 'Mixed element kinds keep insertion order.',
        input: () => ({ value: new Set<unknown>([2, 'a', 1]) }),
        expected: [
          'SEQUENCE:ENTER',
          'float64(2)',
          'string(a)',
          'float64(1)',
          'SEQUENCE:LEAVE'
        ]
      },
      {
        id: 'Dates',
        description: 'Dates sort chronologically before being adapted.',
        input: () => ({
          value: new Set([new Date(1000), new Date(0)]),
          setup: registerBuiltins
        }),
        expected: [
          'SEQUENCE:ENTER',
          'string(1970-01-01T00:00:00.000Z)',
          'string(1970-01-01T00:00:01.000Z)',
          'SEQUENCE:LEAVE'
        ]
      },
      {
        id: 'Comparable Objects',
        description: 'Objects exposing compareTo sort by it.',
        input: () => ({ value: new Set([new Version(2), new Version(1)]) }),
        expected: [
          'SEQUENCE:ENTER',
          'OBJECT:ENTER',
          'field:major',
          'float64(1)',
          'OBJECT:LEAVE',
          'OBJECT:ENTER',
          'field:major',
          'float64(2)',
          'OBJECT:LEAVE',
          'SEQUENCE:LEAVE'
        ]
      },
      {
        id: 'Null Element',
        description: 'Set elements go through the null filter.',
        input: () => ({ value: new Set([null, 'x']) }),
        expected: ['SEQUENCE:ENTER', 'string(x)', 'SEQUENCE:LEAVE']
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });
});
