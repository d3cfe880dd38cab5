import { describe, it, expect } from '@jest/globals';
import { lineKey } from '@rail-trace/domain';
import type { Line, Train } from '@rail-trace/domain';
import { CategoricalCounter } from '../services/aggregation/categorical-counter.js';
import { TrainStatistics } from '../services/aggregation/train-statistics.js';

const S4: Line = { color: '#1A2B3C', id: 4, name: 'S4', stroke: '#1A2B3C', textColor: '#FFFFFF' };

function train(overrides: Partial<Train> = {}): Train {
  return {
    hasJourney: true,
    hasRealtime: true,
    hasRealtimeJourney: false,
    operatorProvidesRealtimeJourney: 'yes',
    tenant: 'sbm',
    trainId: 'sbm_1',
    ...overrides,
  };
}

describe('CategoricalCounter', () => {
  it('counts absent values in their own bucket', () => {
    const counter = CategoricalCounter.ofStrings();
    for (const value of [null, 'A', 'A', null, 'B']) counter.increment(value);

    expect(counter.entries()).toEqual([
      { value: null, count: 2 },
      { value: 'A', count: 2 },
      { value: 'B', count: 1 },
    ]);
    expect(counter.count('A')).toBe(2);
    expect(counter.count('C')).toBe(0);
    expect(counter.noValueCount).toBe(2);
    expect(counter.total).toBe(5);
  });

  it('returns the new count of the bucket it touched', () => {
    const counter = CategoricalCounter.ofStrings();
    expect(counter.increment('A')).toBe(1);
    expect(counter.increment(undefined)).toBe(1);
    expect(counter.increment(null)).toBe(2);
    expect(counter.increment('A')).toBe(2);
  });

  it('sorts by count and keeps first-seen order on ties', () => {
    const counter = CategoricalCounter.ofStrings();
    for (const value of ['X', 'Y', 'Z', 'Z']) counter.increment(value);
    expect(counter.entries().map((entry) => entry.value)).toEqual(['Z', 'X', 'Y']);
  });

  it('compares structured values by every field', () => {
    const counter = new CategoricalCounter<Line>(lineKey);
    counter.increment(S4);
    counter.increment({ ...S4 });
    counter.increment({ ...S4, textColor: '#000000' });

    expect(counter.count(S4)).toBe(2);
    expect(counter.entries()).toHaveLength(2);
  });
});

describe('TrainStatistics', () => {
  it('feeds every optional field into its counter', () => {
    const statistics = new TrainStatistics();
    statistics.record(train({ delay: '0', state: 'DRIVING', line: S4 }));
    statistics.record(train({ state: 'DRIVING', rideState: 'ON_ROUTE', originalLine: 'S8' }));

    const snapshot = statistics.snapshot();
    expect(snapshot.trains).toBe(2);
    expect(snapshot.delays).toEqual([
      { value: null, count: 1 },
      { value: '0', count: 1 },
    ]);
    expect(snapshot.states).toEqual([{ value: 'DRIVING', count: 2 }]);
    expect(snapshot.rideStates).toEqual([
      { value: null, count: 1 },
      { value: 'ON_ROUTE', count: 1 },
    ]);
    expect(snapshot.originalLines).toEqual([
      { value: null, count: 1 },
      { value: 'S8', count: 1 },
    ]);
    expect(snapshot.lines).toEqual([
      { value: null, count: 1 },
      { value: S4, count: 1 },
    ]);
  });
});
