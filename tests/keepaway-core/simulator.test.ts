import { describe, it, expect } from 'vitest';
import {
  monkeyBusiness,
  runCustom,
  runLong,
  runPreset,
  runShort,
  runSimulation,
  type RoundSnapshot,
} from '@core/simulator';
import { createReliefPolicy, type ReliefPolicy } from '@core/relief';
import { InsufficientDataError, OverflowError, RoutingError, StateError } from '@core/errors';
import type { Item, Operation, Simulation, WorkerSpec } from '@core/types';
import { exampleTroop } from '../helpers';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Divide by 1: keeps worry levels unchanged. */
const KEEP: ReliefPolicy = { mode: 'divide', factor: 1n };

const IDENTITY: Operation = {
  left: { kind: 'old' },
  operator: 'multiply',
  right: { kind: 'literal', value: 1n },
};

interface MonkeyShape {
  items: Item[];
  ifTrue: number;
  ifFalse?: number;
  divisor?: bigint;
  operation?: Operation;
}

function troop(monkeys: MonkeyShape[]): Simulation {
  const specs = monkeys.map(
    (m): WorkerSpec => ({
      operation: m.operation ?? IDENTITY,
      test: { divisor: m.divisor ?? 1n },
      route: { ifTrue: m.ifTrue, ifFalse: m.ifFalse ?? m.ifTrue },
    }),
  );
  return { specs, queues: monkeys.map((m) => m.items) };
}

function recordRounds(
  simulation: Simulation,
  rounds: number,
  policy: ReliefPolicy,
): RoundSnapshot[] {
  const snapshots: RoundSnapshot[] = [];
  runSimulation(simulation, rounds, policy, { onRound: (s) => snapshots.push(s) });
  return snapshots;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

// ---------------------------------------------------------------------------
// Example troop
// ---------------------------------------------------------------------------

describe('example troop', () => {
  it('runShort reports 10605', () => {
    expect(runShort(exampleTroop())).toBe(10605);
  });

  it('runLong reports 2713310158', () => {
    expect(runLong(exampleTroop())).toBe(2713310158);
  });

  it('divide relief: holdings and counts after round 1', () => {
    const [first] = recordRounds(exampleTroop(), 1, createReliefPolicy('divide', exampleTroop()));
    expect(first?.round).toBe(1);
    expect(first?.queues).toEqual([
      [20n, 23n, 27n, 26n],
      [2080n, 25n, 167n, 207n, 401n, 1046n],
      [],
      [],
    ]);
    expect(first?.counts).toEqual([2, 4, 3, 5]);
  });

  it('divide relief: counts after 20 rounds', () => {
    const simulation = exampleTroop();
    const counter = runSimulation(simulation, 20, createReliefPolicy('divide', simulation));
    expect(counter.counts()).toEqual([101, 95, 7, 105]);
  });

  it('modulus relief: counts after rounds 1 and 20', () => {
    const simulation = exampleTroop();
    const snapshots = recordRounds(simulation, 20, createReliefPolicy('modulus', simulation));
    expect(snapshots).toHaveLength(20);
    expect(snapshots[0]?.counts).toEqual([2, 4, 3, 6]);
    expect(snapshots[19]?.counts).toEqual([99, 97, 8, 103]);
  });

  it('modulus relief: counts after 10000 rounds', () => {
    const simulation = exampleTroop();
    const counter = runSimulation(simulation, 10_000, createReliefPolicy('modulus', simulation));
    expect(counter.counts()).toEqual([52166, 47830, 1938, 52013]);
  });

  it('conserves items across rounds', () => {
    const simulation = exampleTroop();
    const snapshots = recordRounds(simulation, 50, createReliefPolicy('modulus', simulation));
    for (const snapshot of snapshots) {
      const held = snapshot.queues.reduce((sum, queue) => sum + queue.length, 0);
      expect(held).toBe(10);
    }
  });

  it('leaves the loaded simulation untouched', () => {
    const simulation = exampleTroop();
    expect(runShort(simulation)).toBe(10605);
    expect(runShort(simulation)).toBe(10605);
    expect(simulation.queues).toEqual([[79n, 98n], [54n, 65n, 75n, 74n], [79n, 60n, 97n], [74n]]);
  });
});

// ---------------------------------------------------------------------------
// Turn ordering
// ---------------------------------------------------------------------------

describe('turn ordering', () => {
  const pingPong = () =>
    troop([
      { items: [10n], ifTrue: 1 },
      { items: [20n], ifTrue: 0 },
    ]);

  it('an item thrown to a higher id is inspected again in the same round', () => {
    const [first] = recordRounds(pingPong(), 1, KEEP);
    // 10 went 0 -> 1 -> 0 in round 1; 20 went 1 -> 0 and waits for round 2.
    expect(first?.queues).toEqual([[20n, 10n], []]);
    expect(first?.counts).toEqual([1, 2]);
  });

  it('items thrown to a lower id wait for the next round', () => {
    const snapshots = recordRounds(pingPong(), 3, KEEP);
    expect(snapshots.map((s) => s.counts)).toEqual([
      [1, 2],
      [3, 4],
      [5, 6],
    ]);
  });

  it('total inspections equal the batch sizes taken at each turn', () => {
    const counter = runSimulation(pingPong(), 3, KEEP);
    // round 1: 1 + 2, rounds 2 and 3: 2 + 2 each
    expect(counter.total()).toBe(11);
  });

  it('an item thrown to its own thrower is not re-inspected in the same turn', () => {
    const selfish = troop([
      { items: [5n], ifTrue: 0 },
      { items: [], ifTrue: 0 },
    ]);
    const snapshots = recordRounds(selfish, 3, KEEP);
    expect(snapshots.map((s) => s.counts)).toEqual([
      [1, 0],
      [2, 0],
      [3, 0],
    ]);
    expect(snapshots[2]?.queues).toEqual([[5n], []]);
  });

  it('routes by the test outcome after relief', () => {
    // 5 + 1 = 6, relieved to 2, not divisible by 3 -> monkey 2.
    // Monkey 2 then keeps it: 2 / 3 = 0.
    const simulation = troop([
      {
        items: [5n],
        ifTrue: 1,
        ifFalse: 2,
        divisor: 3n,
        operation: { left: { kind: 'old' }, operator: 'add', right: { kind: 'literal', value: 1n } },
      },
      { items: [], ifTrue: 1 },
      { items: [], ifTrue: 2 },
    ]);
    const [first] = recordRounds(simulation, 1, { mode: 'divide', factor: 3n });
    expect(first?.queues).toEqual([[], [], [0n]]);
    expect(first?.counts).toEqual([1, 0, 1]);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe('failures', () => {
  it('throws RoutingError with round, monkey and item for an out-of-troop target', () => {
    const simulation = troop([
      { items: [7n], ifTrue: 5 },
      { items: [], ifTrue: 0 },
    ]);
    const err = captureError(() => runSimulation(simulation, 1, KEEP));

    expect(err).toBeInstanceOf(RoutingError);
    if (err instanceof RoutingError) {
      expect(err.context).toEqual({ round: 1, workerId: 0, item: 7n });
      expect(err.message).toBe(
        'round 1, monkey 0, item 7: throw target monkey 5 is outside the troop (0..1)',
      );
    }
  });

  it('throws OverflowError with context when a transform overflows', () => {
    const simulation = troop([
      {
        items: [1n << 40n],
        ifTrue: 1,
        operation: { left: { kind: 'old' }, operator: 'multiply', right: { kind: 'old' } },
      },
      { items: [], ifTrue: 0 },
    ]);
    const err = captureError(() =>
      runSimulation(simulation, 20, createReliefPolicy('divide', simulation)),
    );

    expect(err).toBeInstanceOf(OverflowError);
    if (err instanceof OverflowError) {
      expect(err.context).toEqual({ round: 1, workerId: 0, item: 1099511627776n });
      expect(err.message).toMatch(/^round 1, monkey 0, item 1099511627776: /);
    }
  });

  it('throws StateError when specs and queues disagree', () => {
    const simulation: Simulation = {
      specs: troop([{ items: [], ifTrue: 0 }, { items: [], ifTrue: 0 }]).specs,
      queues: [[1n]],
    };
    expect(() => runSimulation(simulation, 1, KEEP)).toThrow(StateError);
    expect(() => runSimulation(simulation, 1, KEEP)).toThrow(
      'troop has 2 monkey specs but 1 queues',
    );
  });

  it('monkeyBusiness throws InsufficientDataError when one monkey did all the work', () => {
    const lonely = troop([
      { items: [5n], ifTrue: 0 },
      { items: [], ifTrue: 0 },
    ]);
    expect(() => monkeyBusiness(runSimulation(lonely, 2, KEEP))).toThrow(InsufficientDataError);
  });
});

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

describe('reports', () => {
  it('runPreset short describes the run', () => {
    expect(runPreset(exampleTroop(), 'short')).toEqual({
      preset: 'short',
      rounds: 20,
      relief: 'divide by 3',
      counts: [101, 95, 7, 105],
      top: [
        { workerId: 3, count: 105 },
        { workerId: 0, count: 101 },
      ],
      monkeyBusiness: 10605,
    });
  });

  it('runCustom reports a custom run', () => {
    const simulation = exampleTroop();
    const report = runCustom(simulation, 1, createReliefPolicy('divide', simulation));
    expect(report.preset).toBe('custom');
    expect(report.counts).toEqual([2, 4, 3, 5]);
    expect(report.monkeyBusiness).toBe(20);
  });
});
