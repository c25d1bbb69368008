import { RUN_PRESETS } from '@shared/constants';
import type { InspectionEntry, PresetName } from '@shared/types';
import { passesTest, selectTarget } from './divisibility';
import { isSimulationError, OverflowError, RoutingError, StateError } from './errors';
import { InspectionCounter } from './inspection-counter';
import { applyRelief, createReliefPolicy, describeRelief, type ReliefPolicy } from './relief';
import { applyOperation } from './transform';
import type { Item, Simulation, WorkerId, WorkerSpec } from './types';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface RoundSnapshot {
  round: number;
  counts: readonly number[];
  queues: readonly (readonly Item[])[];
}

export interface RunOptions {
  /** Called after every round with copies of the queues and counts. */
  onRound?: (snapshot: RoundSnapshot) => void;
}

export interface SimulationReport {
  preset: PresetName | 'custom';
  rounds: number;
  relief: string;
  counts: number[];
  top: [InspectionEntry, InspectionEntry];
  monkeyBusiness: number;
}

// ---------------------------------------------------------------------------
// Turn execution
// ---------------------------------------------------------------------------

function inspectItem(
  spec: WorkerSpec,
  item: Item,
  policy: ReliefPolicy,
  workerCount: number,
): { target: WorkerId; value: Item } {
  const transformed = applyOperation(spec.operation, item);
  const value = applyRelief(policy, transformed);
  const target = selectTarget(spec.route, passesTest(spec.test, value));

  if (!Number.isInteger(target) || target < 0 || target >= workerCount) {
    throw new RoutingError(
      `throw target monkey ${target} is outside the troop (0..${workerCount - 1})`,
    );
  }
  return { target, value };
}

/**
 * One monkey's turn. The queue is swapped for an empty one before any item is
 * inspected, so items landing in it during the turn wait for the next round.
 */
function takeTurn(
  workerId: WorkerId,
  round: number,
  spec: WorkerSpec,
  queues: Item[][],
  policy: ReliefPolicy,
  counter: InspectionCounter,
): void {
  const batch = queues[workerId];
  if (batch === undefined) {
    throw new StateError(`no queue for monkey ${workerId}`, { round, workerId });
  }
  queues[workerId] = [];

  for (const item of batch) {
    counter.record(workerId);

    let thrown: { target: WorkerId; value: Item };
    try {
      thrown = inspectItem(spec, item, policy, queues.length);
    } catch (err) {
      if (isSimulationError(err)) {
        throw err.withContext({ round, workerId, item });
      }
      throw err;
    }

    const destination = queues[thrown.target];
    if (destination === undefined) {
      throw new StateError(`no queue for monkey ${thrown.target}`, { round, workerId, item });
    }
    destination.push(thrown.value);
  }
}

// ---------------------------------------------------------------------------
// Runs
// ---------------------------------------------------------------------------

/**
 * Plays `rounds` full rounds. Monkeys take turns in ascending id order and
 * throws land in the live queues, so an item thrown to a higher id is handled
 * again in the same round while one thrown to a lower id waits for the next.
 */
export function runSimulation(
  simulation: Simulation,
  rounds: number,
  policy: ReliefPolicy,
  options: RunOptions = {},
): InspectionCounter {
  const { specs } = simulation;
  if (simulation.queues.length !== specs.length) {
    throw new StateError(
      `troop has ${specs.length} monkey specs but ${simulation.queues.length} queues`,
    );
  }

  const queues: Item[][] = simulation.queues.map((queue) => [...queue]);
  const counter = new InspectionCounter(specs.length);

  for (let round = 1; round <= rounds; round++) {
    specs.forEach((spec, workerId) => {
      takeTurn(workerId, round, spec, queues, policy, counter);
    });

    options.onRound?.({
      round,
      counts: counter.counts(),
      queues: queues.map((queue) => [...queue]),
    });
  }

  return counter;
}

/** Product of the two highest inspection counts. */
export function monkeyBusiness(counter: InspectionCounter): number {
  const [first, second] = counter.top();
  const product = first.count * second.count;
  if (!Number.isSafeInteger(product)) {
    throw new OverflowError(
      `monkey business ${first.count} * ${second.count} exceeds the safe integer range`,
    );
  }
  return product;
}

export function runPreset(
  simulation: Simulation,
  preset: PresetName,
  options: RunOptions = {},
): SimulationReport {
  const { rounds, relief } = RUN_PRESETS[preset];
  const report = runCustom(simulation, rounds, createReliefPolicy(relief, simulation), options);
  return { ...report, preset };
}

export function runCustom(
  simulation: Simulation,
  rounds: number,
  policy: ReliefPolicy,
  options: RunOptions = {},
): SimulationReport {
  const counter = runSimulation(simulation, rounds, policy, options);
  return {
    preset: 'custom',
    rounds,
    relief: describeRelief(policy),
    counts: counter.counts(),
    top: counter.top(),
    monkeyBusiness: monkeyBusiness(counter),
  };
}

/** 20 rounds with divide-by-3 relief. */
export function runShort(simulation: Simulation): number {
  return runPreset(simulation, 'short').monkeyBusiness;
}

/** 10000 rounds with modulus relief. */
export function runLong(simulation: Simulation): number {
  return runPreset(simulation, 'long').monkeyBusiness;
}
