// ---------------------------------------------------------------------------
// Troop model
// ---------------------------------------------------------------------------

/** Dense, zero-based monkey index. */
export type WorkerId = number;

/** Worry level of a single item. */
export type Item = bigint;

export type Operand = { kind: 'old' } | { kind: 'literal'; value: bigint };

export type Operator = 'add' | 'multiply';

export interface Operation {
  left: Operand;
  operator: Operator;
  right: Operand;
}

export interface DivisibilityTest {
  divisor: bigint;
}

export interface RoutePreference {
  ifTrue: WorkerId;
  ifFalse: WorkerId;
}

export interface WorkerSpec {
  readonly operation: Operation;
  readonly test: DivisibilityTest;
  readonly route: RoutePreference;
}

/**
 * A loaded troop. `specs[id]` and `queues[id]` describe the same monkey; both
 * arrays have one entry per monkey. Runs copy the queues and never write back.
 */
export interface Simulation {
  readonly specs: readonly WorkerSpec[];
  readonly queues: readonly (readonly Item[])[];
}
