// ---------------------------------------------------------------------------
// Seeded scenario generator: random troops
// ---------------------------------------------------------------------------

import type { MonkeyDefinition, OperandDefinition, TroopDefinition } from '../definition';

export interface RandomTroopOptions {
  monkeyCount: number;
  /** Inclusive upper bound on starting items per monkey. */
  maxItems?: number;
  /** Inclusive upper bound on starting worry levels. */
  maxWorry?: number;
}

// ---------------------------------------------------------------------------
// Seeded PRNG -- mulberry32
// ---------------------------------------------------------------------------

function mulberry32(seed: number) {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ---------------------------------------------------------------------------
// Pools
// ---------------------------------------------------------------------------

const DIVISORS = [2, 3, 5, 7, 11, 13, 17, 19, 23, 29, 31] as const;

/** Pick a random element from an array using the PRNG. */
function pick<T>(arr: readonly T[], rand: () => number): T {
  const value = arr[Math.floor(rand() * arr.length)];
  if (value === undefined) {
    throw new Error('pick() called with an empty pool');
  }
  return value;
}

/** Uniform integer in [min, max]. */
function between(min: number, max: number, rand: () => number): number {
  return min + Math.floor(rand() * (max - min + 1));
}

/** Any monkey other than `self`. */
function otherMonkey(self: number, monkeyCount: number, rand: () => number): number {
  const offset = between(1, monkeyCount - 1, rand);
  return (self + offset) % monkeyCount;
}

function pickOperation(rand: () => number): MonkeyDefinition['operation'] {
  const r = rand();
  if (r < 0.15) return { left: 'old', operator: '*', right: 'old' };
  const right: OperandDefinition = between(1, 19, rand);
  return r < 0.55
    ? { left: 'old', operator: '+', right }
    : { left: 'old', operator: '*', right };
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

/**
 * Builds a troop definition that passes `troopDefinitionSchema`. Throw targets
 * never point back at the thrower and every target is inside the troop.
 */
export function generateRandomTroop(options: RandomTroopOptions, seed: number): TroopDefinition {
  const { monkeyCount, maxItems = 5, maxWorry = 99 } = options;
  if (monkeyCount < 2) {
    throw new Error(`a troop needs at least 2 monkeys, got ${monkeyCount}`);
  }

  const rand = mulberry32(seed);
  const monkeys: MonkeyDefinition[] = [];

  for (let id = 0; id < monkeyCount; id++) {
    const itemCount = between(0, maxItems, rand);
    const items = Array.from({ length: itemCount }, () => between(1, maxWorry, rand));
    const operation = pickOperation(rand);
    const divisibleBy = pick(DIVISORS, rand);
    const ifTrue = otherMonkey(id, monkeyCount, rand);
    const ifFalse = otherMonkey(id, monkeyCount, rand);

    monkeys.push({ id, items, operation, divisibleBy, ifTrue, ifFalse });
  }

  return { monkeys };
}
