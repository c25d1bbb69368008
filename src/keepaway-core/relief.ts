import { DIVIDE_RELIEF_FACTOR } from '@shared/constants';
import type { ReliefMode } from '@shared/types';
import { checkedMul } from './checked-math';
import { OverflowError } from './errors';
import type { Item, Simulation } from './types';

// ---------------------------------------------------------------------------
// Policies
// ---------------------------------------------------------------------------

export interface DivideRelief {
  mode: 'divide';
  factor: bigint;
}

/**
 * `modulus` is the product of every distinct test divisor in the troop.
 * Because operations only add and multiply, reducing by a multiple of each
 * divisor keeps every later divisibility outcome unchanged.
 */
export interface ModulusRelief {
  mode: 'modulus';
  modulus: bigint;
}

export type ReliefPolicy = DivideRelief | ModulusRelief;

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Product of the distinct divisors, computed with checked multiplication.
 * A troop whose product leaves the 64-bit range is rejected here, before any
 * round runs.
 */
export function computeModulus(simulation: Simulation): bigint {
  const divisors = new Set(simulation.specs.map((spec) => spec.test.divisor));
  let product = 1n;
  try {
    for (const divisor of divisors) {
      product = checkedMul(product, divisor);
    }
  } catch (err) {
    if (err instanceof OverflowError) {
      throw new OverflowError(
        `product of ${divisors.size} distinct divisors exceeds the 64-bit integer range`,
      );
    }
    throw err;
  }
  return product;
}

export function createReliefPolicy(mode: ReliefMode, simulation: Simulation): ReliefPolicy {
  switch (mode) {
    case 'divide':
      return { mode: 'divide', factor: DIVIDE_RELIEF_FACTOR };
    case 'modulus':
      return { mode: 'modulus', modulus: computeModulus(simulation) };
  }
}

// ---------------------------------------------------------------------------
// Application
// ---------------------------------------------------------------------------

/** Bigint division truncates toward zero, and `%` keeps the dividend's sign. */
export function applyRelief(policy: ReliefPolicy, value: Item): Item {
  switch (policy.mode) {
    case 'divide':
      return value / policy.factor;
    case 'modulus':
      return value % policy.modulus;
  }
}

export function describeRelief(policy: ReliefPolicy): string {
  switch (policy.mode) {
    case 'divide':
      return `divide by ${policy.factor}`;
    case 'modulus':
      return `modulo ${policy.modulus}`;
  }
}
