import { OverflowError } from './errors';

export const INT64_MAX = (1n << 63n) - 1n;
export const INT64_MIN = -(1n << 63n);

function ensureInRange(result: bigint, expression: string): bigint {
  if (result > INT64_MAX || result < INT64_MIN) {
    throw new OverflowError(`${expression} exceeds the 64-bit integer range`);
  }
  return result;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return ensureInRange(a + b, `${a} + ${b}`);
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return ensureInRange(a * b, `${a} * ${b}`);
}
