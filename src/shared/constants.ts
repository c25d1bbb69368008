export const API_PREFIX = '/api';

export const RELIEF_MODES = ['divide', 'modulus'] as const;

export const OPERATOR_SYMBOLS = {
  add: '+',
  multiply: '*',
} as const;

/** Divisor used by divide-mode relief. */
export const DIVIDE_RELIEF_FACTOR = 3n;

export const RUN_PRESETS = {
  short: { rounds: 20, relief: 'divide' },
  long: { rounds: 10_000, relief: 'modulus' },
} as const;

export const PRESET_NAMES = ['short', 'long'] as const;

export const ERROR_CODES = [
  'PARSE_ERROR',
  'OVERFLOW',
  'ROUTING_ERROR',
  'STATE_ERROR',
  'INSUFFICIENT_DATA',
] as const;
