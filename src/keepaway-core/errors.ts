import type { ErrorCode } from '@shared/types';

export interface ErrorContext {
  round?: number;
  workerId?: number;
  item?: bigint;
  /** 1-based line in troop source text. */
  line?: number;
}

function describeContext(context: ErrorContext): string {
  const parts: string[] = [];
  if (context.line !== undefined) parts.push(`line ${context.line}`);
  if (context.round !== undefined) parts.push(`round ${context.round}`);
  if (context.workerId !== undefined) parts.push(`monkey ${context.workerId}`);
  if (context.item !== undefined) parts.push(`item ${context.item}`);
  return parts.join(', ');
}

/**
 * Base class for every failure raised while loading or running a simulation.
 * All of them are fatal to the run.
 */
export abstract class SimulationError extends Error {
  abstract readonly code: ErrorCode;
  readonly detail: string;
  readonly context: ErrorContext;

  constructor(detail: string, context: ErrorContext = {}) {
    const where = describeContext(context);
    super(where ? `${where}: ${detail}` : detail);
    this.name = this.constructor.name;
    this.detail = detail;
    this.context = context;
  }

  /** Same error class and detail, with extra context merged in. */
  abstract withContext(context: ErrorContext): SimulationError;
}

/**
 * Thrown when troop text or a troop definition is malformed
 */
export class ParseError extends SimulationError {
  readonly code = 'PARSE_ERROR';

  withContext(context: ErrorContext): ParseError {
    return new ParseError(this.detail, { ...this.context, ...context });
  }
}

/**
 * Thrown when arithmetic leaves the signed 64-bit range
 */
export class OverflowError extends SimulationError {
  readonly code = 'OVERFLOW';

  withContext(context: ErrorContext): OverflowError {
    return new OverflowError(this.detail, { ...this.context, ...context });
  }
}

/**
 * Thrown when an item is thrown to a monkey outside the troop
 */
export class RoutingError extends SimulationError {
  readonly code = 'ROUTING_ERROR';

  withContext(context: ErrorContext): RoutingError {
    return new RoutingError(this.detail, { ...this.context, ...context });
  }
}

/**
 * Thrown when expected per-monkey state is missing
 */
export class StateError extends SimulationError {
  readonly code = 'STATE_ERROR';

  withContext(context: ErrorContext): StateError {
    return new StateError(this.detail, { ...this.context, ...context });
  }
}

/**
 * Thrown when fewer than two monkeys inspected anything
 */
export class InsufficientDataError extends SimulationError {
  readonly code = 'INSUFFICIENT_DATA';

  withContext(context: ErrorContext): InsufficientDataError {
    return new InsufficientDataError(this.detail, { ...this.context, ...context });
  }
}

export function isSimulationError(err: unknown): err is SimulationError {
  return err instanceof SimulationError;
}
