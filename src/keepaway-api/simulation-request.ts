import { z } from 'zod';
import { ParseError } from '@core/errors';
import { loadSimulation } from '@core/definition';
import { parseTroop } from '@core/parser';
import { createReliefPolicy } from '@core/relief';
import { runCustom, runPreset, type RoundSnapshot, type SimulationReport } from '@core/simulator';
import type { Simulation } from '@core/types';
import { PRESET_NAMES, RELIEF_MODES, RUN_PRESETS } from '@shared/constants';
import type { RoundHistoryRecord, SimulationReportRecord } from '@shared/types';

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

/** `input` is troop text or a troop definition object. */
export const parseRequestSchema = z.object({
  input: z.union([z.string().min(1), z.record(z.unknown())]),
});

export function runRequestSchema(maxRounds: number) {
  return parseRequestSchema
    .extend({
      preset: z.enum(PRESET_NAMES).optional(),
      rounds: z.number().int().min(1).max(maxRounds).optional(),
      relief: z.enum(RELIEF_MODES).optional(),
      history: z.boolean().optional(),
    })
    .refine((body) => (body.rounds === undefined) === (body.relief === undefined), {
      message: 'rounds and relief must be given together',
    })
    .refine((body) => body.preset === undefined || body.rounds === undefined, {
      message: 'give either preset or rounds/relief, not both',
    });
}

export type RunRequest = z.infer<ReturnType<typeof runRequestSchema>>;

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

function validate<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ParseError(
      `invalid request: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
    );
  }
  return parsed.data;
}

export function resolveSimulation(input: RunRequest['input']): Simulation {
  return typeof input === 'string' ? parseTroop(input) : loadSimulation(input);
}

export function parseSimulationRequest(body: unknown): Simulation {
  return resolveSimulation(validate(parseRequestSchema, body).input);
}

function toHistoryRecord(snapshot: RoundSnapshot): RoundHistoryRecord {
  return {
    round: snapshot.round,
    counts: [...snapshot.counts],
    queues: snapshot.queues.map((queue) => queue.map((item) => item.toString())),
  };
}

export interface RunLimits {
  maxRounds: number;
  /** History keeps every queue for every round, so it has its own, lower cap. */
  maxHistoryRounds: number;
}

/**
 * Validates a run request, runs it to completion and returns the report.
 * Any simulation error propagates to the caller unchanged.
 */
export function runSimulationRequest(body: unknown, limits: RunLimits): SimulationReportRecord {
  const request = validate(runRequestSchema(limits.maxRounds), body);
  const rounds = request.rounds ?? RUN_PRESETS[request.preset ?? 'short'].rounds;
  if (request.history && rounds > limits.maxHistoryRounds) {
    throw new ParseError(
      `invalid request: history is limited to ${limits.maxHistoryRounds} rounds, got ${rounds}`,
    );
  }
  const simulation = resolveSimulation(request.input);

  const history: RoundHistoryRecord[] = [];
  const options = request.history
    ? { onRound: (snapshot: RoundSnapshot) => history.push(toHistoryRecord(snapshot)) }
    : {};

  let report: SimulationReport;
  if (request.rounds !== undefined && request.relief !== undefined) {
    const policy = createReliefPolicy(request.relief, simulation);
    report = runCustom(simulation, request.rounds, policy, options);
  } else {
    report = runPreset(simulation, request.preset ?? 'short', options);
  }

  return request.history ? { ...report, history } : report;
}
