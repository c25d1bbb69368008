import { z } from 'zod';
import { OPERATOR_SYMBOLS } from '@shared/constants';
import { ParseError } from './errors';
import type { Operand, Operator, Simulation, WorkerSpec } from './types';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const safeInt = z.number().int().safe();
const monkeyId = z.number().int().nonnegative().safe();

export const operandSchema = z.union([z.literal('old'), safeInt]);

export const operationSchema = z.object({
  left: operandSchema,
  operator: z.enum(['+', '*']),
  right: operandSchema,
});

export const monkeyDefinitionSchema = z.object({
  id: monkeyId,
  items: z.array(safeInt),
  operation: operationSchema,
  divisibleBy: safeInt.positive(),
  ifTrue: monkeyId,
  ifFalse: monkeyId,
});

export const troopDefinitionSchema = z
  .object({
    monkeys: z.array(monkeyDefinitionSchema).min(1),
  })
  .superRefine((troop, ctx) => {
    troop.monkeys.forEach((monkey, index) => {
      if (monkey.id !== index) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['monkeys', index, 'id'],
          message: `expected monkey id ${index}, got ${monkey.id}`,
        });
      }
    });
  });

export type OperandDefinition = z.infer<typeof operandSchema>;
export type MonkeyDefinition = z.infer<typeof monkeyDefinitionSchema>;
export type TroopDefinition = z.infer<typeof troopDefinitionSchema>;

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

const OPERATORS_BY_SYMBOL: Record<MonkeyDefinition['operation']['operator'], Operator> = {
  '+': 'add',
  '*': 'multiply',
};

function toOperand(operand: OperandDefinition): Operand {
  return operand === 'old' ? { kind: 'old' } : { kind: 'literal', value: BigInt(operand) };
}

function fromOperand(operand: Operand): OperandDefinition {
  return operand.kind === 'old' ? 'old' : Number(operand.value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validates a troop definition and builds the simulation it describes.
 * Route targets are not checked here; the simulator reports them when an
 * item is actually thrown out of range.
 */
export function loadSimulation(input: unknown): Simulation {
  const parsed = troopDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new ParseError(`invalid troop definition: ${formatIssues(parsed.error)}`);
  }

  const specs: WorkerSpec[] = parsed.data.monkeys.map((monkey) => ({
    operation: {
      left: toOperand(monkey.operation.left),
      operator: OPERATORS_BY_SYMBOL[monkey.operation.operator],
      right: toOperand(monkey.operation.right),
    },
    test: { divisor: BigInt(monkey.divisibleBy) },
    route: { ifTrue: monkey.ifTrue, ifFalse: monkey.ifFalse },
  }));
  const queues = parsed.data.monkeys.map((monkey) => monkey.items.map((item) => BigInt(item)));

  return { specs, queues };
}

/** Inverse of `loadSimulation`, for API responses. */
export function toDefinition(simulation: Simulation): TroopDefinition {
  return {
    monkeys: simulation.specs.map((spec, id) => ({
      id,
      items: (simulation.queues[id] ?? []).map((item) => Number(item)),
      operation: {
        left: fromOperand(spec.operation.left),
        operator: OPERATOR_SYMBOLS[spec.operation.operator],
        right: fromOperand(spec.operation.right),
      },
      divisibleBy: Number(spec.test.divisor),
      ifTrue: spec.route.ifTrue,
      ifFalse: spec.route.ifFalse,
    })),
  };
}
