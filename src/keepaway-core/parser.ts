// ---------------------------------------------------------------------------
// Troop text loader
//
//   Monkey 0:
//     Starting items: 79, 98
//     Operation: new = old * 19
//     Test: divisible by 23
//       If true: throw to monkey 2
//       If false: throw to monkey 3
//
// One block per monkey, blocks separated by a single blank line.
// ---------------------------------------------------------------------------

import { loadSimulation, type MonkeyDefinition, type OperandDefinition, type TroopDefinition } from './definition';
import { ParseError } from './errors';
import type { Simulation } from './types';

const HEADER = /^Monkey\s+(\d+)\s*:$/;
const ITEMS = /^\s+Starting items\s*:\s*(.*)$/;
const OPERATION = /^\s+Operation\s*:\s*new\s*=\s*(old|-?\d+)\s*([+*])\s*(old|-?\d+)$/;
const TEST = /^\s+Test\s*:\s*divisible by\s+(\d+)$/;
const IF_TRUE = /^\s+If true\s*:\s*throw to monkey\s+(\d+)$/;
const IF_FALSE = /^\s+If false\s*:\s*throw to monkey\s+(\d+)$/;
const INTEGER = /^-?\d+$/;

class LineReader {
  private index = 0;

  constructor(private readonly lines: string[]) {}

  get lineNumber(): number {
    return this.index + 1;
  }

  get done(): boolean {
    return this.index >= this.lines.length;
  }

  /** Consumes the next line, which must match `pattern`. */
  expect(pattern: RegExp, label: string): RegExpMatchArray {
    const line = this.lines[this.index];
    if (line === undefined) {
      throw new ParseError(`expected ${label}, found end of input`, { line: this.lineNumber });
    }
    const match = line.trimEnd().match(pattern);
    if (!match) {
      throw new ParseError(`expected ${label}, found "${line.trim()}"`, { line: this.lineNumber });
    }
    this.index++;
    return match;
  }

  expectBlank(): void {
    this.expect(/^$/, 'blank line between monkeys');
  }
}

function toInteger(text: string, label: string, line: number): number {
  const value = Number(text);
  if (!INTEGER.test(text) || !Number.isSafeInteger(value)) {
    throw new ParseError(`${label} "${text}" is not a safe integer`, { line });
  }
  return value;
}

function toOperand(text: string, line: number): OperandDefinition {
  return text === 'old' ? 'old' : toInteger(text, 'operand', line);
}

/** A capture group of a successful match. */
function capture(match: RegExpMatchArray, group = 1): string {
  return match[group] ?? '';
}

function readMonkey(reader: LineReader, expectedId: number): MonkeyDefinition {
  const headerLine = reader.lineNumber;
  const id = toInteger(capture(reader.expect(HEADER, 'monkey header')), 'monkey id', headerLine);
  if (id !== expectedId) {
    throw new ParseError(`expected monkey ${expectedId}, got monkey ${id}`, { line: headerLine });
  }

  const itemsLine = reader.lineNumber;
  const itemsText = capture(reader.expect(ITEMS, 'starting items line')).trim();
  const items =
    itemsText === ''
      ? []
      : itemsText.split(/\s*,\s*/).map((text) => toInteger(text, 'item', itemsLine));

  const operationLine = reader.lineNumber;
  const operation = reader.expect(OPERATION, 'operation line');
  const operator = capture(operation, 2) === '*' ? '*' : '+';

  const testLine = reader.lineNumber;
  const divisibleBy = toInteger(capture(reader.expect(TEST, 'test line')), 'divisor', testLine);
  if (divisibleBy <= 0) {
    throw new ParseError('divisor must be positive', { line: testLine });
  }

  const ifTrueLine = reader.lineNumber;
  const ifTrue = toInteger(capture(reader.expect(IF_TRUE, 'if true line')), 'monkey id', ifTrueLine);
  const ifFalseLine = reader.lineNumber;
  const ifFalse = toInteger(capture(reader.expect(IF_FALSE, 'if false line')), 'monkey id', ifFalseLine);

  return {
    id,
    items,
    operation: {
      left: toOperand(capture(operation, 1), operationLine),
      operator,
      right: toOperand(capture(operation, 3), operationLine),
    },
    divisibleBy,
    ifTrue,
    ifFalse,
  };
}

/** Parses troop text into its JSON definition. */
export function parseTroopDefinition(text: string): TroopDefinition {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === '') {
    lines.pop();
  }
  if (lines.length === 0) {
    throw new ParseError('troop text is empty', { line: 1 });
  }

  const reader = new LineReader(lines);
  const monkeys: MonkeyDefinition[] = [readMonkey(reader, 0)];
  while (!reader.done) {
    reader.expectBlank();
    monkeys.push(readMonkey(reader, monkeys.length));
  }
  return { monkeys };
}

export function parseTroop(text: string): Simulation {
  return loadSimulation(parseTroopDefinition(text));
}
