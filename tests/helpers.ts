import { readFileSync } from 'fs';
import path from 'path';
import { parseTroop } from '@core/parser';
import type { Simulation } from '@core/types';

export const FIXTURES_DIR = path.resolve('tests/fixtures');

export function readFixture(name: string): string {
  return readFileSync(path.join(FIXTURES_DIR, name), 'utf-8');
}

/** The four-monkey example troop. */
export function exampleTroop(): Simulation {
  return parseTroop(readFixture('example-troop.txt'));
}
