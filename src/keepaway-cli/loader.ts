import { readFile } from 'fs/promises';
import path from 'path';
import { loadSimulation, parseTroop, ParseError, type Simulation } from '@core/index';

/**
 * Reads a troop from disk. `.json` files hold a troop definition; anything
 * else is parsed as troop text.
 */
export async function loadTroopFile(filePath: string): Promise<Simulation> {
  const raw = await readFile(filePath, 'utf-8');
  if (path.extname(filePath).toLowerCase() !== '.json') {
    return parseTroop(raw);
  }

  let definition: unknown;
  try {
    definition = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(`${path.basename(filePath)} is not valid JSON: ${reason}`);
  }
  return loadSimulation(definition);
}
