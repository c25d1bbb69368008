/**
 * keepaway run command
 *
 * Runs one troop file under the short preset, the long preset, both, or a
 * custom round count and relief mode.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { z } from 'zod';
import {
  createReliefPolicy,
  isSimulationError,
  runCustom,
  runPreset,
  type SimulationReport,
  type Simulation,
} from '@core/index';
import { PRESET_NAMES, RELIEF_MODES } from '@shared/constants';
import type { PresetName } from '@shared/types';
import { formatReport, formatReportsJson } from '../format';
import { loadTroopFile } from '../loader';

const runOptionsSchema = z
  .object({
    preset: z.enum(['short', 'long', 'both']),
    rounds: z.coerce.number().int().positive().optional(),
    relief: z.enum(RELIEF_MODES).optional(),
    format: z.enum(['pretty', 'json']),
  })
  .refine((opts) => (opts.rounds === undefined) === (opts.relief === undefined), {
    message: '--rounds and --relief must be given together',
  });

export type RunCommandOptions = z.infer<typeof runOptionsSchema>;

export function buildReports(simulation: Simulation, options: RunCommandOptions): SimulationReport[] {
  if (options.rounds !== undefined && options.relief !== undefined) {
    const policy = createReliefPolicy(options.relief, simulation);
    return [runCustom(simulation, options.rounds, policy)];
  }
  const presets: readonly PresetName[] = options.preset === 'both' ? PRESET_NAMES : [options.preset];
  return presets.map((preset) => runPreset(simulation, preset));
}

export const runCommand = new Command('run')
  .description('Run a troop file and report monkey business')
  .argument('<file>', 'Troop text file, or a .json troop definition')
  .option('--preset <name>', 'Preset to run: short, long, both', 'both')
  .option('--rounds <n>', 'Custom round count (requires --relief)')
  .option('--relief <mode>', 'Custom relief mode: divide, modulus (requires --rounds)')
  .option('--format <type>', 'Output format: pretty, json', 'pretty')
  .action(async (file: string, rawOptions: unknown) => {
    try {
      const parsed = runOptionsSchema.safeParse(rawOptions);
      if (!parsed.success) {
        console.error(chalk.red(`[ERROR] ${parsed.error.issues.map((i) => i.message).join('; ')}`));
        process.exitCode = 1;
        return;
      }

      const simulation = await loadTroopFile(file);
      const reports = buildReports(simulation, parsed.data);

      if (parsed.data.format === 'json') {
        console.log(formatReportsJson(reports));
      } else {
        console.log(reports.map((report) => formatReport(report, chalk)).join('\n\n'));
      }
    } catch (error) {
      if (!isSimulationError(error)) {
        throw error;
      }
      console.error(chalk.red(`[ERROR] ${error.name}: ${error.message}`));
      process.exitCode = 1;
    }
  });
