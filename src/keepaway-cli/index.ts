#!/usr/bin/env node

/**
 * keepaway CLI - run troop files from the command line
 */

import { Command } from 'commander';
import { KEEPAWAY_CORE_VERSION } from '@core/index';
import { runCommand } from './commands/run';

const program = new Command();

program
  .name('keepaway')
  .description('Simulate monkeys throwing items around and report monkey business')
  .version(KEEPAWAY_CORE_VERSION);

program.addCommand(runCommand);

program.parseAsync().catch((err: unknown) => {
  console.error('[CLI] Unexpected failure:', err);
  process.exit(1);
});
