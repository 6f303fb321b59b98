#!/usr/bin/env node

/**
 * matrixplan CLI Entry Point
 */

import { program } from 'commander';
import { registerPlanCommands } from '../commands/plan.js';
import { handleError } from '../core/error-handler.js';

program
  .name('matrixplan')
  .description('Plan train/test matrix builds from temporal matrix set definitions')
  .version('1.0.0');

registerPlanCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
}

void main();
