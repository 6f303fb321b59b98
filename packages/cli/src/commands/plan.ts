/**
 * Plan Commands
 */

import type { Command } from 'commander';
import { planGenerateSchema } from '../command-defs/plan.js';
import { generatePlanHandler, type GeneratePlanResult } from '../handlers/plan/generate-plan.js';

/**
 * Text printed to stdout after planning
 */
export function renderPlanOutput(result: GeneratePlanResult, format: 'json' | 'summary'): string {
  const { summary } = result;
  if (format === 'summary') {
    return (
      `Planned ${summary.definitionCount} matrix definitions from ${summary.matrixSetCount} matrix sets: ` +
      `${summary.buildTaskCount} unique build tasks (${summary.trainTaskCount} train, ${summary.testTaskCount} test)`
    );
  }
  if (result.outputPath) {
    return `Plan written to ${result.outputPath}`;
  }
  return JSON.stringify(result.plan, null, 2);
}

/**
 * Register plan commands
 */
export function registerPlanCommands(program: Command): void {
  program
    .command('plan')
    .description('Expand matrix set definitions into matrix UUIDs and build tasks')
    .requiredOption('--config <path>', 'Planner config (YAML or JSON)')
    .requiredOption('--input <path>', 'Matrix set definitions and feature dictionaries (JSON or YAML)')
    .option('--out <path>', 'Write the plan to this file instead of stdout')
    .option('--matrix-directory <dir>', 'Directory build tasks will write matrices to')
    .option('--format <format>', 'Output format (json, summary)', 'json')
    .action(async (opts: Record<string, unknown>) => {
      const args = planGenerateSchema.parse(opts);
      const result = await generatePlanHandler(args);
      process.stdout.write(renderPlanOutput(result, args.format) + '\n');
    });
}
