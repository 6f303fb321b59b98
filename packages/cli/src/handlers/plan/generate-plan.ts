/**
 * Generate Plan Handler
 *
 * Loads planner configuration and plan input, runs the planner and writes the
 * resulting plan when an output path is given.
 */

import { mkdir, writeFile } from 'fs/promises';
import { z } from 'zod';
import { dirname } from 'path';
import { PlanInputSchema, type PlanInput, type PlanResult, type PlanObserver } from '@matrixplan/core';
import {
  LoggingPlanObserver,
  Planner,
  PlannerConfigSchema,
  type PlannerConfig,
} from '@matrixplan/planner';
import { getPlannerEnvConfig, loadConfig } from '@matrixplan/utils';
import type { PlanGenerateArgs } from '../../command-defs/plan.js';

export interface PlanSummary {
  matrixSetCount: number;
  definitionCount: number;
  buildTaskCount: number;
  trainTaskCount: number;
  testTaskCount: number;
}

export interface GeneratePlanResult {
  plan: PlanResult;
  summary: PlanSummary;
  outputPath?: string;
}

export interface GeneratePlanContext {
  env?: NodeJS.ProcessEnv;
  observer?: PlanObserver;
}

/**
 * Planner config from file. `matrixDirectory` precedence:
 * override > config file > MATRIX_DIRECTORY env > ./matrices
 */
export async function loadPlannerConfig(
  configPath: string,
  matrixDirectory?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<PlannerConfig> {
  const schema = PlannerConfigSchema.extend({
    matrixDirectory: z.string().min(1).default(getPlannerEnvConfig(env).matrixDirectory),
  });
  return loadConfig(configPath, schema, { matrixDirectory });
}

export async function loadPlanInput(inputPath: string): Promise<PlanInput> {
  return loadConfig(inputPath, PlanInputSchema);
}

export function summarizePlan(matrixSetCount: number, plan: PlanResult): PlanSummary {
  const tasks = Object.values(plan.buildTasks);
  return {
    matrixSetCount,
    definitionCount: plan.updatedDefinitions.length,
    buildTaskCount: tasks.length,
    trainTaskCount: tasks.filter((task) => task.matrixType === 'train').length,
    testTaskCount: tasks.filter((task) => task.matrixType === 'test').length,
  };
}

export async function generatePlanHandler(
  args: PlanGenerateArgs,
  ctx: GeneratePlanContext = {}
): Promise<GeneratePlanResult> {
  const config = await loadPlannerConfig(args.config, args.matrixDirectory, ctx.env);
  const input = await loadPlanInput(args.input);

  const planner = new Planner(config, { observer: ctx.observer ?? new LoggingPlanObserver() });
  const plan = planner.generatePlans(input.matrixSetDefinitions, input.featureDictionaries);
  const summary = summarizePlan(input.matrixSetDefinitions.length, plan);

  if (args.out) {
    await mkdir(dirname(args.out), { recursive: true });
    await writeFile(args.out, JSON.stringify(plan, null, 2), 'utf-8');
    return { plan, summary, outputPath: args.out };
  }

  return { plan, summary };
}
