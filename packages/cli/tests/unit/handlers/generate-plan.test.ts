/**
 * Generate plan handler tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { PlanResult } from '@matrixplan/core';
import { NotFoundError, ValidationError } from '@matrixplan/utils';
import {
  generatePlanHandler,
  loadPlanInput,
  loadPlannerConfig,
  summarizePlan,
} from '../../../src/handlers/plan/generate-plan.js';

const configPath = fileURLToPath(new URL('../../fixtures/planner.yaml', import.meta.url));
const inputPath = fileURLToPath(new URL('../../fixtures/plan-input.json', import.meta.url));

const silent = {};

describe('loadPlannerConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'matrixplan-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should prefer an explicit matrix directory', async () => {
    const config = await loadPlannerConfig(configPath, '/override/matrices', {
      MATRIX_DIRECTORY: '/env/matrices',
    });

    expect(config.matrixDirectory).toBe('/override/matrices');
  });

  it('should use the config file matrix directory over the environment', async () => {
    const path = join(dir, 'planner.json');
    await writeFile(
      path,
      JSON.stringify({
        featureStartTime: '2010-01-01',
        labelNames: ['outcome'],
        labelTypes: ['binary'],
        matrixDirectory: '/file/matrices',
      })
    );

    const config = await loadPlannerConfig(path, undefined, { MATRIX_DIRECTORY: '/env/matrices' });

    expect(config.matrixDirectory).toBe('/file/matrices');
  });

  it('should fall back to MATRIX_DIRECTORY', async () => {
    const config = await loadPlannerConfig(configPath, undefined, {
      MATRIX_DIRECTORY: '/env/matrices',
    });

    expect(config.matrixDirectory).toBe('/env/matrices');
  });

  it('should default the matrix directory', async () => {
    const config = await loadPlannerConfig(configPath, undefined, {});

    expect(config).toMatchObject({
      featureStartTime: '2010-01-01',
      labelNames: ['outcome'],
      labelTypes: ['binary'],
      states: ['active'],
      cohortName: 'test_cohort',
      userMetadata: { team: 'research' },
      matrixDirectory: './matrices',
    });
  });

  it('should reject configs missing label names', async () => {
    const path = join(dir, 'planner.yaml');
    await writeFile(path, "featureStartTime: '2010-01-01'\nlabelTypes: [binary]\n");

    await expect(loadPlannerConfig(path, undefined, {})).rejects.toThrow(
      'Config validation failed: labelNames: Required'
    );
  });
});

describe('loadPlanInput', () => {
  it('should load matrix sets and feature dictionaries', async () => {
    const input = await loadPlanInput(inputPath);

    expect(input.matrixSetDefinitions).toHaveLength(1);
    expect(input.matrixSetDefinitions[0].feature_start_time).toBe('2010-01-01');
    expect(input.featureDictionaries).toEqual([{ tableA: ['f1', 'f2'] }, { tableB: ['f3'] }]);
  });

  it('should report a missing input file', async () => {
    await expect(loadPlanInput('/nonexistent/plan-input.json')).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});

describe('summarizePlan', () => {
  it('should count tasks by matrix type', () => {
    const plan: PlanResult = { updatedDefinitions: [], buildTasks: {} };

    expect(summarizePlan(3, plan)).toEqual({
      matrixSetCount: 3,
      definitionCount: 0,
      buildTaskCount: 0,
      trainTaskCount: 0,
      testTaskCount: 0,
    });
  });
});

describe('generatePlanHandler', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'matrixplan-plan-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should plan every combination and summarize the result', async () => {
    const result = await generatePlanHandler(
      { config: configPath, input: inputPath, matrixDirectory: '/tmp/matrices', format: 'json' },
      { env: {}, observer: silent }
    );

    expect(result.summary).toEqual({
      matrixSetCount: 1,
      definitionCount: 2,
      buildTaskCount: 6,
      trainTaskCount: 2,
      testTaskCount: 4,
    });
    expect(result.outputPath).toBeUndefined();
    for (const task of Object.values(result.plan.buildTasks)) {
      expect(task.matrixDirectory).toBe('/tmp/matrices');
      expect(task.matrixMetadata.cohort_name).toBe('test_cohort');
      expect(task.matrixMetadata.team).toBe('research');
    }
  });

  it('should write the plan as JSON when an output path is given', async () => {
    const out = join(dir, 'nested', 'plan.json');

    const result = await generatePlanHandler(
      { config: configPath, input: inputPath, out, format: 'json' },
      { env: {}, observer: silent }
    );

    expect(result.outputPath).toBe(out);
    const written: unknown = JSON.parse(await readFile(out, 'utf-8'));
    expect(written).toEqual(JSON.parse(JSON.stringify(result.plan)));
  });

  it('should reject invalid plan input', async () => {
    const badInput = join(dir, 'input.json');
    await writeFile(badInput, JSON.stringify({ matrixSetDefinitions: [{}], featureDictionaries: [] }));

    await expect(
      generatePlanHandler(
        { config: configPath, input: badInput, format: 'json' },
        { env: {}, observer: silent }
      )
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
