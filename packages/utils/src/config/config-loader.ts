/**
 * Config Loader - Load YAML/JSON configuration files with override merging
 *
 * - Auto-detect config format (YAML/JSON) by extension
 * - Load and parse config files
 * - Deep merge overrides into config
 * - Validate with Zod schema
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import * as yaml from 'js-yaml';
import type { z } from 'zod';
import { NotFoundError, ValidationError } from '../errors.js';

export type ConfigFormat = 'yaml' | 'json';

/**
 * Detect config format by file extension
 */
export function detectConfigFormat(path: string): ConfigFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml';
  }
  // Default to JSON for unknown extensions
  return 'json';
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (overrides win)
 *
 * Rules:
 * - Primitives: override value wins
 * - Arrays: override value replaces base value
 * - Objects: recursively merged
 * - Undefined overrides are skipped
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }

    const baseValue = result[key];
    if (isPlainObject(value) && isPlainObject(baseValue)) {
      result[key] = deepMerge(baseValue, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Parse config text in the given format
 *
 * @throws ValidationError if the document is not an object
 */
export function parseConfigText(
  content: string,
  format: ConfigFormat,
  source: string = '<inline>'
): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = format === 'yaml' ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    throw new ValidationError(
      `Failed to parse ${format.toUpperCase()} from ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { source, format }
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ValidationError(`${format.toUpperCase()} config must be an object`, {
      source,
      format,
    });
  }
  return parsed;
}

/**
 * Load config from YAML or JSON file
 *
 * @param configPath - Path to config file
 * @param schema - Zod schema for validation
 * @param overrides - Overrides to merge before validation
 * @throws NotFoundError if the file does not exist
 * @throws ValidationError if config is invalid
 */
export async function loadConfig<T>(
  configPath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  overrides?: Record<string, unknown>
): Promise<T> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (isPlainObject(error) && error.code === 'ENOENT') {
      throw new NotFoundError('Config file', configPath);
    }
    throw error;
  }

  let configData = parseConfigText(content, detectConfigFormat(configPath), configPath);

  if (overrides && Object.keys(overrides).length > 0) {
    configData = deepMerge(configData, overrides);
  }

  const parsed = schema.safeParse(configData);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Config validation failed: ${issues}`, {
      configPath,
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}
