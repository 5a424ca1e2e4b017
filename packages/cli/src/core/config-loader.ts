/**
 * Config Loader - Load YAML/JSON configuration files with override merging
 *
 * Used for the launch preset: the fixed executable and ordered hyperparameter
 * flags live in a file beside the code so the snapshot carries them too.
 *
 * - Auto-detect config format (YAML/JSON) by extension
 * - Deep merge overrides into config
 * - Validate with Zod schema
 */

import { readFileSync } from 'fs';
import { extname, isAbsolute, join } from 'path';
import * as yaml from 'js-yaml';
import type { z } from 'zod';
import { ValidationError } from '@trainlaunch/utils';
import { launchPresetSchema, type LaunchPreset } from '../command-defs/launch.js';

export const DEFAULT_PRESET_FILE = 'launch.config.yaml';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Detect config format by file extension
 */
export function detectConfigFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml';
  }
  // Default to JSON for unknown extensions
  return 'json';
}

/**
 * Deep merge two objects (overrides win)
 *
 * - Primitives: override value wins
 * - Arrays: override value replaces base value
 * - Objects: recursively merged
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };

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

function parseConfigFile(configPath: string): PlainObject {
  const fileContent = readFileSync(configPath, 'utf-8');
  const format = detectConfigFormat(configPath);
  const parsed: unknown = format === 'yaml' ? yaml.load(fileContent) : JSON.parse(fileContent);

  if (!isPlainObject(parsed)) {
    throw new ValidationError(`${format.toUpperCase()} config must be an object`, {
      configPath,
      format,
    });
  }
  return parsed;
}

/**
 * Load config from YAML or JSON file, merge overrides, validate.
 *
 * @throws ValidationError if the file cannot be read or does not match the schema
 */
export async function loadConfig<T>(
  configPath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  overrides?: PlainObject
): Promise<T> {
  let configData: PlainObject;

  try {
    configData = parseConfigFile(configPath);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw error;
    }
    throw new ValidationError(
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { configPath }
    );
  }

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

/**
 * Resolve the preset path: explicit paths win, relative ones are taken from the
 * launcher root, otherwise the default file in the launcher root.
 */
export function resolvePresetPath(sourceRoot: string, presetPath?: string): string {
  if (!presetPath) {
    return join(sourceRoot, DEFAULT_PRESET_FILE);
  }
  return isAbsolute(presetPath) ? presetPath : join(sourceRoot, presetPath);
}

/**
 * Load and freeze the launch preset. It is read once per run.
 */
export async function loadLaunchPreset(
  presetPath: string,
  overrides?: PlainObject
): Promise<Readonly<LaunchPreset>> {
  const preset = await loadConfig(presetPath, launchPresetSchema, overrides);
  Object.freeze(preset.args);
  for (const hyperparameter of preset.hyperparameters) {
    Object.freeze(hyperparameter);
  }
  Object.freeze(preset.hyperparameters);
  Object.freeze(preset.env);
  return Object.freeze(preset);
}
