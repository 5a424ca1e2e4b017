/**
 * Configuration loading from environment variables
 *
 * Provides the typed launcher configuration. The launch preset itself lives in a
 * YAML/JSON file and is loaded by the CLI; this module only resolves where to find
 * it and the behavioural toggles.
 */

import { ConfigurationError } from '../errors.js';

export interface SnapshotConfig {
  dryRun: boolean;
  verbose: boolean;
}

export interface LauncherConfig {
  /** Launch preset file, resolved against the source root when relative */
  presetPath?: string;
  /** Root of the tree to snapshot; defaults to the launcher's workspace root */
  sourceRoot?: string;
  snapshot: SnapshotConfig;
  trace: boolean;
}

/**
 * Parse a boolean environment flag. Unset means the default.
 */
export function parseBooleanFlag(
  key: string,
  value: string | undefined,
  defaultValue: boolean = false
): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  throw new ConfigurationError(`${key} must be a boolean flag, got '${value}'`, key, { value });
}

/**
 * Load launcher configuration from environment variables
 */
export function getLauncherConfig(env: NodeJS.ProcessEnv = process.env): LauncherConfig {
  const {
    TRAINLAUNCH_PRESET,
    TRAINLAUNCH_SOURCE_ROOT,
    TRAINLAUNCH_SNAPSHOT_DRY_RUN,
    TRAINLAUNCH_SNAPSHOT_VERBOSE,
    TRAINLAUNCH_TRACE,
  } = env;

  return {
    presetPath: TRAINLAUNCH_PRESET || undefined,
    sourceRoot: TRAINLAUNCH_SOURCE_ROOT || undefined,
    snapshot: {
      dryRun: parseBooleanFlag('TRAINLAUNCH_SNAPSHOT_DRY_RUN', TRAINLAUNCH_SNAPSHOT_DRY_RUN),
      verbose: parseBooleanFlag('TRAINLAUNCH_SNAPSHOT_VERBOSE', TRAINLAUNCH_SNAPSHOT_VERBOSE),
    },
    trace: parseBooleanFlag('TRAINLAUNCH_TRACE', TRAINLAUNCH_TRACE),
  };
}
