/**
 * Launch command construction
 *
 * Fixed executable + fixed hyperparameters + caller arguments, in that order.
 * Caller arguments go last and untouched so repeating a flag overrides the
 * default (the training script's parser applies last-wins).
 */

import type { Hyperparameter, LaunchPreset } from '../command-defs/launch.js';

export interface LaunchCommand {
  readonly file: string;
  readonly args: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

export function flattenHyperparameters(hyperparameters: readonly Hyperparameter[]): string[] {
  const tokens: string[] = [];
  for (const { flag, value } of hyperparameters) {
    if (value === false) {
      continue;
    }
    if (value === undefined || value === true) {
      tokens.push(flag);
    } else {
      tokens.push(flag, String(value));
    }
  }
  return tokens;
}

export function buildLaunchCommand(
  preset: Readonly<LaunchPreset>,
  forwarded: readonly string[]
): LaunchCommand {
  return Object.freeze({
    file: preset.executable,
    args: Object.freeze([
      ...preset.args,
      ...flattenHyperparameters(preset.hyperparameters),
      ...forwarded,
    ]),
    env: preset.env,
  });
}

/**
 * Render the command for logs. Display only: arguments are never shell-parsed.
 */
export function formatCommand(command: LaunchCommand): string {
  return [command.file, ...command.args].join(' ');
}
