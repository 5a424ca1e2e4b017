/**
 * Argument Parser - Zod-based validation and parsing
 *
 * The launcher recognises exactly one option of its own. Everything else on the
 * command line belongs to the training process, so unknown options, their values
 * and positionals are tolerated and left for forwarding.
 */

import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { MissingArgumentError, ValidationError } from '@trainlaunch/utils';
import { launchArgsSchema, type LaunchArgs } from '../command-defs/launch.js';

export const CHECKPOINT_OPTION = '--pathCheckpoint';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodSchema>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.infer<T> {
  try {
    return schema.parse(rawArgs);
  } catch (error) {
    if (error instanceof z.ZodError) {
      // Format Zod errors into user-friendly messages
      const messages = error.issues.map((issue) => {
        const path = issue.path.join('.');
        return `  ${path}: ${issue.message}`;
      });

      throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
        issues: error.issues,
        formattedMessages: messages,
      });
    }
    throw error;
  }
}

/**
 * Build the lenient Commander program that only knows --pathCheckpoint.
 * Help and version flags are disabled: --help is meant for the training script.
 */
function buildExtractor(): Command {
  return new Command()
    .name('trainlaunch')
    .option(`${CHECKPOINT_OPTION} <path>`, 'experiment directory for code snapshot and logs')
    .helpOption(false)
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    });
}

/**
 * Read the launcher's own options out of the full argument list.
 */
export function parseLaunchArgs(argv: readonly string[]): LaunchArgs {
  const program = buildExtractor();

  try {
    program.parseOptions([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new ValidationError(`${CHECKPOINT_OPTION} expects a path argument`, {
        commanderCode: error.code,
      });
    }
    throw error;
  }

  const opts = program.opts<Record<string, unknown>>();
  if (opts.pathCheckpoint === undefined) {
    throw new MissingArgumentError(CHECKPOINT_OPTION);
  }

  return parseArguments(launchArgsSchema, opts);
}

/**
 * Extract the destination directory. The value is returned exactly as given.
 */
export function extractCheckpointPath(argv: readonly string[]): string {
  return parseLaunchArgs(argv).pathCheckpoint;
}
