/**
 * CLI runner - one launch from argv to process exit code
 */

import {
  exitCodeForError,
  getLauncherConfig,
  resolveLogLevel,
  setLogLevel,
} from '@trainlaunch/utils';
import { snapshotAndLaunchHandler } from '../handlers/launch/snapshot-and-launch.js';
import { handleError } from './error-handler.js';
import { LaunchContext, type LaunchContextOptions } from './launch-context.js';

/**
 * Run the launcher and return the exit code the process should end with.
 * Errors are reported on stderr as `Error: <message>`.
 */
export async function runCli(
  argv: readonly string[],
  argv0: string,
  options: LaunchContextOptions = {},
  stderr: NodeJS.WritableStream = process.stderr
): Promise<number> {
  try {
    const config = options.config ?? getLauncherConfig();
    setLogLevel(resolveLogLevel(config.trace));

    const ctx = new LaunchContext({ handleSignals: true, ...options, config });
    const result = await snapshotAndLaunchHandler(argv, argv0, ctx);
    return result.exitCode;
  } catch (error) {
    stderr.write(`Error: ${handleError(error)}\n`);
    return exitCodeForError(error);
  }
}
