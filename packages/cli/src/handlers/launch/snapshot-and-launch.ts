/**
 * Snapshot-and-launch Handler
 *
 * destination from argv -> mkdir -p code/ -> filtered copy -> invocation line
 * in out.txt -> training process teed into out.txt. Any failure before the
 * last step aborts without launching.
 */

import { createLogger } from '@trainlaunch/utils';
import { extractCheckpointPath } from '../../core/argument-parser.js';
import type { LaunchContext } from '../../core/launch-context.js';
import { buildLaunchCommand, type LaunchCommand } from '../../core/launch-command.js';
import { appendInvocationRecord } from '../../core/run-log.js';
import { bootstrapDestination, copySnapshot, type SnapshotStats } from '../../core/snapshot.js';

const logger = createLogger('snapshot-and-launch');

export interface SnapshotAndLaunchResult {
  exitCode: number;
  signal?: string;
  destination: string;
  logPath: string;
  command: LaunchCommand;
  snapshot: SnapshotStats;
}

export async function snapshotAndLaunchHandler(
  argv: readonly string[],
  argv0: string,
  ctx: LaunchContext
): Promise<SnapshotAndLaunchResult> {
  const destination = extractCheckpointPath(argv);
  const preset = await ctx.preset();
  const sourceRoot = ctx.sourceRoot();
  const { snapshot: snapshotConfig } = ctx.config();

  logger.debug('Bootstrapping experiment directory', { destination });
  const { codeDir } = await bootstrapDestination(destination);

  const snapshot = await copySnapshot(sourceRoot, codeDir, ctx.snapshotFilter(), {
    dryRun: snapshotConfig.dryRun,
    verbose: snapshotConfig.verbose,
    skipPaths: [destination],
    logger,
  });
  logger.info('Source snapshot written', {
    destination,
    files: snapshot.files,
    skipped: snapshot.skipped,
    excluded: snapshot.excluded,
    dryRun: snapshotConfig.dryRun,
  });

  const logPath = appendInvocationRecord(destination, argv0, argv);
  const command = buildLaunchCommand(preset, argv);

  const outcome = await ctx.launcher()(command, {
    logPath,
    stdout: ctx.stdout(),
    handleSignals: ctx.handleSignals(),
    logger,
  });

  if (outcome.exitCode !== 0) {
    logger.warn('Training process exited with non-zero status', {
      exitCode: outcome.exitCode,
      signal: outcome.signal,
    });
  }

  return {
    exitCode: outcome.exitCode,
    signal: outcome.signal,
    destination,
    logPath,
    command,
    snapshot,
  };
}
