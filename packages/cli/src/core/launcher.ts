/**
 * Launcher - runs the training command and tees its merged output
 *
 * Node cannot replace its own process image, so the launcher spawns the child,
 * stays attached until it exits and hands back the child's status. While
 * attached it behaves like `tee -i`: SIGINT is ignored here (the terminal
 * already delivers it to the child's process group) so the tail of the output
 * still reaches the log; SIGTERM and SIGHUP are forwarded to the child.
 */

import { execa, ExecaError } from 'execa';
import { constants } from 'os';
import { createLogger, errnoCode, LaunchError, type Logger } from '@trainlaunch/utils';
import { formatCommand, type LaunchCommand } from './launch-command.js';
import { openLogSink } from './run-log.js';
import { streamSink, Tee, type TeeSink, type TeeStats } from './tee.js';

const FORWARDED_SIGNALS = ['SIGTERM', 'SIGHUP'] as const;

type ForwardedSignal = (typeof FORWARDED_SIGNALS)[number];

export interface LaunchOptions {
  /** Run log the merged output is appended to */
  logPath: string;
  /** Terminal sink; defaults to process.stdout */
  stdout?: NodeJS.WritableStream;
  /** Install SIGINT/SIGTERM/SIGHUP handlers for the lifetime of the child */
  handleSignals?: boolean;
  logger?: Logger;
}

export interface LaunchOutcome {
  exitCode: number;
  signal?: string;
  output: TeeStats;
}

/**
 * A launch implementation. The handler depends on this, tests substitute it.
 */
export type Launcher = (command: LaunchCommand, options: LaunchOptions) => Promise<LaunchOutcome>;

type Settlement =
  | { kind: 'exited'; exitCode: number; signal?: string }
  | { kind: 'failed'; error: LaunchError };

export function signalExitCode(signal: string): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  const signo: unknown = entry?.[1];
  return typeof signo === 'number' ? 128 + signo : 128;
}

function settleRejection(error: unknown, command: LaunchCommand): Settlement {
  if (error instanceof ExecaError) {
    if (error.exitCode !== undefined) {
      return { kind: 'exited', exitCode: error.exitCode };
    }
    if (error.signal !== undefined) {
      return { kind: 'exited', exitCode: signalExitCode(error.signal), signal: error.signal };
    }
  }

  const code = errnoCode(error) ?? (error instanceof Error ? errnoCode(error.cause) : undefined);
  const message = error instanceof ExecaError ? error.shortMessage : String(error);
  return {
    kind: 'failed',
    error: new LaunchError(
      `Failed to start ${command.file}: ${message}`,
      command.file,
      code === 'EACCES' ? 126 : 127,
      { errno: code }
    ),
  };
}

function openSinks(options: LaunchOptions, logger: Logger): TeeSink[] {
  const sinks: TeeSink[] = [streamSink('stdout', options.stdout ?? process.stdout)];
  try {
    sinks.push(openLogSink(options.logPath));
  } catch (error) {
    logger.warn('Run log unavailable, output goes to the terminal only', {
      path: options.logPath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return sinks;
}

export const launchAndTee: Launcher = async (command, options) => {
  const logger = options.logger ?? createLogger('launcher');
  const tee = new Tee(openSinks(options, logger), logger);

  logger.debug('Launching training process', {
    command: formatCommand(command),
  });

  const subprocess = execa(command.file, [...command.args], {
    all: true,
    buffer: false,
    stdin: 'inherit',
    env: { ...command.env },
    // Forwarded signals are the child's to handle: no SIGKILL escalation
    forceKillAfterDelay: false,
  });

  // Settle immediately so an early spawn failure is never an unhandled rejection
  const settlement: Promise<Settlement> = subprocess.then(
    (result): Settlement => ({ kind: 'exited', exitCode: result.exitCode ?? 0 }),
    (error: unknown): Settlement => settleRejection(error, command)
  );

  const onInterrupt = (): void => {
    logger.debug('SIGINT received, waiting for the training process to exit');
  };
  const forwarders = FORWARDED_SIGNALS.map((signal: ForwardedSignal) => {
    const listener = (): void => {
      logger.debug('Forwarding signal to training process', { signal });
      subprocess.kill(signal);
    };
    return { signal, listener };
  });

  if (options.handleSignals) {
    process.on('SIGINT', onInterrupt);
    for (const { signal, listener } of forwarders) {
      process.on(signal, listener);
    }
  }

  try {
    if (subprocess.all) {
      try {
        await tee.pump(subprocess.all);
      } catch (error) {
        logger.debug('Output stream ended with an error', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const settled = await settlement;
    if (settled.kind === 'failed') {
      throw settled.error;
    }

    const output = tee.getStats();
    logger.debug('Training process exited', {
      exitCode: settled.exitCode,
      signal: settled.signal,
      bytes: output.bytes,
    });
    return { exitCode: settled.exitCode, signal: settled.signal, output };
  } finally {
    if (options.handleSignals) {
      process.off('SIGINT', onInterrupt);
      for (const { signal, listener } of forwarders) {
        process.off(signal, listener);
      }
    }
    tee.close();
  }
};
