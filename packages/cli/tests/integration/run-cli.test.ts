/**
 * Integration tests for the CLI runner: handler result or error to exit code
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdtempSync, realpathSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { PassThrough } from 'stream';
import { resolveLogLevel, setLogLevel, winstonLogger, type LauncherConfig } from '@trainlaunch/utils';
import { USAGE } from '../../src/core/error-handler.js';
import type { Launcher } from '../../src/core/launcher.js';
import { runCli } from '../../src/core/run-cli.js';

const config: LauncherConfig = { snapshot: { dryRun: false, verbose: false }, trace: false };

describe('runCli', () => {
  let source: string;
  let scratch: string;
  let stderr: PassThrough;
  const originalLevel = winstonLogger.level;

  let launcher: Mock<Launcher>;

  function options(overrides: { config?: LauncherConfig } = { config }) {
    return {
      ...overrides,
      sourceRoot: source,
      preset: { executable: 'python', args: ['train.py'], hyperparameters: [], env: {} },
      launcher,
      stdout: new PassThrough(),
      handleSignals: false,
    };
  }

  beforeEach(() => {
    source = realpathSync(mkdtempSync(join(tmpdir(), 'run-cli-src-')));
    scratch = realpathSync(mkdtempSync(join(tmpdir(), 'run-cli-dst-')));
    writeFileSync(join(source, 'train.py'), 'print("train")\n');
    stderr = new PassThrough();
    launcher = vi.fn<Launcher>(async () => ({
      exitCode: 3,
      output: { chunks: 0, bytes: 0, failedSinks: [] },
    }));
  });

  afterEach(() => {
    rmSync(source, { recursive: true, force: true });
    rmSync(scratch, { recursive: true, force: true });
    vi.unstubAllEnvs();
    setLogLevel(originalLevel);
  });

  it('returns the training process exit code', async () => {
    const exitCode = await runCli(
      ['--pathCheckpoint', join(scratch, 'exp')],
      'trainlaunch',
      options(),
      stderr
    );

    expect(exitCode).toBe(3);
    expect(launcher).toHaveBeenCalledTimes(1);
    expect(stderr.read()).toBeNull();
  });

  it('exits 2 with usage when the checkpoint path is missing', async () => {
    const exitCode = await runCli(['--nEpoch', '5'], 'trainlaunch', options(), stderr);

    expect(exitCode).toBe(2);
    expect(String(stderr.read())).toBe(
      `Error: Missing required argument: --pathCheckpoint <path>\n${USAGE}\n`
    );
    expect(launcher).not.toHaveBeenCalled();
  });

  it('exits non-zero without launching when the destination cannot be created', async () => {
    writeFileSync(join(scratch, 'blocker'), '');
    const destination = join(scratch, 'blocker', 'exp');

    const exitCode = await runCli(['--pathCheckpoint', destination], 'trainlaunch', options(), stderr);
    const message = String(stderr.read());

    expect(exitCode).toBe(1);
    expect(message.startsWith(`Error: Cannot create ${join(destination, 'code')}: `)).toBe(true);
    expect(message.endsWith('\nNothing was launched; the destination may be partially populated.\n')).toBe(
      true
    );
    expect(launcher).not.toHaveBeenCalled();
  });

  it('exits 1 on a malformed environment flag', async () => {
    vi.stubEnv('TRAINLAUNCH_TRACE', 'maybe');

    const exitCode = await runCli(['--pathCheckpoint', join(scratch, 'exp')], 'trainlaunch', options({}), stderr);

    expect(exitCode).toBe(1);
    expect(String(stderr.read())).toBe("Error: TRAINLAUNCH_TRACE must be a boolean flag, got 'maybe'\n");
  });

  it('raises the log level when tracing is enabled', async () => {
    await runCli(
      ['--pathCheckpoint', join(scratch, 'exp')],
      'trainlaunch',
      options({ config: { ...config, trace: true } }),
      stderr
    );

    expect(winstonLogger.level).toBe(resolveLogLevel(true));
  });
});
