/**
 * Integration tests for the snapshot-and-launch handler
 *
 * Runs the whole flow against temporary source and destination trees. Most
 * cases substitute the launcher; the last one spawns a real child.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  appendFileSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  readFileSync,
  realpathSync,
  rmSync,
  writeFileSync,
} from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { PassThrough } from 'stream';
import {
  BootstrapError,
  LaunchError,
  MissingArgumentError,
  ValidationError,
  type LauncherConfig,
} from '@trainlaunch/utils';
import type { LaunchPreset } from '../../../src/command-defs/launch.js';
import { LaunchContext } from '../../../src/core/launch-context.js';
import type { Launcher, LaunchOutcome } from '../../../src/core/launcher.js';
import { snapshotAndLaunchHandler } from '../../../src/handlers/launch/snapshot-and-launch.js';

const config: LauncherConfig = { snapshot: { dryRun: false, verbose: false }, trace: false };

const preset: LaunchPreset = {
  executable: 'python',
  args: ['-u', 'train.py'],
  hyperparameters: [
    { flag: '--nEpoch', value: 50 },
    { flag: '--dropout' },
  ],
  env: {},
};

const quietOutcome: LaunchOutcome = { exitCode: 0, output: { chunks: 1, bytes: 12, failedSinks: [] } };

describe('snapshotAndLaunchHandler', () => {
  let source: string;
  let scratch: string;
  let destination: string;

  beforeEach(() => {
    source = realpathSync(mkdtempSync(join(tmpdir(), 'launch-src-')));
    scratch = realpathSync(mkdtempSync(join(tmpdir(), 'launch-dst-')));
    destination = join(scratch, 'exp1');

    writeFileSync(join(source, 'train.py'), 'print("train")\n');
    writeFileSync(join(source, '.env'), 'TOKEN=placeholder\n');
    mkdirSync(join(source, 'cpc'));
    writeFileSync(join(source, 'cpc', 'model.py'), 'pass\n');
    writeFileSync(join(source, 'analysis.ipynb'), '{}\n');
  });

  afterEach(() => {
    rmSync(source, { recursive: true, force: true });
    rmSync(scratch, { recursive: true, force: true });
  });

  function fakeLauncher(outcome: LaunchOutcome = quietOutcome) {
    return vi.fn<Launcher>(async (_command, options) => {
      appendFileSync(options.logPath, 'fake output\n');
      return outcome;
    });
  }

  function context(launcher: Launcher, overrides: { preset?: LaunchPreset } = { preset }): LaunchContext {
    return new LaunchContext({
      config,
      sourceRoot: source,
      preset: overrides.preset,
      launcher,
      stdout: new PassThrough(),
    });
  }

  it('snapshots the source, records the invocation and launches', async () => {
    const launcher = fakeLauncher();
    const argv = ['--pathCheckpoint', destination, '--nEpoch', '5'];

    const result = await snapshotAndLaunchHandler(argv, 'trainlaunch', context(launcher));

    expect(result.exitCode).toBe(0);
    expect(result.destination).toBe(destination);
    expect(result.logPath).toBe(join(destination, 'out.txt'));
    expect(result.snapshot.files).toBe(2);

    expect(readFileSync(join(destination, 'code', 'train.py'), 'utf8')).toBe('print("train")\n');
    expect(readFileSync(join(destination, 'code', 'cpc', 'model.py'), 'utf8')).toBe('pass\n');
    expect(existsSync(join(destination, 'code', '.env'))).toBe(false);
    expect(existsSync(join(destination, 'code', 'analysis.ipynb'))).toBe(false);

    expect(readFileSync(result.logPath, 'utf8')).toBe(
      `trainlaunch --pathCheckpoint ${destination} --nEpoch 5\nfake output\n`
    );
  });

  it('hands the launcher the defaults followed by the caller arguments', async () => {
    const launcher = fakeLauncher();
    const argv = ['--pathCheckpoint', destination, '--nEpoch', '5'];

    await snapshotAndLaunchHandler(argv, 'trainlaunch', context(launcher));

    expect(launcher).toHaveBeenCalledTimes(1);
    const [command, options] = launcher.mock.calls[0];
    expect(command).toEqual({
      file: 'python',
      args: ['-u', 'train.py', '--nEpoch', '50', '--dropout', '--pathCheckpoint', destination, '--nEpoch', '5'],
      env: {},
    });
    expect(options.logPath).toBe(join(destination, 'out.txt'));
    expect(options.handleSignals).toBe(false);
  });

  it('returns the child exit status', async () => {
    const launcher = fakeLauncher({ ...quietOutcome, exitCode: 3 });

    const result = await snapshotAndLaunchHandler(['--pathCheckpoint', destination], 'trainlaunch', context(launcher));

    expect(result.exitCode).toBe(3);
  });

  it('appends to the run log of an existing destination', async () => {
    const launcher = fakeLauncher();
    const argv = ['--pathCheckpoint', destination];

    await snapshotAndLaunchHandler(argv, 'trainlaunch', context(launcher));
    await snapshotAndLaunchHandler(argv, 'trainlaunch', context(launcher));

    expect(readFileSync(join(destination, 'out.txt'), 'utf8')).toBe(
      `trainlaunch --pathCheckpoint ${destination}\nfake output\n`.repeat(2)
    );
  });

  it('does nothing when the checkpoint path is missing', async () => {
    const launcher = fakeLauncher();

    await expect(
      snapshotAndLaunchHandler(['--nEpoch', '5'], 'trainlaunch', context(launcher))
    ).rejects.toBeInstanceOf(MissingArgumentError);

    expect(launcher).not.toHaveBeenCalled();
    expect(readdirSync(scratch)).toEqual([]);
  });

  it('does nothing when the preset cannot be loaded', async () => {
    const launcher = fakeLauncher();

    await expect(
      snapshotAndLaunchHandler(['--pathCheckpoint', destination], 'trainlaunch', context(launcher, {}))
    ).rejects.toBeInstanceOf(ValidationError);

    expect(launcher).not.toHaveBeenCalled();
    expect(existsSync(destination)).toBe(false);
  });

  it('does not launch when the destination cannot be created', async () => {
    const launcher = fakeLauncher();
    writeFileSync(join(scratch, 'blocker'), '');

    await expect(
      snapshotAndLaunchHandler(['--pathCheckpoint', join(scratch, 'blocker', 'exp')], 'trainlaunch', context(launcher))
    ).rejects.toBeInstanceOf(BootstrapError);

    expect(launcher).not.toHaveBeenCalled();
  });

  it('keeps the invocation line when the launch fails', async () => {
    const launcher = vi.fn<Launcher>(async (command) => {
      throw new LaunchError(`Failed to start ${command.file}: ENOENT`, command.file);
    });

    await expect(
      snapshotAndLaunchHandler(['--pathCheckpoint', destination], 'trainlaunch', context(launcher))
    ).rejects.toBeInstanceOf(LaunchError);

    expect(readFileSync(join(destination, 'out.txt'), 'utf8')).toBe(
      `trainlaunch --pathCheckpoint ${destination}\n`
    );
  });

  it('runs a real training process end to end', async () => {
    writeFileSync(
      join(source, 'train.cjs'),
      "process.stdout.write('args: ' + process.argv.slice(2).join(' ') + '\\n');\n"
    );
    const ctx = new LaunchContext({
      config,
      sourceRoot: source,
      preset: {
        executable: process.execPath,
        args: [join(source, 'train.cjs')],
        hyperparameters: [{ flag: '--lr', value: 0.001 }],
        env: {},
      },
      stdout: new PassThrough(),
    });
    const argv = ['--pathCheckpoint', destination, '--lr', '0.01'];

    const result = await snapshotAndLaunchHandler(argv, 'trainlaunch', ctx);

    expect(result.exitCode).toBe(0);
    expect(existsSync(join(destination, 'code', 'train.cjs'))).toBe(true);
    expect(readFileSync(result.logPath, 'utf8')).toBe(
      `trainlaunch ${argv.join(' ')}\nargs: --lr 0.001 ${argv.join(' ')}\n`
    );
  });
});
