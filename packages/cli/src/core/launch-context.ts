/**
 * Launch Context - lazy construction of everything a launch needs
 *
 * Not a framework: an object that resolves configuration once and hands out
 * collaborators. Every collaborator can be overridden, which is how tests run
 * the handler against temporary trees and fake launchers.
 */

import { dirname } from 'path';
import { fileURLToPath } from 'url';
import { findWorkspaceRoot, getLauncherConfig, type LauncherConfig } from '@trainlaunch/utils';
import type { LaunchPreset } from '../command-defs/launch.js';
import { loadLaunchPreset, resolvePresetPath } from './config-loader.js';
import { launchAndTee, type Launcher } from './launcher.js';
import { SnapshotFilter, type SnapshotFilterOptions } from './snapshot-filter.js';

export interface LaunchContextOptions {
  config?: LauncherConfig;
  /** Tree to snapshot; otherwise TRAINLAUNCH_SOURCE_ROOT, otherwise the launcher's workspace root */
  sourceRoot?: string;
  preset?: Readonly<LaunchPreset>;
  filter?: SnapshotFilterOptions;
  launcher?: Launcher;
  stdout?: NodeJS.WritableStream;
  handleSignals?: boolean;
}

export class LaunchContext {
  private _config: LauncherConfig | null = null;
  private _sourceRoot: string | null = null;
  private _preset: Promise<Readonly<LaunchPreset>> | null = null;
  private readonly _options: LaunchContextOptions;

  constructor(options: LaunchContextOptions = {}) {
    this._options = options;
  }

  config(): LauncherConfig {
    if (this._config === null) {
      this._config = this._options.config ?? getLauncherConfig();
    }
    return this._config;
  }

  /**
   * The launcher's own root, resolved from this module's location rather than
   * the caller's working directory.
   */
  sourceRoot(): string {
    if (this._sourceRoot === null) {
      this._sourceRoot =
        this._options.sourceRoot ??
        this.config().sourceRoot ??
        findWorkspaceRoot(dirname(fileURLToPath(import.meta.url)));
    }
    return this._sourceRoot;
  }

  presetPath(): string {
    return resolvePresetPath(this.sourceRoot(), this.config().presetPath);
  }

  /**
   * The launch preset, loaded and validated once.
   */
  preset(): Promise<Readonly<LaunchPreset>> {
    if (this._preset === null) {
      this._preset = this._options.preset
        ? Promise.resolve(this._options.preset)
        : loadLaunchPreset(this.presetPath());
    }
    return this._preset;
  }

  snapshotFilter(): SnapshotFilter {
    return SnapshotFilter.create(this.sourceRoot(), this._options.filter);
  }

  launcher(): Launcher {
    return this._options.launcher ?? launchAndTee;
  }

  stdout(): NodeJS.WritableStream {
    return this._options.stdout ?? process.stdout;
  }

  handleSignals(): boolean {
    return this._options.handleSignals ?? false;
  }
}
