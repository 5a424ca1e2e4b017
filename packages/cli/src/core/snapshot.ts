/**
 * Snapshot - experiment directory bootstrap and filtered source copy
 *
 * Copy semantics follow `rsync -lrpt`: recursive, symlinks kept as symlinks,
 * permission bits and timestamps preserved. Re-running against the same
 * destination merges: unchanged files (same size and mtime) are skipped, changed
 * ones replaced.
 */

import type { Stats } from 'fs';
import {
  chmod,
  copyFile,
  lstat,
  lutimes,
  mkdir,
  readdir,
  readlink,
  rm,
  symlink,
  utimes,
} from 'fs/promises';
import { join, relative, resolve, sep } from 'path';
import {
  AppError,
  BootstrapError,
  createLogger,
  errnoCode,
  type Logger,
} from '@trainlaunch/utils';
import type { SnapshotFilter } from './snapshot-filter.js';

export const CODE_DIRNAME = 'code';

export interface SnapshotOptions {
  /** Walk and report without writing anything */
  dryRun?: boolean;
  /** Log every transferred path at info level */
  verbose?: boolean;
  /** Absolute paths never copied (the destination itself when it sits inside the source) */
  skipPaths?: readonly string[];
  logger?: Logger;
}

export interface SnapshotStats {
  files: number;
  skipped: number;
  directories: number;
  symlinks: number;
  excluded: number;
  bytes: number;
}

export interface BootstrapResult {
  destination: string;
  codeDir: string;
}

async function lstatOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await lstat(path);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

function sameContentStamp(a: Stats, b: Stats): boolean {
  return a.size === b.size && Math.trunc(a.mtimeMs) === Math.trunc(b.mtimeMs);
}

function permissionBits(info: Stats): number {
  return info.mode & 0o7777;
}

/**
 * Ensure `<destination>/code/` exists. Safe to call on an existing tree.
 */
export async function bootstrapDestination(destination: string): Promise<BootstrapResult> {
  const codeDir = join(destination, CODE_DIRNAME);
  try {
    await mkdir(codeDir, { recursive: true });
  } catch (error) {
    throw new BootstrapError(
      `Cannot create ${codeDir}: ${error instanceof Error ? error.message : String(error)}`,
      codeDir,
      { errno: errnoCode(error) }
    );
  }
  return { destination, codeDir };
}

class SnapshotCopier {
  readonly stats: SnapshotStats = {
    files: 0,
    skipped: 0,
    directories: 0,
    symlinks: 0,
    excluded: 0,
    bytes: 0,
  };
  private readonly skip: Set<string>;
  private readonly logger: Logger;

  constructor(
    private readonly sourceRoot: string,
    private readonly codeDir: string,
    private readonly filter: SnapshotFilter,
    private readonly options: SnapshotOptions
  ) {
    this.skip = new Set([resolve(codeDir), ...(options.skipPaths ?? []).map((p) => resolve(p))]);
    this.logger = options.logger ?? createLogger('snapshot');
  }

  async run(): Promise<SnapshotStats> {
    await this.guard(this.sourceRoot, async () => {
      const info = await lstat(this.sourceRoot);
      if (!info.isDirectory()) {
        throw new BootstrapError(`Source root is not a directory: ${this.sourceRoot}`, this.sourceRoot);
      }
    });
    await this.copyDirectory('');
    return this.stats;
  }

  private transferred(rel: string): void {
    if (this.options.verbose) {
      this.logger.info(this.options.dryRun ? `(dry run) ${rel}` : rel);
    }
  }

  private async guard<T>(path: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new BootstrapError(
        `Snapshot failed at ${path}: ${error instanceof Error ? error.message : String(error)}`,
        path,
        { errno: errnoCode(error) }
      );
    }
  }

  private async copyDirectory(relDir: string): Promise<void> {
    this.filter.enterDirectory(relDir);

    const srcDir = join(this.sourceRoot, relDir);
    const names = (await this.guard(srcDir, () => readdir(srcDir))).sort();

    for (const name of names) {
      const rel = relDir === '' ? name : `${relDir}${sep}${name}`;
      const src = join(this.sourceRoot, rel);
      const dst = join(this.codeDir, rel);

      if (this.skip.has(resolve(src))) {
        this.stats.excluded++;
        continue;
      }

      const info = await this.guard(src, () => lstat(src));

      if (this.filter.isExcluded(rel, info.isDirectory())) {
        this.stats.excluded++;
        this.logger.debug('Excluded from snapshot', { path: rel });
        continue;
      }

      if (info.isDirectory()) {
        await this.copySubdirectory(rel, dst, info);
      } else if (info.isSymbolicLink()) {
        await this.guard(src, () => this.copySymlink(rel, src, dst, info));
      } else if (info.isFile()) {
        await this.guard(src, () => this.copyRegularFile(rel, src, dst, info));
      } else {
        this.logger.debug('Skipping non-regular file', { path: rel });
      }
    }
  }

  private async copySubdirectory(rel: string, dst: string, info: Stats): Promise<void> {
    this.stats.directories++;

    if (!this.options.dryRun) {
      await this.guard(dst, async () => {
        const existing = await lstatOrUndefined(dst);
        if (existing && !existing.isDirectory()) {
          await rm(dst, { recursive: true, force: true });
        }
        if (!existing || !existing.isDirectory()) {
          await mkdir(dst);
        }
        // Owner must be able to write while the subtree is filled in
        await chmod(dst, permissionBits(info) | 0o700);
      });
    }

    await this.copyDirectory(rel);

    if (!this.options.dryRun) {
      await this.guard(dst, async () => {
        await chmod(dst, permissionBits(info));
        await utimes(dst, info.atime, info.mtime);
      });
    }
  }

  private async copyRegularFile(rel: string, src: string, dst: string, info: Stats): Promise<void> {
    if (this.options.dryRun) {
      this.stats.files++;
      this.stats.bytes += info.size;
      this.transferred(rel);
      return;
    }

    const existing = await lstatOrUndefined(dst);
    if (existing?.isFile() && sameContentStamp(existing, info)) {
      this.stats.skipped++;
      return;
    }
    if (existing) {
      await rm(dst, { recursive: true, force: true });
    }

    await copyFile(src, dst);
    await chmod(dst, permissionBits(info));
    await utimes(dst, info.atime, info.mtime);

    this.stats.files++;
    this.stats.bytes += info.size;
    this.transferred(rel);
  }

  private async copySymlink(rel: string, src: string, dst: string, info: Stats): Promise<void> {
    const target = await readlink(src);

    if (this.options.dryRun) {
      this.stats.symlinks++;
      this.transferred(`${rel} -> ${target}`);
      return;
    }

    const existing = await lstatOrUndefined(dst);
    if (existing?.isSymbolicLink() && (await readlink(dst)) === target) {
      this.stats.skipped++;
      return;
    }
    if (existing) {
      await rm(dst, { recursive: true, force: true });
    }

    await symlink(target, dst);
    await lutimes(dst, info.atime, info.mtime);

    this.stats.symlinks++;
    this.transferred(`${rel} -> ${target}`);
  }
}

/**
 * Copy the filtered source tree into codeDir.
 *
 * @throws BootstrapError on any read or write failure; already copied entries stay
 */
export async function copySnapshot(
  sourceRoot: string,
  codeDir: string,
  filter: SnapshotFilter,
  options: SnapshotOptions = {}
): Promise<SnapshotStats> {
  const root = resolve(sourceRoot);
  const target = resolve(codeDir);
  const inside = relative(root, target);
  const copier = new SnapshotCopier(root, target, filter, options);
  const stats = await copier.run();

  (options.logger ?? createLogger('snapshot')).debug('Snapshot complete', {
    sourceRoot: root,
    codeDir: target,
    nestedInSource: inside !== '' && !inside.startsWith('..'),
    ...stats,
  });
  return stats;
}
