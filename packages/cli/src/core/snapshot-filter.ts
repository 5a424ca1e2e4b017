/**
 * Snapshot Filter - decides which entries of the source tree are copied
 *
 * Two exclusion sources, both always applied:
 * - the built-in pattern list (dotfiles, data and model directories, caches,
 *   notebooks, run outputs)
 * - every .gitignore found while walking, merged per directory: a file in D
 *   governs D's subtree with patterns relative to D, like rsync's
 *   `--filter=':- .gitignore'`
 *
 * Patterns follow gitignore rules: no slash matches the basename at any depth,
 * a leading or inner slash anchors to the declaring directory, a trailing slash
 * restricts to directories, `!` re-includes, last matching rule wins.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import ignore, { type Ignore } from 'ignore';
import { createLogger } from '@trainlaunch/utils';

const logger = createLogger('snapshot-filter');

export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = Object.freeze([
  '.*',
  'data',
  'pretrained_models',
  '__pycache__',
  '*runs*',
  '*.pyc',
  '*.ipynb',
]);

export const DEFAULT_IGNORE_FILE = '.gitignore';

interface RuleScope {
  /** Directory (relative to the source root, posix, '' for the root) the rules belong to */
  readonly base: string;
  readonly rules: Ignore;
}

export interface SnapshotFilterOptions {
  patterns?: readonly string[];
  /** Per-directory ignore file name; null disables ignore-file merging */
  ignoreFileName?: string | null;
}

/**
 * Compile gitignore-style patterns (lines or a whole ignore file).
 */
export function compileRules(patterns: string | readonly string[]): Ignore {
  // `ignore` is CommonJS; under NodeNext its default export is reached through `.default`
  return ignore.default().add(typeof patterns === 'string' ? patterns : [...patterns]);
}

/**
 * Evaluate one rule set. true: excluded, false: re-included by a negation,
 * undefined: no rule matched.
 */
export function evaluateRules(
  rules: Ignore,
  relPath: string,
  isDirectory: boolean
): boolean | undefined {
  const result = rules.test(isDirectory ? `${relPath}/` : relPath);
  if (result.ignored) {
    return true;
  }
  if (result.unignored) {
    return false;
  }
  return undefined;
}

function toPosix(relPath: string): string {
  return relPath.split(/[\\/]+/).filter(Boolean).join('/');
}

function relativeTo(base: string, relPath: string): string | undefined {
  if (base === '') {
    return relPath;
  }
  if (relPath.startsWith(`${base}/`)) {
    return relPath.slice(base.length + 1);
  }
  return undefined;
}

export class SnapshotFilter {
  private readonly builtIn: Ignore;
  private readonly scopes = new Map<string, RuleScope>();
  private readonly entered = new Set<string>();

  private constructor(
    readonly sourceRoot: string,
    readonly patterns: readonly string[],
    readonly ignoreFileName: string | null
  ) {
    this.builtIn = compileRules(patterns);
  }

  static create(sourceRoot: string, options: SnapshotFilterOptions = {}): SnapshotFilter {
    const ignoreFileName =
      options.ignoreFileName === undefined ? DEFAULT_IGNORE_FILE : options.ignoreFileName;
    return new SnapshotFilter(
      sourceRoot,
      Object.freeze([...(options.patterns ?? DEFAULT_EXCLUDE_PATTERNS)]),
      ignoreFileName
    );
  }

  /**
   * Load the ignore file of a directory about to be walked, if there is one.
   */
  enterDirectory(relDir: string): void {
    const base = toPosix(relDir);
    if (this.entered.has(base)) {
      return;
    }
    this.entered.add(base);

    if (this.ignoreFileName === null) {
      return;
    }

    const file = join(this.sourceRoot, base, this.ignoreFileName);
    if (!existsSync(file)) {
      return;
    }

    const rules = compileRules(readFileSync(file, 'utf8'));
    logger.debug('Merged ignore file', { path: file });
    this.scopes.set(base, { base, rules });
  }

  /**
   * Whether a path (relative to the source root) is excluded from the snapshot.
   * Ancestor directories must already have been entered for their ignore files
   * to apply.
   */
  isExcluded(relPath: string, isDirectory: boolean): boolean {
    const path = toPosix(relPath);
    if (path === '') {
      return false;
    }

    if (evaluateRules(this.builtIn, path, isDirectory) === true) {
      return true;
    }

    let verdict: boolean | undefined;
    for (const scope of this.applicableScopes(path)) {
      const scoped = relativeTo(scope.base, path);
      if (scoped === undefined) {
        continue;
      }
      // Deeper ignore files override shallower ones
      const result = evaluateRules(scope.rules, scoped, isDirectory);
      if (result !== undefined) {
        verdict = result;
      }
    }
    return verdict === true;
  }

  private applicableScopes(path: string): RuleScope[] {
    const segments = path.split('/');
    const scopes: RuleScope[] = [];
    for (let depth = 0; depth < segments.length; depth++) {
      const base = segments.slice(0, depth).join('/');
      const scope = this.scopes.get(base);
      if (scope) {
        scopes.push(scope);
      }
    }
    return scopes;
  }
}
