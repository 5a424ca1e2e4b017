/**
 * Workspace root discovery
 *
 * Walks up from a starting directory to the first package.json that declares
 * npm workspaces. That directory is the launcher root: the tree that gets
 * snapshotted and the base for the default launch preset.
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';

const cache = new Map<string, string>();

function declaresWorkspaces(packageFile: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(packageFile, 'utf8'));
    return typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg;
  } catch {
    // Unreadable or malformed package.json: keep walking
    return false;
  }
}

/**
 * Find workspace root by walking up from startDir.
 * Falls back to startDir when no workspace package.json is found.
 */
export function findWorkspaceRoot(startDir: string = process.cwd()): string {
  const start = resolve(startDir);
  const cached = cache.get(start);
  if (cached !== undefined) {
    return cached;
  }

  let current = start;
  let found = start;

  for (;;) {
    const packageFile = join(current, 'package.json');
    if (existsSync(packageFile) && declaresWorkspaces(packageFile)) {
      found = current;
      break;
    }

    const parent = dirname(current);
    if (parent === current) {
      // Reached filesystem root
      break;
    }
    current = parent;
  }

  cache.set(start, found);
  return found;
}

export function clearWorkspaceRootCache(): void {
  cache.clear();
}
