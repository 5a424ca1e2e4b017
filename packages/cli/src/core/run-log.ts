/**
 * Run log - `<destination>/out.txt`
 *
 * One invocation line written by the launcher, then the merged output of the
 * training process appended by the tee. Append mode throughout.
 */

import { appendFileSync, closeSync, openSync, writeSync } from 'fs';
import { join } from 'path';
import { BootstrapError } from '@trainlaunch/utils';
import type { TeeSink } from './tee.js';

export const RUN_LOG_FILENAME = 'out.txt';

export function runLogPath(destination: string): string {
  return join(destination, RUN_LOG_FILENAME);
}

/**
 * The invocation line: program name and arguments joined by single spaces,
 * no quoting.
 */
export function formatInvocationRecord(argv0: string, args: readonly string[]): string {
  return [argv0, ...args].join(' ');
}

export function appendInvocationRecord(
  destination: string,
  argv0: string,
  args: readonly string[]
): string {
  const path = runLogPath(destination);
  try {
    appendFileSync(path, `${formatInvocationRecord(argv0, args)}\n`, 'utf8');
  } catch (error) {
    throw new BootstrapError(
      `Cannot append to ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }
  return path;
}

/**
 * Open the run log for the tee. Every chunk is written synchronously so a crash
 * leaves everything received so far on disk.
 */
export function openLogSink(path: string): TeeSink {
  const fd = openSync(path, 'a');
  let open = true;

  return {
    name: path,
    write(chunk) {
      let offset = 0;
      while (offset < chunk.byteLength) {
        offset += writeSync(fd, chunk, offset);
      }
    },
    close() {
      if (open) {
        open = false;
        closeSync(fd);
      }
    },
  };
}
