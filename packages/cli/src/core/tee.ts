/**
 * Tee - fan one output stream out to several sinks
 *
 * Each chunk reaches every live sink before the next chunk is pulled from the
 * source, so no sink lags or reorders. A sink that fails is dropped (with one
 * warning) and the rest keep receiving: a broken log file never stops terminal
 * output.
 */

import { createLogger, type Logger } from '@trainlaunch/utils';

export interface TeeSink {
  readonly name: string;
  write(chunk: Uint8Array): void;
  close?(): void;
}

export interface TeeStats {
  chunks: number;
  bytes: number;
  failedSinks: string[];
}

function toBytes(chunk: Uint8Array | string): Uint8Array {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
}

export class Tee {
  private readonly live: TeeSink[];
  private readonly stats: TeeStats = { chunks: 0, bytes: 0, failedSinks: [] };
  private closed = false;

  constructor(
    private readonly sinks: readonly TeeSink[],
    private readonly logger: Logger = createLogger('tee')
  ) {
    this.live = [...sinks];
  }

  /**
   * Write one chunk to every live sink.
   */
  write(chunk: Uint8Array | string): void {
    const bytes = toBytes(chunk);
    this.stats.chunks++;
    this.stats.bytes += bytes.byteLength;

    for (const sink of [...this.live]) {
      try {
        sink.write(bytes);
      } catch (error) {
        this.drop(sink, error);
      }
    }
  }

  /**
   * Drain a source into the sinks. Resolves when the source ends.
   */
  async pump(source: AsyncIterable<Uint8Array | string>): Promise<TeeStats> {
    for await (const chunk of source) {
      this.write(chunk);
    }
    return this.getStats();
  }

  getStats(): TeeStats {
    return { ...this.stats, failedSinks: [...this.stats.failedSinks] };
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const sink of this.sinks) {
      try {
        sink.close?.();
      } catch (error) {
        this.logger.warn('Failed to close output sink', {
          sink: sink.name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private drop(sink: TeeSink, error: unknown): void {
    const index = this.live.indexOf(sink);
    if (index >= 0) {
      this.live.splice(index, 1);
    }
    this.stats.failedSinks.push(sink.name);
    this.logger.warn('Output sink failed, continuing without it', {
      sink: sink.name,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Sink for a writable such as process.stdout. Writes are not awaited: the
 * stream's own queue keeps order.
 */
export function streamSink(name: string, stream: NodeJS.WritableStream): TeeSink {
  return {
    name,
    write(chunk) {
      stream.write(chunk);
    },
  };
}
