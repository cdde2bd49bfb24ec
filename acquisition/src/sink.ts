// sink.ts - Line output

import type { Writable } from 'stream';

/** Where data lines go. One call per line; the newline is added here. */
export interface LineSink {
  writeLine(line: string): Promise<void>;
}

/**
 * Writes to a stream, one line at a time. Each write resolves once the
 * stream has accepted the chunk; a stream error (EPIPE from a closed
 * reader) rejects the pending write and every later one.
 */
export class StreamSink implements LineSink {
  private failure: Error | undefined;

  constructor(private readonly stream: Writable) {
    stream.on('error', (err) => {
      this.failure ??= err;
    });
  }

  async writeLine(line: string): Promise<void> {
    if (this.failure) throw this.failure;
    await new Promise<void>((resolve, reject) => {
      this.stream.write(`${line}\n`, (err) => {
        if (err) reject(this.failure ?? err);
        else resolve();
      });
    });
  }
}

/** Collects lines in memory. */
export class MemorySink implements LineSink {
  readonly lines: string[] = [];

  async writeLine(line: string): Promise<void> {
    this.lines.push(line);
  }
}

export function stdoutSink(): LineSink {
  return new StreamSink(process.stdout);
}
