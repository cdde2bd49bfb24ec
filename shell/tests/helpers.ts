// shell/tests/helpers.ts - Command context for tests

import { CancellationToken, MemorySink, type LineSink, type Logger } from '@thermofuse/acquisition';
import type { OutputOptions } from '../cli/src/config';
import type { CommandContext } from '../cli/src/context';
import { FakeBoardDriver } from '../../acquisition/tests/fake-driver';
import { fakeLauncher, type FakeProducer } from '../../acquisition/tests/fake-producer';

export interface CapturedLog extends Logger {
  errors: string[];
  warnings: string[];
}

export function captureLogger(): CapturedLog {
  const errors: string[] = [];
  const warnings: string[] = [];
  return {
    errors,
    warnings,
    debug() {},
    info() {},
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
  };
}

export interface TestHarness {
  sink: MemorySink;
  log: CapturedLog;
  token: CancellationToken;
  driver: FakeBoardDriver;
  launches: Array<{ command: string; args: readonly string[] }>;
  outputs: OutputOptions[];
  makeContext: (output: OutputOptions) => CommandContext;
}

export interface HarnessOptions {
  driver?: FakeBoardDriver;
  producer?: FakeProducer;
  /** Cancel the session token after each line written */
  cancelOnOutput?: boolean;
}

export function harness(opts: HarnessOptions = {}): TestHarness {
  const sink = new MemorySink();
  const log = captureLogger();
  const token = new CancellationToken();
  const driver = opts.driver ?? new FakeBoardDriver();
  const fake = opts.producer ? fakeLauncher(opts.producer) : undefined;
  const outputs: OutputOptions[] = [];
  const contextSink: LineSink = opts.cancelOnOutput
    ? {
        async writeLine(line) {
          await sink.writeLine(line);
          token.cancel('test');
        },
      }
    : sink;

  return {
    sink,
    log,
    token,
    driver,
    launches: fake?.launches ?? [],
    outputs,
    makeContext: (output) => {
      outputs.push(output);
      return {
        output,
        sink: contextSink,
        log,
        loadDriver: async () => driver,
        launcher: fake?.launcher,
        token,
      };
    },
  };
}
