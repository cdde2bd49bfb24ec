// cli/src/context.ts - What every command runs against

import { DEFAULTS, ThermoError, describeError } from '@thermofuse/contracts';
import {
  getDriver,
  stdoutSink,
  createLogger,
  type BoardDriver,
  type CancellationToken,
  type LineSink,
  type Logger,
  type ProducerLauncher,
} from '@thermofuse/acquisition';
import type { OutputOptions } from './config';

export interface CommandContext {
  output: OutputOptions;
  /** Data lines (stdout) */
  sink: LineSink;
  log: Logger;
  loadDriver: () => Promise<BoardDriver>;
  /** Tests substitute these; production uses the process defaults */
  launcher?: ProducerLauncher;
  token?: CancellationToken;
}

export type Command = (args: string[], ctx: CommandContext) => Promise<number>;

export function defaultContext(output: OutputOptions, env: Record<string, string | undefined> = process.env): CommandContext {
  return {
    output,
    sink: stdoutSink(),
    log: createLogger('cli'),
    loadDriver: () => getDriver(env.THERMO_DRIVER || DEFAULTS.DRIVER),
  };
}

/** One-line stderr report for a fatal error, with the cause when there is one. */
export function reportError(log: Logger, err: unknown): void {
  if (err instanceof ThermoError && err.cause !== undefined) {
    log.error(`${err.message}: ${describeError(err.cause)}`);
  } else {
    log.error(describeError(err));
  }
}
