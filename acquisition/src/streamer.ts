// streamer.ts - Polling Loop
//
// Opens the sources' boards, emits the static header once if any static
// field was asked for, then collects and emits one batch per period until
// cancelled. Boards are closed on every exit path.

import { setTimeout as sleep } from 'timers/promises';
import {
  TIMING,
  wantsAnyStatic,
  type BoardAddress,
  type BoardInfo,
  type QuantitySelection,
  type Reading,
  type Source,
  type StaticSelection,
} from '@thermofuse/contracts';
import { BoardManager } from './board-manager';
import { installSignalHandlers, processCancellation, type CancellationToken } from './cancellation';
import { ReadingCollector, collectStaticInfo } from './collector';
import type { BoardDriver } from './driver/types';
import { createLogger, type Logger } from './log';
import type { LineSink } from './sink';

/** Turns collected data into output lines for one mode (JSON or text). */
export interface BatchFormatter {
  formatStatic(infos: ReadonlyMap<BoardAddress, BoardInfo>): string[];
  formatCycle(readings: readonly Reading[]): string[];
}

export interface StreamOptions {
  sources: readonly Source[];
  periodMs: number;
  quantities: QuantitySelection;
  statics: StaticSelection;
  formatter: BatchFormatter;
  sink: LineSink;
  /** Defaults to the process token, with signal handlers installed */
  token?: CancellationToken;
  boards?: BoardManager;
  log?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface StreamResult {
  cycles: number;
}

/**
 * Run the polling loop. Cancellation is observed between cycles: an
 * in-progress collection or sleep always completes. Throws BoardOpenError
 * when a board cannot be opened.
 */
export async function runStream(driver: BoardDriver, options: StreamOptions): Promise<StreamResult> {
  const log = options.log ?? createLogger('stream');
  const boards = options.boards ?? new BoardManager(driver, createLogger('board'));
  const wait = options.sleep ?? ((ms: number) => sleep(ms));
  const now = options.now ?? (() => performance.now());

  let token = options.token;
  if (!token) {
    installSignalHandlers();
    token = processCancellation();
  }

  const { sources, formatter, sink } = options;
  let cycles = 0;

  try {
    await boards.initialize(sources);
    await boards.configure(sources);
    if (TIMING.SETTLE_AFTER_CONFIGURE_MS > 0) await wait(TIMING.SETTLE_AFTER_CONFIGURE_MS);

    if (wantsAnyStatic(options.statics)) {
      const infos = await collectStaticInfo(driver, sources, options.statics);
      for (const line of formatter.formatStatic(infos)) await sink.writeLine(line);
    }

    const collector = new ReadingCollector(driver, sources, options.quantities, log);
    log.debug(`Streaming ${sources.length} source(s) every ${options.periodMs}ms`);

    while (!token.isCancelled) {
      const started = now();
      const readings = await collector.collect();
      for (const line of formatter.formatCycle(readings)) await sink.writeLine(line);
      cycles++;

      if (token.isCancelled) break;
      const remaining = options.periodMs - (now() - started);
      if (remaining > 0) await wait(remaining);
    }

    log.debug(`Stopped after ${cycles} cycle(s)${token.reason ? ` (${token.reason})` : ''}`);
    return { cycles };
  } finally {
    await boards.close();
  }
}
