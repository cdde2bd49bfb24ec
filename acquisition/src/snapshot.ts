// snapshot.ts - Single-shot read
//
// Same session shape as the polling loop, one cycle long: open, configure,
// collect static info and one batch of readings, close.

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
import { setTimeout as sleep } from 'timers/promises';
import { BoardManager } from './board-manager';
import { collectReading, collectStaticInfo } from './collector';
import type { BoardDriver } from './driver/types';
import { createLogger, silentLogger, type Logger } from './log';

export interface SnapshotOptions {
  sources: readonly Source[];
  quantities: QuantitySelection;
  statics: StaticSelection;
  boards?: BoardManager;
  log?: Logger;
  settleMs?: number;
}

export interface Snapshot {
  /** One per source, in source order */
  readings: Reading[];
  infos: Map<BoardAddress, BoardInfo>;
}

export async function readSnapshot(driver: BoardDriver, options: SnapshotOptions): Promise<Snapshot> {
  const log = options.log ?? silentLogger;
  const boards = options.boards ?? new BoardManager(driver, createLogger('board'));
  const settleMs = options.settleMs ?? TIMING.SETTLE_AFTER_CONFIGURE_MS;

  try {
    await boards.initialize(options.sources);
    await boards.configure(options.sources);
    if (settleMs > 0) await sleep(settleMs);

    const infos = wantsAnyStatic(options.statics)
      ? await collectStaticInfo(driver, options.sources, options.statics)
      : new Map<BoardAddress, BoardInfo>();

    const readings: Reading[] = [];
    for (const source of options.sources) {
      readings.push(await collectReading(driver, source.address, source.channel, options.quantities, log));
    }
    return { readings, infos };
  } finally {
    await boards.close();
  }
}
