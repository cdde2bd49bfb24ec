// bridge.ts - Fusion Bridge
//
// Runs a producer process and forwards its stdout line by line. Lines that
// are JSON objects get a TIMESTAMP and a THERMOCOUPLE map of fresh readings;
// everything else passes through untouched.
//
//   created -> boards_initialized -> running -> draining -> terminated
//
// Whatever path leaves `run()`, the producer is reaped before the boards are
// closed.

import {
  DEFAULTS,
  EXIT_CODES,
  ThermoError,
  TIMING,
  describeError,
  formatDuration,
  type QuantitySelection,
  type Source,
} from '@thermofuse/contracts';
import { BoardManager } from './board-manager';
import { installSignalHandlers, processCancellation, type CancellationToken } from './cancellation';
import { ReadingCollector } from './collector';
import type { BoardDriver } from './driver/types';
import { readLines } from './lines';
import { createLogger, type Logger } from './log';
import { exitStatus, spawnProducer, type ProducerLauncher, type ProducerProcess } from './producer';
import { fusionPayload, injectReadings, parseJsonObject } from './render/json';
import { stdoutSink, type LineSink } from './sink';
import { captureInstant, formatTimestamp, type Instant } from './timestamp';

export type BridgeState = 'created' | 'boards_initialized' | 'running' | 'draining' | 'terminated';

const BRIDGE_TRANSITIONS: Record<BridgeState, BridgeState[]> = {
  created: ['boards_initialized', 'terminated'],
  boards_initialized: ['running', 'terminated'],
  running: ['draining'],
  draining: ['terminated'],
  terminated: [],
};

export const FUSION_QUANTITIES: Readonly<QuantitySelection> = Object.freeze({
  temperature: true,
  adc: false,
  cjc: false,
});

export interface BridgeOptions {
  sources: readonly Source[];
  command: string;
  args?: readonly string[];
  timeFormat?: string;
  utc?: boolean;
  /** Quantities injected per source (default: temperature only) */
  quantities?: QuantitySelection;
  sink?: LineSink;
  launcher?: ProducerLauncher;
  /** Defaults to the process token, with signal handlers installed once running */
  token?: CancellationToken;
  killGraceMs?: number;
  clock?: () => Instant;
  log?: Logger;
  boards?: BoardManager;
}

export class FusionBridge {
  private state: BridgeState = 'created';
  private readonly boards: BoardManager;
  private readonly collector: ReadingCollector;
  private readonly log: Logger;
  private readonly sink: LineSink;
  private readonly clock: () => Instant;
  private readonly timeFormat: string;
  private token: CancellationToken | undefined;
  private killTimer: NodeJS.Timeout | undefined;

  constructor(
    driver: BoardDriver,
    private readonly options: BridgeOptions,
  ) {
    this.log = options.log ?? createLogger('bridge');
    this.boards = options.boards ?? new BoardManager(driver, createLogger('board'));
    this.collector = new ReadingCollector(driver, options.sources, options.quantities ?? FUSION_QUANTITIES, this.log);
    this.sink = options.sink ?? stdoutSink();
    this.clock = options.clock ?? captureInstant;
    this.timeFormat = options.timeFormat ?? DEFAULTS.TIME_FORMAT;
    this.token = options.token;
  }

  get currentState(): BridgeState {
    return this.state;
  }

  /**
   * Run the session to completion and return the exit status: the
   * producer's, or 1 if boards or the producer could not be started.
   * A bridge runs once.
   */
  async run(): Promise<number> {
    if (this.state !== 'created') {
      throw new ThermoError('BRIDGE_ALREADY_RUN', `Bridge session is ${this.state}`, 'internal');
    }

    let producer: ProducerProcess | null = null;
    try {
      try {
        await this.boards.initialize(this.options.sources);
        await this.boards.configure(this.options.sources);
      } catch (err) {
        this.log.error(describeError(err));
        return EXIT_CODES.FAILURE;
      }
      this.transition('boards_initialized');

      const launch = this.options.launcher ?? spawnProducer;
      try {
        producer = await launch(this.options.command, this.options.args ?? []);
      } catch (err) {
        this.log.error(describeError(err));
        return EXIT_CODES.FAILURE;
      }
      this.transition('running');
      this.log.debug(`Producer started (pid ${producer.pid ?? 'unknown'})`);

      return await this.forward(producer);
    } finally {
      if (producer) {
        if (this.currentState === 'running') this.transition('draining');
        await producer.exited;
        clearTimeout(this.killTimer);
      }
      await this.boards.close();
      this.transition('terminated');
    }
  }

  // ─── Running ───────────────────────────────────────────────────────────────

  private async forward(producer: ProducerProcess): Promise<number> {
    const token = this.cancellationToken();
    const stopOnCancel = token.onCancel((reason) => this.terminate(producer, reason));
    const lines = readLines(producer.stdout);

    try {
      while (!token.isCancelled) {
        const next = await lines.next();
        if (next.done) break;
        const received = this.clock();
        await this.sink.writeLine(await this.transform(next.value, received));
      }
    } catch (err) {
      // Output failed; the producer must not be left writing into a full pipe
      this.terminate(producer, describeError(err));
      throw err;
    } finally {
      stopOnCancel();
      await lines.return();
      // A generator that never started leaves stdout open; unread output
      // would keep the child's 'close' from firing
      producer.stdout.destroy();
    }

    this.transition('draining');
    const exit = await producer.exited;
    this.log.debug(`Producer exited (code ${exit.code ?? 'none'}, signal ${exit.signal ?? 'none'})`);
    return exitStatus(exit);
  }

  /** Inject readings into a JSON-object line; pass anything else through. */
  private async transform(line: string, received: Instant): Promise<string> {
    const payload = parseJsonObject(line);
    if (!payload) return line;

    const readings = await this.collector.collect();
    const timestamp = formatTimestamp(this.timeFormat, received, { utc: this.options.utc });
    return JSON.stringify(injectReadings(payload, timestamp, fusionPayload(this.options.sources, readings)));
  }

  private cancellationToken(): CancellationToken {
    if (!this.token) {
      installSignalHandlers();
      this.token = processCancellation();
    }
    return this.token;
  }

  /** SIGTERM now, SIGKILL if still running after the grace period. */
  private terminate(producer: ProducerProcess, reason: string): void {
    if (this.killTimer) return;
    this.log.debug(`Stopping producer: ${reason}`);
    producer.kill('SIGTERM');
    const grace = this.options.killGraceMs ?? TIMING.PRODUCER_KILL_GRACE_MS;
    this.killTimer = setTimeout(() => {
      this.log.warn(`Producer ignored SIGTERM for ${formatDuration(grace)}, sending SIGKILL`);
      producer.kill('SIGKILL');
    }, grace);
    this.killTimer.unref();
  }

  private transition(to: BridgeState): void {
    if (!BRIDGE_TRANSITIONS[this.state].includes(to)) {
      throw new ThermoError('INVALID_BRIDGE_TRANSITION', `Cannot move bridge from ${this.state} to ${to}`, 'internal');
    }
    this.log.debug(`${this.state} -> ${to}`);
    this.state = to;
  }
}

/** Convenience wrapper: build and run one session. */
export async function runBridge(driver: BoardDriver, options: BridgeOptions): Promise<number> {
  return new FusionBridge(driver, options).run();
}
