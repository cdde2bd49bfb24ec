// board-manager.ts - Board Lifecycle Manager
//
// Owns the set of open board addresses for one invocation. Boards shared by
// several sources are opened once; teardown is safe to call from every exit
// path.

import {
  BoardOpenError,
  ConfigurationWarning,
  DEFAULT_UPDATE_INTERVAL,
  describeError,
  isDefaultCalibration,
  type BoardAddress,
  type Source,
} from '@thermofuse/contracts';
import type { BoardDriver } from './driver/types';
import { createLogger, type Logger } from './log';

export class BoardManager {
  private readonly opened = new Set<BoardAddress>();

  constructor(
    private readonly driver: BoardDriver,
    private readonly log: Logger = createLogger('board'),
  ) {}

  /**
   * Open every distinct address the sources reference, then apply non-default
   * update intervals. All-or-nothing: if any open fails, the addresses opened
   * by this call are closed again and a BoardOpenError is thrown. Addresses
   * opened by an earlier call are left alone.
   *
   * Intervals are written per source, so when several sources on one board
   * ask for different non-default intervals the last one wins.
   */
  async initialize(sources: readonly Source[]): Promise<ReadonlySet<BoardAddress>> {
    const openedNow: BoardAddress[] = [];

    for (const source of sources) {
      if (this.opened.has(source.address)) continue;

      this.log.debug(`Opening board at address ${source.address}`);
      const result = await this.driver.open(source.address);
      if (!result.success) {
        await this.closeAddresses(openedNow);
        throw new BoardOpenError(source.address, { cause: result.error });
      }
      this.opened.add(source.address);
      openedNow.push(source.address);
    }

    for (const source of sources) {
      if (source.updateInterval === DEFAULT_UPDATE_INTERVAL) continue;
      this.log.debug(`Setting update interval for address ${source.address} to ${source.updateInterval}`);
      const result = await this.driver.writeUpdateInterval(source.address, source.updateInterval);
      if (!result.success) {
        this.warn(new ConfigurationWarning('update_interval', source.address, undefined, { cause: result.error }));
      }
    }

    return this.openSet();
  }

  /**
   * Apply calibration (only when it differs from the factory defaults) and
   * thermocouple type for every source. Type is always written: the board
   * resets it on some writes. Failures are logged and returned, never thrown.
   */
  async configure(sources: readonly Source[]): Promise<ConfigurationWarning[]> {
    const warnings: ConfigurationWarning[] = [];

    for (const source of sources) {
      if (!isDefaultCalibration(source.calibration)) {
        this.log.debug(
          `Setting calibration for address ${source.address} channel ${source.channel}: ` +
            `slope=${source.calibration.slope.toFixed(6)}, offset=${source.calibration.offset.toFixed(6)}`,
        );
        const result = await this.driver.writeCalibrationCoefficients(source.address, source.channel, {
          slope: source.calibration.slope,
          offset: source.calibration.offset,
        });
        if (!result.success) {
          warnings.push(
            this.warn(new ConfigurationWarning('calibration', source.address, source.channel, { cause: result.error })),
          );
        }
      }

      const warning = await this.writeType(source);
      if (warning) warnings.push(warning);
    }

    return warnings;
  }

  /** Close every open address exactly once. A no-op when nothing is open. */
  async close(): Promise<void> {
    await this.closeAddresses([...this.opened]);
  }

  isOpen(address: BoardAddress): boolean {
    return this.opened.has(address);
  }

  get openCount(): number {
    return this.opened.size;
  }

  openSet(): ReadonlySet<BoardAddress> {
    return new Set(this.opened);
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async writeType(source: Source): Promise<ConfigurationWarning | null> {
    const result = await this.driver.writeThermocoupleType(source.address, source.channel, source.tcType);
    if (result.success) return null;
    return this.warn(new ConfigurationWarning('tc_type', source.address, source.channel, { cause: result.error }));
  }

  private async closeAddresses(addresses: readonly BoardAddress[]): Promise<void> {
    for (const address of addresses) {
      // Removed before the call so a failing close is never retried
      this.opened.delete(address);
      this.log.debug(`Closing board at address ${address}`);
      const result = await this.driver.close(address);
      if (!result.success) {
        this.log.warn(`Failed to close board at address ${address}: ${describeError(result.error)}`);
      }
    }
  }

  private warn(warning: ConfigurationWarning): ConfigurationWarning {
    this.log.warn(warning.message);
    return warning;
  }
}
