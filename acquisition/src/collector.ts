// collector.ts - Reading Collector
//
// Samples the requested quantities from already-open boards. A failed read
// only marks that quantity unavailable; collection itself never fails.

import {
  UNAVAILABLE,
  describeError,
  sampleOf,
  type BoardAddress,
  type BoardInfo,
  type ChannelIndex,
  type QuantitySelection,
  type Reading,
  type Sample,
  type Source,
  type StaticSelection,
} from '@thermofuse/contracts';
import type { BoardDriver, DriverResult } from './driver/types';
import { silentLogger, type Logger } from './log';

// =============================================================================
// Dynamic readings
// =============================================================================

export function emptyReading(address: BoardAddress, channel: ChannelIndex): Reading {
  return Object.freeze({ address, channel, temperature: UNAVAILABLE, adc: UNAVAILABLE, cjc: UNAVAILABLE });
}

async function sample(read: () => Promise<DriverResult<number>>, log: Logger): Promise<Sample> {
  try {
    const result = await read();
    if (result.success) return sampleOf(result.data);
    log.debug(result.error.message);
    return UNAVAILABLE;
  } catch (err) {
    // Drivers report failures as values; a throw is treated the same way
    log.debug(`Driver threw during read: ${describeError(err)}`);
    return UNAVAILABLE;
  }
}

/**
 * Read one source. Requires the board to be open and, for temperature and
 * ADC, the channel type to be configured. Each quantity is read
 * independently with no retry.
 */
export async function collectReading(
  driver: BoardDriver,
  address: BoardAddress,
  channel: ChannelIndex,
  want: QuantitySelection,
  log: Logger = silentLogger,
): Promise<Reading> {
  const temperature = want.temperature
    ? await sample(() => driver.readTemperature(address, channel), log)
    : UNAVAILABLE;
  const adc = want.adc ? await sample(() => driver.readAdcVoltage(address, channel), log) : UNAVAILABLE;
  const cjc = want.cjc ? await sample(() => driver.readCjcTemperature(address, channel), log) : UNAVAILABLE;
  return Object.freeze({ address, channel, temperature, adc, cjc });
}

/**
 * Per-session collector with a buffer sized once to the source list. Each
 * `collect()` refills the buffer in source order; the returned array is only
 * valid until the next call.
 */
export class ReadingCollector {
  private readonly buffer: Reading[];

  constructor(
    private readonly driver: BoardDriver,
    private readonly sources: readonly Source[],
    private readonly want: QuantitySelection,
    private readonly log: Logger = silentLogger,
  ) {
    this.buffer = sources.map((s) => emptyReading(s.address, s.channel));
  }

  async collect(): Promise<readonly Reading[]> {
    for (const [i, source] of this.sources.entries()) {
      this.buffer[i] = await collectReading(this.driver, source.address, source.channel, this.want, this.log);
    }
    return this.buffer;
  }

  get size(): number {
    return this.buffer.length;
  }
}

// =============================================================================
// Static board info
// =============================================================================

/**
 * Accumulate static fields for one source into `infos`. The serial is read
 * once per board; calibration data is stored under the source's channel.
 */
export async function collectBoardInfo(
  driver: BoardDriver,
  infos: Map<BoardAddress, BoardInfo>,
  address: BoardAddress,
  channel: ChannelIndex,
  want: StaticSelection,
): Promise<BoardInfo> {
  let info = infos.get(address);
  if (!info) {
    info = { address, channels: {} };
    infos.set(address, info);
  }

  if (want.serial && info.serial === undefined) {
    const serial = await driver.readSerial(address);
    if (serial.success) info.serial = serial.data;
  }

  if (want.updateInterval) {
    const interval = await driver.readUpdateInterval(address);
    if (interval.success) info.updateInterval = interval.data;
  }

  if (want.calibrationDate || want.calibrationCoefficients) {
    const channelInfo = info.channels[channel] ?? {};
    if (want.calibrationDate) {
      const date = await driver.readCalibrationDate(address);
      if (date.success) channelInfo.calibrationDate = date.data;
    }
    if (want.calibrationCoefficients) {
      const coeffs = await driver.readCalibrationCoefficients(address, channel);
      if (coeffs.success) channelInfo.calibration = coeffs.data;
    }
    info.channels[channel] = channelInfo;
  }

  return info;
}

/** Static info for every board referenced by the sources, keyed by address. */
export async function collectStaticInfo(
  driver: BoardDriver,
  sources: readonly Source[],
  want: StaticSelection,
): Promise<Map<BoardAddress, BoardInfo>> {
  const infos = new Map<BoardAddress, BoardInfo>();
  for (const source of sources) {
    await collectBoardInfo(driver, infos, source.address, source.channel, want);
  }
  return infos;
}
