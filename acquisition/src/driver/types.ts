// driver/types.ts - Board Driver Interface

import type {
  BoardAddress,
  BoardDescriptor,
  Calibration,
  ChannelIndex,
  DriverError,
  ThermocoupleType,
} from '@thermofuse/contracts';

// =============================================================================
// Results
// =============================================================================

/** Driver primitives report failure as a value, never by throwing. */
export type DriverResult<T> =
  | { success: true; data: T }
  | { success: false; error: DriverError };

export function ok<T>(data: T): DriverResult<T> {
  return { success: true, data };
}

export function fail<T>(error: DriverError): DriverResult<T> {
  return { success: false, error };
}

// =============================================================================
// Driver
// =============================================================================

/**
 * Primitive operations on a stack of thermocouple boards. Every call that
 * names an address other than `listBoards` and `open` requires that board to
 * be open.
 */
export interface BoardDriver {
  readonly name: string;

  listBoards(): Promise<DriverResult<BoardDescriptor[]>>;

  open(address: BoardAddress): Promise<DriverResult<void>>;
  close(address: BoardAddress): Promise<DriverResult<void>>;
  isOpen(address: BoardAddress): boolean;

  // Identity and configuration
  readSerial(address: BoardAddress): Promise<DriverResult<string>>;
  /** Factory calibration date, YYYY-MM-DD */
  readCalibrationDate(address: BoardAddress): Promise<DriverResult<string>>;
  readCalibrationCoefficients(address: BoardAddress, channel: ChannelIndex): Promise<DriverResult<Calibration>>;
  writeCalibrationCoefficients(
    address: BoardAddress,
    channel: ChannelIndex,
    calibration: Calibration,
  ): Promise<DriverResult<void>>;
  /** Seconds between board conversions */
  readUpdateInterval(address: BoardAddress): Promise<DriverResult<number>>;
  writeUpdateInterval(address: BoardAddress, seconds: number): Promise<DriverResult<void>>;
  writeThermocoupleType(
    address: BoardAddress,
    channel: ChannelIndex,
    type: ThermocoupleType,
  ): Promise<DriverResult<void>>;

  // Per-cycle quantities
  /** Degrees Celsius, or one of the sentinel values */
  readTemperature(address: BoardAddress, channel: ChannelIndex): Promise<DriverResult<number>>;
  /** Raw thermocouple voltage in volts */
  readAdcVoltage(address: BoardAddress, channel: ChannelIndex): Promise<DriverResult<number>>;
  /** Cold-junction temperature in degrees Celsius */
  readCjcTemperature(address: BoardAddress, channel: ChannelIndex): Promise<DriverResult<number>>;
}
