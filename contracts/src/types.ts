// types.ts - Sources, Readings and Board Primitives

// =============================================================================
// PRIMITIVES
// =============================================================================

/** Board address on the HAT stack (0-7) */
export type BoardAddress = number;

/** Channel index on a board (0-3) */
export type ChannelIndex = number;

export const MAX_BOARDS = 8;
export const NUM_CHANNELS = 4;

export const MIN_UPDATE_INTERVAL = 1;
export const MAX_UPDATE_INTERVAL = 255;

// =============================================================================
// THERMOCOUPLE TYPES
// =============================================================================

export const THERMOCOUPLE_TYPES = ['J', 'K', 'T', 'E', 'R', 'S', 'B', 'N', 'DISABLED'] as const;

export type ThermocoupleType = (typeof THERMOCOUPLE_TYPES)[number];

export function isThermocoupleType(value: string): value is ThermocoupleType {
  return (THERMOCOUPLE_TYPES as readonly string[]).includes(value);
}

// Sentinel temperatures reported by the board instead of a reading
export const OPEN_TC_VALUE = -9999.0;
export const OVERRANGE_TC_VALUE = -8888.0;
export const COMMON_MODE_TC_VALUE = -7777.0;

// =============================================================================
// CALIBRATION
// =============================================================================

export interface Calibration {
  slope: number;
  offset: number;
}

// Factory coefficients; anything else is written to the board on configure
export const DEFAULT_CALIBRATION_SLOPE = 0.99956;
export const DEFAULT_CALIBRATION_OFFSET = -38.955465;

/** Library default update interval in seconds */
export const DEFAULT_UPDATE_INTERVAL = 1;

export const DEFAULT_THERMOCOUPLE_TYPE: ThermocoupleType = 'K';

export function isDefaultCalibration(cal: Calibration): boolean {
  return cal.slope === DEFAULT_CALIBRATION_SLOPE && cal.offset === DEFAULT_CALIBRATION_OFFSET;
}

// =============================================================================
// SOURCE
// =============================================================================

/**
 * One logical sensor binding. Built once per invocation from a config file or
 * CLI flags and never mutated afterwards.
 *
 * `key` labels the source in output. It is not required to be unique.
 */
export interface Source {
  readonly key: string;
  readonly address: BoardAddress;
  readonly channel: ChannelIndex;
  readonly tcType: ThermocoupleType;
  readonly calibration: Readonly<Calibration>;
  /** Board update interval hint in seconds */
  readonly updateInterval: number;
}

export function defaultSourceKey(address: BoardAddress, channel: ChannelIndex): string {
  return `TEMP_${address}_${channel}`;
}

export interface SourceInit {
  key?: string;
  address: BoardAddress;
  channel: ChannelIndex;
  tcType?: ThermocoupleType;
  calibration?: Partial<Calibration>;
  updateInterval?: number;
}

/** Build a Source with defaults for every field not given. */
export function makeSource(init: SourceInit): Source {
  return Object.freeze({
    key: init.key ?? defaultSourceKey(init.address, init.channel),
    address: init.address,
    channel: init.channel,
    tcType: init.tcType ?? DEFAULT_THERMOCOUPLE_TYPE,
    calibration: Object.freeze({
      slope: init.calibration?.slope ?? DEFAULT_CALIBRATION_SLOPE,
      offset: init.calibration?.offset ?? DEFAULT_CALIBRATION_OFFSET,
    }),
    updateInterval: init.updateInterval ?? DEFAULT_UPDATE_INTERVAL,
  });
}

// =============================================================================
// QUANTITIES
// =============================================================================

/** Per-cycle quantities a caller may request for each source */
export interface QuantitySelection {
  temperature: boolean;
  adc: boolean;
  cjc: boolean;
}

/** Identity/configuration fields that do not change between cycles */
export interface StaticSelection {
  serial: boolean;
  calibrationDate: boolean;
  calibrationCoefficients: boolean;
  updateInterval: boolean;
}

export const NO_QUANTITIES: Readonly<QuantitySelection> = Object.freeze({
  temperature: false,
  adc: false,
  cjc: false,
});

export const NO_STATICS: Readonly<StaticSelection> = Object.freeze({
  serial: false,
  calibrationDate: false,
  calibrationCoefficients: false,
  updateInterval: false,
});

export function wantsAnyQuantity(q: QuantitySelection): boolean {
  return q.temperature || q.adc || q.cjc;
}

export function wantsAnyStatic(s: StaticSelection): boolean {
  return s.serial || s.calibrationDate || s.calibrationCoefficients || s.updateInterval;
}

// =============================================================================
// READING
// =============================================================================

/**
 * One optional scalar. `available: false` means the quantity was not
 * requested or the hardware read failed; it never means zero.
 */
export type Sample =
  | { readonly available: true; readonly value: number }
  | { readonly available: false };

export const UNAVAILABLE: Sample = Object.freeze({ available: false });

export function sampleOf(value: number): Sample {
  return Object.freeze({ available: true, value });
}

/** One sample result for one source, produced fresh every cycle. */
export interface Reading {
  readonly address: BoardAddress;
  readonly channel: ChannelIndex;
  readonly temperature: Sample;
  readonly adc: Sample;
  readonly cjc: Sample;
}

// =============================================================================
// BOARD INFO
// =============================================================================

export interface ChannelInfo {
  calibrationDate?: string;
  calibration?: Calibration;
}

/** Static per-board data, accumulated across the channels that reference it */
export interface BoardInfo {
  address: BoardAddress;
  serial?: string;
  updateInterval?: number;
  channels: Partial<Record<ChannelIndex, ChannelInfo>>;
}

/** A board discovered on the stack */
export interface BoardDescriptor {
  address: BoardAddress;
  id: string;
  name: string;
}
