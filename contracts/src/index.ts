// index.ts - Re-exports from all modules

// Types & primitives
export type {
  BoardAddress,
  ChannelIndex,
  ThermocoupleType,
  Calibration,
  Source,
  SourceInit,
  QuantitySelection,
  StaticSelection,
  Sample,
  Reading,
  ChannelInfo,
  BoardInfo,
  BoardDescriptor,
} from './types';

export {
  MAX_BOARDS,
  NUM_CHANNELS,
  MIN_UPDATE_INTERVAL,
  MAX_UPDATE_INTERVAL,
  THERMOCOUPLE_TYPES,
  isThermocoupleType,
  OPEN_TC_VALUE,
  OVERRANGE_TC_VALUE,
  COMMON_MODE_TC_VALUE,
  DEFAULT_CALIBRATION_SLOPE,
  DEFAULT_CALIBRATION_OFFSET,
  DEFAULT_UPDATE_INTERVAL,
  DEFAULT_THERMOCOUPLE_TYPE,
  isDefaultCalibration,
  defaultSourceKey,
  makeSource,
  NO_QUANTITIES,
  NO_STATICS,
  wantsAnyQuantity,
  wantsAnyStatic,
  UNAVAILABLE,
  sampleOf,
} from './types';

// Errors
export {
  ThermoError,
  BoardOpenError,
  SpawnError,
  ConfigurationWarning,
  ConfigError,
  UsageError,
  DriverError,
  isThermoError,
  describeError,
  EXIT_CODES,
  exitCodeForError,
} from './errors';

export type { ErrorCategory } from './errors';

// Config - Source schema
export {
  ThermocoupleTypeSchema,
  SourceEntrySchema,
  SourceConfigSchema,
  checkSourceConfig,
  isSourceConfig,
  sourceFromEntry,
  duplicateKeys,
} from './config/source-config.schema';

export type { SourceEntry, SourceConfig, SchemaValidationError } from './config/source-config.schema';

// Config - Timing
export { TIMING, DEFAULTS, parseDuration, periodForRate, formatDuration } from './config/timing';

