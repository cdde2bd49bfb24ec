// index.ts - Acquisition core exports

export type { BoardDriver, DriverResult } from './driver/types';
export { ok, fail } from './driver/types';
export { driverRegistry, getDriver, getAllDrivers, isDriverRegistered, clearDriverCache } from './driver/registry';
export type { DriverName } from './driver/registry';
export { SimulatedBoardDriver, createSimulatedDriver, parseSimulatedAddresses } from './driver/simulated';
export type { SimulatedDriverOptions } from './driver/simulated';

export { BoardManager } from './board-manager';
export {
  ReadingCollector,
  collectReading,
  collectBoardInfo,
  collectStaticInfo,
  emptyReading,
} from './collector';

export {
  CancellationToken,
  processCancellation,
  installSignalHandlers,
  signalHandlersInstalled,
  resetProcessCancellation,
} from './cancellation';
export type { CancelListener, SignalSource } from './cancellation';

export { runStream } from './streamer';
export type { BatchFormatter, StreamOptions, StreamResult } from './streamer';

export { readSnapshot } from './snapshot';
export type { Snapshot, SnapshotOptions } from './snapshot';

export { FusionBridge, runBridge, FUSION_QUANTITIES } from './bridge';
export type { BridgeOptions, BridgeState } from './bridge';

export { spawnProducer, lineBuffered, exitStatus } from './producer';
export type { ProducerExit, ProducerLauncher, ProducerProcess } from './producer';

export { readLines } from './lines';
export { StreamSink, MemorySink, stdoutSink } from './sink';
export type { LineSink } from './sink';

export { captureInstant, instantFromEpochMs, formatTimestamp, substituteSubsecond } from './timestamp';
export type { Instant, TimestampOptions } from './timestamp';

export {
  isJsonObject,
  parseJsonObject,
  readingToJson,
  readingsToJson,
  fusionPayload,
  injectReadings,
  jsonBatchFormatter,
} from './render/json';
export type { JsonValue, JsonObject, ReadingJsonOptions, ReadingsJsonOptions } from './render/json';

export { createLogger, silentLogger, isDebugEnabled } from './log';
export type { Logger } from './log';
