// render/json.ts - Structured output
//
// Output values are built as plain typed trees and serialized once.

import type { BoardAddress, BoardInfo, Reading, Sample, Source, StaticSelection } from '@thermofuse/contracts';
import { emptyReading } from '../collector';
import type { BatchFormatter } from '../streamer';

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse a line as a JSON object. Anything else (blank, scalar, array, malformed) is null. */
export function parseJsonObject(line: string): JsonObject | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}

function withSample(target: JsonObject, field: string, sample: Sample): void {
  if (sample.available) target[field] = sample.value;
}

// =============================================================================
// Readings
// =============================================================================

export interface ReadingJsonOptions {
  /** Emitted as KEY when given */
  key?: string;
  info?: BoardInfo;
  statics?: StaticSelection;
}

/** One reading, with any requested static fields that were collected. */
export function readingToJson(reading: Reading, options: ReadingJsonOptions = {}): JsonObject {
  const obj: JsonObject = {};
  if (options.key) obj.KEY = options.key;
  obj.ADDRESS = reading.address;
  obj.CHANNEL = reading.channel;

  const { info, statics } = options;
  if (info && statics) {
    if (statics.serial && info.serial !== undefined) obj.SERIAL = info.serial;

    const channel = info.channels[reading.channel];
    const calibration: JsonObject = {};
    if (statics.calibrationDate && channel?.calibrationDate !== undefined) {
      calibration.DATE = channel.calibrationDate;
    }
    if (statics.calibrationCoefficients && channel?.calibration !== undefined) {
      calibration.SLOPE = channel.calibration.slope;
      calibration.OFFSET = channel.calibration.offset;
    }
    if (Object.keys(calibration).length > 0) obj.CALIBRATION = calibration;

    if (statics.updateInterval && info.updateInterval !== undefined) obj.UPDATE_INTERVAL = info.updateInterval;
  }

  withSample(obj, 'TEMPERATURE', reading.temperature);
  withSample(obj, 'ADC', reading.adc);
  withSample(obj, 'CJC', reading.cjc);
  return obj;
}

export interface ReadingsJsonOptions {
  sources: readonly Source[];
  /** Include each source's key as KEY */
  showKeys?: boolean;
  infos?: ReadonlyMap<BoardAddress, BoardInfo>;
  statics?: StaticSelection;
}

/** A flat object for a single source, an array otherwise. */
export function readingsToJson(readings: readonly Reading[], options: ReadingsJsonOptions): JsonValue {
  const items = readings.map((reading, i) => {
    const source = options.sources[i];
    return readingToJson(reading, {
      key: options.showKeys ? source?.key : undefined,
      info: options.infos?.get(reading.address),
      statics: options.statics,
    });
  });
  return items.length === 1 ? items[0] : items;
}

/**
 * Streaming in JSON mode: the static header is one value with identity fields
 * only; each cycle is one value with quantities only.
 */
export function jsonBatchFormatter(options: {
  sources: readonly Source[];
  showKeys?: boolean;
  statics: StaticSelection;
}): BatchFormatter {
  const { sources, showKeys, statics } = options;
  return {
    formatStatic(infos) {
      const blank = sources.map((s) => emptyReading(s.address, s.channel));
      return [JSON.stringify(readingsToJson(blank, { sources, showKeys, infos, statics }))];
    },
    formatCycle(readings) {
      return [JSON.stringify(readingsToJson(readings, { sources, showKeys }))];
    },
  };
}

// =============================================================================
// Fusion payload
// =============================================================================

/** `{TEMP?, ADC?, CJC?}` per source key. A repeated key keeps the later source. */
export function fusionPayload(sources: readonly Source[], readings: readonly Reading[]): JsonObject {
  // Own properties: a key such as __proto__ stays a key
  return Object.fromEntries(
    sources.map((source, i): [string, JsonValue] => {
      const reading = readings[i];
      const entry: JsonObject = {};
      if (reading) {
        withSample(entry, 'TEMP', reading.temperature);
        withSample(entry, 'ADC', reading.adc);
        withSample(entry, 'CJC', reading.cjc);
      }
      return [source.key, entry];
    }),
  );
}

/** The producer's object with TIMESTAMP and THERMOCOUPLE added after its own keys. */
export function injectReadings(line: JsonObject, timestamp: string, thermocouple: JsonObject): JsonObject {
  return { ...line, TIMESTAMP: timestamp, THERMOCOUPLE: thermocouple };
}
