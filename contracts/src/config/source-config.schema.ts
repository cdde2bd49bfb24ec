// config/source-config.schema.ts - TypeBox schema for declarative source configs
// Shape of the parsed YAML/JSON document. Checked before normalization so a
// bad file is rejected with every offending path at once.

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import {
  MAX_BOARDS,
  NUM_CHANNELS,
  MIN_UPDATE_INTERVAL,
  MAX_UPDATE_INTERVAL,
  THERMOCOUPLE_TYPES,
  makeSource,
  type Source,
} from '../types';

// =============================================================================
// Schemas
// =============================================================================

export const ThermocoupleTypeSchema = Type.Union(THERMOCOUPLE_TYPES.map((t) => Type.Literal(t)));

export const SourceEntrySchema = Type.Object({
  key: Type.Optional(Type.String({ minLength: 1 })),
  address: Type.Integer({ minimum: 0, maximum: MAX_BOARDS - 1 }),
  channel: Type.Integer({ minimum: 0, maximum: NUM_CHANNELS - 1 }),
  tc_type: Type.Optional(ThermocoupleTypeSchema),
  cal_slope: Type.Optional(Type.Number()),
  cal_offset: Type.Optional(Type.Number()),
  update_interval: Type.Optional(Type.Integer({ minimum: MIN_UPDATE_INTERVAL, maximum: MAX_UPDATE_INTERVAL })),
});

export type SourceEntry = Static<typeof SourceEntrySchema>;

export const SourceConfigSchema = Type.Object({
  sources: Type.Array(SourceEntrySchema, { minItems: 1 }),
});

export type SourceConfig = Static<typeof SourceConfigSchema>;

// =============================================================================
// Validation
// =============================================================================

export interface SchemaValidationError {
  path: string;
  message: string;
  value: unknown;
}

/**
 * Validate a parsed config document.
 * Returns null on success, or an array of errors on failure.
 */
export function checkSourceConfig(doc: unknown): SchemaValidationError[] | null {
  if (Value.Check(SourceConfigSchema, doc)) return null;
  return [...Value.Errors(SourceConfigSchema, doc)].map((e) => ({
    path: e.path,
    message: e.message,
    value: e.value,
  }));
}

export function isSourceConfig(doc: unknown): doc is SourceConfig {
  return Value.Check(SourceConfigSchema, doc);
}

/** Apply defaults to a validated entry. */
export function sourceFromEntry(entry: SourceEntry): Source {
  return makeSource({
    key: entry.key,
    address: entry.address,
    channel: entry.channel,
    tcType: entry.tc_type,
    calibration: {
      slope: entry.cal_slope,
      offset: entry.cal_offset,
    },
    updateInterval: entry.update_interval,
  });
}

/** Keys that appear on more than one source, in first-seen order */
export function duplicateKeys(sources: readonly Source[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const s of sources) {
    if (seen.has(s.key)) dupes.add(s.key);
    seen.add(s.key);
  }
  return [...dupes];
}
