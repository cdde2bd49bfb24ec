// cli/src/config.ts - Environment, source config files and output mode

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { extname, join } from 'path';
import YAML from 'yaml';
import {
  ConfigError,
  DEFAULT_CALIBRATION_OFFSET,
  MAX_BOARDS,
  NUM_CHANNELS,
  THERMOCOUPLE_TYPES,
  UsageError,
  checkSourceConfig,
  describeError,
  duplicateKeys,
  isSourceConfig,
  isThermocoupleType,
  makeSource,
  sourceFromEntry,
  type Source,
  type SourceConfig,
  type ThermocoupleType,
} from '@thermofuse/contracts';
import type { Logger } from '@thermofuse/acquisition';
import { flagValue, intFlag, type ParsedArgs } from './args';

// ─── Output Mode ─────────────────────────────────────────────────────────────

export type OutputMode = 'normal' | 'json';

export interface OutputOptions {
  mode: OutputMode;
  /** Drop separators and headers from human-readable output */
  clean: boolean;
}

// ─── Environment ─────────────────────────────────────────────────────────────

/** Path to the ~/.thermo directory. */
export const THERMO_DIR = join(homedir(), '.thermo');

/**
 * Load a KEY=VALUE env file into `env` (lowest priority: existing variables
 * are kept). Blank lines and lines starting with # are ignored. No shell
 * expansion.
 */
export function loadEnvFile(filePath: string, env: Record<string, string | undefined> = process.env): void {
  if (!existsSync(filePath)) return;
  const content = readFileSync(filePath, 'utf-8');
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (env[key] === undefined) env[key] = value;
  }
}

// ─── Source Config ───────────────────────────────────────────────────────────

function isJsonPath(filePath: string): boolean {
  return extname(filePath).toLowerCase() === '.json';
}

/**
 * Read, validate and normalize a source config file. YAML unless the
 * extension is .json.
 */
export function loadSourceConfig(filePath: string, log?: Logger): Source[] {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`, { code: 'CONFIG_NOT_FOUND', details: { path: filePath } });
  }

  const text = readFileSync(filePath, 'utf-8');
  let doc: unknown;
  try {
    doc = isJsonPath(filePath) ? JSON.parse(text) : YAML.parse(text);
  } catch (err) {
    throw new ConfigError(`Invalid ${isJsonPath(filePath) ? 'JSON' : 'YAML'} in config file: ${describeError(err)}`, {
      details: { path: filePath },
      cause: err,
    });
  }

  if (doc === null || doc === undefined) throw new ConfigError(`Config file is empty: ${filePath}`);

  if (!isSourceConfig(doc)) {
    const errors = checkSourceConfig(doc) ?? [];
    const first = errors[0];
    const where = first ? `${first.path || '/'}: ${first.message}` : 'does not match the expected shape';
    throw new ConfigError(`Invalid config file ${filePath} at ${where}`, { details: { path: filePath, errors } });
  }

  const sources = doc.sources.map(sourceFromEntry);
  for (const key of duplicateKeys(sources)) {
    log?.warn(`Duplicate source key '${key}'; the last source with this key wins in fused output`);
  }
  return sources;
}

export function exampleConfig(): SourceConfig {
  return {
    sources: [
      { key: 'OVEN_TEMP', address: 0, channel: 0, tc_type: 'K' },
      { key: 'AMBIENT_TEMP', address: 0, channel: 1, tc_type: 'K', update_interval: 2 },
      {
        key: 'EXHAUST_TEMP',
        address: 0,
        channel: 2,
        tc_type: 'J',
        cal_slope: 1.0,
        cal_offset: DEFAULT_CALIBRATION_OFFSET,
      },
    ],
  };
}

export function serializeConfig(config: SourceConfig, filePath: string): string {
  return isJsonPath(filePath) ? `${JSON.stringify(config, null, 2)}\n` : YAML.stringify(config);
}

export function writeExampleConfig(filePath: string): void {
  writeFileSync(filePath, serializeConfig(exampleConfig(), filePath));
}

// ─── Single-Channel Flags ────────────────────────────────────────────────────

const SELECTABLE_TYPES = THERMOCOUPLE_TYPES.filter((t) => t !== 'DISABLED');

export function parseTcType(value: string): ThermocoupleType {
  const upper = value.toUpperCase();
  if (!isThermocoupleType(upper) || upper === 'DISABLED') {
    throw new UsageError(`Invalid thermocouple type '${value}' (expected one of ${SELECTABLE_TYPES.join(', ')})`);
  }
  return upper;
}

/** A single source from -a/-c/-t, defaulting to address 0 channel 0. */
export function sourceFromFlags(flags: ParsedArgs['flags'], key?: string): Source {
  const tcType = flagValue(flags, '--tc-type');
  return makeSource({
    key,
    address: intFlag(flags, '--address', { min: 0, max: MAX_BOARDS - 1 }) ?? 0,
    channel: intFlag(flags, '--channel', { min: 0, max: NUM_CHANNELS - 1 }) ?? 0,
    tcType: tcType === undefined ? undefined : parseTcType(tcType),
  });
}
