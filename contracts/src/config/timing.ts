// config/timing.ts - Centralized Timing and Format Defaults

// =============================================================================
// DURATION PARSING
// =============================================================================

export function parseDuration(value: string): number {
  const match = value.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h)$/i);
  if (!match) throw new Error(`Invalid duration: ${value}`);
  const [, num, unit] = match;
  const n = parseFloat(num);
  switch (unit.toLowerCase()) {
    case 'ms':
      return n;
    case 's':
      return n * 1000;
    case 'm':
      return n * 60_000;
    case 'h':
      return n * 3_600_000;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

function getEnvDuration(key: string, defaultMs: number): number {
  const value = process.env[key];
  return value ? parseDuration(value) : defaultMs;
}

function getEnvString(key: string, fallback: string): string {
  const value = process.env[key];
  return value !== undefined && value !== '' ? value : fallback;
}

// =============================================================================
// TIMING CONSTANTS
// =============================================================================

export const TIMING = {
  // Pause after configuring channels before the first read. The board
  // refreshes once per update interval; zero trusts the first conversion.
  SETTLE_AFTER_CONFIGURE_MS: getEnvDuration('THERMO_SETTLE_AFTER_CONFIGURE', 0),

  // How long a cancelled producer gets between SIGTERM and SIGKILL
  PRODUCER_KILL_GRACE_MS: getEnvDuration('THERMO_PRODUCER_KILL_GRACE', 5_000), // 5s

  // Streaming rate bounds (Hz)
  STREAM_MIN_HZ: 1,
  STREAM_MAX_HZ: 1_000,
} as const;

// =============================================================================
// FORMAT DEFAULTS
// =============================================================================

export const DEFAULTS = {
  /** strftime-style; %f is six-digit microseconds */
  TIME_FORMAT: getEnvString('THERMO_TIME_FORMAT', '%Y-%m-%dT%H:%M:%S.%f'),
  DRIVER: getEnvString('THERMO_DRIVER', 'simulated'),
  FUSE_KEY: 'TEMP_FUSED',
  CONFIG_FILE: 'thermo_config.yaml',
} as const;

// =============================================================================
// HELPERS
// =============================================================================

/** Cycle period for a streaming rate in Hz, in whole milliseconds */
export function periodForRate(hz: number): number {
  if (!Number.isFinite(hz) || hz < TIMING.STREAM_MIN_HZ || hz > TIMING.STREAM_MAX_HZ) {
    throw new Error(`Stream rate must be between ${TIMING.STREAM_MIN_HZ} and ${TIMING.STREAM_MAX_HZ} Hz`);
  }
  return Math.floor(1000 / hz);
}

/** Format milliseconds to human-readable string */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${ms / 1000}s`;
  if (ms < 3_600_000) return `${ms / 60_000}m`;
  return `${ms / 3_600_000}h`;
}
