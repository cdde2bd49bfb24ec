// errors.ts - Error Types and Helpers

import type { BoardAddress, ChannelIndex } from './types';

// =============================================================================
// CATEGORIES
// =============================================================================

export type ErrorCategory = 'hardware' | 'process' | 'config' | 'validation' | 'internal';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/** Base error class for all thermofuse errors */
export class ThermoError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    options?: {
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'ThermoError';
    this.code = code;
    this.category = category;
    this.details = options?.details;
  }
}

/** A board address could not be opened. Fatal to the whole session. */
export class BoardOpenError extends ThermoError {
  readonly address: BoardAddress;

  constructor(address: BoardAddress, options?: { cause?: unknown }) {
    super('BOARD_OPEN_FAILED', `Failed to open board at address ${address}`, 'hardware', {
      details: { address },
      cause: options?.cause,
    });
    this.name = 'BoardOpenError';
    this.address = address;
  }
}

/** The producer process could not be started. */
export class SpawnError extends ThermoError {
  readonly command: string;

  constructor(command: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('PRODUCER_SPAWN_FAILED', `Failed to start producer '${command}'${reason}`, 'process', {
      details: { command },
      cause: options?.cause,
    });
    this.name = 'SpawnError';
    this.command = command;
  }
}

/**
 * A calibration, type or interval write failed. Logged, never thrown: the
 * session continues with whatever the board already holds.
 */
export class ConfigurationWarning extends ThermoError {
  readonly address: BoardAddress;
  readonly channel?: ChannelIndex;

  constructor(
    setting: 'calibration' | 'tc_type' | 'update_interval',
    address: BoardAddress,
    channel?: ChannelIndex,
    options?: { cause?: unknown },
  ) {
    const where = channel === undefined ? `address ${address}` : `address ${address}, channel ${channel}`;
    super('BOARD_CONFIG_WARNING', `Failed to set ${SETTING_LABELS[setting]} for ${where}`, 'hardware', {
      details: { setting, address, channel },
      cause: options?.cause,
    });
    this.name = 'ConfigurationWarning';
    this.address = address;
    this.channel = channel;
  }
}

const SETTING_LABELS = {
  calibration: 'calibration coefficients',
  tc_type: 'TC type',
  update_interval: 'update interval',
} as const;

/** Config file missing, unreadable or invalid */
export class ConfigError extends ThermoError {
  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'CONFIG_INVALID', message, 'config', options);
    this.name = 'ConfigError';
  }
}

/** Bad command-line input */
export class UsageError extends ThermoError {
  constructor(message: string, options?: { details?: Record<string, unknown> }) {
    super('INVALID_ARGUMENT', message, 'validation', options);
    this.name = 'UsageError';
  }
}

/** Error raised by a board driver primitive */
export class DriverError extends ThermoError {
  constructor(
    operation: string,
    address: BoardAddress,
    channel?: ChannelIndex,
    options?: { cause?: unknown; reason?: string },
  ) {
    const where = channel === undefined ? `address ${address}` : `address ${address}, channel ${channel}`;
    const suffix = options?.reason ? ` (${options.reason})` : '';
    super('DRIVER_ERROR', `${operation} failed for ${where}${suffix}`, 'hardware', {
      details: { operation, address, channel },
      cause: options?.cause,
    });
    this.name = 'DriverError';
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function isThermoError(err: unknown): err is ThermoError {
  return err instanceof ThermoError;
}

/** Single-line diagnostic for an arbitrary thrown value */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// =============================================================================
// EXIT CODES
// =============================================================================

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

/** Exit code for a fatal error surfaced to the CLI */
export function exitCodeForError(err: unknown): number {
  if (err instanceof UsageError) return EXIT_CODES.USAGE;
  return EXIT_CODES.FAILURE;
}
