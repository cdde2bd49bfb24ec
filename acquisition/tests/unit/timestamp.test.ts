// tests/unit/timestamp.test.ts - Timestamp Formatting Tests

import { describe, it, expect } from 'vitest';
import { formatTimestamp, instantFromEpochMs, substituteSubsecond, type Instant } from '../../src/timestamp';

// 2024-01-02T03:04:05.123456Z
const INSTANT: Instant = { date: new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 123)), micros: 123456 };

describe('formatTimestamp', () => {
  it('fills %f with six-digit microseconds', () => {
    expect(formatTimestamp('%H:%M:%S.%f', INSTANT, { utc: true })).toBe('03:04:05.123456');
  });

  it('zero-pads small sub-second values', () => {
    const instant: Instant = { date: INSTANT.date, micros: 42 };
    expect(formatTimestamp('%S.%f', instant, { utc: true })).toBe('05.000042');
  });

  it('formats the default ISO-like layout', () => {
    expect(formatTimestamp('%Y-%m-%dT%H:%M:%S.%f', INSTANT, { utc: true })).toBe('2024-01-02T03:04:05.123456');
  });

  it('passes unknown directives through unchanged', () => {
    expect(formatTimestamp('[%Q] %H', INSTANT, { utc: true })).toBe('[%Q] 03');
  });

  it('keeps a trailing percent sign', () => {
    expect(formatTimestamp('%M%', INSTANT, { utc: true })).toBe('04%');
  });

  it('treats %% as a literal percent', () => {
    expect(formatTimestamp('%%f=%f', INSTANT, { utc: true })).toBe('%f=123456');
  });
});

describe('substituteSubsecond', () => {
  it('escapes unknown directives and keeps known ones', () => {
    expect(substituteSubsecond('%Y %Q %f', 7)).toBe('%Y %%Q 000007');
  });

  it('keeps padding flags on known directives', () => {
    expect(substituteSubsecond('%-d %_H', 0)).toBe('%-d %_H');
  });
});

describe('instantFromEpochMs', () => {
  it('splits fractional milliseconds into microseconds', () => {
    const instant = instantFromEpochMs(1000.25);
    expect(instant.date.getTime()).toBe(1000);
    expect(instant.micros).toBe(250);
  });

  it('counts whole milliseconds into microseconds within the second', () => {
    expect(instantFromEpochMs(5_123).micros).toBe(123_000);
  });
});
