// timestamp.ts - Line timestamps with sub-second precision
//
// Two passes: `%f` becomes six-digit microseconds, then strftime handles the
// calendar directives. Directives strftime does not know are escaped first so
// they come out literally instead of being dropped.

import strftime from 'strftime';

/** A captured wall-clock instant with microsecond resolution */
export interface Instant {
  readonly date: Date;
  /** Microseconds within the current second, 0-999999 */
  readonly micros: number;
}

/** Current time from the high-resolution clock. */
export function captureInstant(): Instant {
  return instantFromEpochMs(performance.timeOrigin + performance.now());
}

export function instantFromEpochMs(epochMs: number): Instant {
  const seconds = Math.floor(epochMs / 1000);
  const micros = Math.min(999_999, Math.floor((epochMs - seconds * 1000) * 1000));
  return { date: new Date(Math.floor(epochMs)), micros };
}

// Conversion characters strftime understands
const DIRECTIVES = new Set('aAbBcCdDeFgGhHIjklLmMnopPrRsStTuUvVwWxXyYzZ');
// Padding flags strftime accepts between % and the directive
const FLAGS = new Set('-_0:');

/**
 * Replace `%f` with zero-padded microseconds and escape anything strftime
 * would not recognize. `%%` is preserved.
 */
export function substituteSubsecond(format: string, micros: number): string {
  const fraction = String(micros).padStart(6, '0');
  let out = '';

  for (let i = 0; i < format.length; i++) {
    const ch = format[i];
    if (ch !== '%') {
      out += ch;
      continue;
    }

    const next = format[i + 1];
    if (next === '%') {
      out += '%%';
      i++;
    } else if (next === 'f') {
      out += fraction;
      i++;
    } else if (next !== undefined && DIRECTIVES.has(next)) {
      out += `%${next}`;
      i++;
    } else if (next !== undefined && FLAGS.has(next) && DIRECTIVES.has(format[i + 2] ?? '')) {
      out += `%${next}${format[i + 2]}`;
      i += 2;
    } else {
      // Literal percent; the following character is copied on the next pass
      out += '%%';
    }
  }

  return out;
}

const strftimeUtc = strftime.utc();

export interface TimestampOptions {
  /** Format in UTC instead of the local zone */
  utc?: boolean;
}

export function formatTimestamp(format: string, instant: Instant, options?: TimestampOptions): string {
  const prepared = substituteSubsecond(format, instant.micros);
  return options?.utc ? strftimeUtc(prepared, instant.date) : strftime(prepared, instant.date);
}
