// cli/src/args.ts - Flag parsing shared by every command
//
// Commands declare which flags take a value and which are switches; short
// flags are normalized to their long form. Anything undeclared is a usage
// error.

import { UsageError } from '@thermofuse/contracts';

export interface FlagSpec {
  /** Flags that consume the next argument */
  valued: string[];
  /** Switches */
  bool: string[];
  /** Short form -> long form */
  aliases?: Record<string, string>;
  /** Accept positional arguments instead of rejecting them */
  positionals?: boolean;
}

export interface ParsedArgs {
  flags: Record<string, string | true>;
  positionals: string[];
}

export function parseFlags(args: readonly string[], declared: FlagSpec): ParsedArgs {
  const valued = new Set(declared.valued);
  const bool = new Set(declared.bool);
  const flags: Record<string, string | true> = {};
  const positionals: string[] = [];

  let i = 0;
  while (i < args.length) {
    const raw = args[i];
    if (raw.startsWith('-') && raw !== '-') {
      // --flag=value
      const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
      const name = eq === -1 ? raw : raw.slice(0, eq);
      const key = declared.aliases?.[name] ?? name;

      if (valued.has(key)) {
        const value = eq === -1 ? args[i + 1] : raw.slice(eq + 1);
        if (value === undefined) throw new UsageError(`Flag ${name} requires a value`);
        flags[key] = value;
        i += eq === -1 ? 2 : 1;
      } else if (bool.has(key) && eq === -1) {
        flags[key] = true;
        i++;
      } else {
        throw new UsageError(`Unknown flag: ${raw}`);
      }
    } else if (declared.positionals) {
      positionals.push(raw);
      i++;
    } else {
      throw new UsageError(`Unexpected argument: ${raw}`);
    }
  }

  return { flags, positionals };
}

/** The string value of a valued flag, if given */
export function flagValue(flags: ParsedArgs['flags'], key: string): string | undefined {
  const value = flags[key];
  return typeof value === 'string' ? value : undefined;
}

/** Parse an integer flag within [min, max]. */
export function intFlag(
  flags: ParsedArgs['flags'],
  key: string,
  range: { min: number; max: number },
): number | undefined {
  const value = flagValue(flags, key);
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value)) throw new UsageError(`${key} must be an integer, got '${value}'`);
  const n = parseInt(value, 10);
  if (n < range.min || n > range.max) {
    throw new UsageError(`${key} must be between ${range.min} and ${range.max}, got ${n}`);
  }
  return n;
}

/** Parse a decimal number flag. */
export function numberFlag(flags: ParsedArgs['flags'], key: string): number | undefined {
  const value = flagValue(flags, key);
  if (value === undefined) return undefined;
  const n = value.trim() === '' ? NaN : Number(value);
  if (!Number.isFinite(n)) throw new UsageError(`${key} must be a number, got '${value}'`);
  return n;
}

/** Split argv at the first `--`. */
export function splitAtDoubleDash(args: readonly string[]): { before: string[]; after: string[] | null } {
  const idx = args.indexOf('--');
  if (idx === -1) return { before: [...args], after: null };
  return { before: args.slice(0, idx), after: args.slice(idx + 1) };
}
