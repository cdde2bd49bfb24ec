// cli/src/output/human.ts - Aligned text output for terminals
//
// Values print as `Label: value unit` with labels, values and units aligned
// across every line of one block. Six decimal places throughout.

import {
  COMMON_MODE_TC_VALUE,
  OPEN_TC_VALUE,
  OVERRANGE_TC_VALUE,
  type BoardDescriptor,
  type BoardInfo,
  type Calibration,
  type Reading,
  type Sample,
  type Source,
  type StaticSelection,
} from '@thermofuse/contracts';
import { emptyReading, type BatchFormatter } from '@thermofuse/acquisition';

export const SEPARATOR = '-'.repeat(40);
export const HEAVY_SEPARATOR = '='.repeat(40);

const INDENT = 4;

const SENTINELS = new Map<number, string>([
  [OPEN_TC_VALUE, 'OPEN'],
  [OVERRANGE_TC_VALUE, 'OVERRANGE'],
  [COMMON_MODE_TC_VALUE, 'COMMON_MODE_ERROR'],
]);

type Line =
  | { kind: 'text'; text: string }
  | { kind: 'value'; indent: number; label: string; value: string; unit: string };

export interface HumanEntry {
  source: Source;
  reading: Reading;
  info?: BoardInfo;
}

export interface HumanBlockOptions {
  statics?: StaticSelection;
  /** Print `KEY (Address: a, Channel: c):` before each entry */
  headers: boolean;
}

function valueLine(indent: number, label: string, value: number, unit = ''): Line {
  return { kind: 'value', indent, label, value: value.toFixed(6), unit };
}

function sampleLine(label: string, sample: Sample, unit: string, sentinels = false): Line | null {
  if (!sample.available) return null;
  const named = sentinels ? SENTINELS.get(sample.value) : undefined;
  if (named) return { kind: 'value', indent: INDENT, label, value: named, unit: '' };
  return valueLine(INDENT, label, sample.value, unit);
}

function staticLines(entry: HumanEntry, statics: StaticSelection | undefined): Line[] {
  const { info } = entry;
  if (!info || !statics) return [];
  const pad = ' '.repeat(INDENT);
  const lines: Line[] = [];
  const channel = info.channels[entry.reading.channel];

  if (statics.serial && info.serial !== undefined) {
    lines.push({ kind: 'text', text: `${pad}Serial Number: ${info.serial}` });
  }
  if (statics.calibrationDate && channel?.calibrationDate !== undefined) {
    lines.push({ kind: 'text', text: `${pad}Calibration Date: ${channel.calibrationDate}` });
  }
  if (statics.calibrationCoefficients && channel?.calibration !== undefined) {
    lines.push({ kind: 'text', text: `${pad}Calibration Coefficients:` });
    lines.push(valueLine(INDENT * 2, 'Slope', channel.calibration.slope));
    lines.push(valueLine(INDENT * 2, 'Offset', channel.calibration.offset));
  }
  if (statics.updateInterval && info.updateInterval !== undefined) {
    lines.push({ kind: 'text', text: `${pad}Update Interval: ${info.updateInterval} seconds` });
  }
  return lines;
}

function entryLines(entry: HumanEntry, statics: StaticSelection | undefined): Line[] {
  const { reading } = entry;
  const samples = [
    sampleLine('Temperature', reading.temperature, 'degC', true),
    sampleLine('ADC', reading.adc, 'V'),
    sampleLine('CJC', reading.cjc, 'degC'),
  ];
  return [...staticLines(entry, statics), ...samples.filter((l): l is Line => l !== null)];
}

/** Render lines with label, value and unit columns sized to the widest in the block. */
function render(lines: readonly Line[]): string[] {
  let labelWidth = 0;
  let valueWidth = 0;
  let unitWidth = 0;
  for (const line of lines) {
    if (line.kind !== 'value') continue;
    labelWidth = Math.max(labelWidth, line.label.length);
    valueWidth = Math.max(valueWidth, line.value.length);
    unitWidth = Math.max(unitWidth, line.unit.length);
  }

  return lines.map((line) => {
    if (line.kind === 'text') return line.text;
    const head = `${' '.repeat(line.indent)}${line.label.padEnd(labelWidth)}: ${line.value.padStart(valueWidth)}`;
    return line.unit ? `${head} ${line.unit.padStart(unitWidth)}` : head;
  });
}

export function sourceHeader(source: Source, keyWidth = 0): string {
  return `${source.key.padEnd(keyWidth)} (Address: ${source.address}, Channel: ${source.channel}):`;
}

/** One block of entries, optionally separated, with shared column widths. */
export function formatEntries(entries: readonly HumanEntry[], options: HumanBlockOptions & { separators?: boolean }): string[] {
  const keyWidth = Math.max(0, ...entries.map((e) => e.source.key.length));
  const lines: Line[] = [];
  if (options.separators) lines.push({ kind: 'text', text: SEPARATOR });

  for (const entry of entries) {
    if (options.headers) lines.push({ kind: 'text', text: sourceHeader(entry.source, keyWidth) });
    lines.push(...entryLines(entry, options.statics));
    if (options.separators) lines.push({ kind: 'text', text: SEPARATOR });
  }
  return render(lines);
}

export function toEntries(
  sources: readonly Source[],
  readings: readonly Reading[],
  infos?: ReadonlyMap<number, BoardInfo>,
): HumanEntry[] {
  return sources.map((source, i) => ({
    source,
    reading: readings[i] ?? emptyReading(source.address, source.channel),
    info: infos?.get(source.address),
  }));
}

/** Single-shot output for `get`. */
export function formatSnapshot(
  entries: readonly HumanEntry[],
  options: { statics: StaticSelection; clean: boolean },
): string[] {
  return formatEntries(entries, {
    statics: options.statics,
    headers: true,
    separators: entries.length > 1 && !options.clean,
  });
}

/**
 * Streaming text output. The first cycle is preceded by a banner naming the
 * rate unless clean. A single source prints values only; several sources
 * print a header per source.
 */
export function humanBatchFormatter(options: {
  sources: readonly Source[];
  statics: StaticSelection;
  clean: boolean;
  rateHz: number;
}): BatchFormatter {
  const { sources, statics, clean, rateHz } = options;
  const multi = sources.length > 1;
  let bannerShown = false;

  return {
    formatStatic(infos) {
      const blank = sources.map((s) => emptyReading(s.address, s.channel));
      const lines = clean ? [] : [SEPARATOR];
      lines.push(...formatEntries(toEntries(sources, blank, infos), { statics, headers: true }));
      lines.push(clean ? '' : HEAVY_SEPARATOR);
      return lines;
    },
    formatCycle(readings) {
      const lines: string[] = [];
      if (!bannerShown && !clean) {
        lines.push(
          multi ? `Streaming ${sources.length} sources at ${rateHz} Hz` : `Streaming at ${rateHz} Hz`,
          multi ? HEAVY_SEPARATOR : SEPARATOR,
        );
      }
      bannerShown = true;
      lines.push(...formatEntries(toEntries(sources, readings), { headers: multi }));
      if (multi || !clean) lines.push(clean ? '' : SEPARATOR);
      return lines;
    },
  };
}

// ─── Board List ──────────────────────────────────────────────────────────────

export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
  const fmt = (row: string[]) => row.map((v, i) => v.padEnd(widths[i])).join('  ').trimEnd();
  return [fmt(headers), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(fmt)];
}

export function formatBoardList(boards: readonly BoardDescriptor[]): string[] {
  if (boards.length === 0) return ['No boards detected.'];
  return formatTable(
    ['ADDRESS', 'ID', 'NAME'],
    boards.map((b) => [String(b.address), b.id, b.name]),
  );
}

// ─── Settings ────────────────────────────────────────────────────────────────

export function formatCalibrationSet(address: number, channel: number, calibration: Calibration): string[] {
  return [
    `Calibration Coefficients (Addr ${address} Ch ${channel}) set to:`,
    `  Slope:  ${calibration.slope.toFixed(6)}`,
    `  Offset: ${calibration.offset.toFixed(6)}`,
  ];
}

export function formatIntervalSet(address: number, seconds: number): string {
  return `Update Interval (Addr ${address}) set to: ${seconds} seconds`;
}
