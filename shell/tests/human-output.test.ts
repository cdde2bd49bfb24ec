// shell/tests/human-output.test.ts - Aligned text output

import { describe, it, expect } from 'vitest';
import {
  NO_STATICS,
  OPEN_TC_VALUE,
  UNAVAILABLE,
  makeSource,
  sampleOf,
  type Reading,
} from '@thermofuse/contracts';
import { emptyReading } from '@thermofuse/acquisition';
import {
  SEPARATOR,
  formatBoardList,
  formatEntries,
  formatSnapshot,
  humanBatchFormatter,
} from '../cli/src/output/human';

function reading(address: number, channel: number, values: Partial<Pick<Reading, 'temperature' | 'adc' | 'cjc'>>): Reading {
  return { ...emptyReading(address, channel), ...values };
}

describe('formatEntries', () => {
  it('aligns labels, values and units across sources', () => {
    const oven = makeSource({ key: 'OVEN', address: 0, channel: 0 });
    const amb = makeSource({ key: 'AMB', address: 0, channel: 1 });

    const lines = formatEntries(
      [
        { source: oven, reading: reading(0, 0, { temperature: sampleOf(123.5), adc: sampleOf(0.0012) }) },
        { source: amb, reading: reading(0, 1, { temperature: sampleOf(OPEN_TC_VALUE), cjc: sampleOf(24.25) }) },
      ],
      { headers: true, separators: true },
    );

    expect(lines).toEqual([
      SEPARATOR,
      'OVEN (Address: 0, Channel: 0):',
      '    Temperature: 123.500000 degC',
      '    ADC        :   0.001200    V',
      SEPARATOR,
      'AMB  (Address: 0, Channel: 1):',
      '    Temperature:       OPEN',
      '    CJC        :  24.250000 degC',
      SEPARATOR,
    ]);
  });

  it('skips quantities that are unavailable', () => {
    const source = makeSource({ address: 0, channel: 0 });
    const lines = formatEntries([{ source, reading: reading(0, 0, { temperature: UNAVAILABLE, cjc: sampleOf(1) }) }], {
      headers: false,
    });
    expect(lines).toEqual(['    CJC: 1.000000 degC']);
  });
});

describe('formatSnapshot', () => {
  it('prints static fields before readings', () => {
    const source = makeSource({ key: 'K', address: 0, channel: 0 });
    const lines = formatSnapshot(
      [
        {
          source,
          reading: reading(0, 0, { temperature: sampleOf(20) }),
          info: {
            address: 0,
            serial: 'SN1',
            updateInterval: 2,
            channels: { 0: { calibrationDate: '2023-06-01', calibration: { slope: 1.5, offset: -2 } } },
          },
        },
      ],
      {
        statics: { serial: true, calibrationDate: true, calibrationCoefficients: true, updateInterval: true },
        clean: false,
      },
    );

    expect(lines).toEqual([
      'K (Address: 0, Channel: 0):',
      '    Serial Number: SN1',
      '    Calibration Date: 2023-06-01',
      '    Calibration Coefficients:',
      '        Slope      :  1.500000',
      '        Offset     : -2.000000',
      '    Update Interval: 2 seconds',
      '    Temperature: 20.000000 degC',
    ]);
  });
});

describe('humanBatchFormatter', () => {
  const source = makeSource({ address: 0, channel: 0 });
  const cycle = [reading(0, 0, { temperature: sampleOf(21.5) })];

  it('prints a banner before the first cycle only', () => {
    const formatter = humanBatchFormatter({ sources: [source], statics: NO_STATICS, clean: false, rateHz: 5 });

    expect(formatter.formatCycle(cycle)).toEqual([
      'Streaming at 5 Hz',
      SEPARATOR,
      '    Temperature: 21.500000 degC',
      SEPARATOR,
    ]);
    expect(formatter.formatCycle(cycle)).toEqual(['    Temperature: 21.500000 degC', SEPARATOR]);
  });

  it('prints bare values when clean', () => {
    const formatter = humanBatchFormatter({ sources: [source], statics: NO_STATICS, clean: true, rateHz: 5 });
    expect(formatter.formatCycle(cycle)).toEqual(['    Temperature: 21.500000 degC']);
  });

  it('ends a clean multi-source cycle with a blank line', () => {
    const other = makeSource({ key: 'B', address: 1, channel: 0 });
    const formatter = humanBatchFormatter({ sources: [source, other], statics: NO_STATICS, clean: true, rateHz: 2 });

    expect(formatter.formatCycle([cycle[0], reading(1, 0, { temperature: sampleOf(-1.25) })])).toEqual([
      'TEMP_0_0 (Address: 0, Channel: 0):',
      '    Temperature: 21.500000 degC',
      'B        (Address: 1, Channel: 0):',
      '    Temperature: -1.250000 degC',
      '',
    ]);
  });
});

describe('formatBoardList', () => {
  it('prints a table', () => {
    expect(formatBoardList([{ address: 0, id: 'FAKE-0', name: 'Fake board' }])).toEqual([
      'ADDRESS  ID      NAME',
      '-------  ------  ----------',
      '0        FAKE-0  Fake board',
    ]);
  });

  it('says when nothing was found', () => {
    expect(formatBoardList([])).toEqual(['No boards detected.']);
  });
});
