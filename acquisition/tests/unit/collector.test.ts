// tests/unit/collector.test.ts - Reading Collector Tests

import { describe, it, expect } from 'vitest';
import { NO_QUANTITIES, NO_STATICS, makeSource } from '@thermofuse/contracts';
import { ReadingCollector, collectReading, collectStaticInfo } from '../../src/collector';
import { FakeBoardDriver } from '../fake-driver';

const ALL = { temperature: true, adc: true, cjc: true };

describe('collectReading', () => {
  it('requesting nothing yields a reading with every quantity unavailable', async () => {
    const driver = new FakeBoardDriver();

    const reading = await collectReading(driver, 1, 2, NO_QUANTITIES);

    expect(reading).toEqual({
      address: 1,
      channel: 2,
      temperature: { available: false },
      adc: { available: false },
      cjc: { available: false },
    });
    expect(driver.calls).toHaveLength(0);
  });

  it('reads each requested quantity', async () => {
    const driver = new FakeBoardDriver({ temperature: 19.75, adc: 0.0021, cjc: 23.5 });

    const reading = await collectReading(driver, 0, 0, ALL);

    expect(reading.temperature).toEqual({ available: true, value: 19.75 });
    expect(reading.adc).toEqual({ available: true, value: 0.0021 });
    expect(reading.cjc).toEqual({ available: true, value: 23.5 });
  });

  it('a failed read clears only that quantity', async () => {
    const driver = new FakeBoardDriver({ fail: ['readAdcVoltage'] });

    const reading = await collectReading(driver, 0, 1, ALL);

    expect(reading.temperature.available).toBe(true);
    expect(reading.adc.available).toBe(false);
    expect(reading.cjc.available).toBe(true);
  });

  it('a driver that throws is treated as a failed read', async () => {
    const driver = new FakeBoardDriver({ throwOn: ['readTemperature'] });

    const reading = await collectReading(driver, 0, 0, ALL);

    expect(reading.temperature.available).toBe(false);
    expect(reading.cjc.available).toBe(true);
  });

  it('returns a frozen reading', async () => {
    const reading = await collectReading(new FakeBoardDriver(), 0, 0, ALL);
    expect(Object.isFrozen(reading)).toBe(true);
  });
});

describe('ReadingCollector', () => {
  it('refills one buffer in source order', async () => {
    const driver = new FakeBoardDriver({ temperature: (address, channel) => address * 10 + channel });
    const sources = [makeSource({ address: 1, channel: 3 }), makeSource({ address: 0, channel: 2 })];
    const collector = new ReadingCollector(driver, sources, { temperature: true, adc: false, cjc: false });

    const first = await collector.collect();
    const firstReadings = [...first];
    const second = await collector.collect();

    expect(second).toBe(first);
    expect(collector.size).toBe(2);
    expect(second.map((r) => r.temperature)).toEqual([
      { available: true, value: 13 },
      { available: true, value: 2 },
    ]);
    // Each cycle produces new Reading objects
    expect(second[0]).not.toBe(firstReadings[0]);
  });
});

describe('collectStaticInfo', () => {
  it('reads the serial once per board and calibration per channel', async () => {
    const driver = new FakeBoardDriver();
    const sources = [makeSource({ address: 0, channel: 0 }), makeSource({ address: 0, channel: 2 })];

    const infos = await collectStaticInfo(driver, sources, {
      ...NO_STATICS,
      serial: true,
      calibrationCoefficients: true,
    });

    expect(driver.count('readSerial')).toBe(1);
    expect(infos.get(0)).toEqual({
      address: 0,
      serial: 'FAKE0000',
      channels: {
        0: { calibration: { slope: 0.99956, offset: 0 } },
        2: { calibration: { slope: 0.99956, offset: 2 } },
      },
    });
  });

  it('leaves failed fields absent', async () => {
    const driver = new FakeBoardDriver({ fail: ['readUpdateInterval', 'readCalibrationDate'] });

    const infos = await collectStaticInfo(driver, [makeSource({ address: 5, channel: 1 })], {
      serial: true,
      calibrationDate: true,
      calibrationCoefficients: false,
      updateInterval: true,
    });

    expect(infos.get(5)).toEqual({ address: 5, serial: 'FAKE0005', channels: { 1: {} } });
  });
});
