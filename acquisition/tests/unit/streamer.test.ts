// tests/unit/streamer.test.ts - Polling Loop Tests

import { describe, it, expect } from 'vitest';
import { BoardOpenError, NO_STATICS, makeSource } from '@thermofuse/contracts';
import { CancellationToken } from '../../src/cancellation';
import { silentLogger } from '../../src/log';
import { jsonBatchFormatter } from '../../src/render/json';
import { MemorySink } from '../../src/sink';
import { runStream, type StreamOptions } from '../../src/streamer';
import { BoardManager } from '../../src/board-manager';
import { FakeBoardDriver } from '../fake-driver';

const TEMP_ONLY = { temperature: true, adc: false, cjc: false };

function setup(driver: FakeBoardDriver, overrides: Partial<StreamOptions> = {}) {
  const token = new CancellationToken();
  const sink = new MemorySink();
  const sources = [makeSource({ address: 0, channel: 0 })];
  const sleeps: number[] = [];
  const options: StreamOptions = {
    sources,
    periodMs: 100,
    quantities: TEMP_ONLY,
    statics: NO_STATICS,
    formatter: jsonBatchFormatter({ sources, statics: NO_STATICS }),
    sink,
    token,
    log: silentLogger,
    boards: new BoardManager(driver, silentLogger),
    now: () => 0,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    ...overrides,
  };
  return { token, sink, sleeps, options };
}

describe('runStream', () => {
  it('stops after the in-progress cycle once cancelled and closes boards once', async () => {
    const driver = new FakeBoardDriver();
    const ctx = setup(driver);
    ctx.options.sleep = async (ms) => {
      ctx.sleeps.push(ms);
      // Cancelled between the second and third cycles
      if (ctx.sleeps.length === 2) ctx.token.cancel('test');
    };

    const result = await runStream(driver, ctx.options);

    expect(result.cycles).toBe(2);
    expect(ctx.sink.lines).toEqual([
      '{"ADDRESS":0,"CHANNEL":0,"TEMPERATURE":21.5}',
      '{"ADDRESS":0,"CHANNEL":0,"TEMPERATURE":21.5}',
    ]);
    expect(driver.count('close')).toBe(1);
  });

  it('sleeps for the remainder of the period', async () => {
    const driver = new FakeBoardDriver();
    let clock = 0;
    const ctx = setup(driver, {
      now: () => {
        clock += 15;
        return clock;
      },
    });
    ctx.options.sleep = async (ms) => {
      ctx.sleeps.push(ms);
      ctx.token.cancel();
    };

    await runStream(driver, ctx.options);

    expect(ctx.sleeps).toEqual([85]);
  });

  it('emits the static header once before the first cycle', async () => {
    const driver = new FakeBoardDriver();
    const sources = [makeSource({ address: 0, channel: 0 })];
    const statics = { ...NO_STATICS, serial: true };
    const ctx = setup(driver, { sources, statics, formatter: jsonBatchFormatter({ sources, statics }) });
    ctx.options.sleep = async () => {
      if (driver.count('readTemperature') === 2) ctx.token.cancel();
    };

    await runStream(driver, ctx.options);

    expect(ctx.sink.lines).toEqual([
      '{"ADDRESS":0,"CHANNEL":0,"SERIAL":"FAKE0000"}',
      '{"ADDRESS":0,"CHANNEL":0,"TEMPERATURE":21.5}',
      '{"ADDRESS":0,"CHANNEL":0,"TEMPERATURE":21.5}',
    ]);
    expect(driver.count('readSerial')).toBe(1);
  });

  it('configures types before the first read', async () => {
    const driver = new FakeBoardDriver();
    const ctx = setup(driver);
    ctx.token.cancel();

    const result = await runStream(driver, ctx.options);

    expect(result.cycles).toBe(0);
    expect(driver.calls.map((c) => c.op)).toEqual(['open', 'writeThermocoupleType', 'close']);
  });

  it('propagates an open failure without emitting anything', async () => {
    const driver = new FakeBoardDriver({ failOpen: [0] });
    const ctx = setup(driver);

    await expect(runStream(driver, ctx.options)).rejects.toBeInstanceOf(BoardOpenError);
    expect(ctx.sink.lines).toEqual([]);
    expect(driver.count('close')).toBe(0);
  });

  it('closes boards when output fails', async () => {
    const driver = new FakeBoardDriver();
    const ctx = setup(driver, {
      sink: {
        writeLine: async () => {
          throw new Error('pipe closed');
        },
      },
    });

    await expect(runStream(driver, ctx.options)).rejects.toThrow('pipe closed');
    expect(driver.count('close')).toBe(1);
  });
});
