// cli/src/commands/set.ts - Write calibration and update interval to a board

import {
  EXIT_CODES,
  MAX_BOARDS,
  MAX_UPDATE_INTERVAL,
  MIN_UPDATE_INTERVAL,
  NUM_CHANNELS,
  UsageError,
  makeSource,
  type Calibration,
  type Source,
} from '@thermofuse/contracts';
import { BoardManager, type JsonObject } from '@thermofuse/acquisition';
import { intFlag, numberFlag, parseFlags } from '../args';
import type { CommandContext } from '../context';
import { formatCalibrationSet, formatIntervalSet } from '../output/human';
import { emitJson } from '../output/program';

export const SET_USAGE = `Usage: thermo set [options]

Write settings to one board channel. Calibration needs both coefficients.

Options:
  -a, --address NUM          Board address (0-7) [default: 0]
  -c, --channel NUM          Channel index (0-3) [default: 0]
  -S, --cali-slope VALUE     Calibration slope
  -O, --cali-offset VALUE    Calibration offset
  -i, --update-interval SEC  Board update interval (${MIN_UPDATE_INTERVAL}-${MAX_UPDATE_INTERVAL} seconds)`;

export interface SetRequest {
  source: Source;
  calibration?: Calibration;
  updateInterval?: number;
}

export function parseSetArgs(args: string[]): SetRequest {
  const { flags } = parseFlags(args, {
    valued: ['--address', '--channel', '--cali-slope', '--cali-offset', '--update-interval'],
    bool: [],
    aliases: {
      '-a': '--address',
      '-c': '--channel',
      '-S': '--cali-slope',
      '-O': '--cali-offset',
      '-i': '--update-interval',
    },
  });

  const source = makeSource({
    address: intFlag(flags, '--address', { min: 0, max: MAX_BOARDS - 1 }) ?? 0,
    channel: intFlag(flags, '--channel', { min: 0, max: NUM_CHANNELS - 1 }) ?? 0,
  });
  const slope = numberFlag(flags, '--cali-slope');
  const offset = numberFlag(flags, '--cali-offset');
  const updateInterval = intFlag(flags, '--update-interval', { min: MIN_UPDATE_INTERVAL, max: MAX_UPDATE_INTERVAL });

  if ((slope === undefined) !== (offset === undefined)) {
    throw new UsageError('Both --cali-slope and --cali-offset must be provided');
  }
  const calibration = slope !== undefined && offset !== undefined ? { slope, offset } : undefined;
  if (!calibration && updateInterval === undefined) {
    throw new UsageError('No settings specified. Use --cali-slope/--cali-offset or --update-interval');
  }
  return { source, calibration, updateInterval };
}

/**
 * Calibration is written before the interval; a failed write stops the
 * command. The board is closed on every path.
 */
export async function setCommand(args: string[], ctx: CommandContext): Promise<number> {
  const { source, calibration, updateInterval } = parseSetArgs(args);
  const { address, channel } = source;
  const json = ctx.output.mode === 'json';
  const driver = await ctx.loadDriver();
  const boards = new BoardManager(driver, ctx.log);
  const applied: JsonObject = { ADDRESS: address, CHANNEL: channel };

  try {
    await boards.initialize([source]);

    if (calibration) {
      const result = await driver.writeCalibrationCoefficients(address, channel, calibration);
      if (!result.success) throw result.error;
      applied.CALIBRATION = { SLOPE: calibration.slope, OFFSET: calibration.offset };
      if (!json) {
        for (const line of formatCalibrationSet(address, channel, calibration)) await ctx.sink.writeLine(line);
      }
    }

    if (updateInterval !== undefined) {
      const result = await driver.writeUpdateInterval(address, updateInterval);
      if (!result.success) throw result.error;
      applied.UPDATE_INTERVAL = updateInterval;
      if (!json) await ctx.sink.writeLine(formatIntervalSet(address, updateInterval));
    }
  } finally {
    await boards.close();
  }

  if (json) await emitJson(ctx.sink, applied);
  return EXIT_CODES.OK;
}
