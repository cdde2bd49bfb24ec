// cli/src/commands/get.ts - Read sources once, or stream them

import {
  EXIT_CODES,
  TIMING,
  UsageError,
  periodForRate,
  wantsAnyQuantity,
  wantsAnyStatic,
  type QuantitySelection,
  type Source,
  type StaticSelection,
} from '@thermofuse/contracts';
import { jsonBatchFormatter, readSnapshot, readingsToJson, runStream } from '@thermofuse/acquisition';
import { intFlag, flagValue, parseFlags, type FlagSpec, type ParsedArgs } from '../args';
import { loadSourceConfig, sourceFromFlags } from '../config';
import type { CommandContext } from '../context';
import { formatSnapshot, humanBatchFormatter, toEntries } from '../output/human';
import { emitJson } from '../output/program';

export const GET_USAGE = `Usage: thermo get [options]

Read one channel (--address/--channel) or every source in a config file.

Options:
  -C, --config FILE        YAML/JSON source config (multi-channel mode)
  -a, --address NUM        Board address (0-7) [default: 0]
  -c, --channel NUM        Channel index (0-3) [default: 0]
  -t, --tc-type TYPE       Thermocouple type (J,K,T,E,R,S,B,N) [default: K]
  -s, --serial             Serial number
  -D, --cali-date          Calibration date
  -O, --cali-coeffs        Calibration coefficients
  -i, --update-interval    Update interval
  -T, --temp               Temperature (default when nothing else is asked for)
  -A, --adc                Raw ADC voltage
  -J, --cjc                Cold-junction temperature
  -S, --stream HZ          Stream readings at HZ (1-1000) until interrupted`;

const GET_FLAGS: FlagSpec = {
  valued: ['--config', '--address', '--channel', '--tc-type', '--stream'],
  bool: ['--serial', '--cali-date', '--cali-coeffs', '--update-interval', '--temp', '--adc', '--cjc'],
  aliases: {
    '-C': '--config',
    '-a': '--address',
    '-c': '--channel',
    '-t': '--tc-type',
    '-S': '--stream',
    '-s': '--serial',
    '-D': '--cali-date',
    '-O': '--cali-coeffs',
    '-i': '--update-interval',
    '-T': '--temp',
    '-A': '--adc',
    '-J': '--cjc',
  },
};

export interface GetRequest {
  sources: Source[];
  /** True when the sources came from a config file */
  fromConfig: boolean;
  quantities: QuantitySelection;
  statics: StaticSelection;
  rateHz?: number;
}

export function parseGetArgs(args: string[], ctx: Pick<CommandContext, 'log'>): GetRequest {
  const { flags } = parseFlags(args, GET_FLAGS);
  const configPath = flagValue(flags, '--config');

  if (configPath !== undefined && ('--address' in flags || '--channel' in flags)) {
    throw new UsageError('Cannot specify both --config and --address/--channel');
  }
  if (configPath !== undefined && '--tc-type' in flags) {
    throw new UsageError('--tc-type applies to single-channel mode; set tc_type in the config file');
  }

  const statics = staticSelection(flags);
  const quantities = quantitySelection(flags);
  if (!wantsAnyQuantity(quantities) && !wantsAnyStatic(statics)) quantities.temperature = true;

  return {
    sources: configPath !== undefined ? loadSourceConfig(configPath, ctx.log) : [sourceFromFlags(flags)],
    fromConfig: configPath !== undefined,
    quantities,
    statics,
    rateHz: intFlag(flags, '--stream', { min: TIMING.STREAM_MIN_HZ, max: TIMING.STREAM_MAX_HZ }),
  };
}

function staticSelection(flags: ParsedArgs['flags']): StaticSelection {
  return {
    serial: flags['--serial'] === true,
    calibrationDate: flags['--cali-date'] === true,
    calibrationCoefficients: flags['--cali-coeffs'] === true,
    updateInterval: flags['--update-interval'] === true,
  };
}

function quantitySelection(flags: ParsedArgs['flags']): QuantitySelection {
  return {
    temperature: flags['--temp'] === true,
    adc: flags['--adc'] === true,
    cjc: flags['--cjc'] === true,
  };
}

export async function getCommand(args: string[], ctx: CommandContext): Promise<number> {
  const request = parseGetArgs(args, ctx);
  const driver = await ctx.loadDriver();
  const json = ctx.output.mode === 'json';

  if (request.rateHz !== undefined) {
    const { sources, statics, rateHz } = request;
    await runStream(driver, {
      sources,
      periodMs: periodForRate(rateHz),
      quantities: request.quantities,
      statics,
      formatter: json
        ? jsonBatchFormatter({ sources, statics, showKeys: request.fromConfig })
        : humanBatchFormatter({ sources, statics, clean: ctx.output.clean, rateHz }),
      sink: ctx.sink,
      token: ctx.token,
      log: ctx.log,
    });
    return EXIT_CODES.OK;
  }

  const { readings, infos } = await readSnapshot(driver, {
    sources: request.sources,
    quantities: request.quantities,
    statics: request.statics,
    log: ctx.log,
  });

  if (json) {
    await emitJson(
      ctx.sink,
      readingsToJson(readings, {
        sources: request.sources,
        showKeys: request.fromConfig,
        infos,
        statics: request.statics,
      }),
    );
  } else {
    const lines = formatSnapshot(toEntries(request.sources, readings, infos), {
      statics: request.statics,
      clean: ctx.output.clean,
    });
    for (const line of lines) await ctx.sink.writeLine(line);
  }
  return EXIT_CODES.OK;
}
