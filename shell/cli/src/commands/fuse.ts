// cli/src/commands/fuse.ts - Inject readings into a producer's JSON lines

import { DEFAULTS, UsageError, type QuantitySelection, type Source } from '@thermofuse/contracts';
import { lineBuffered, runBridge } from '@thermofuse/acquisition';
import { flagValue, parseFlags, splitAtDoubleDash, type FlagSpec } from '../args';
import { loadSourceConfig, sourceFromFlags } from '../config';
import type { CommandContext } from '../context';

export const FUSE_USAGE = `Usage: thermo fuse [options] -- <command> [args...]

Run <command> and add TIMESTAMP and THERMOCOUPLE fields to every JSON object
line it prints. Other lines pass through unchanged.

Options:
  -C, --config FILE        YAML/JSON source config
  -a, --address NUM        Single mode: board address [default: 0]
  -c, --channel NUM        Single mode: channel index [default: 0]
  -k, --key NAME           Single mode: key under THERMOCOUPLE [default: ${DEFAULTS.FUSE_KEY}]
  -t, --tc-type TYPE       Single mode: thermocouple type [default: K]
  -T, --time-format FMT    Timestamp format; %f is six-digit microseconds
                           [default: ${DEFAULTS.TIME_FORMAT}]
      --utc                Format timestamps in UTC
      --adc                Also inject ADC voltage
      --cjc                Also inject cold-junction temperature
      --line-buffered      Run the command under stdbuf -oL -eL`;

const FUSE_FLAGS: FlagSpec = {
  valued: ['--config', '--address', '--channel', '--key', '--tc-type', '--time-format'],
  bool: ['--utc', '--adc', '--cjc', '--line-buffered'],
  aliases: {
    '-C': '--config',
    '-a': '--address',
    '-c': '--channel',
    '-k': '--key',
    '-t': '--tc-type',
    '-T': '--time-format',
  },
};

export interface FuseRequest {
  sources: Source[];
  command: string;
  args: string[];
  timeFormat: string;
  utc: boolean;
  quantities: QuantitySelection;
}

export function parseFuseArgs(argv: string[], ctx: Pick<CommandContext, 'log'>): FuseRequest {
  const { before, after } = splitAtDoubleDash(argv);
  if (after === null || after.length === 0) {
    throw new UsageError('fuse needs a producer command after --');
  }

  const { flags } = parseFlags(before, FUSE_FLAGS);
  const configPath = flagValue(flags, '--config');
  if (
    configPath !== undefined &&
    ['--address', '--channel', '--key', '--tc-type'].some((f) => f in flags)
  ) {
    throw new UsageError('Cannot specify both --config and --address/--channel/--key/--tc-type');
  }

  const sources =
    configPath !== undefined
      ? loadSourceConfig(configPath, ctx.log)
      : [sourceFromFlags(flags, flagValue(flags, '--key') ?? DEFAULTS.FUSE_KEY)];

  const [command, ...args] = after;
  const launch = flags['--line-buffered'] === true ? lineBuffered(command, args) : { command, args };

  return {
    sources,
    command: launch.command,
    args: launch.args,
    timeFormat: flagValue(flags, '--time-format') ?? DEFAULTS.TIME_FORMAT,
    utc: flags['--utc'] === true,
    quantities: {
      temperature: true,
      adc: flags['--adc'] === true,
      cjc: flags['--cjc'] === true,
    },
  };
}

/** Exit status is the producer's, or 1 when boards or the producer could not be started. */
export async function fuseCommand(argv: string[], ctx: CommandContext): Promise<number> {
  const request = parseFuseArgs(argv, ctx);
  const driver = await ctx.loadDriver();

  return runBridge(driver, {
    ...request,
    sink: ctx.sink,
    launcher: ctx.launcher,
    token: ctx.token,
    log: ctx.log,
  });
}
