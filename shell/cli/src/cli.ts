// cli/src/cli.ts - Global flags and command dispatch

import { EXIT_CODES, UsageError, exitCodeForError } from '@thermofuse/contracts';
import type { OutputOptions } from './config';
import { reportError, type Command, type CommandContext } from './context';
import { FUSE_USAGE, fuseCommand } from './commands/fuse';
import { GET_USAGE, getCommand } from './commands/get';
import { INIT_CONFIG_USAGE, initConfigCommand } from './commands/init-config';
import { LIST_USAGE, listCommand } from './commands/list';
import { SET_USAGE, setCommand } from './commands/set';

export const VERSION = '0.1.0';

const COMMANDS = new Map<string, { run: Command; usage: string }>([
  ['list', { run: listCommand, usage: LIST_USAGE }],
  ['get', { run: getCommand, usage: GET_USAGE }],
  ['set', { run: setCommand, usage: SET_USAGE }],
  ['fuse', { run: fuseCommand, usage: FUSE_USAGE }],
  ['init-config', { run: initConfigCommand, usage: INIT_CONFIG_USAGE }],
]);

export const USAGE = `Usage: thermo <command> [options]

Commands:
  list                     List detected boards
  get [options]            Read channels once, or stream them with --stream HZ
  set [options]            Write calibration or update interval to a channel
  fuse [options] -- CMD    Inject readings into CMD's JSON output lines
  init-config [-o FILE]    Write an example source config
  help [command]           Show help

Global flags:
  -j, --json               JSON output
  -l, --clean              Plain text without separators or banners
  -v, --version            Print the version

Environment:
  THERMO_DRIVER            Board driver [default: simulated]
  THERMO_SIM_BOARDS        Simulated board addresses, comma separated [default: 0]
  THERMO_DEBUG=1           Debug logging on stderr`;

const GLOBAL_FLAGS: Record<string, keyof OutputOptions> = {
  '--json': 'mode',
  '-j': 'mode',
  '--clean': 'clean',
  '-l': 'clean',
};

/**
 * Pull --json and --clean out of argv. Everything after `--` belongs to the
 * producer and is left alone.
 */
export function parseGlobalFlags(argv: readonly string[]): { output: OutputOptions; remainingArgs: string[] } {
  const output: OutputOptions = { mode: 'normal', clean: false };
  const remainingArgs: string[] = [];
  let passthrough = false;

  for (const arg of argv) {
    if (passthrough) {
      remainingArgs.push(arg);
      continue;
    }
    if (arg === '--') passthrough = true;
    const global = GLOBAL_FLAGS[arg];
    if (global === 'mode') output.mode = 'json';
    else if (global === 'clean') output.clean = true;
    else remainingArgs.push(arg);
  }
  return { output, remainingArgs };
}

function wantsHelp(args: readonly string[]): boolean {
  const end = args.indexOf('--');
  return (end === -1 ? args : args.slice(0, end)).some((a) => a === '-h' || a === '--help');
}

/**
 * Run one invocation. Returns the process exit status; never throws.
 * `makeContext` receives the parsed global output options.
 */
export async function runCli(
  argv: readonly string[],
  makeContext: (output: OutputOptions) => CommandContext,
): Promise<number> {
  const { output, remainingArgs: args } = parseGlobalFlags(argv);
  const ctx = makeContext(output);
  const [name, ...commandArgs] = args;

  if (name === undefined || name === '-h' || name === '--help') {
    await ctx.sink.writeLine(USAGE);
    return name === undefined ? EXIT_CODES.USAGE : EXIT_CODES.OK;
  }

  if (name === '-v' || name === '--version') {
    await ctx.sink.writeLine(`thermo ${VERSION}`);
    return EXIT_CODES.OK;
  }

  if (name === 'help') {
    const topic = commandArgs[0];
    const command = topic === undefined ? undefined : COMMANDS.get(topic);
    await ctx.sink.writeLine(command ? command.usage : USAGE);
    return EXIT_CODES.OK;
  }

  const command = COMMANDS.get(name);
  if (!command) {
    ctx.log.error(`Unknown command: ${name}`);
    ctx.log.info(`Run 'thermo help' for usage`);
    return EXIT_CODES.USAGE;
  }

  if (wantsHelp(commandArgs)) {
    await ctx.sink.writeLine(command.usage);
    return EXIT_CODES.OK;
  }

  try {
    return await command.run(commandArgs, ctx);
  } catch (err) {
    reportError(ctx.log, err);
    if (err instanceof UsageError) ctx.log.info(`Run 'thermo help ${name}' for usage`);
    return exitCodeForError(err);
  }
}
