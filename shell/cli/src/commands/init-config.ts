// cli/src/commands/init-config.ts - Write an example source config

import { DEFAULTS, EXIT_CODES } from '@thermofuse/contracts';
import { flagValue, parseFlags } from '../args';
import { writeExampleConfig } from '../config';
import type { CommandContext } from '../context';

export const INIT_CONFIG_USAGE = `Usage: thermo init-config [-o FILE]

Write an example config with three sources on board 0. The format is JSON
when FILE ends in .json, YAML otherwise.

Options:
  -o, --output FILE        Where to write [default: ${DEFAULTS.CONFIG_FILE}]`;

export async function initConfigCommand(args: string[], ctx: CommandContext): Promise<number> {
  const { flags } = parseFlags(args, { valued: ['--output'], bool: [], aliases: { '-o': '--output' } });
  const path = flagValue(flags, '--output') ?? DEFAULTS.CONFIG_FILE;
  writeExampleConfig(path);
  await ctx.sink.writeLine(`Created example config: ${path}`);
  return EXIT_CODES.OK;
}
