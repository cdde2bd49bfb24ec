// cli/src/commands/list.ts - Boards detected on the stack

import { EXIT_CODES } from '@thermofuse/contracts';
import { parseFlags } from '../args';
import type { CommandContext } from '../context';
import { formatBoardList } from '../output/human';
import { boardListJson, emitJson } from '../output/program';

export const LIST_USAGE = `Usage: thermo list

List every board detected on the stack.`;

export async function listCommand(args: string[], ctx: CommandContext): Promise<number> {
  parseFlags(args, { valued: [], bool: [] });
  const driver = await ctx.loadDriver();
  const result = await driver.listBoards();
  if (!result.success) throw result.error;

  if (ctx.output.mode === 'json') {
    await emitJson(ctx.sink, boardListJson(result.data), { pretty: true });
  } else {
    for (const line of formatBoardList(result.data)) await ctx.sink.writeLine(line);
  }
  return EXIT_CODES.OK;
}
