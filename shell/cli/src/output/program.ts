// cli/src/output/program.ts - JSON output for programs
//
// Data documents go to stdout as one line each; `list` is the exception and
// prints indented JSON.

import type { BoardDescriptor } from '@thermofuse/contracts';
import type { JsonValue, LineSink } from '@thermofuse/acquisition';

export async function emitJson(sink: LineSink, value: JsonValue, opts?: { pretty?: boolean }): Promise<void> {
  await sink.writeLine(opts?.pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value));
}

export function boardListJson(boards: readonly BoardDescriptor[]): JsonValue {
  return {
    boards: boards.map((b) => ({ address: b.address, id: b.id, name: b.name })),
  };
}
