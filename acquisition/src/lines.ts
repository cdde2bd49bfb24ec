// lines.ts - Split a byte stream into lines
//
// Only '\n' terminates a line; a trailing '\r' stays part of it so text is
// forwarded exactly as received. A final unterminated line is still yielded.

import type { Readable } from 'stream';

export async function* readLines(stream: Readable): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder();
  const chunks: AsyncIterable<unknown> = stream;
  let buffer = '';

  for await (const chunk of chunks) {
    if (typeof chunk === 'string') buffer += chunk;
    else if (chunk instanceof Uint8Array) buffer += decoder.decode(chunk, { stream: true });
    else continue;

    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';
    for (const line of lines) yield line;
  }

  buffer += decoder.decode();
  if (buffer.length > 0) yield buffer;
}
