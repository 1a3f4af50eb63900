import { StringDecoder } from 'node:string_decoder';

/**
 * Reassemble lines from arbitrarily split chunks.
 *
 * Lines end at `\n`; a `\r` before it is dropped. A last line without a
 * terminator is still yielded, but a terminator at the very end does not
 * produce an extra empty line.
 */
export async function* splitLines(
  chunks: AsyncIterable<string | Buffer>,
  encoding: BufferEncoding = 'utf-8',
): AsyncGenerator<string, void, undefined> {
  const decoder = new StringDecoder(encoding);
  let pending = '';

  for await (const chunk of chunks) {
    pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);

    let newline = pending.indexOf('\n');
    while (newline >= 0) {
      yield stripCarriageReturn(pending.slice(0, newline));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
  }

  pending += decoder.end();
  if (pending !== '') {
    yield stripCarriageReturn(pending);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
