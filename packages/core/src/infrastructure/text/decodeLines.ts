import { LoadError } from '../../domain/errors/FixedWidthError.js';
import { LineSplitter } from '../../domain/services/LineSplitter.js';

const BOM = '\uFEFF';

/**
 * Decode a chunked source into lines.
 *
 * Byte chunks go through a fatal `TextDecoder` in streaming mode, so a
 * character split across chunks is fine but invalid sequences are not. Text
 * containing NUL is treated as binary. Both raise `LoadError` with code
 * `DECODE`; errors thrown by the chunk iterable itself pass through untouched.
 */
export async function* decodeLines(
  chunks: AsyncIterable<string | Uint8Array>,
  encoding = 'utf-8',
): AsyncGenerator<string, void, undefined> {
  const decoder = createDecoder(encoding);
  const splitter = new LineSplitter();
  let first = true;

  for await (const chunk of chunks) {
    let text = typeof chunk === 'string' ? chunk : decode(decoder, chunk, true);
    if (first && text !== '') {
      if (text.startsWith(BOM)) text = text.slice(1);
      first = false;
    }
    assertText(text);
    yield* splitter.push(text);
  }

  const tail = decode(decoder, new Uint8Array(0), false);
  assertText(tail);
  yield* splitter.push(tail);
  yield* splitter.flush();
}

function createDecoder(encoding: string): TextDecoder {
  try {
    return new TextDecoder(encoding, { fatal: true });
  } catch (error) {
    throw LoadError.decode(`unsupported encoding '${encoding}'`, error);
  }
}

function decode(decoder: TextDecoder, bytes: Uint8Array, stream: boolean): string {
  try {
    return decoder.decode(bytes, { stream });
  } catch (error) {
    throw LoadError.decode(`invalid ${decoder.encoding} byte sequence`, error);
  }
}

function assertText(text: string): void {
  if (text.includes('\u0000')) {
    throw LoadError.decode('content contains NUL bytes');
  }
}
