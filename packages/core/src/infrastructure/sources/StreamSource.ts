import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** Source name for metadata and error messages. Default: 'stream-input'. */
  readonly name?: string;
  /** Size in bytes for metadata (if known). */
  readonly size?: number;
}

type ChunkStream = AsyncIterable<string | Uint8Array> | ReadableStream<string | Uint8Array>;

/** Data source that wraps an `AsyncIterable` (e.g. a Node `Readable`) or a web `ReadableStream`. Single use. */
export class StreamSource implements DataSource {
  private readonly stream: ChunkStream;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(stream: ChunkStream, options?: StreamSourceOptions) {
    this.stream = stream;
    this.meta = {
      name: options?.name ?? 'stream-input',
      size: options?.size,
    };
  }

  async *read(): AsyncIterable<string | Uint8Array> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = this.isReadableStream(this.stream) ? this.fromReadableStream(this.stream) : this.stream;

    for await (const chunk of iterable) {
      yield chunk;
    }
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private isReadableStream(stream: ChunkStream): stream is ReadableStream<string | Uint8Array> {
    return 'getReader' in stream && typeof stream.getReader === 'function';
  }

  private async *fromReadableStream(stream: ReadableStream<string | Uint8Array>): AsyncIterable<string | Uint8Array> {
    const reader = stream.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield value;
      }
    } finally {
      reader.releaseLock();
    }
  }
}
