import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** Data source over content already in memory. Can be read any number of times. */
export class BufferSource implements DataSource {
  private readonly content: string | Uint8Array;
  private readonly meta: SourceMetadata;

  constructor(data: string | Uint8Array, metadata?: Partial<SourceMetadata>) {
    this.content = data;
    this.meta = {
      name: metadata?.name ?? 'buffer-input',
      size: typeof data === 'string' ? Buffer.byteLength(data) : data.byteLength,
    };
  }

  async *read(): AsyncIterable<string | Uint8Array> {
    yield await Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
