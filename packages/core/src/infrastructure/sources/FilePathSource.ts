import { createReadStream } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/**
 * Data source that streams raw bytes from a local file path using `createReadStream`.
 *
 * Decoding is left to the loader so that invalid content can be reported as a
 * decode error. The stream is destroyed when iteration ends, early or not.
 */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<Uint8Array> {
    const stream = createReadStream(this.filePath, { highWaterMark: this.highWaterMark });

    for await (const chunk of stream) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    }
  }

  metadata(): SourceMetadata {
    return { name: basename(this.filePath) };
  }

  get path(): string {
    return this.filePath;
  }
}
