/** Metadata about the data source (optional, for logging and error messages). */
export interface SourceMetadata {
  readonly name?: string;
  readonly size?: number;
}

/**
 * Port for reading the raw content of a flat file from any origin (path, buffer, stream).
 *
 * `read()` yields the content in chunks, as text or raw bytes; chunk
 * boundaries carry no meaning and may fall inside a line or a multi-byte
 * character. The sequence is finite and is consumed once per load. Failing to
 * open or read must surface as a rejected iteration, which the loader reports
 * as a fatal `IO` error.
 */
export interface DataSource {
  read(): AsyncIterable<string | Uint8Array>;
  metadata(): SourceMetadata;
}
