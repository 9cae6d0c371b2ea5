import type { DataFile } from '@fixedwidth/core';

/** Options shared by every writer. */
export interface WriteOptions {
  /**
   * Fields to output, in output order. Default: every field in definition order.
   * Unknown names throw `FieldNotFoundError`.
   */
  readonly fields?: readonly string[];
}

/**
 * Port for serializing a loaded `DataFile`.
 *
 * Implement this interface to support new output formats.
 */
export interface DataFileWriter<O extends WriteOptions = WriteOptions> {
  /** Serialize the records of `data` to a string. */
  write(data: DataFile, options?: O): string;
  /** File extension (without dot) conventionally used for the output. */
  readonly extension: string;
}
