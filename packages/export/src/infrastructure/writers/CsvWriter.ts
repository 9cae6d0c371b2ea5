import Papa from 'papaparse';
import type { DataFile } from '@fixedwidth/core';
import type { DataFileWriter, WriteOptions } from '../../domain/ports/DataFileWriter.js';

export interface CsvWriteOptions extends WriteOptions {
  /** Emit a header row with the field names. Default: `true`. */
  readonly header?: boolean;
  /** Column delimiter. Default: `','`. */
  readonly delimiter?: string;
  /** Row terminator. Default: `'\r\n'`. */
  readonly newline?: string;
}

/** CSV writer adapter using PapaParse. Quoting and escaping follow `Papa.unparse`. */
export class CsvWriter implements DataFileWriter<CsvWriteOptions> {
  readonly extension = 'csv';
  private readonly defaults: CsvWriteOptions;

  constructor(defaults?: CsvWriteOptions) {
    this.defaults = defaults ?? {};
  }

  write(data: DataFile, options?: CsvWriteOptions): string {
    const merged = { ...this.defaults, ...options };
    const fields = merged.fields ?? data.fields.names;
    const rows = data.orderedRows(fields);

    return Papa.unparse(
      { fields: [...fields], data: rows },
      {
        header: merged.header ?? true,
        delimiter: merged.delimiter ?? ',',
        newline: merged.newline ?? '\r\n',
      },
    );
  }
}
