import { ConfigurationError } from '@fixedwidth/core';
import type { DataFile } from '@fixedwidth/core';
import type { DataFileWriter, WriteOptions } from '../../domain/ports/DataFileWriter.js';

export interface JsonWriteOptions extends WriteOptions {
  /** `'array'` for one JSON array of objects, `'ndjson'` for one object per line. Default: `'array'`. */
  readonly format?: 'array' | 'ndjson';
  /** Indentation for `'array'` output. Default: `0` (compact). Ignored for NDJSON. */
  readonly indent?: number;
  /**
   * Add the source line number to each object under this key. Must not be one
   * of the output fields. Default: none.
   */
  readonly lineNumberKey?: string;
}

/** JSON / NDJSON writer. Zero dependencies. Object keys follow the requested field order. */
export class JsonWriter implements DataFileWriter<JsonWriteOptions> {
  private readonly defaults: JsonWriteOptions;

  constructor(defaults?: JsonWriteOptions) {
    this.defaults = defaults ?? {};
  }

  get extension(): string {
    return this.defaults.format === 'ndjson' ? 'ndjson' : 'json';
  }

  write(data: DataFile, options?: JsonWriteOptions): string {
    const merged = { ...this.defaults, ...options };
    const fields = merged.fields ?? data.fields.names;
    const rows = data.orderedRows(fields);

    const key = merged.lineNumberKey;
    if (key !== undefined && fields.includes(key)) {
      throw new ConfigurationError(`lineNumberKey '${key}' clashes with an output field`, 'INVALID_OPTION', {
        parameter: 'lineNumberKey',
        value: key,
      });
    }

    const objects = rows.map((row, i) => {
      const entries: [string, unknown][] = fields.map((name, j) => [name, row[j]]);
      const line = data.records[i]?.line;
      if (key !== undefined && line !== undefined) {
        entries.unshift([key, line]);
      }
      return Object.fromEntries(entries);
    });

    if (merged.format === 'ndjson') {
      return objects.map((o) => JSON.stringify(o) + '\n').join('');
    }
    return JSON.stringify(objects, null, merged.indent ?? 0);
  }
}
