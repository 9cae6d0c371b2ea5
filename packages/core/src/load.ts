import { ConfigurationError, LoadError } from './domain/errors/FixedWidthError.js';
import type { DataFile } from './domain/model/DataFile.js';
import type { FieldDefsInput } from './domain/model/FieldSet.js';
import type { LoadOptions } from './domain/model/LoadOptions.js';
import type { LoadResult } from './domain/model/LoadResult.js';
import { loadFailed } from './domain/model/LoadResult.js';
import { FixedWidthReader } from './FixedWidthReader.js';
import type { SourceInput } from './FixedWidthReader.js';

/**
 * Load a fixed-width source in one call.
 *
 * Resolves to `{ ok: true, data }` with every record and warning, or to
 * `{ ok: false, error }` when the source cannot be read or decoded, or the
 * field definitions are invalid. Invalid `options` reject with
 * `ConfigurationError`.
 *
 * @example
 * ```typescript
 * const result = await tryLoad(
 *   [{ name: 'id', start: 0, length: 4 }, { name: 'amount', start: 4, length: 6 }],
 *   './export.dat',
 *   { emptyLines: 'skip' },
 * );
 * ```
 */
export async function tryLoad(defs: FieldDefsInput, source: SourceInput, options: LoadOptions): Promise<LoadResult> {
  let reader: FixedWidthReader;
  try {
    reader = new FixedWidthReader({ ...options, fields: defs });
  } catch (error) {
    if (error instanceof ConfigurationError && error.code !== 'INVALID_OPTION') {
      return loadFailed(LoadError.invalidDefinitions(error));
    }
    throw error;
  }
  return reader.tryLoad(source);
}

/** Like `tryLoad()`, but rejects with the `LoadError`. */
export async function load(defs: FieldDefsInput, source: SourceInput, options: LoadOptions): Promise<DataFile> {
  const result = await tryLoad(defs, source, options);
  if (!result.ok) throw result.error;
  return result.data;
}

/**
 * Synchronous pass over lines already in memory.
 *
 * @throws LoadError with code `INVALID_DEFINITIONS` for an invalid definition set.
 */
export function loadLines(defs: FieldDefsInput, lines: Iterable<string>, options: LoadOptions): DataFile {
  let reader: FixedWidthReader;
  try {
    reader = new FixedWidthReader({ ...options, fields: defs });
  } catch (error) {
    if (error instanceof ConfigurationError && error.code !== 'INVALID_OPTION') {
      throw LoadError.invalidDefinitions(error);
    }
    throw error;
  }
  return reader.loadLines(lines);
}
