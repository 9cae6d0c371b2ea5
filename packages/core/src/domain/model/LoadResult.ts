import type { LoadError } from '../errors/FixedWidthError.js';
import type { DataFile } from './DataFile.js';

/** Either a complete `DataFile` or the single fatal error that prevented it. */
export type LoadResult =
  | { readonly ok: true; readonly data: DataFile }
  | { readonly ok: false; readonly error: LoadError };

export function loadSucceeded(data: DataFile): LoadResult {
  return { ok: true, data };
}

export function loadFailed(error: LoadError): LoadResult {
  return { ok: false, error };
}
