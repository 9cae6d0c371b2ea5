import type { Logger } from 'pino';

/**
 * What to do with a line that has no characters at all.
 *
 * - `'skip'`: drop it; no record, no warning.
 * - `'record'`: produce a record with every field empty and one `EMPTY_LINE` warning.
 */
export type EmptyLinePolicy = 'skip' | 'record';

/**
 * Unit used for `start` and `length`.
 *
 * - `'character'`: Unicode code points.
 * - `'byte'`: bytes of the line's UTF-8 encoding.
 */
export type OffsetMode = 'character' | 'byte';

/** Per-load settings. */
export interface LoadOptions {
  /** Empty-line handling. Required: there is no safe default for legacy exports. */
  readonly emptyLines: EmptyLinePolicy;
  /** Offset unit. Default: `'character'`. */
  readonly offsets?: OffsetMode;
  /** Lines shorter than this get one `SHORT_LINE` warning. Default: none. */
  readonly minLineLength?: number;
  /** Text encoding of the source, as understood by `TextDecoder`. Default: `'utf-8'`. */
  readonly encoding?: string;
  /** Logger for load diagnostics. Default: the package logger. */
  readonly logger?: Logger;
}

/** `LoadOptions` with defaults applied. */
export interface ResolvedLoadOptions {
  readonly emptyLines: EmptyLinePolicy;
  readonly offsets: OffsetMode;
  readonly minLineLength: number | undefined;
  readonly encoding: string;
}

export function resolveLoadOptions(options: LoadOptions): ResolvedLoadOptions {
  return {
    emptyLines: options.emptyLines,
    offsets: options.offsets ?? 'character',
    minLineLength: options.minLineLength,
    encoding: options.encoding ?? 'utf-8',
  };
}
