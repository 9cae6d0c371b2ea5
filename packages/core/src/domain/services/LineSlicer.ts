import type { OffsetMode } from '../model/LoadOptions.js';

/** Outcome of cutting `[start, end)` out of a line. */
export type SliceResult =
  | { readonly kind: 'ok'; readonly text: string }
  | { readonly kind: 'short' }
  | { readonly kind: 'split' };

/** A line prepared for repeated slicing in one offset unit. */
export interface SlicedLine {
  /** Length in the offset unit. */
  readonly length: number;
  slice(start: number, end: number): SliceResult;
}

const SURROGATE = /[\uD800-\uDFFF]/;
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Prepare a line for slicing by code points or by UTF-8 bytes. */
export function sliceLine(line: string, mode: OffsetMode): SlicedLine {
  return mode === 'byte' ? byteLine(line) : characterLine(line);
}

function characterLine(line: string): SlicedLine {
  // Code units equal code points when there are no surrogate pairs.
  if (!SURROGATE.test(line)) {
    return {
      length: line.length,
      slice: (start, end) => (end > line.length ? { kind: 'short' } : { kind: 'ok', text: line.slice(start, end) }),
    };
  }

  const points = Array.from(line);
  return {
    length: points.length,
    slice: (start, end) =>
      end > points.length ? { kind: 'short' } : { kind: 'ok', text: points.slice(start, end).join('') },
  };
}

function byteLine(line: string): SlicedLine {
  const bytes = Buffer.from(line, 'utf-8');
  return {
    length: bytes.length,
    slice: (start, end) => {
      if (end > bytes.length) return { kind: 'short' };
      try {
        return { kind: 'ok', text: utf8.decode(bytes.subarray(start, end)) };
      } catch {
        // fatal decoder: the range starts or ends inside a multi-byte sequence
        return { kind: 'split' };
      }
    },
  };
}
