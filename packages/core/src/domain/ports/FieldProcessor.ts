import type { ProcessOutcome } from '../model/ProcessOutcome.js';

/**
 * Port for validating and transforming one extracted field.
 *
 * Receives the raw slice exactly as cut from the line (no trimming) and returns
 * an outcome. A processor that throws is treated as a rejection of that field
 * only; the load continues.
 *
 * @example
 * ```typescript
 * const upper: FieldProcessor<string> = {
 *   process: (raw) => accepted(raw.toUpperCase()),
 * };
 * ```
 */
export interface FieldProcessor<T = unknown> {
  process(raw: string): ProcessOutcome<T>;
}

/** Plain-function form of a processor. */
export type FieldProcessorFn<T = unknown> = (raw: string) => ProcessOutcome<T>;

/** Anything accepted where a processor is expected. */
export type ProcessorLike<T = unknown> = FieldProcessor<T> | FieldProcessorFn<T>;

/** Normalize a function or processor object to the `FieldProcessor` interface. */
export function toFieldProcessor<T>(processor: ProcessorLike<T>): FieldProcessor<T> {
  if (typeof processor === 'function') {
    return { process: processor };
  }
  return processor;
}
