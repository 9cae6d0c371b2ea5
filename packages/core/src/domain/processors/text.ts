import type { FieldProcessor } from '../ports/FieldProcessor.js';
import { accepted, rejected } from '../model/ProcessOutcome.js';

export type TrimSide = 'both' | 'start' | 'end';

/** Strip padding. Legacy exports pad text with trailing spaces and numbers with leading ones. */
export function trimmed(side: TrimSide = 'both'): FieldProcessor<string> {
  return {
    process(raw) {
      switch (side) {
        case 'start':
          return accepted(raw.trimStart());
        case 'end':
          return accepted(raw.trimEnd());
        default:
          return accepted(raw.trim());
      }
    },
  };
}

/** Reject blank (all-space) values; pass anything else through unchanged. */
export function required(): FieldProcessor<string> {
  return {
    process(raw) {
      return raw.trim() === '' ? rejected('Value is blank') : accepted(raw);
    },
  };
}

export interface OneOfOptions {
  /** Compare without regard to case. Default: `false`. */
  readonly ignoreCase?: boolean;
}

/**
 * Accept only enumerated codes. The value is trimmed before comparison, and
 * the matching entry of `allowed` is stored, so case is normalized.
 */
export function oneOf(allowed: readonly string[], options?: OneOfOptions): FieldProcessor<string> {
  const ignoreCase = options?.ignoreCase ?? false;
  const lookup = new Map(allowed.map((v) => [ignoreCase ? v.toLowerCase() : v, v]));

  return {
    process(raw) {
      const value = raw.trim();
      const match = lookup.get(ignoreCase ? value.toLowerCase() : value);
      if (match === undefined) {
        return rejected(`Value '${value}' is not one of: ${allowed.join(', ')}`);
      }
      return accepted(match);
    },
  };
}

/** Accept the raw value when it matches `pattern` (tested against the untrimmed slice). */
export function matches(pattern: RegExp, message?: string): FieldProcessor<string> {
  return {
    process(raw) {
      // a /g or /y pattern keeps lastIndex between calls
      pattern.lastIndex = 0;
      return pattern.test(raw) ? accepted(raw) : rejected(message ?? `Value '${raw}' does not match ${String(pattern)}`);
    },
  };
}
