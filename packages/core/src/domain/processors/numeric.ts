import type { FieldProcessor } from '../ports/FieldProcessor.js';
import type { ProcessOutcome } from '../model/ProcessOutcome.js';
import { accepted, acceptedWithWarning, rejected } from '../model/ProcessOutcome.js';

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;

export interface NumericOptions {
  /**
   * Value stored for a blank field. When omitted, a blank field is rejected.
   * `null` is a common choice for optional amounts.
   */
  readonly blankAs?: number | null;
}

export interface DecimalOptions extends NumericOptions {
  /**
   * Number of implied decimal places for values written without a point,
   * e.g. `2` turns `001250` into `12.5`. Values that contain a point are
   * taken as written. Default: `0`.
   */
  readonly impliedDecimals?: number;
}

function blank(options: NumericOptions | undefined): ProcessOutcome<number | null> {
  return options?.blankAs !== undefined ? accepted(options.blankAs) : rejected('Value is blank');
}

/** Parse a whole number, allowing leading zeros, padding and a sign. */
export function integer(options?: NumericOptions): FieldProcessor<number | null> {
  return {
    process(raw) {
      const value = raw.trim();
      if (value === '') return blank(options);
      if (!INTEGER.test(value)) return rejected(`Value '${value}' is not an integer`);

      const parsed = Number(value);
      if (!Number.isSafeInteger(parsed)) {
        return acceptedWithWarning(parsed, `Value '${value}' exceeds the safe integer range and lost precision`);
      }
      return accepted(parsed);
    },
  };
}

/** Parse a decimal number, optionally with implied decimal places. */
export function decimal(options?: DecimalOptions): FieldProcessor<number | null> {
  const implied = options?.impliedDecimals ?? 0;
  const divisor = 10 ** implied;

  return {
    process(raw) {
      const value = raw.trim();
      if (value === '') return blank(options);
      if (!DECIMAL.test(value)) return rejected(`Value '${value}' is not a number`);

      const parsed = Number(value);
      return accepted(implied > 0 && !value.includes('.') ? parsed / divisor : parsed);
    },
  };
}
