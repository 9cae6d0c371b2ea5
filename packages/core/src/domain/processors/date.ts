import type { FieldProcessor } from '../ports/FieldProcessor.js';
import { accepted, rejected } from '../model/ProcessOutcome.js';

const YMD = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Parse a `YYYYMMDD` date into an ISO `YYYY-MM-DD` string.
 * Blank and all-zero values mean "no date" and are stored as `null`.
 */
export function dateYmd(): FieldProcessor<string | null> {
  return {
    process(raw) {
      const value = raw.trim();
      if (value === '' || /^0+$/.test(value)) return accepted(null);

      const match = YMD.exec(value);
      if (!match) return rejected(`Value '${value}' is not a YYYYMMDD date`);

      const [, y = '', m = '', d = ''] = match;
      const year = Number(y);
      const month = Number(m);
      const day = Number(d);
      const date = new Date(Date.UTC(year, month - 1, day));

      if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return rejected(`Value '${value}' is not a calendar date`);
      }
      return accepted(`${y}-${m}-${d}`);
    },
  };
}
