import { loadLines, trimmed, decimal, integer } from '@fixedwidth/core';
import type { DataFile, FieldSpec } from '@fixedwidth/core';

export const ACCOUNT_FIELDS: FieldSpec[] = [
  { name: 'id', start: 0, length: 4 },
  { name: 'name', start: 4, length: 6, processor: trimmed() },
  { name: 'amount', start: 10, length: 6, processor: decimal({ impliedDecimals: 2 }) },
];

export const ACCOUNT_LINES = ['0001ACME  001250', '0002B,C   000075'];

export function accounts(): DataFile {
  return loadLines(ACCOUNT_FIELDS, ACCOUNT_LINES, { emptyLines: 'skip' });
}

/** Two lines where the second has a blank, nullable count. */
export function counts(): DataFile {
  return loadLines(
    [
      { name: 'code', start: 0, length: 3 },
      { name: 'count', start: 3, length: 3, processor: integer({ blankAs: null }) },
    ],
    ['A"B012', 'XYZ   '],
    { emptyLines: 'skip' },
  );
}
