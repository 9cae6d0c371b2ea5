import type { DataRecord } from './DataRecord.js';
import type { FieldSet } from './FieldSet.js';
import type { LoadWarning } from './LoadWarning.js';

/** Counters gathered during one load. */
export interface LoadStats {
  /** Physical lines read, skipped ones included. */
  readonly linesRead: number;
  /** Empty lines dropped under the `'skip'` policy. */
  readonly skippedLines: number;
}

/**
 * Result of one successful load: records in file order plus every warning.
 *
 * Owned by the caller once returned; the engine keeps no reference to it.
 */
export class DataFile {
  readonly fields: FieldSet;
  readonly records: readonly DataRecord[];
  readonly warnings: readonly LoadWarning[];
  readonly linesRead: number;
  readonly skippedLines: number;

  constructor(fields: FieldSet, records: readonly DataRecord[], warnings: readonly LoadWarning[], stats: LoadStats) {
    this.fields = fields;
    this.records = Object.freeze([...records]);
    this.warnings = Object.freeze(warnings.map((w) => Object.freeze({ ...w })));
    this.linesRead = stats.linesRead;
    this.skippedLines = stats.skippedLines;
    Object.freeze(this);
  }

  get hasWarnings(): boolean {
    return this.warnings.length > 0;
  }

  /**
   * Each record's values for the given fields, in the given order.
   * Defaults to every field in definition order. Throws `FieldNotFoundError`
   * for unknown names, even when there are no records.
   */
  orderedRows(names: readonly string[] = this.fields.names): unknown[][] {
    for (const name of names) this.fields.get(name);
    return this.records.map((record) => record.pick(names));
  }

  warningsForLine(line: number): LoadWarning[] {
    return this.warnings.filter((w) => w.line === line);
  }

  warningsForField(name: string): LoadWarning[] {
    return this.warnings.filter((w) => w.field === name);
  }
}
