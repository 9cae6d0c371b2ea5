import { FieldNotFoundError } from '../errors/FixedWidthError.js';

/** Value stored for a field that was truncated, rejected, or on a recorded empty line. */
export const EMPTY_VALUE = '';

/**
 * One parsed line: field name → value, in field-definition order.
 *
 * Built once all fields of the line are computed, so iteration order always
 * follows the definition set rather than any processing order.
 */
export class DataRecord {
  /** 1-based line number this record was read from. */
  readonly line: number;
  private readonly values: ReadonlyMap<string, unknown>;

  constructor(line: number, entries: readonly (readonly [string, unknown])[]) {
    this.line = line;
    this.values = new Map(entries);
    Object.freeze(this);
  }

  /** Number of fields in the record. */
  get size(): number {
    return this.values.size;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  /** Value of a field. Throws `FieldNotFoundError` for names outside the definition set. */
  get(name: string): unknown {
    if (!this.values.has(name)) throw new FieldNotFoundError(name);
    return this.values.get(name);
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  entries(): [string, unknown][] {
    return [...this.values.entries()];
  }

  /** Values of the given fields, in the order requested. */
  pick(names: readonly string[]): unknown[] {
    return names.map((name) => this.get(name));
  }

  toObject(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}
