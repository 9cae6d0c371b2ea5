import { ConfigurationError, FieldNotFoundError } from '../errors/FixedWidthError.js';
import { FieldDef, createFieldDef, validateFieldSpec } from './FieldDef.js';
import type { FieldSpec } from './FieldDef.js';

/** Anything the loader accepts as a definition set. */
export type FieldDefsInput = FieldSet | readonly (FieldSpec | FieldDef)[];

/**
 * Ordered, immutable set of field definitions with unique names.
 *
 * Shared freely between loads: nothing in it changes after construction.
 */
export class FieldSet implements Iterable<FieldDef> {
  private readonly defs: readonly FieldDef[];
  private readonly byName: ReadonlyMap<string, FieldDef>;

  constructor(specs: readonly (FieldSpec | FieldDef)[]) {
    if (specs.length === 0) {
      throw new ConfigurationError('A field set needs at least one field', 'EMPTY_FIELD_SET');
    }

    const byName = new Map<string, FieldDef>();
    const defs: FieldDef[] = [];

    for (const spec of specs) {
      const def = createFieldDef(spec);
      if (byName.has(def.name)) {
        throw new ConfigurationError(`Duplicate field name '${def.name}'`, 'DUPLICATE_FIELD', {
          field: def.name,
          parameter: 'name',
        });
      }
      byName.set(def.name, def);
      defs.push(def);
    }

    this.defs = Object.freeze(defs);
    this.byName = byName;
  }

  /** Number of fields. */
  get size(): number {
    return this.defs.length;
  }

  /** Field names in definition order. */
  get names(): readonly string[] {
    return this.defs.map((d) => d.name);
  }

  /** Length a line must reach for every field to be present. */
  get requiredLength(): number {
    return this.defs.reduce((max, d) => Math.max(max, d.end), 0);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): FieldDef {
    const def = this.byName.get(name);
    if (!def) throw new FieldNotFoundError(name);
    return def;
  }

  [Symbol.iterator](): Iterator<FieldDef> {
    return this.defs[Symbol.iterator]();
  }

  /**
   * Check the set again from scratch.
   *
   * Definitions are validated when built, but a set may have been assembled
   * from objects that bypassed the constructors; the loader calls this before
   * reading any line.
   */
  revalidate(): void {
    if (this.defs.length === 0) {
      throw new ConfigurationError('A field set needs at least one field', 'EMPTY_FIELD_SET');
    }
    const seen = new Set<string>();
    for (const def of this.defs) {
      validateFieldSpec(def);
      if (seen.has(def.name)) {
        throw new ConfigurationError(`Duplicate field name '${def.name}'`, 'DUPLICATE_FIELD', {
          field: def.name,
          parameter: 'name',
        });
      }
      seen.add(def.name);
    }
  }
}

/**
 * Build a validated field set.
 *
 * @example
 * ```typescript
 * const fields = defineFields([
 *   { name: 'id', start: 0, length: 4 },
 *   { name: 'amount', start: 4, length: 6, processor: decimal() },
 * ]);
 * ```
 */
export function defineFields(specs: readonly (FieldSpec | FieldDef)[]): FieldSet {
  return new FieldSet(specs);
}

/** Turn whatever the caller passed into a `FieldSet`. Throws `ConfigurationError`. */
export function toFieldSet(input: FieldDefsInput): FieldSet {
  if (input instanceof FieldSet) {
    input.revalidate();
    return input;
  }
  return new FieldSet(input);
}
