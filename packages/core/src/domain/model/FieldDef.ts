import { ConfigurationError } from '../errors/FixedWidthError.js';
import type { FieldProcessor, ProcessorLike } from '../ports/FieldProcessor.js';
import { toFieldProcessor } from '../ports/FieldProcessor.js';

/** Plain description of a field, as written by callers. */
export interface FieldSpec {
  /** Identifier of the field. Must be unique within a definition set. */
  readonly name: string;
  /** Zero-based offset of the first character (or byte) of the field. */
  readonly start: number;
  /** Number of characters (or bytes) the field occupies. */
  readonly length: number;
  /** Optional validation/transformation applied to the raw slice. */
  readonly processor?: ProcessorLike;
}

/** Immutable, validated definition of one fixed-position field. */
export class FieldDef {
  readonly name: string;
  readonly start: number;
  readonly length: number;
  readonly processor?: FieldProcessor;

  constructor(spec: FieldSpec) {
    validateFieldSpec(spec);
    this.name = spec.name;
    this.start = spec.start;
    this.length = spec.length;
    if (spec.processor !== undefined) {
      this.processor = toFieldProcessor(spec.processor);
    }
    Object.freeze(this);
  }

  /** Exclusive end offset: the minimum line length that contains the whole field. */
  get end(): number {
    return this.start + this.length;
  }

  /** Whether two definitions describe the same slot (processors are not compared). */
  sameSlot(other: FieldDef): boolean {
    return this.name === other.name && this.start === other.start && this.length === other.length;
  }
}

/** Build a `FieldDef`, reusing the instance when one is passed. */
export function createFieldDef(spec: FieldSpec | FieldDef): FieldDef {
  return spec instanceof FieldDef ? spec : new FieldDef(spec);
}

/** Throw `ConfigurationError` if a spec breaks any single-field invariant. */
export function validateFieldSpec(spec: FieldSpec): void {
  const { name, start, length } = spec;

  if (typeof name !== 'string' || name.trim() === '') {
    throw new ConfigurationError('Field name must be a non-empty string', 'INVALID_FIELD', {
      parameter: 'name',
      value: name,
    });
  }

  if (!Number.isInteger(start) || start < 0) {
    throw new ConfigurationError(`Field '${name}': start must be an integer >= 0 (got ${String(start)})`, 'INVALID_FIELD', {
      field: name,
      parameter: 'start',
      value: start,
    });
  }

  if (!Number.isInteger(length) || length <= 0) {
    throw new ConfigurationError(`Field '${name}': length must be an integer > 0 (got ${String(length)})`, 'INVALID_FIELD', {
      field: name,
      parameter: 'length',
      value: length,
    });
  }

  if (spec.processor !== undefined && typeof spec.processor !== 'function' && typeof spec.processor.process !== 'function') {
    throw new ConfigurationError(`Field '${name}': processor must be a function or expose process()`, 'INVALID_FIELD', {
      field: name,
      parameter: 'processor',
    });
  }
}
