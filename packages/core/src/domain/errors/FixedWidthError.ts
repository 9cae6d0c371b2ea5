/** Machine-readable codes for every error thrown or returned by the library. */
export type FixedWidthErrorCode =
  | 'INVALID_FIELD'
  | 'DUPLICATE_FIELD'
  | 'EMPTY_FIELD_SET'
  | 'INVALID_OPTION'
  | 'FIELD_NOT_FOUND'
  | LoadErrorCode;

/** Codes of the fatal conditions that abort a whole load. */
export type LoadErrorCode = 'IO' | 'DECODE' | 'INVALID_DEFINITIONS';

/** Codes of `ConfigurationError`. */
export type ConfigurationErrorCode = 'INVALID_FIELD' | 'DUPLICATE_FIELD' | 'EMPTY_FIELD_SET' | 'INVALID_OPTION';

/** Base class for library errors. */
export class FixedWidthError extends Error {
  readonly code: FixedWidthErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: FixedWidthErrorCode, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  toJSON(): { error: string; code: FixedWidthErrorCode; details?: Record<string, unknown> } {
    return serializeError(this.message, this.code, this.details);
  }
}

function serializeError(
  error: string,
  code: FixedWidthErrorCode,
  extra?: Record<string, unknown>,
): { error: string; code: FixedWidthErrorCode; details?: Record<string, unknown> } {
  return extra !== undefined ? { error, code, details: extra } : { error, code };
}

/**
 * Invalid field definition, definition set or option.
 *
 * Thrown before any source is opened or any output is written.
 */
export class ConfigurationError extends FixedWidthError {
  declare readonly code: ConfigurationErrorCode;
  /** Name of the offending field, when there is one. */
  readonly field?: string;
  /** Parameter that failed validation (`'name'`, `'start'`, `'length'`, or an option name). */
  readonly parameter?: string;

  constructor(
    message: string,
    code: ConfigurationErrorCode,
    context: { field?: string; parameter?: string; value?: unknown } = {},
  ) {
    super(message, code, context);
    this.field = context.field;
    this.parameter = context.parameter;
  }
}

/** Fatal condition that makes the whole source unusable. No partial result accompanies it. */
export class LoadError extends FixedWidthError {
  declare readonly code: LoadErrorCode;

  constructor(message: string, code: LoadErrorCode, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, code, options?.details, options?.cause !== undefined ? { cause: options.cause } : undefined);
  }

  static io(cause: unknown, sourceName?: string): LoadError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const target = sourceName !== undefined ? ` '${sourceName}'` : '';
    return new LoadError(`Cannot read source${target}: ${reason}`, 'IO', {
      cause,
      details: sourceName !== undefined ? { source: sourceName } : undefined,
    });
  }

  static decode(message: string, cause?: unknown): LoadError {
    return new LoadError(`Source is not readable as text: ${message}`, 'DECODE', { cause });
  }

  static invalidDefinitions(cause: ConfigurationError): LoadError {
    return new LoadError(`Invalid field definitions: ${cause.message}`, 'INVALID_DEFINITIONS', {
      cause,
      details: cause.field !== undefined ? { field: cause.field } : undefined,
    });
  }
}

/** A field name was requested that the definition set does not contain. */
export class FieldNotFoundError extends FixedWidthError {
  readonly field: string;

  constructor(field: string) {
    super(`Field '${field}' is not defined`, 'FIELD_NOT_FOUND', { field });
    this.field = field;
  }
}
