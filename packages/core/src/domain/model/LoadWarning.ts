/** Machine-readable codes for non-fatal load problems. */
export type LoadWarningCode =
  | 'TRUNCATED_FIELD'
  | 'FIELD_REJECTED'
  | 'FIELD_WARNING'
  | 'PROCESSOR_ERROR'
  | 'SPLIT_CHARACTER'
  | 'EMPTY_LINE'
  | 'SHORT_LINE';

/** A non-fatal issue found while loading. Never aborts the load. */
export interface LoadWarning {
  /** 1-based physical line number. */
  readonly line: number;
  /** Field the warning is about. Absent for line-level warnings. */
  readonly field?: string;
  readonly code: LoadWarningCode;
  /** Human-readable description. */
  readonly message: string;
}

export function fieldWarning(line: number, field: string, code: LoadWarningCode, message: string): LoadWarning {
  return { line, field, code, message };
}

export function lineWarning(line: number, code: LoadWarningCode, message: string): LoadWarning {
  return { line, code, message };
}

/** Render a warning as a single log-friendly line. */
export function formatWarning(warning: LoadWarning): string {
  const where = warning.field !== undefined ? `line ${warning.line}, field '${warning.field}'` : `line ${warning.line}`;
  return `[${warning.code}] ${where}: ${warning.message}`;
}
