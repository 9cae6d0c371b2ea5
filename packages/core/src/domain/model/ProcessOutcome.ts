/** Value accepted as-is. */
export interface AcceptedOutcome<T> {
  readonly status: 'accepted';
  readonly value: T;
}

/** Value accepted, with a non-blocking note for the warnings list. */
export interface WarnedOutcome<T> {
  readonly status: 'warned';
  readonly value: T;
  readonly message: string;
}

/** Value rejected. The record keeps a placeholder for the field. */
export interface RejectedOutcome {
  readonly status: 'rejected';
  readonly reason: string;
}

/** Result of running a field processor over one raw slice. */
export type ProcessOutcome<T = unknown> = AcceptedOutcome<T> | WarnedOutcome<T> | RejectedOutcome;

export function accepted<T>(value: T): AcceptedOutcome<T> {
  return { status: 'accepted', value };
}

export function acceptedWithWarning<T>(value: T, message: string): WarnedOutcome<T> {
  return { status: 'warned', value, message };
}

export function rejected(reason: string): RejectedOutcome {
  return { status: 'rejected', reason };
}

/** `true` when the outcome carries a value (accepted, with or without a warning). */
export function isAccepted<T>(outcome: ProcessOutcome<T>): outcome is AcceptedOutcome<T> | WarnedOutcome<T> {
  return outcome.status !== 'rejected';
}

/** Whether a value returned by a caller's processor has the shape of a `ProcessOutcome`. */
export function isProcessOutcome(value: unknown): value is ProcessOutcome {
  if (typeof value !== 'object' || value === null || !('status' in value)) return false;

  switch (value.status) {
    case 'accepted':
      return 'value' in value;
    case 'warned':
      return 'value' in value && 'message' in value && typeof value.message === 'string';
    case 'rejected':
      return 'reason' in value && typeof value.reason === 'string';
    default:
      return false;
  }
}
