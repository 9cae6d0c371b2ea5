import type { LoadWarning } from '../model/LoadWarning.js';
import type { LoadErrorCode } from '../errors/FixedWidthError.js';

/** Emitted before the first line is read. */
export interface LoadStartedEvent {
  readonly type: 'load:started';
  readonly loadId: string;
  readonly source: string;
  readonly fieldCount: number;
  readonly timestamp: number;
}

/** Emitted for every warning, in the order it is appended to the result. */
export interface LoadWarningEvent {
  readonly type: 'load:warning';
  readonly loadId: string;
  readonly warning: LoadWarning;
  readonly timestamp: number;
}

/** Emitted once the `DataFile` is complete. */
export interface LoadCompletedEvent {
  readonly type: 'load:completed';
  readonly loadId: string;
  readonly recordCount: number;
  readonly warningCount: number;
  readonly linesRead: number;
  readonly skippedLines: number;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when the load aborts on a fatal error. */
export interface LoadFailedEvent {
  readonly type: 'load:failed';
  readonly loadId: string;
  readonly code: LoadErrorCode;
  readonly error: string;
  /** Lines read before the failure. */
  readonly linesRead: number;
  readonly timestamp: number;
}

export type DomainEvent = LoadStartedEvent | LoadWarningEvent | LoadCompletedEvent | LoadFailedEvent;

export type EventType = DomainEvent['type'];

/** Narrow `DomainEvent` to the payload of one event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
