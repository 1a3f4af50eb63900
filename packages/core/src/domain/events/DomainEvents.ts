import type { ReaderState } from '../model/ReaderState.js';
import type { Record } from '../model/Record.js';

/** Emitted when the first line has been read (or the input turned out empty). */
export interface ReaderOpenedEvent {
  readonly type: 'reader:opened';
  readonly source: string;
  readonly state: ReaderState;
  readonly timestamp: number;
}

/** Emitted when a line's record-type key is not part of the layout. The line is skipped. */
export interface LineSkippedEvent {
  readonly type: 'line:skipped';
  /** One-based line number in the input. */
  readonly lineNumber: number;
  readonly key: string;
  readonly line: string;
  readonly timestamp: number;
}

/**
 * Emitted after a line has been decoded into its template.
 *
 * `record` is the shared template: handlers must copy what they keep.
 */
export interface RecordDecodedEvent {
  readonly type: 'record:decoded';
  readonly lineNumber: number;
  readonly record: Record;
  readonly timestamp: number;
}

/** Emitted when a decoded record does not satisfy the reader's filter. */
export interface RecordFilteredEvent {
  readonly type: 'record:filtered';
  readonly lineNumber: number;
  readonly recordName: string;
  readonly timestamp: number;
}

/** Emitted when the end of input is reached. */
export interface ReaderExhaustedEvent {
  readonly type: 'reader:exhausted';
  readonly linesRead: number;
  readonly recordsDecoded: number;
  readonly linesSkipped: number;
  readonly timestamp: number;
}

/** Emitted when reading fails; the reader is then terminal. */
export interface ReaderFailedEvent {
  readonly type: 'reader:failed';
  readonly lineNumber: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted once when the source has been released. */
export interface ReaderClosedEvent {
  readonly type: 'reader:closed';
  readonly linesRead: number;
  readonly timestamp: number;
}

/** Union of all reader events. */
export type DomainEvent =
  | ReaderOpenedEvent
  | LineSkippedEvent
  | RecordDecodedEvent
  | RecordFilteredEvent
  | ReaderExhaustedEvent
  | ReaderFailedEvent
  | ReaderClosedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type name. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
