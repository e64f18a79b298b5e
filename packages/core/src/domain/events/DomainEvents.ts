import type { JoinProgress, JoinSummary } from '../model/Join.js';
import type { FailureTag } from '../model/Outcome.js';

/** Emitted when `start()` is called. */
export interface JoinStartedEvent {
  readonly type: 'join:started';
  readonly joinId: string;
  readonly startPage: number;
  readonly stopPage: number;
  readonly pageSize: number;
  readonly concurrency: number;
  readonly timestamp: number;
}

/** Emitted after a page of identifiers was retrieved. */
export interface PageFetchedEvent {
  readonly type: 'page:fetched';
  readonly joinId: string;
  readonly pageIndex: number;
  readonly recordCount: number;
  readonly hasMore: boolean;
  readonly timestamp: number;
}

/** Emitted when a page could not be retrieved. The page is skipped. */
export interface PageFailedEvent {
  readonly type: 'page:failed';
  readonly joinId: string;
  readonly pageIndex: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when the resolution tasks of a group have been launched. */
export interface GroupDispatchedEvent {
  readonly type: 'group:dispatched';
  readonly joinId: string;
  readonly pageIndex: number;
  /** Zero-based group index within the page. */
  readonly groupIndex: number;
  readonly firstSequence: number;
  readonly recordCount: number;
  readonly timestamp: number;
}

/** Emitted for each record whose point was matched (or matched nothing). */
export interface RecordResolvedEvent {
  readonly type: 'record:resolved';
  readonly joinId: string;
  readonly sequence: number;
  readonly identifier: string;
  readonly polygonId: string | null;
  readonly timestamp: number;
}

/** Emitted for each record written with a failure tag. */
export interface RecordFailedEvent {
  readonly type: 'record:failed';
  readonly joinId: string;
  readonly sequence: number;
  readonly identifier: string;
  readonly tag: FailureTag;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted once a group's records have been written to the sink. */
export interface GroupFlushedEvent {
  readonly type: 'group:flushed';
  readonly joinId: string;
  readonly pageIndex: number;
  readonly groupIndex: number;
  readonly recordCount: number;
  readonly failedCount: number;
  readonly timestamp: number;
}

/** Emitted after each flushed group with updated progress counters. */
export interface JoinProgressEvent {
  readonly type: 'join:progress';
  readonly joinId: string;
  readonly progress: JoinProgress;
  readonly timestamp: number;
}

/** Emitted when every reachable page has been processed. */
export interface JoinCompletedEvent {
  readonly type: 'join:completed';
  readonly joinId: string;
  readonly summary: JoinSummary;
  readonly timestamp: number;
}

/** Emitted when `abort()` is called. */
export interface JoinAbortedEvent {
  readonly type: 'join:aborted';
  readonly joinId: string;
  readonly progress: JoinProgress;
  readonly timestamp: number;
}

/** Emitted when the join stops on an unrecoverable error (e.g. the sink cannot be written). */
export interface JoinFailedEvent {
  readonly type: 'join:failed';
  readonly joinId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | JoinStartedEvent
  | PageFetchedEvent
  | PageFailedEvent
  | GroupDispatchedEvent
  | RecordResolvedEvent
  | RecordFailedEvent
  | GroupFlushedEvent
  | JoinProgressEvent
  | JoinCompletedEvent
  | JoinAbortedEvent
  | JoinFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
