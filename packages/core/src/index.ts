// Main entry point
export { JoinEngine } from './JoinEngine.js';
export type { JoinEngineConfig } from './JoinEngine.js';

// Domain model
export type { Coordinates } from './domain/model/Coordinates.js';
export type { Page, GroupMember } from './domain/model/Page.js';
export type {
  ResolutionOutcome,
  ResolvedOutcome,
  PointLookupFailedOutcome,
  PolygonMatchFailedOutcome,
  OutputRecord,
} from './domain/model/Outcome.js';
export {
  FailureTag,
  resolved,
  pointLookupFailed,
  polygonMatchFailed,
  failureTagOf,
  toOutputRecord,
  sortBySequence,
} from './domain/model/Outcome.js';
export type { JoinProgress, JoinSummary } from './domain/model/Join.js';
export { JoinStatus, canTransition } from './domain/model/JoinStatus.js';
export { JoinPhase, canEnterPhase } from './domain/model/JoinPhase.js';

// Errors
export {
  PipJoinError,
  FetchIdBatchError,
  FetchPointError,
  PIPError,
  InitialisationError,
  errorMessage,
} from './domain/errors.js';

// Use case result types
export type { JoinStatusResult } from './application/usecases/GetJoinStatus.js';

// Domain services
export { GroupSplitter } from './domain/services/GroupSplitter.js';

// Ports (for custom implementations)
export type { IdentifierPager } from './domain/ports/IdentifierPager.js';
export type { PointProvider } from './domain/ports/PointProvider.js';
export type { PolygonMatcher } from './domain/ports/PolygonMatcher.js';
export type { PointIndex } from './domain/ports/PointIndex.js';
export type { ResultSink } from './domain/ports/ResultSink.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  JoinStartedEvent,
  PageFetchedEvent,
  PageFailedEvent,
  GroupDispatchedEvent,
  RecordResolvedEvent,
  RecordFailedEvent,
  GroupFlushedEvent,
  JoinProgressEvent,
  JoinCompletedEvent,
  JoinAbortedEvent,
  JoinFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { WfsPolygonMatcher } from './infrastructure/wfs/WfsPolygonMatcher.js';
export type { WfsPolygonMatcherOptions } from './infrastructure/wfs/WfsPolygonMatcher.js';
export { LinkedDataRegister, extractPoint } from './infrastructure/register/LinkedDataRegister.js';
export type { LinkedDataRegisterOptions } from './infrastructure/register/LinkedDataRegister.js';
export { CsvFileSink, formatRecords } from './infrastructure/sinks/CsvFileSink.js';
export { InMemorySink } from './infrastructure/sinks/InMemorySink.js';
export { createLogger, silentLogger } from './infrastructure/logging/createLogger.js';
export type { Logger, LoggerOptions } from './infrastructure/logging/createLogger.js';
