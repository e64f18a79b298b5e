import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { JoinProgress, JoinSummary } from '../domain/model/Join.js';
import type { JoinStatus } from '../domain/model/JoinStatus.js';
import type { JoinPhase } from '../domain/model/JoinPhase.js';
import type { IdentifierPager } from '../domain/ports/IdentifierPager.js';
import type { PointProvider } from '../domain/ports/PointProvider.js';
import type { PolygonMatcher } from '../domain/ports/PolygonMatcher.js';
import type { ResultSink } from '../domain/ports/ResultSink.js';
import { canTransition } from '../domain/model/JoinStatus.js';
import { canEnterPhase } from '../domain/model/JoinPhase.js';
import { EventBus } from './EventBus.js';

/** Collaborators and run settings, validated by `JoinEngine`. */
export interface JoinSettings {
  readonly pager: IdentifierPager;
  readonly points: PointProvider;
  readonly polygons: PolygonMatcher;
  readonly sink: ResultSink;
  readonly predicate: string;
  readonly startPage: number;
  readonly stopPage: number;
  readonly pageSize: number;
  readonly concurrency: number;
  readonly firstSequence: number;
}

/**
 * Mutable state shared by the use cases of a single join.
 *
 * Internal class. The sequence counter lives here and is only advanced by the
 * dispatch step, so a sequence number is never handed out twice.
 */
export class JoinContext {
  readonly joinId: string;
  readonly settings: JoinSettings;
  readonly logger: Logger;
  readonly eventBus: EventBus;

  status: JoinStatus = 'CREATED';
  phase: JoinPhase = 'IDLE';
  currentPage: number;
  nextSequence: number;
  startedAt?: number;

  pagesFetched = 0;
  pagesFailed = 0;
  dispatchedCount = 0;
  resolvedCount = 0;
  unmatchedCount = 0;
  pointFailureCount = 0;
  polygonFailureCount = 0;

  constructor(settings: JoinSettings, logger: Logger) {
    this.joinId = randomUUID();
    this.settings = settings;
    this.logger = logger.child({ joinId: this.joinId });
    this.eventBus = new EventBus(this.logger);
    this.currentPage = settings.startPage;
    this.nextSequence = settings.firstSequence;
  }

  transitionTo(newStatus: JoinStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  enterPhase(next: JoinPhase): void {
    if (!canEnterPhase(this.phase, next)) {
      throw new Error(`Invalid phase transition: ${this.phase} → ${next}`);
    }
    this.phase = next;
  }

  /** Hand out the next sequence number. */
  takeSequence(): number {
    const sequence = this.nextSequence;
    this.nextSequence++;
    return sequence;
  }

  get running(): boolean {
    return this.status === 'RUNNING';
  }

  get aborted(): boolean {
    return this.status === 'ABORTED';
  }

  buildProgress(): JoinProgress {
    return {
      currentPage: this.currentPage,
      pagesFetched: this.pagesFetched,
      pagesFailed: this.pagesFailed,
      dispatchedRecords: this.dispatchedCount,
      resolvedRecords: this.resolvedCount,
      unmatchedRecords: this.unmatchedCount,
      pointFailures: this.pointFailureCount,
      polygonFailures: this.polygonFailureCount,
      nextSequence: this.nextSequence,
      elapsedMs: this.elapsed(),
    };
  }

  buildSummary(): JoinSummary {
    return {
      pagesFetched: this.pagesFetched,
      pagesFailed: this.pagesFailed,
      total: this.dispatchedCount,
      resolved: this.resolvedCount,
      unmatched: this.unmatchedCount,
      pointFailures: this.pointFailureCount,
      polygonFailures: this.polygonFailureCount,
      lastSequence: this.dispatchedCount > 0 ? this.nextSequence - 1 : null,
      elapsedMs: this.elapsed(),
    };
  }

  private elapsed(): number {
    return this.startedAt ? Date.now() - this.startedAt : 0;
  }
}
