import type { Logger } from 'pino';
import type { JoinSummary } from './domain/model/Join.js';
import type { IdentifierPager } from './domain/ports/IdentifierPager.js';
import type { PointProvider } from './domain/ports/PointProvider.js';
import type { PolygonMatcher } from './domain/ports/PolygonMatcher.js';
import type { ResultSink } from './domain/ports/ResultSink.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { JoinContext } from './application/JoinContext.js';
import type { JoinSettings } from './application/JoinContext.js';
import { RunJoin } from './application/usecases/RunJoin.js';
import { AbortJoin } from './application/usecases/AbortJoin.js';
import { GetJoinStatus } from './application/usecases/GetJoinStatus.js';
import type { JoinStatusResult } from './application/usecases/GetJoinStatus.js';
import { createLogger } from './infrastructure/logging/createLogger.js';

/** Configuration for a join run. */
export interface JoinEngineConfig {
  /** Source of identifier pages. */
  readonly pager: IdentifierPager;
  /** Point lookup. Usually the same object as `pager`. */
  readonly points: PointProvider;
  readonly polygons: PolygonMatcher;
  readonly sink: ResultSink;
  /** Spatial relation forwarded to the polygon matcher, e.g. `'Contains'`. */
  readonly predicate: string;
  /** First page index (1-based). Default: `1`. */
  readonly startPage?: number;
  /** Page index at which the run stops; this page is not fetched. */
  readonly stopPage: number;
  /** Identifiers requested per page. Default: `100`. */
  readonly pageSize?: number;
  /** Maximum number of records resolved concurrently (the group width). Default: `1`. */
  readonly concurrency?: number;
  /** Sequence number of the first dispatched identifier. Default: `1`. */
  readonly firstSequence?: number;
  /** Default: a pino logger from `createLogger()`. */
  readonly logger?: Logger;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

function requireInteger(name: string, value: number): number {
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got ${String(value)}`);
  }
  return value;
}

/**
 * Facade over the join lifecycle: page → group → resolve → flush.
 *
 * Delegates each operation to a use case in `application/usecases/` over a shared
 * `JoinContext`. One engine runs one join.
 *
 * @example
 * ```typescript
 * const engine = new JoinEngine({
 *   pager: register,
 *   points: register,
 *   polygons: new WfsPolygonMatcher(wfsOptions),
 *   sink: new CsvFileSink('output.csv'),
 *   predicate: 'Contains',
 *   stopPage: 50,
 *   pageSize: 1000,
 *   concurrency: 16,
 * });
 * engine.on('page:failed', (e) => alert(e.error));
 * const summary = await engine.start();
 * ```
 */
export class JoinEngine {
  private readonly ctx: JoinContext;

  constructor(config: JoinEngineConfig) {
    const settings: JoinSettings = {
      pager: config.pager,
      points: config.points,
      polygons: config.polygons,
      sink: config.sink,
      predicate: config.predicate,
      startPage: requirePositiveInteger('startPage', config.startPage ?? 1),
      stopPage: requireInteger('stopPage', config.stopPage),
      pageSize: requirePositiveInteger('pageSize', config.pageSize ?? 100),
      concurrency: requirePositiveInteger('concurrency', config.concurrency ?? 1),
      firstSequence: requireInteger('firstSequence', config.firstSequence ?? 1),
    };
    this.ctx = new JoinContext(settings, config.logger ?? createLogger());
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Run the join to the stop page or the end of the index.
   *
   * Page failures are skipped and record failures are written as tagged rows; only
   * a failing sink (or an invalid state) rejects.
   */
  async start(): Promise<JoinSummary> {
    return new RunJoin(this.ctx).execute();
  }

  /** Stop after the group in flight has been flushed. Terminal. */
  abort(): void {
    new AbortJoin(this.ctx).execute();
  }

  getStatus(): JoinStatusResult {
    return new GetJoinStatus(this.ctx).execute();
  }

  getJoinId(): string {
    return this.ctx.joinId;
  }
}
