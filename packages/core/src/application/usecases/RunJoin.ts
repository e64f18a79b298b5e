import type { JoinSummary } from '../../domain/model/Join.js';
import type { Page, GroupMember } from '../../domain/model/Page.js';
import { toOutputRecord, sortBySequence } from '../../domain/model/Outcome.js';
import { GroupSplitter } from '../../domain/services/GroupSplitter.js';
import { errorMessage } from '../../domain/errors.js';
import type { JoinContext } from '../JoinContext.js';
import { ResolveRecord } from './ResolveRecord.js';

/**
 * Use case: drive the pager from `startPage` up to (excluding) `stopPage`.
 *
 * Each page is split into groups of at most `concurrency` identifiers. A group's
 * tasks all run concurrently and are joined with a full barrier; the group is then
 * written to the sink in sequence order before the next group is dispatched.
 * The page index advances by one per page, whether the page succeeded or not.
 */
export class RunJoin {
  private readonly splitter: GroupSplitter;
  private readonly resolver: ResolveRecord;

  constructor(private readonly ctx: JoinContext) {
    this.splitter = new GroupSplitter(ctx.settings.concurrency);
    this.resolver = new ResolveRecord(ctx);
  }

  async execute(): Promise<JoinSummary> {
    if (this.ctx.status !== 'CREATED') {
      throw new Error(`Cannot start join from status '${this.ctx.status}'`);
    }

    this.ctx.transitionTo('RUNNING');
    this.ctx.startedAt = Date.now();

    // Yield to next microtask so handlers registered after start() on the same tick receive this event
    await Promise.resolve();

    const { startPage, stopPage, pageSize, concurrency } = this.ctx.settings;
    this.ctx.logger.info({ startPage, stopPage, pageSize, concurrency }, 'join started');
    this.ctx.eventBus.emit({
      type: 'join:started',
      joinId: this.ctx.joinId,
      startPage,
      stopPage,
      pageSize,
      concurrency,
      timestamp: Date.now(),
    });

    try {
      await this.processPages();
    } catch (error) {
      this.ctx.logger.error({ err: error, progress: this.ctx.buildProgress() }, 'join failed');
      if (this.ctx.running) {
        this.ctx.transitionTo('FAILED');
        this.ctx.eventBus.emit({
          type: 'join:failed',
          joinId: this.ctx.joinId,
          error: errorMessage(error),
          timestamp: Date.now(),
        });
      }
      throw error;
    }

    this.ctx.enterPhase('DONE');
    const summary = this.ctx.buildSummary();

    if (this.ctx.running) {
      this.ctx.transitionTo('COMPLETED');
      this.ctx.logger.info(summary, 'join completed');
      this.ctx.eventBus.emit({
        type: 'join:completed',
        joinId: this.ctx.joinId,
        summary,
        timestamp: Date.now(),
      });
    } else {
      this.ctx.logger.info(summary, 'join stopped after abort');
    }

    return summary;
  }

  private async processPages(): Promise<void> {
    const { startPage, stopPage, pageSize } = this.ctx.settings;
    let hasMore = true;

    for (let pageIndex = startPage; pageIndex < stopPage && hasMore; pageIndex++) {
      if (this.ctx.aborted) break;

      this.ctx.enterPhase('PAGING');
      this.ctx.currentPage = pageIndex;

      const page = await this.fetchPage(pageIndex, pageSize);
      if (!page) continue;

      hasMore = page.hasMore;
      await this.processPage(pageIndex, page);
    }
  }

  /** Returns `null` when the page could not be fetched; the failure is logged and reported. */
  private async fetchPage(pageIndex: number, pageSize: number): Promise<Page | null> {
    try {
      const page = await this.ctx.settings.pager.fetchPage(pageIndex, pageSize);
      this.ctx.pagesFetched++;
      this.ctx.eventBus.emit({
        type: 'page:fetched',
        joinId: this.ctx.joinId,
        pageIndex,
        recordCount: page.identifiers.length,
        hasMore: page.hasMore,
        timestamp: Date.now(),
      });
      return page;
    } catch (error) {
      this.ctx.pagesFailed++;
      this.ctx.logger.warn({ err: error, pageIndex, pageSize }, 'page skipped');
      this.ctx.eventBus.emit({
        type: 'page:failed',
        joinId: this.ctx.joinId,
        pageIndex,
        error: errorMessage(error),
        timestamp: Date.now(),
      });
      return null;
    }
  }

  private async processPage(pageIndex: number, page: Page): Promise<void> {
    let groupIndex = 0;
    for (const identifiers of this.splitter.split(page.identifiers)) {
      if (this.ctx.aborted) return;
      await this.processGroup(pageIndex, groupIndex, identifiers);
      groupIndex++;
    }
  }

  private async processGroup(pageIndex: number, groupIndex: number, identifiers: readonly string[]): Promise<void> {
    this.ctx.enterPhase('DISPATCHING');

    const members: GroupMember[] = identifiers.map((identifier) => ({
      sequence: this.ctx.takeSequence(),
      identifier,
    }));
    this.ctx.dispatchedCount += members.length;
    const tasks = members.map((member) => this.resolver.execute(member));

    this.ctx.eventBus.emit({
      type: 'group:dispatched',
      joinId: this.ctx.joinId,
      pageIndex,
      groupIndex,
      firstSequence: members[0]?.sequence ?? this.ctx.nextSequence,
      recordCount: members.length,
      timestamp: Date.now(),
    });

    this.ctx.enterPhase('AWAITING');
    const outcomes = await Promise.all(tasks);

    this.ctx.enterPhase('FLUSHING');
    const records = sortBySequence(outcomes.map(toOutputRecord));
    await this.ctx.settings.sink.flush(records);

    const failedCount = outcomes.filter((outcome) => outcome.kind !== 'resolved').length;
    this.ctx.logger.debug({ pageIndex, groupIndex, recordCount: records.length, failedCount }, 'group flushed');

    this.ctx.eventBus.emit({
      type: 'group:flushed',
      joinId: this.ctx.joinId,
      pageIndex,
      groupIndex,
      recordCount: records.length,
      failedCount,
      timestamp: Date.now(),
    });

    this.ctx.eventBus.emit({
      type: 'join:progress',
      joinId: this.ctx.joinId,
      progress: this.ctx.buildProgress(),
      timestamp: Date.now(),
    });
  }
}
