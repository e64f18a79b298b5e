import type { JoinContext } from '../JoinContext.js';

/**
 * Use case: stop the join after the group in flight has been flushed.
 *
 * Terminal. Tasks already dispatched run to completion and are written.
 */
export class AbortJoin {
  constructor(private readonly ctx: JoinContext) {}

  execute(): void {
    if (this.ctx.status !== 'RUNNING') {
      throw new Error(`Cannot abort join from status '${this.ctx.status}'`);
    }

    this.ctx.transitionTo('ABORTED');

    const progress = this.ctx.buildProgress();
    this.ctx.logger.info({ progress }, 'abort requested');
    this.ctx.eventBus.emit({
      type: 'join:aborted',
      joinId: this.ctx.joinId,
      progress,
      timestamp: Date.now(),
    });
  }
}
