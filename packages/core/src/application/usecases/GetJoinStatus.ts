import type { JoinStatus } from '../../domain/model/JoinStatus.js';
import type { JoinPhase } from '../../domain/model/JoinPhase.js';
import type { JoinProgress } from '../../domain/model/Join.js';
import type { JoinContext } from '../JoinContext.js';

/** Result of querying join status. */
export interface JoinStatusResult {
  readonly status: JoinStatus;
  readonly phase: JoinPhase;
  readonly progress: JoinProgress;
}

/** Use case: query the lifecycle status, coordinator phase and counters of a join. */
export class GetJoinStatus {
  constructor(private readonly ctx: JoinContext) {}

  execute(): JoinStatusResult {
    return {
      status: this.ctx.status,
      phase: this.ctx.phase,
      progress: this.ctx.buildProgress(),
    };
  }
}
