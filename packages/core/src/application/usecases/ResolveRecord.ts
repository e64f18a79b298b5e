import type { Coordinates } from '../../domain/model/Coordinates.js';
import type { GroupMember } from '../../domain/model/Page.js';
import type { ResolutionOutcome } from '../../domain/model/Outcome.js';
import { FailureTag, resolved, pointLookupFailed, polygonMatchFailed } from '../../domain/model/Outcome.js';
import { FetchPointError, PIPError, errorMessage } from '../../domain/errors.js';
import type { JoinContext } from '../JoinContext.js';

/**
 * Use case: resolve one identifier to the polygon containing its point.
 *
 * Never rejects. A failed point lookup ends the task before the polygon matcher
 * is called; either failure becomes a tagged outcome for this record only.
 */
export class ResolveRecord {
  constructor(private readonly ctx: JoinContext) {}

  async execute(member: GroupMember): Promise<ResolutionOutcome> {
    const { points, polygons, predicate } = this.ctx.settings;

    let point: Coordinates;
    try {
      point = await points.getPoint(member.identifier);
    } catch (error) {
      this.reportUnexpected(error, FetchPointError, member, 'point lookup');
      const outcome = pointLookupFailed(member, errorMessage(error));
      this.ctx.pointFailureCount++;
      this.emitFailure(member, FailureTag.POINT_LOOKUP_FAILED, outcome.error);
      return outcome;
    }

    let polygonId: string | null;
    try {
      polygonId = await polygons.matchPolygon(point, predicate);
    } catch (error) {
      this.reportUnexpected(error, PIPError, member, 'polygon match');
      const outcome = polygonMatchFailed(member, errorMessage(error));
      this.ctx.polygonFailureCount++;
      this.emitFailure(member, FailureTag.POLYGON_MATCH_FAILED, outcome.error);
      return outcome;
    }

    if (polygonId === null) {
      this.ctx.unmatchedCount++;
    } else {
      this.ctx.resolvedCount++;
    }

    this.ctx.eventBus.emit({
      type: 'record:resolved',
      joinId: this.ctx.joinId,
      sequence: member.sequence,
      identifier: member.identifier,
      polygonId,
      timestamp: Date.now(),
    });

    return resolved(member, polygonId);
  }

  private emitFailure(member: GroupMember, tag: FailureTag, error: string): void {
    this.ctx.logger.warn({ sequence: member.sequence, identifier: member.identifier, tag }, error);
    this.ctx.eventBus.emit({
      type: 'record:failed',
      joinId: this.ctx.joinId,
      sequence: member.sequence,
      identifier: member.identifier,
      tag,
      error,
      timestamp: Date.now(),
    });
  }

  /** Errors outside the taxonomy are tagged like their step's error and additionally logged at `error`. */
  private reportUnexpected(
    error: unknown,
    expected: typeof FetchPointError | typeof PIPError,
    member: GroupMember,
    step: string,
  ): void {
    if (error instanceof expected) return;
    this.ctx.logger.error({ err: error, sequence: member.sequence, identifier: member.identifier }, `unexpected error during ${step}`);
  }
}
