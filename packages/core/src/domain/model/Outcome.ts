import type { GroupMember } from './Page.js';

/** Literal result values written for records that could not be resolved. */
export const FailureTag = {
  POINT_LOOKUP_FAILED: 'POINTFAIL',
  POLYGON_MATCH_FAILED: 'PIPFAIL',
} as const;

export type FailureTag = (typeof FailureTag)[keyof typeof FailureTag];

/** The point fell inside a polygon (`polygonId`) or inside none (`null`). */
export interface ResolvedOutcome extends GroupMember {
  readonly kind: 'resolved';
  readonly polygonId: string | null;
}

export interface PointLookupFailedOutcome extends GroupMember {
  readonly kind: 'point-lookup-failed';
  readonly error: string;
}

export interface PolygonMatchFailedOutcome extends GroupMember {
  readonly kind: 'polygon-match-failed';
  readonly error: string;
}

/** Exactly one of these is produced for every dispatched identifier. */
export type ResolutionOutcome = ResolvedOutcome | PointLookupFailedOutcome | PolygonMatchFailedOutcome;

/** The unit written to a result sink: `sequence,identifier,result`. */
export interface OutputRecord {
  readonly sequence: number;
  readonly identifier: string;
  /** Polygon identifier, a failure tag, or `''` when no polygon matched. */
  readonly result: string;
}

export function resolved(member: GroupMember, polygonId: string | null): ResolvedOutcome {
  return { kind: 'resolved', sequence: member.sequence, identifier: member.identifier, polygonId };
}

export function pointLookupFailed(member: GroupMember, error: string): PointLookupFailedOutcome {
  return { kind: 'point-lookup-failed', sequence: member.sequence, identifier: member.identifier, error };
}

export function polygonMatchFailed(member: GroupMember, error: string): PolygonMatchFailedOutcome {
  return { kind: 'polygon-match-failed', sequence: member.sequence, identifier: member.identifier, error };
}

/** Failure tag for a failed outcome, `null` for a resolved one. */
export function failureTagOf(outcome: ResolutionOutcome): FailureTag | null {
  switch (outcome.kind) {
    case 'point-lookup-failed':
      return FailureTag.POINT_LOOKUP_FAILED;
    case 'polygon-match-failed':
      return FailureTag.POLYGON_MATCH_FAILED;
    case 'resolved':
      return null;
  }
}

export function toOutputRecord(outcome: ResolutionOutcome): OutputRecord {
  const result = outcome.kind === 'resolved' ? (outcome.polygonId ?? '') : (failureTagOf(outcome) ?? '');
  return { sequence: outcome.sequence, identifier: outcome.identifier, result };
}

/** Order output records by sequence number without mutating the input. */
export function sortBySequence(records: readonly OutputRecord[]): OutputRecord[] {
  return [...records].sort((a, b) => a.sequence - b.sequence);
}
