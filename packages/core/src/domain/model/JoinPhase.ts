/**
 * Coordinator state machine, one step below the job lifecycle.
 *
 * - `IDLE` → `PAGING`
 * - `PAGING` → `DISPATCHING` (page has identifiers) | `PAGING` (page failed or was empty) | `DONE`
 * - `DISPATCHING` → `AWAITING`
 * - `AWAITING` → `FLUSHING`
 * - `FLUSHING` → `DISPATCHING` (next group of the page) | `PAGING` (page exhausted) | `DONE`
 * - `DONE` → (terminal)
 *
 * A new group is never dispatched while the previous one is still being flushed.
 */
export const JoinPhase = {
  IDLE: 'IDLE',
  PAGING: 'PAGING',
  DISPATCHING: 'DISPATCHING',
  AWAITING: 'AWAITING',
  FLUSHING: 'FLUSHING',
  DONE: 'DONE',
} as const;

export type JoinPhase = (typeof JoinPhase)[keyof typeof JoinPhase];

const VALID_PHASE_TRANSITIONS: Record<JoinPhase, readonly JoinPhase[]> = {
  [JoinPhase.IDLE]: [JoinPhase.PAGING, JoinPhase.DONE],
  [JoinPhase.PAGING]: [JoinPhase.DISPATCHING, JoinPhase.PAGING, JoinPhase.DONE],
  [JoinPhase.DISPATCHING]: [JoinPhase.AWAITING],
  [JoinPhase.AWAITING]: [JoinPhase.FLUSHING],
  [JoinPhase.FLUSHING]: [JoinPhase.DISPATCHING, JoinPhase.PAGING, JoinPhase.DONE],
  [JoinPhase.DONE]: [],
};

export function canEnterPhase(from: JoinPhase, to: JoinPhase): boolean {
  return VALID_PHASE_TRANSITIONS[from].includes(to);
}
