/**
 * Finite state machine for the join lifecycle.
 *
 * Valid transitions:
 * - `CREATED` → `RUNNING`
 * - `RUNNING` → `COMPLETED` | `ABORTED` | `FAILED`
 * - `COMPLETED`, `ABORTED`, `FAILED` → (terminal)
 */
export const JoinStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  ABORTED: 'ABORTED',
  FAILED: 'FAILED',
} as const;

export type JoinStatus = (typeof JoinStatus)[keyof typeof JoinStatus];

const VALID_TRANSITIONS: Record<JoinStatus, readonly JoinStatus[]> = {
  [JoinStatus.CREATED]: [JoinStatus.RUNNING],
  [JoinStatus.RUNNING]: [JoinStatus.COMPLETED, JoinStatus.ABORTED, JoinStatus.FAILED],
  [JoinStatus.COMPLETED]: [],
  [JoinStatus.ABORTED]: [],
  [JoinStatus.FAILED]: [],
};

/** Check whether a status transition is valid according to the join lifecycle FSM. */
export function canTransition(from: JoinStatus, to: JoinStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
