/**
 * Process state machine.
 *
 * Enforces valid status transitions for validation processes,
 * producing typed errors on invalid transitions. Stores call this inside
 * their compare-and-set so the check and the write are one step.
 */

import { ProcessStatus, VALID_PROCESS_TRANSITIONS } from '../domain/process';
import { TypedError, invalidTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult =
  | { success: true; newStatus: ProcessStatus }
  | { success: false; error: TypedError };

/** Attempt a process state transition. */
export function transitionProcessStatus(
  processId: string,
  current: ProcessStatus,
  target: ProcessStatus,
): TransitionResult {
  const validTargets = VALID_PROCESS_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return { success: false, error: invalidTransitionError(processId, current, target) };
  }
  return { success: true, newStatus: target };
}

/** Statuses from which `target` may legally be reached. */
export function legalPredecessors(target: ProcessStatus): ProcessStatus[] {
  return Object.values(ProcessStatus).filter((status) =>
    VALID_PROCESS_TRANSITIONS[status].includes(target),
  );
}

/** Check if a process status is terminal. */
export function isTerminalProcessStatus(status: ProcessStatus): boolean {
  return status === ProcessStatus.Completed || status === ProcessStatus.Failed;
}

const STATUS_RANK: Record<ProcessStatus, number> = {
  [ProcessStatus.Pending]: 0,
  [ProcessStatus.InProgress]: 1,
  [ProcessStatus.Completed]: 2,
  [ProcessStatus.Failed]: 2,
};

/**
 * Position of a status in the read ordering
 * pending < in_progress < {completed, failed}.
 */
export function statusRank(status: ProcessStatus): number {
  return STATUS_RANK[status];
}
