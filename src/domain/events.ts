/**
 * Process lifecycle event model.
 *
 * Events are published on every status transition so notifiers can
 * react to completion without coupling to the execution engine.
 */

import { TypedError } from './errors';
import { ProcessStatus } from './process';

/** Event types emitted for process lifecycle transitions. */
export type ProcessEventType =
  | 'process.created'
  | 'process.started'
  | 'process.completed'
  | 'process.failed';

/** Event types that mark a terminal transition. */
export const TERMINAL_EVENT_TYPES: readonly ProcessEventType[] = ['process.completed', 'process.failed'];

/** A lifecycle event with a stable schema. */
export interface ProcessEvent {
  id: string;
  type: ProcessEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  processId: string;
  subjectId: string;
  payload: {
    status: ProcessStatus;
    message: string;
    errorDetail?: TypedError;
  };
}

/** Event subscription. */
export interface EventSubscription {
  id: string;
  /** Filter by event types; all types when omitted or empty. */
  eventTypes?: ProcessEventType[];
  /** Callback for event delivery. */
  callback: (event: ProcessEvent) => void | Promise<void>;
}

/** Event type announcing that a process reached the given status. */
export function eventTypeForStatus(status: ProcessStatus): ProcessEventType {
  switch (status) {
    case ProcessStatus.Pending:
      return 'process.created';
    case ProcessStatus.InProgress:
      return 'process.started';
    case ProcessStatus.Completed:
      return 'process.completed';
    case ProcessStatus.Failed:
      return 'process.failed';
  }
}
