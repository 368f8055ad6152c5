/**
 * Validation process domain model.
 *
 * One tracked validation request, created pending and driven to a
 * terminal status by the execution engine.
 */

import { TypedError } from './errors';
import { ValidationResult } from './subject';

/** Process lifecycle states. Values are exposed verbatim over the API. */
export enum ProcessStatus {
  Pending = 'pending',
  InProgress = 'in_progress',
  Completed = 'completed',
  Failed = 'failed',
}

/** Valid state transitions for processes. */
export const VALID_PROCESS_TRANSITIONS: Record<ProcessStatus, ProcessStatus[]> = {
  [ProcessStatus.Pending]: [ProcessStatus.InProgress],
  [ProcessStatus.InProgress]: [ProcessStatus.Completed, ProcessStatus.Failed],
  [ProcessStatus.Completed]: [],
  [ProcessStatus.Failed]: [],
};

/** A single validation process. */
export interface ValidationProcess {
  /** Opaque unique identifier; the only lookup key. */
  processId: string;
  /** The identifier being validated. */
  subjectId: string;
  status: ProcessStatus;
  createdAt: string;
  updatedAt: string;
  /** Outcome description; empty until the process leaves pending. */
  message: string;
  /** Failure cause; present only on failed processes. */
  errorDetail?: TypedError;
  /** Record summary; present only on completed processes that read a record. */
  result?: ValidationResult;
}

/** Fields a status transition may change besides the status itself. */
export interface StatusUpdate {
  message?: string;
  errorDetail?: TypedError;
  result?: ValidationResult;
}

/** Creation-style view returned from submit. */
export interface SubmittedProcessView {
  processId: string;
  subjectId: string;
  status: ProcessStatus;
  createdAt: string;
  message: string;
}

/** Read view returned from status queries. */
export interface ProcessStatusView extends SubmittedProcessView {
  updatedAt: string;
  errorDetail?: TypedError;
  result?: ValidationResult;
}

export function toSubmittedView(process: ValidationProcess): SubmittedProcessView {
  return {
    processId: process.processId,
    subjectId: process.subjectId,
    status: process.status,
    createdAt: process.createdAt,
    message: process.message,
  };
}

export function toStatusView(process: ValidationProcess): ProcessStatusView {
  const view: ProcessStatusView = {
    ...toSubmittedView(process),
    updatedAt: process.updatedAt,
  };
  if (process.errorDetail) view.errorDetail = process.errorDetail;
  if (process.result) view.result = process.result;
  return view;
}

/**
 * Timestamp for a transition. Never earlier than the record's previous
 * updatedAt, so updatedAt >= createdAt holds even if the wall clock steps back.
 */
export function nextTimestamp(previous: string, now: Date = new Date()): string {
  const candidate = now.toISOString();
  return candidate < previous ? previous : candidate;
}
