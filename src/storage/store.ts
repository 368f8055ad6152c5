/**
 * Storage layer interfaces.
 *
 * Defines the contract for process persistence and subject lookup with
 * pluggable backends (in-memory, SQLite).
 */

import { ProcessStatus, StatusUpdate, ValidationProcess } from '../domain/process';
import { SubjectRecord } from '../domain/subject';

/**
 * Store interface for validation processes.
 *
 * Failures are thrown as ProcessError: PROCESS.NOT_FOUND,
 * PROCESS.INVALID_TRANSITION or STORE.UNAVAILABLE.
 */
export interface ProcessStore {
  /** Allocate a new process id and persist a pending record. */
  create(subjectId: string): Promise<ValidationProcess>;
  fetch(processId: string): Promise<ValidationProcess>;
  /**
   * Atomic compare-and-set: the transition is checked against the
   * persisted status in the same step that writes it.
   */
  updateStatus(processId: string, status: ProcessStatus, update?: StatusUpdate): Promise<ValidationProcess>;
}

/** Store interface for the external subject record store. */
export interface RecordStore {
  exists(subjectId: string): Promise<boolean>;
  fetch(subjectId: string): Promise<SubjectRecord | null>;
}

/** The combined store used by the application. */
export interface Store {
  processes: ProcessStore;
  records: RecordStore;
  /** Whether the backend answers a trivial query. Never throws. */
  ping(): Promise<boolean>;
  /** Release resources held by the backend. */
  close(): Promise<void>;
}
