/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Records are
 * deep-copied on the way in and out so callers never alias store state.
 */

import { v4 as uuid } from 'uuid';
import { ProcessError, processNotFoundError } from '../domain/errors';
import { ProcessStatus, StatusUpdate, ValidationProcess, nextTimestamp } from '../domain/process';
import { SubjectRecord } from '../domain/subject';
import { transitionProcessStatus } from '../engine/state-machine';
import { ProcessStore, RecordStore, Store } from './store';

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/** Generate a process id. */
export function newProcessId(): string {
  return `proc_${uuid()}`;
}

export class MemoryProcessStore implements ProcessStore {
  private data = new Map<string, ValidationProcess>();
  /** Every id ever issued, so none is reused even if a record is dropped. */
  private issued = new Set<string>();

  async create(subjectId: string): Promise<ValidationProcess> {
    let processId = newProcessId();
    while (this.issued.has(processId)) processId = newProcessId();
    this.issued.add(processId);

    const now = new Date().toISOString();
    const process: ValidationProcess = {
      processId,
      subjectId,
      status: ProcessStatus.Pending,
      createdAt: now,
      updatedAt: now,
      message: '',
    };
    this.data.set(processId, deepCopy(process));
    return deepCopy(process);
  }

  async fetch(processId: string): Promise<ValidationProcess> {
    const process = this.data.get(processId);
    if (!process) throw new ProcessError(processNotFoundError(processId));
    return deepCopy(process);
  }

  // No await between the read and the write: the check-and-set is atomic
  // with respect to every other caller on the event loop.
  async updateStatus(processId: string, status: ProcessStatus, update: StatusUpdate = {}): Promise<ValidationProcess> {
    const existing = this.data.get(processId);
    if (!existing) throw new ProcessError(processNotFoundError(processId));

    const result = transitionProcessStatus(processId, existing.status, status);
    if (!result.success) throw new ProcessError(result.error);

    const updated: ValidationProcess = {
      processId: existing.processId,
      subjectId: existing.subjectId,
      status: result.newStatus,
      createdAt: existing.createdAt,
      updatedAt: nextTimestamp(existing.updatedAt),
      message: update.message ?? existing.message,
    };
    if (result.newStatus === ProcessStatus.Failed && update.errorDetail) {
      updated.errorDetail = deepCopy(update.errorDetail);
    }
    if (result.newStatus === ProcessStatus.Completed && update.result) {
      updated.result = deepCopy(update.result);
    }
    this.data.set(processId, updated);
    return deepCopy(updated);
  }

  /** Number of stored processes. */
  size(): number {
    return this.data.size;
  }
}

export class MemoryRecordStore implements RecordStore {
  private data = new Map<string, SubjectRecord>();

  constructor(records: SubjectRecord[] = []) {
    for (const record of records) this.put(record);
  }

  put(record: SubjectRecord): void {
    this.data.set(record.subjectId.toLowerCase(), deepCopy(record));
  }

  async exists(subjectId: string): Promise<boolean> {
    return this.data.has(subjectId.toLowerCase());
  }

  async fetch(subjectId: string): Promise<SubjectRecord | null> {
    const record = this.data.get(subjectId.toLowerCase());
    return record ? deepCopy(record) : null;
  }
}

/** Create an in-memory store, optionally seeded with subject records. */
export function createMemoryStore(records: SubjectRecord[] = []): Store & {
  processes: MemoryProcessStore;
  records: MemoryRecordStore;
} {
  return {
    processes: new MemoryProcessStore(),
    records: new MemoryRecordStore(records),
    async ping() {
      return true;
    },
    async close() {},
  };
}
