/**
 * Identifier validator.
 *
 * Two stages: a synchronous format check that never touches a store,
 * and an existence check against the record store. The existence stage
 * may be slow or remote and is only run from the execution engine.
 */

import {
  ProcessError,
  TypedError,
  invalidFormatError,
  isProcessError,
  storeUnavailableError,
  subjectNotFoundError,
} from '../domain/errors';
import { SubjectRecord, isWellFormedSubjectId } from '../domain/subject';
import { RecordStore } from '../storage/store';

/** Reason an identifier check did not pass. */
export type IdentifierFailureReason = 'InvalidFormat' | 'NotFound';

export interface IdentifierFailure {
  ok: false;
  reason: IdentifierFailureReason;
  error: TypedError;
}

/** Result of the format stage; carries the identifier narrowed to a string. */
export type FormatCheck = { ok: true; subjectId: string } | IdentifierFailure;

/** Result of an identifier check. */
export type IdentifierCheck = { ok: true } | IdentifierFailure;

export class IdentifierValidator {
  constructor(private readonly records: RecordStore) {}

  /** Format stage only. */
  checkFormat(subjectId: unknown): FormatCheck {
    if (!isWellFormedSubjectId(subjectId)) {
      return { ok: false, reason: 'InvalidFormat', error: invalidFormatError(subjectId) };
    }
    return { ok: true, subjectId };
  }

  /**
   * Format stage, then existence in the record store. Record store
   * failures are thrown as retryable STORE.UNAVAILABLE errors.
   */
  async checkExistence(subjectId: string): Promise<IdentifierCheck> {
    const format = this.checkFormat(subjectId);
    if (!format.ok) return format;

    const exists = await this.fromRecordStore(() => this.records.exists(subjectId));
    if (!exists) {
      return { ok: false, reason: 'NotFound', error: subjectNotFoundError(subjectId) };
    }
    return { ok: true };
  }

  /** Fetch the subject's record; null when absent. */
  async fetchRecord(subjectId: string): Promise<SubjectRecord | null> {
    return this.fromRecordStore(() => this.records.fetch(subjectId));
  }

  private async fromRecordStore<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (isProcessError(err)) throw err;
      throw new ProcessError(storeUnavailableError('Record store', err));
    }
  }
}
