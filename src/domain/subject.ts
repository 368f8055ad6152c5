/**
 * Subject record domain model.
 *
 * A subject is the entity a validation process checks, looked up in the
 * external record store by its identifier (an enrollment UUID).
 */

/** A record held by the external record store. */
export interface SubjectRecord {
  subjectId: string;
  email?: string;
  phone?: string;
  /** Whether the source system already marked the record as verified. */
  verified?: boolean;
  /** Any further fields carried by the source document. */
  attributes: Record<string, unknown>;
}

/** Canonical UUID: 8-4-4-4-12 hex digits. */
export const SUBJECT_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Check an identifier's syntactic shape. */
export function isWellFormedSubjectId(value: unknown): value is string {
  return typeof value === 'string' && SUBJECT_ID_PATTERN.test(value);
}

/**
 * Read a named field from a record, looking at the top-level fields
 * first and then at the free-form attributes.
 */
export function readRecordField(record: SubjectRecord, field: string): unknown {
  switch (field) {
    case 'subjectId':
      return record.subjectId;
    case 'email':
      return record.email;
    case 'phone':
      return record.phone;
    case 'verified':
      return record.verified;
    default:
      return record.attributes[field];
  }
}

/** Summary of a subject's record, stored on a completed process. */
export interface ValidationResult {
  subjectId: string;
  email?: string;
  phone?: string;
  /** Entries in the record's `studentsInfo` list. */
  studentsCount: number;
  verified: boolean;
  validatedAt: string;
}

export function summarizeRecord(record: SubjectRecord, now: Date = new Date()): ValidationResult {
  const students = readRecordField(record, 'studentsInfo');
  const result: ValidationResult = {
    subjectId: record.subjectId,
    studentsCount: Array.isArray(students) ? students.length : 0,
    verified: record.verified ?? false,
    validatedAt: now.toISOString(),
  };
  if (record.email !== undefined) result.email = record.email;
  if (record.phone !== undefined) result.phone = record.phone;
  return result;
}
