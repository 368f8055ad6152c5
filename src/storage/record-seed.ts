/**
 * Subject record seeding.
 *
 * Loads subject records from a JSON file (an array of objects) so the
 * in-memory record store can stand in for the external record store in
 * development. Unknown keys go into `attributes`.
 */

import { readFileSync } from 'fs';
import { SubjectRecord } from '../domain/subject';

/** Error raised for a seed file that does not hold subject records. */
export class RecordSeedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordSeedError';
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Convert one parsed JSON entry into a SubjectRecord. */
export function parseSubjectRecord(entry: unknown, index: number): SubjectRecord {
  if (!isPlainObject(entry)) {
    throw new RecordSeedError(`Record ${index} is not an object`);
  }
  const { subjectId, email, phone, verified, ...rest } = entry;
  if (typeof subjectId !== 'string' || subjectId.length === 0) {
    throw new RecordSeedError(`Record ${index} has no subjectId`);
  }

  const attributes = isPlainObject(rest.attributes) ? { ...rest.attributes } : {};
  for (const [key, value] of Object.entries(rest)) {
    if (key !== 'attributes') attributes[key] = value;
  }

  const record: SubjectRecord = { subjectId, attributes };
  if (typeof email === 'string') record.email = email;
  if (typeof phone === 'string') record.phone = phone;
  if (typeof verified === 'boolean') record.verified = verified;
  return record;
}

/** Parse a JSON document holding an array of subject records. */
export function parseSubjectRecords(json: string): SubjectRecord[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    throw new RecordSeedError('Subject record seed must be a JSON array');
  }
  return parsed.map((entry, index) => parseSubjectRecord(entry, index));
}

/** Read subject records from a JSON file. */
export function loadSubjectRecords(filePath: string): SubjectRecord[] {
  return parseSubjectRecords(readFileSync(filePath, 'utf8'));
}
