/**
 * Pluggable validation logic.
 *
 * The execution engine treats validation as an opaque, possibly slow
 * operation returning a pass/fail outcome. Implementations range from a
 * format-only check to a full check of the subject's record; the one in
 * use is selected by configuration (see createValidationLogic).
 *
 * Outcomes are definitive. Transient infrastructure failures are thrown
 * (as retryable ProcessErrors) so the engine can retry them.
 */

import { TypedError, subjectNotFoundError, validationFailedError } from '../domain/errors';
import { ValidationResult, readRecordField, summarizeRecord } from '../domain/subject';
import { IdentifierFailureReason, IdentifierValidator } from './identifier-validator';

/** Reason a validation outcome is negative. */
export type ValidationFailureReason = IdentifierFailureReason | 'ValidationFailed';

/** Outcome of a validation run. */
export type ValidationOutcome =
  | { ok: true; message: string; result?: ValidationResult }
  | { ok: false; reason: ValidationFailureReason; error: TypedError };

/** Capability interface for validation logic. */
export interface ValidationLogic {
  readonly name: string;
  validate(subjectId: string): Promise<ValidationOutcome>;
}

/** Validation modes selectable by configuration. */
export type ValidationMode = 'format' | 'existence' | 'document';

export const VALIDATION_MODES: readonly ValidationMode[] = ['format', 'existence', 'document'];

/** Checks only the identifier's shape. */
export class FormatValidation implements ValidationLogic {
  readonly name = 'format';

  constructor(private readonly identifiers: IdentifierValidator) {}

  async validate(subjectId: string): Promise<ValidationOutcome> {
    const check = this.identifiers.checkFormat(subjectId);
    if (!check.ok) return check;
    return { ok: true, message: `Subject identifier ${subjectId} is well formed` };
  }
}

/** Checks shape and presence in the record store, and summarizes the record. */
export class ExistenceValidation implements ValidationLogic {
  readonly name = 'existence';

  constructor(private readonly identifiers: IdentifierValidator) {}

  async validate(subjectId: string): Promise<ValidationOutcome> {
    const check = await this.identifiers.checkExistence(subjectId);
    if (!check.ok) return check;

    const record = await this.identifiers.fetchRecord(subjectId);
    if (!record) {
      return { ok: false, reason: 'NotFound', error: subjectNotFoundError(subjectId) };
    }
    return { ok: true, message: `Subject ${subjectId} found in record store`, result: summarizeRecord(record) };
  }
}

/**
 * Checks shape, presence, and that the subject's record carries every
 * required field with a non-empty value.
 */
export class DocumentValidation implements ValidationLogic {
  readonly name = 'document';

  constructor(
    private readonly identifiers: IdentifierValidator,
    private readonly requiredFields: readonly string[],
  ) {}

  async validate(subjectId: string): Promise<ValidationOutcome> {
    const check = await this.identifiers.checkExistence(subjectId);
    if (!check.ok) return check;

    const record = await this.identifiers.fetchRecord(subjectId);
    if (!record) {
      return { ok: false, reason: 'NotFound', error: subjectNotFoundError(subjectId) };
    }

    const missingFields = this.requiredFields.filter((field) => isEmpty(readRecordField(record, field)));
    if (missingFields.length > 0) {
      return {
        ok: false,
        reason: 'ValidationFailed',
        error: validationFailedError(
          subjectId,
          `Subject record is missing required fields: ${missingFields.join(', ')}`,
          { missingFields },
        ),
      };
    }

    return {
      ok: true,
      message: `Subject ${subjectId} record validated (${this.requiredFields.length} required fields present)`,
      result: summarizeRecord(record),
    };
  }
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/** Build the validation logic for a configured mode. */
export function createValidationLogic(
  mode: ValidationMode,
  deps: { identifiers: IdentifierValidator; requiredFields?: readonly string[] },
): ValidationLogic {
  switch (mode) {
    case 'format':
      return new FormatValidation(deps.identifiers);
    case 'existence':
      return new ExistenceValidation(deps.identifiers);
    case 'document':
      return new DocumentValidation(deps.identifiers, deps.requiredFields ?? []);
  }
}
