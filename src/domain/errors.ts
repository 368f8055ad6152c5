/**
 * Typed error model.
 *
 * Errors carry a namespaced code and a retryable flag so the execution
 * engine can tell transient infrastructure failures from definitive
 * outcomes, and so the HTTP layer can map them to status codes. The same
 * structure is stored as `errorDetail` on failed processes.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'SUBJECT'
  | 'PROCESS'
  | 'STORE'
  | 'VALIDATION'
  | 'REQUEST'
  | 'SYSTEM';

/** Error codes used across the service. */
export const ErrorCode = {
  InvalidFormat: 'SUBJECT.INVALID_FORMAT',
  SubjectNotFound: 'SUBJECT.NOT_FOUND',
  ProcessNotFound: 'PROCESS.NOT_FOUND',
  InvalidTransition: 'PROCESS.INVALID_TRANSITION',
  StoreUnavailable: 'STORE.UNAVAILABLE',
  ValidationFailed: 'VALIDATION.FAILED',
  Timeout: 'VALIDATION.TIMEOUT',
  ExecutionError: 'VALIDATION.EXECUTION_ERROR',
  RequestSchema: 'REQUEST.SCHEMA',
  Internal: 'SYSTEM.INTERNAL',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** The typed error structure returned in API responses and stored on failed processes. */
export interface TypedError {
  /** Namespaced error code (e.g., "SUBJECT.NOT_FOUND"). */
  code: ErrorCode;
  /** Human-readable error message. */
  message: string;
  /** Associated process if applicable. */
  processId?: string;
  /** Associated subject if applicable. */
  subjectId?: string;
  /** Whether the same operation is expected to succeed if attempted again. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: ErrorCode;
  message: string;
  processId?: string;
  subjectId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
}): TypedError {
  const error: TypedError = {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
  };
  // Optional keys are left off entirely so records compare and serialize cleanly.
  if (params.processId !== undefined) error.processId = params.processId;
  if (params.subjectId !== undefined) error.subjectId = params.subjectId;
  if (params.details !== undefined) error.details = params.details;
  return error;
}

/**
 * Error wrapper thrown across component boundaries. The typed payload is
 * what callers inspect; the Error shell keeps stack traces.
 */
export class ProcessError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'ProcessError';
  }

  get code(): ErrorCode {
    return this.typedError.code;
  }

  get retryable(): boolean {
    return this.typedError.retryable;
  }
}

/** Narrow an unknown thrown value to a ProcessError with the given code. */
export function isProcessError(err: unknown, code?: ErrorCode): err is ProcessError {
  if (!(err instanceof ProcessError)) return false;
  return code === undefined || err.code === code;
}

// --- Factories ---

export function invalidFormatError(subjectId: unknown): TypedError {
  const shown = typeof subjectId === 'string' ? subjectId : String(subjectId);
  return createTypedError({
    code: ErrorCode.InvalidFormat,
    message: `Invalid subject identifier format: ${shown}. Expected a canonical UUID`,
    subjectId: typeof subjectId === 'string' ? subjectId : undefined,
  });
}

export function subjectNotFoundError(subjectId: string): TypedError {
  return createTypedError({
    code: ErrorCode.SubjectNotFound,
    message: `Subject not found: ${subjectId}`,
    subjectId,
  });
}

export function processNotFoundError(processId: string): TypedError {
  return createTypedError({
    code: ErrorCode.ProcessNotFound,
    message: `Validation process not found: ${processId}`,
    processId,
  });
}

export function invalidTransitionError(processId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: ErrorCode.InvalidTransition,
    message: `Cannot transition process from "${from}" to "${to}"`,
    processId,
    details: { from, to },
  });
}

export function storeUnavailableError(store: string, cause?: unknown): TypedError {
  const reason = cause instanceof Error ? cause.message : undefined;
  return createTypedError({
    code: ErrorCode.StoreUnavailable,
    message: reason ? `${store} unavailable: ${reason}` : `${store} unavailable`,
    retryable: true,
    details: { store },
  });
}

export function validationFailedError(
  subjectId: string,
  message: string,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code: ErrorCode.ValidationFailed,
    message,
    subjectId,
    details,
  });
}

export function validationTimeoutError(processId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: ErrorCode.Timeout,
    message: `Validation exceeded timeout of ${timeoutMs}ms`,
    processId,
    details: { timeoutMs },
  });
}

export function requestSchemaError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: ErrorCode.RequestSchema,
    message,
    details,
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
