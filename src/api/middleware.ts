/**
 * API middleware: request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { ProcessError, TypedError, apiError, createTypedError, ErrorCode } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ component: 'api' });

/** Log each request once its response has been sent. */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      log.debug('Request handled', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  };
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Forward rejections to the error handler. */
export function handle(fn: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

/** Map a typed error code to an HTTP status. */
export function getHttpStatus(error: TypedError): number {
  switch (error.code) {
    case ErrorCode.InvalidFormat:
    case ErrorCode.RequestSchema:
      return 400;
    case ErrorCode.SubjectNotFound:
    case ErrorCode.ProcessNotFound:
      return 404;
    case ErrorCode.StoreUnavailable:
      return 503;
    default:
      return 500;
  }
}

/** Send a typed error response. */
export function sendError(res: Response, error: TypedError): void {
  res.status(getHttpStatus(error)).json(apiError(error));
}

/** Body-parser failures carry a status and a type such as "entity.parse.failed". */
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  if (!(err instanceof Error)) return false;
  return 'status' in err && typeof err.status === 'number' && 'type' in err && typeof err.type === 'string';
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ProcessError) {
    const status = getHttpStatus(err.typedError);
    log.warn('Request error', { code: err.code, status });
    sendError(res, err.typedError);
    return;
  }

  if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
    const typed = createTypedError({
      code: ErrorCode.RequestSchema,
      message: err.type === 'entity.parse.failed' ? 'Request body is not valid JSON' : err.message,
      details: { type: err.type },
    });
    log.warn('Request body rejected', { type: err.type, status: err.status });
    res.status(err.status).json(apiError(typed));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  sendError(res, createTypedError({
    code: ErrorCode.Internal,
    message: message || 'Internal server error',
  }));
}
