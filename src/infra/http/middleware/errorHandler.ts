import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import {
  ConflictError,
  InternalError,
  NotFoundError,
  RequestAbortedError,
  UnavailableError,
} from '../../../application/errors.js';
import type { Logger } from '../../logging/logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

// nginx's status for a client that went away before the response
const CLIENT_CLOSED_REQUEST = 499;
const RETRY_AFTER_SECONDS = '5';

const BODY_PARSER_CODES: Record<string, ErrorResponse> = {
  'entity.parse.failed': { code: 'MALFORMED_JSON', message: 'Request body is not valid JSON' },
  'entity.too.large': { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' },
};

/**
 * body-parser errors carry `type` and a 4xx `status`. Their messages can
 * quote the raw body, so only the fixed texts above are ever returned.
 */
function bodyParserFailure(err: Error): { status: number; response: ErrorResponse } | null {
  const type: unknown = Reflect.get(err, 'type');
  const status: unknown = Reflect.get(err, 'status');
  if (typeof type !== 'string' || typeof status !== 'number' || status < 400 || status >= 500) {
    return null;
  }
  return {
    status,
    response: BODY_PARSER_CODES[type] ?? { code: 'BAD_REQUEST', message: 'Bad request' },
  };
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: Error, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const request = { method: req.method, path: req.path };

    if (err instanceof RequestAbortedError) {
      logger.info(request, 'Client closed request');
      res.status(CLIENT_CLOSED_REQUEST).end();
      return;
    }

    if (err instanceof ZodError) {
      const response: ErrorResponse = {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      };
      logger.warn({ ...request, code: response.code }, 'Request rejected');
      res.status(400).json(response);
      return;
    }

    const parserFailure = bodyParserFailure(err);
    if (parserFailure) {
      logger.warn({ ...request, code: parserFailure.response.code }, 'Request rejected');
      res.status(parserFailure.status).json(parserFailure.response);
      return;
    }

    if (err instanceof NotFoundError) {
      const response: ErrorResponse = {
        code: 'NOT_FOUND',
        message: err.message,
      };
      res.status(404).json(response);
      return;
    }

    if (err instanceof ConflictError) {
      const response: ErrorResponse = {
        code: 'CONFLICT',
        message: err.message,
        ...(err.field ? { details: { field: err.field } } : {}),
      };
      logger.warn({ ...request, code: response.code, field: err.field }, 'Request conflicted');
      res.status(409).json(response);
      return;
    }

    if (err instanceof UnavailableError) {
      logger.error({ ...request, err }, 'Backing store unavailable');
      const response: ErrorResponse = {
        code: 'SERVICE_UNAVAILABLE',
        message: 'Service temporarily unavailable, please retry',
      };
      res.status(503).set('Retry-After', RETRY_AFTER_SECONDS).json(response);
      return;
    }

    // InternalError and anything unclassified: detail stays in the log
    logger.error(
      { ...request, err },
      err instanceof InternalError ? 'Internal error' : 'Unhandled error'
    );
    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
