/**
 * Error Middleware
 *
 * The one place where failures become HTTP responses. AppErrors map to
 * their own status and code, body-parser rejections keep their 4xx status,
 * and anything else is a 500.
 */

import { Request, Response, NextFunction } from 'express';
import { ApiResponse, AuthenticatedRequest } from '../types';
import { isAppError } from '../utils/errors.utils';
import { createRequestContext, logError, logWarning } from '../utils/logger.utils';
import { isRecord } from '../utils/validation.utils';

interface BodyParserError {
  status: number;
  type: string;
}

const BODY_ERRORS: Partial<Record<string, { code: string; message: string }>> = {
  'entity.too.large': { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' },
  'charset.unsupported': { code: 'UNSUPPORTED_MEDIA_TYPE', message: 'Unsupported request charset' },
  'encoding.unsupported': { code: 'UNSUPPORTED_MEDIA_TYPE', message: 'Unsupported content encoding' },
};

/**
 * body-parser marks malformed JSON with `type: 'entity.parse.failed'`
 */
function isJsonParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * body-parser rejects oversized or undecodable bodies with a 4xx `status`
 * and a `type` tag
 */
function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    isRecord(err) &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    typeof err.type === 'string'
  );
}

/**
 * 404 for routes nothing matched
 */
export function notFoundHandler(req: Request, res: Response): void {
  const body: ApiResponse = {
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  };
  res.status(404).json(body);
}

// Express recognizes error handlers by their four parameters
export function errorHandler(err: unknown, req: AuthenticatedRequest, res: Response, next: NextFunction): void {
  const context = createRequestContext(req.requestId, req.user?.userId);

  if (isAppError(err)) {
    if (err.status >= 500) {
      logError('http.app_error', err.message, err, context);
    } else {
      logWarning('http.request_rejected', err.code, context, { status: err.status, path: req.path });
    }
    const body: ApiResponse = {
      success: false,
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
      },
    };
    res.status(err.status).json(body);
    return;
  }

  if (isJsonParseError(err)) {
    const body: ApiResponse = {
      success: false,
      error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' },
    };
    res.status(400).json(body);
    return;
  }

  if (isBodyParserError(err)) {
    logWarning('http.request_rejected', err.type, context, { status: err.status, path: req.path });
    const known = BODY_ERRORS[err.type];
    const body: ApiResponse = {
      success: false,
      error: known ?? { code: 'BAD_REQUEST', message: 'Request body could not be read' },
    };
    res.status(err.status).json(body);
    return;
  }

  logError('http.unhandled_error', 'Unhandled error', err, context, { path: req.path });

  const message =
    process.env.NODE_ENV === 'development' && err instanceof Error ? err.message : 'An unexpected error occurred';
  const body: ApiResponse = {
    success: false,
    error: { code: 'INTERNAL_ERROR', message },
  };
  res.status(500).json(body);
}
