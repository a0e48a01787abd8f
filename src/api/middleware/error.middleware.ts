import type { Request, Response, NextFunction } from 'express';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import {
  ApiError,
  ChainConflictError,
  ConsensusError,
  InvalidInputError,
  SubmissionRejectedError,
} from '../../utils/errors.js';

/**
 * REST API Error Response Format
 */
export interface ErrorResponse {
  error: {
    message: string;
    field?: string;
    rule?: string;
  };
}

const DUPLICATE_RULES = new Set(['duplicate_in_transaction', 'duplicate_on_chain']);

/**
 * Domain errors that carry a meaningful HTTP status
 */
function toApiError(error: unknown): ApiError | null {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof SubmissionRejectedError) {
    const status = DUPLICATE_RULES.has(error.rule) ? 409 : 400;
    return new ApiError(status, error.reason, undefined, error.rule);
  }
  if (error instanceof InvalidInputError) {
    return new ApiError(400, error.message);
  }
  if (error instanceof ChainConflictError) {
    return new ApiError(409, error.message);
  }
  if (error instanceof ConsensusError) {
    return new ApiError(503, error.message);
  }
  // Malformed JSON from express.json()
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    return new ApiError(400, 'Malformed JSON body');
  }
  return null;
}

export function errorMiddleware(
  error: unknown,
  req: Request,
  res: Response<ErrorResponse>,
  _next: NextFunction
): void {
  const apiError = toApiError(error);

  if (apiError) {
    if (apiError.statusCode >= 500) {
      logger.error({ err: error, method: req.method, path: req.path }, 'Request error');
    } else {
      logger.warn(
        { method: req.method, path: req.path, status: apiError.statusCode, reason: apiError.message },
        'Request rejected'
      );
    }

    res.status(apiError.statusCode).json({
      error: {
        message: apiError.message,
        field: apiError.field,
        rule: apiError.rule,
      },
    });
    return;
  }

  logger.error(
    {
      err: error,
      method: req.method,
      path: req.path,
      query: req.query,
    },
    'Request error'
  );

  // In production, hide error details
  const message =
    config.nodeEnv === 'production'
      ? 'Internal server error'
      : error instanceof Error
        ? error.message
        : 'Unknown error';

  res.status(500).json({
    error: {
      message,
    },
  });
}
