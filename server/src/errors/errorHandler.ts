/**
 * Error Handler Middleware
 *
 * Express middleware for catching and formatting API errors.
 * Converts all errors to the standardized ApiErrorResponse format.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiError, ConflictError, InternalError, NotFoundError, ValidationError, ErrorCodes } from './ApiError';
import { ProviderIdTakenError, ProviderNameTakenError, ProviderNotFoundError } from '../repositories/types';
import { createLogger } from '../utils/logger';
import { requestContext } from '../utils/requestContext';

const log = createLogger('ErrorHandler');

/**
 * Body parser rejections carry the HTTP status they should produce
 */
function isMalformedBody(error: Error): boolean {
  return error instanceof SyntaxError && 'status' in error && error.status === 400;
}

/**
 * Map store and body parser errors that escaped the route to API errors
 */
function mapKnownError(error: Error): ApiError | null {
  if (isMalformedBody(error)) {
    return new ValidationError('Malformed JSON body', ErrorCodes.INVALID_INPUT);
  }
  if (error instanceof ProviderNotFoundError) {
    return new NotFoundError(error.message, ErrorCodes.PROVIDER_NOT_FOUND, { providerId: error.providerId });
  }
  if (error instanceof ProviderIdTakenError) {
    return new ConflictError(error.message, ErrorCodes.CONFLICT, { providerId: error.providerId });
  }
  if (error instanceof ProviderNameTakenError) {
    return new ConflictError(error.message, ErrorCodes.DUPLICATE_ENTRY, { name: error.providerName });
  }
  return null;
}

/**
 * Main error handler middleware
 *
 * Should be registered last in the middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const requestId = requestContext.getRequestId();

  const apiError = error instanceof ApiError ? error : mapKnownError(error);

  if (apiError) {
    // Operational errors at warn level, programming errors at error level
    if (apiError.isOperational) {
      log.warn(`API Error: ${apiError.code}`, {
        message: apiError.message,
        statusCode: apiError.statusCode,
        details: apiError.details,
      });
    } else {
      log.error(`Unexpected API Error: ${apiError.code}`, {
        message: apiError.message,
        stack: apiError.stack,
        details: apiError.details,
      });
    }

    res.status(apiError.statusCode).json(apiError.toResponse(requestId));
    return;
  }

  log.error('Unhandled error', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });

  const internalError = new InternalError();
  res.status(500).json(internalError.toResponse(requestId));
}

/**
 * Async handler wrapper
 *
 * ```typescript
 * router.get('/providers/:providerId', asyncHandler(async (req, res) => {
 *   res.json(await providerService.get(req.params.providerId));
 * }));
 * ```
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found handler for undefined routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const requestId = requestContext.getRequestId();
  const error = new NotFoundError(`Route not found: ${req.method} ${req.path}`);
  res.status(404).json(error.toResponse(requestId));
}
