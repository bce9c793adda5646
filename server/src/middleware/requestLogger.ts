/**
 * Request Logger Middleware
 *
 * - Assigns a request ID to each incoming request (or reuses X-Request-ID)
 * - Logs request start and completion with duration
 * - Sets the X-Request-ID response header
 */

import { Request, Response, NextFunction } from 'express';
import { requestContext } from '../utils/requestContext';
import { createLogger } from '../utils/logger';

const log = createLogger('HTTP');

/**
 * Paths excluded from request logging (liveness polling would flood the log)
 */
const EXCLUDED_PATHS = ['/health', '/api/v1alpha1/health'];

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId =
    headerValue(req.headers['x-request-id']) ||
    headerValue(req.headers['x-correlation-id']) ||
    requestContext.generateRequestId();

  const context = {
    requestId,
    startTime: Date.now(),
    path: req.path,
    method: req.method,
  };

  res.setHeader('X-Request-ID', requestId);

  const isExcluded = EXCLUDED_PATHS.some((p) => req.path === p || req.path.startsWith(`${p}/`));

  requestContext.run(context, () => {
    if (!isExcluded) {
      log.info(`${req.method} ${req.path}`, {
        ip: headerValue(req.headers['x-forwarded-for']) || req.socket.remoteAddress,
        userAgent: req.headers['user-agent']?.substring(0, 50),
      });
    }

    res.on('finish', () => {
      if (isExcluded) return;

      const statusCode = res.statusCode;
      const logData = {
        status: statusCode,
        duration: `${Date.now() - context.startTime}ms`,
      };

      if (statusCode >= 500) {
        log.error(`${req.method} ${req.path} completed`, logData);
      } else if (statusCode >= 400) {
        log.warn(`${req.method} ${req.path} completed`, logData);
      } else {
        log.info(`${req.method} ${req.path} completed`, logData);
      }
    });

    next();
  });
}

export default requestLogger;
