import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { Logger } from '@/utils/logger';
import { PrometheusMetrics } from '@/telemetry/metrics';

/**
 * Request Logging Middleware - single summary line per request
 */
export function createRequestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();
    const requestId = randomUUID();
    res.locals.requestId = requestId;

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      const meta = {
        requestId,
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        duration,
      };
      if (duration > 1000) {
        logger.warn('Request completed', meta);
      } else {
        logger.http('Request completed', meta);
      }
    });

    next();
  };
}

/**
 * Error Logging Middleware
 */
export function createErrorLogger(logger: Logger) {
  return (error: Error, req: Request, res: Response, next: NextFunction): void => {
    logger.error('Request error', {
      requestId: res.locals.requestId,
      name: error.name,
      error: error.message,
      stack: error.stack,
      method: req.method,
      url: req.originalUrl,
    });
    next(error);
  };
}

/**
 * Performance Monitoring Middleware
 *
 * Fan-out routes make several sequential upstream calls, so the slow-request
 * threshold is higher than for a plain proxy.
 */
export function createPerformanceLogger(
  logger: Logger,
  metrics: PrometheusMetrics,
  slowRequestThreshold: number = 5000
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = process.hrtime.bigint();

    res.on('finish', () => {
      const endTime = process.hrtime.bigint();
      const duration = Number(endTime - startTime) / 1000000; // Convert to milliseconds
      const route = req.route?.path ? `${req.baseUrl}${req.route.path}` : 'unmatched';

      metrics.httpRequestsTotal.inc({ route, status_code: String(res.statusCode) });
      metrics.httpRequestDurationMs.observe({ route }, duration);

      if (duration > slowRequestThreshold) {
        logger.warn('Slow request detected', {
          requestId: res.locals.requestId,
          method: req.method,
          url: req.originalUrl,
          duration: Math.round(duration),
          threshold: slowRequestThreshold,
        });
      }

      logger.debug('Request performance', {
        requestId: res.locals.requestId,
        duration: Math.round(duration * 100) / 100, // Round to 2 decimal places
        method: req.method,
        statusCode: res.statusCode,
      });
    });

    next();
  };
}
