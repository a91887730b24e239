import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { ErrorResponse } from '@authgate/shared';
import type { AppEnv } from '../types/hono.js';
import { ProviderUnavailableError } from '../errors/faults.js';
import { AuthFailure } from '../errors/auth-failure.js';
import { formatIssues } from '../config/index.js';
import { createLogger, describeError } from '../logging/logger.js';
import {
  NO_STORE_CACHE_CONTROL,
  NO_CACHE_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../config/constants.js';

const logger = createLogger('http');

/**
 * Global handler for thrown faults
 *
 * Expected failures never get here; they are rendered from results by
 * the routes.
 */
export const errorHandler: ErrorHandler<AppEnv> = (err, c) => {
  c.header(HEADER_CACHE_CONTROL, NO_STORE_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, NO_CACHE_PRAGMA);

  if (err instanceof ProviderUnavailableError) {
    logger.error('External provider unavailable', {
      provider: err.provider,
      status: err.status,
      ...describeError(err),
    });
    const body: ErrorResponse = {
      error: 'provider_unavailable',
      error_description: 'The external provider is unavailable. Please try again later.',
    };
    return c.json(body, 502);
  }

  if (err instanceof ZodError) {
    return c.json(AuthFailure.validation(formatIssues(err).join(', ')).toJSON(), 400);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  logger.error('Unhandled error', { path: c.req.path, ...describeError(err) });

  const body: ErrorResponse = {
    error: 'server_error',
    error_description:
      process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message,
  };
  return c.json(body, 500);
};

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    await next();

    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Token responses must not be cached
    if (c.req.path.startsWith('/auth')) {
      c.header(HEADER_CACHE_CONTROL, NO_STORE_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, NO_CACHE_PRAGMA);
    }

    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Path only; query strings may carry codes
    logger.info('request', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
      userId: c.get('principal')?.id,
    });
  };
}
