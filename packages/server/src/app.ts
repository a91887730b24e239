import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppEnv } from './types/hono.js';
import type { SessionCore } from './core.js';
import { errorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { createAuthRoutes } from './routes/auth/index.js';

export interface AuthServerOptions {
  core: SessionCore;
  enableCors?: boolean;
  /**
   * Origins allowed to call the API with credentials (cookie mode)
   */
  corsOrigins?: string[];
  enableLogging?: boolean;
}

/**
 * Create the session server application
 */
export function createAuthServer(options: AuthServerOptions): Hono<AppEnv> {
  const { core, enableCors = true, corsOrigins = [], enableLogging = true } = options;

  const app = new Hono<AppEnv>();

  // Global error handler
  app.onError(errorHandler);

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  // CORS (SPAs calling the auth endpoints)
  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: corsOrigins.length > 0 ? corsOrigins : '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        exposeHeaders: ['WWW-Authenticate'],
        credentials: corsOrigins.length > 0,
        maxAge: 86400,
      })
    );
  }

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/auth', createAuthRoutes({ core }));

  return app;
}
