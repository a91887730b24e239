import { Hono } from 'hono';
import type { AppEnv } from '../../types/hono.js';
import type { SessionCore } from '../../core.js';
import { createLoginRoutes } from './login.js';
import { createSessionRoutes } from './session.js';
import { createTwoFactorRoutes } from './two-factor.js';
import { createExternalRoutes } from './external.js';

export { createLoginRoutes } from './login.js';
export { createSessionRoutes } from './session.js';
export { createTwoFactorRoutes } from './two-factor.js';
export { createExternalRoutes } from './external.js';

export interface AuthRoutesOptions {
  core: SessionCore;
}

/**
 * All session routes, mounted under /auth
 */
export function createAuthRoutes(options: AuthRoutesOptions): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.route('/login', createLoginRoutes(options));
  app.route('/2fa', createTwoFactorRoutes(options));
  app.route('/external', createExternalRoutes(options));
  app.route('/', createSessionRoutes(options));

  return app;
}
