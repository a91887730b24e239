import { Hono } from 'hono';
import { z } from 'zod';
import type { AppEnv } from '../../types/hono.js';
import type { SessionCore } from '../../core.js';
import { validate } from '../../middleware/validation.js';
import { sessionAuth } from '../../middleware/session-auth.js';
import { AuthFailure } from '../../errors/auth-failure.js';
import { sendFailure } from '../respond.js';

const enableSchema = z.object({
  code: z.string().trim().min(1, 'code is required'),
});

const passwordSchema = z.object({
  password: z.string().min(1, 'password is required'),
});

export interface TwoFactorRoutesOptions {
  core: SessionCore;
}

/**
 * Authenticator enrolment for the signed-in user
 */
export function createTwoFactorRoutes(options: TwoFactorRoutesOptions): Hono<AppEnv> {
  const { core } = options;
  const app = new Hono<AppEnv>();

  app.use('*', sessionAuth(core));

  /**
   * POST /2fa/setup
   */
  app.post('/setup', async (c) => {
    const principal = c.get('principal');
    if (!principal) return sendFailure(c, AuthFailure.unauthorized());

    const result = await core.twoFactor.setup(principal.id);
    if (!result.ok) return sendFailure(c, result.error);
    return c.json(result.value);
  });

  /**
   * POST /2fa/enable
   * Confirms enrolment; the recovery codes are only ever shown here
   */
  app.post('/enable', validate('json', enableSchema), async (c) => {
    const principal = c.get('principal');
    if (!principal) return sendFailure(c, AuthFailure.unauthorized());

    const result = await core.twoFactor.enable(principal.id, c.req.valid('json').code);
    if (!result.ok) return sendFailure(c, result.error);
    return c.json(result.value);
  });

  /**
   * POST /2fa/disable
   */
  app.post('/disable', validate('json', passwordSchema), async (c) => {
    const principal = c.get('principal');
    if (!principal) return sendFailure(c, AuthFailure.unauthorized());

    const result = await core.twoFactor.disable(principal.id, c.req.valid('json').password);
    if (!result.ok) return sendFailure(c, result.error);
    return c.body(null, 204);
  });

  /**
   * POST /2fa/recovery-codes
   */
  app.post('/recovery-codes', validate('json', passwordSchema), async (c) => {
    const principal = c.get('principal');
    if (!principal) return sendFailure(c, AuthFailure.unauthorized());

    const result = await core.twoFactor.regenerateRecoveryCodes(principal.id, c.req.valid('json').password);
    if (!result.ok) return sendFailure(c, result.error);
    return c.json(result.value);
  });

  return app;
}
