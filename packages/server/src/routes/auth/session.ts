import { Hono } from 'hono';
import { z } from 'zod';
import type { CurrentUserResponse } from '@authgate/shared';
import type { AppEnv } from '../../types/hono.js';
import type { SessionCore } from '../../core.js';
import { validate } from '../../middleware/validation.js';
import { sessionAuth, optionalSessionAuth } from '../../middleware/session-auth.js';
import { wantsCookies } from '../../transport/session-transport.js';
import { AuthFailure } from '../../errors/auth-failure.js';
import { sendFailure, deliver, deliverEmpty } from '../respond.js';

const refreshSchema = z.object({
  refreshToken: z.string().optional(),
});

const changePasswordSchema = z.object({
  currentPassword: z.string().min(1, 'currentPassword is required'),
  newPassword: z.string().min(8, 'newPassword must be at least 8 characters'),
});

export interface SessionRoutesOptions {
  core: SessionCore;
}

/**
 * Refresh, sign-out and the signed-in user's own account
 */
export function createSessionRoutes(options: SessionRoutesOptions): Hono<AppEnv> {
  const { core } = options;
  const { sessions, transport } = core;
  const app = new Hono<AppEnv>();

  /**
   * POST /refresh
   * Refresh value from the body, else from the refresh cookie
   */
  app.post('/refresh', validate('json', refreshSchema), async (c) => {
    const body = c.req.valid('json');
    const presented = transport.readRefreshToken(c, body.refreshToken);

    const result = await sessions.refresh(presented, wantsCookies(c));

    if (!result.ok) {
      transport.apply(c, transport.clear().cookies);
      return sendFailure(c, result.error);
    }
    return deliver(c, transport, result.value.delivery);
  });

  /**
   * POST /logout
   */
  app.post('/logout', optionalSessionAuth(core), async (c) => {
    const result = await sessions.logout(c.get('principal')?.id);

    if (!result.ok) return sendFailure(c, result.error);
    return deliverEmpty(c, transport, result.value);
  });

  /**
   * POST /change-password
   */
  app.post('/change-password', sessionAuth(core), validate('json', changePasswordSchema), async (c) => {
    const principal = c.get('principal');
    if (!principal) return sendFailure(c, AuthFailure.unauthorized());

    const body = c.req.valid('json');
    const result = await sessions.changePassword(principal.id, body.currentPassword, body.newPassword);

    if (!result.ok) return sendFailure(c, result.error);
    return deliverEmpty(c, transport, result.value);
  });

  /**
   * GET /me
   */
  app.get('/me', sessionAuth(core), (c) => {
    const principal = c.get('principal');
    if (!principal) return sendFailure(c, AuthFailure.unauthorized());

    const body: CurrentUserResponse = {
      id: principal.id,
      userName: principal.userName,
      email: principal.email,
      twoFactorEnabled: principal.twoFactorEnabled,
    };
    return c.json(body);
  });

  return app;
}
