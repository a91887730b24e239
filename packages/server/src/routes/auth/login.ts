import { Hono } from 'hono';
import { z } from 'zod';
import type { AppEnv } from '../../types/hono.js';
import type { SessionCore } from '../../core.js';
import { validate } from '../../middleware/validation.js';
import { wantsCookies } from '../../transport/session-transport.js';
import { sendFailure, deliver } from '../respond.js';

const loginSchema = z.object({
  username: z.string().trim().min(1, 'username is required'),
  password: z.string().min(1, 'password is required'),
  rememberMe: z.boolean().default(false),
});

const twoFactorSchema = z.object({
  challengeToken: z.string().min(1, 'challengeToken is required'),
  code: z.string().trim().min(1, 'code is required'),
});

const recoveryCodeSchema = z.object({
  challengeToken: z.string().min(1, 'challengeToken is required'),
  recoveryCode: z.string().trim().min(1, 'recoveryCode is required'),
});

export interface LoginRoutesOptions {
  core: SessionCore;
}

/**
 * Password sign-in and the second-factor step
 */
export function createLoginRoutes(options: LoginRoutesOptions): Hono<AppEnv> {
  const { sessions, transport } = options.core;
  const app = new Hono<AppEnv>();

  /**
   * POST /login
   */
  app.post('/', validate('json', loginSchema), async (c) => {
    const body = c.req.valid('json');

    const result = await sessions.login({
      identifier: body.username,
      password: body.password,
      rememberMe: body.rememberMe,
      useCookies: wantsCookies(c),
    });

    if (!result.ok) return sendFailure(c, result.error);
    return deliver(c, transport, result.value.delivery);
  });

  /**
   * POST /login/2fa
   */
  app.post('/2fa', validate('json', twoFactorSchema), async (c) => {
    const body = c.req.valid('json');

    const result = await sessions.verifyTwoFactor({
      challengeToken: body.challengeToken,
      code: body.code,
      useCookies: wantsCookies(c),
    });

    if (!result.ok) return sendFailure(c, result.error);
    return deliver(c, transport, result.value.delivery);
  });

  /**
   * POST /login/recovery-code
   */
  app.post('/recovery-code', validate('json', recoveryCodeSchema), async (c) => {
    const body = c.req.valid('json');

    const result = await sessions.verifyRecoveryCode({
      challengeToken: body.challengeToken,
      recoveryCode: body.recoveryCode,
      useCookies: wantsCookies(c),
    });

    if (!result.ok) return sendFailure(c, result.error);
    return deliver(c, transport, result.value.delivery);
  });

  return app;
}
