import { Hono } from 'hono';
import { z } from 'zod';
import type { AppEnv } from '../../types/hono.js';
import type { SessionCore } from '../../core.js';
import { validate } from '../../middleware/validation.js';
import { sessionAuth, optionalSessionAuth } from '../../middleware/session-auth.js';
import { wantsCookies } from '../../transport/session-transport.js';
import { AuthFailure } from '../../errors/auth-failure.js';
import { sendFailure, deliver } from '../respond.js';

const challengeSchema = z.object({
  provider: z.string().trim().min(1, 'provider is required'),
  redirectUri: z.string().url('redirectUri must be an absolute URL'),
});

const callbackSchema = z.object({
  code: z.string().min(1, 'code is required'),
  state: z.string().min(1, 'state is required'),
});

const setPasswordSchema = z.object({
  newPassword: z.string().min(8, 'newPassword must be at least 8 characters'),
});

export interface ExternalRoutesOptions {
  core: SessionCore;
}

/**
 * Sign-in with external OAuth2 providers and the account's linked providers
 */
export function createExternalRoutes(options: ExternalRoutesOptions): Hono<AppEnv> {
  const { core } = options;
  const { externalSignIn, transport } = core;
  const app = new Hono<AppEnv>();

  /**
   * GET /external/providers
   */
  app.get('/providers', (c) => c.json(externalSignIn.listProviders()));

  /**
   * POST /external/challenge
   * Returns the provider URL to send the browser to. When signed in, the
   * callback links the provider to the current account.
   */
  app.post('/challenge', optionalSessionAuth(core), validate('json', challengeSchema), async (c) => {
    const body = c.req.valid('json');

    const result = await externalSignIn.begin(body.provider, body.redirectUri, c.get('principal')?.id);
    if (!result.ok) return sendFailure(c, result.error);
    return c.json(result.value);
  });

  /**
   * POST /external/callback
   * Exchange the code the provider returned to the redirect URI
   */
  app.post('/callback', validate('json', callbackSchema), async (c) => {
    const body = c.req.valid('json');

    const result = await externalSignIn.complete({
      code: body.code,
      state: body.state,
      useCookies: wantsCookies(c),
      signal: c.req.raw.signal,
    });

    if (!result.ok) return sendFailure(c, result.error);
    if (result.value.kind === 'linked') return c.json(result.value.body);
    return deliver(c, transport, result.value.delivery);
  });

  /**
   * GET /external/linked
   */
  app.get('/linked', sessionAuth(core), async (c) => {
    const principal = c.get('principal');
    if (!principal) return sendFailure(c, AuthFailure.unauthorized());

    const result = await externalSignIn.listLinkedProviders(principal.id);
    if (!result.ok) return sendFailure(c, result.error);
    return c.json(result.value);
  });

  /**
   * DELETE /external/linked/:provider
   */
  app.delete('/linked/:provider', sessionAuth(core), async (c) => {
    const principal = c.get('principal');
    if (!principal) return sendFailure(c, AuthFailure.unauthorized());

    const result = await externalSignIn.unlinkProvider(principal.id, c.req.param('provider'));
    if (!result.ok) return sendFailure(c, result.error);
    return c.body(null, 204);
  });

  /**
   * POST /external/set-password
   * First password for an account created through a provider
   */
  app.post('/set-password', sessionAuth(core), validate('json', setPasswordSchema), async (c) => {
    const principal = c.get('principal');
    if (!principal) return sendFailure(c, AuthFailure.unauthorized());

    const body = c.req.valid('json');
    const result = await externalSignIn.setPassword(principal.id, body.newPassword);
    if (!result.ok) return sendFailure(c, result.error);
    return c.body(null, 204);
  });

  return app;
}
