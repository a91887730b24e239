import { describe, it, expect, beforeEach } from 'vitest';
import type { ExternalChallengeResponse, LinkedProvidersResponse } from '@authgate/shared';
import { ProviderUnavailableError } from '../../errors/faults.js';
import {
  createTestContext,
  createTestUser,
  enableTwoFactor,
  parseSetCookies,
  jsonRequest,
  type TestContext,
  type AuthenticationResponse,
  type LoginResponse,
  type ErrorResponse,
  TEST_REDIRECT_URI,
  TEST_PASSWORD,
} from '../test-setup.js';

describe('External sign-in', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  async function challenge(): Promise<string> {
    const res = await ctx.app.request(
      '/auth/external/challenge',
      jsonRequest({ provider: 'fake', redirectUri: TEST_REDIRECT_URI })
    );
    expect(res.status).toBe(200);
    const { authorizationUrl } = await res.json() as ExternalChallengeResponse;
    const url = new URL(authorizationUrl);
    expect(url.searchParams.get('redirect_uri')).toBe(TEST_REDIRECT_URI);
    return url.searchParams.get('state') ?? '';
  }

  function callback(code: string, state: string, query = '') {
    return ctx.app.request(`/auth/external/callback${query}`, jsonRequest({ code, state }));
  }

  it('lists the providers', async () => {
    const res = await ctx.app.request('/auth/external/providers');

    expect(await res.json()).toEqual([{ name: 'fake', displayName: 'Fake fake' }]);
  });

  it('signs in a new user', async () => {
    ctx.provider.answer('code-1', { providerKey: 'p-1', email: 'new@example.com', emailVerified: true });
    const state = await challenge();

    const res = await callback('code-1', state);

    expect(res.status).toBe(200);
    const body = await res.json() as AuthenticationResponse;
    expect(body.isNewUser).toBe(true);
    expect(body.provider).toBe('fake');
    expect(body.accessToken).toBeDefined();
    expect(ctx.provider.exchanges).toEqual([{ code: 'code-1', redirectUri: TEST_REDIRECT_URI }]);
  });

  it('delivers cookies in cookie mode', async () => {
    ctx.provider.answer('code-1', { providerKey: 'p-1', email: 'new@example.com', emailVerified: true });
    const state = await challenge();

    const res = await callback('code-1', state, '?useCookies=true');

    expect(res.status).toBe(200);
    expect([...parseSetCookies(res).keys()]).toEqual(['access_token', 'refresh_token']);
    expect(parseSetCookies(res).get('refresh_token')).not.toContain('Expires=');
  });

  it('accepts a state only once', async () => {
    ctx.provider.answer('code-1', { providerKey: 'p-1', email: 'new@example.com', emailVerified: true });
    const state = await challenge();
    await callback('code-1', state);

    const res = await callback('code-1', state);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'validation_error',
      error_description: 'Sign-in state is invalid or has already been used.',
    });
    expect(ctx.provider.exchanges).toHaveLength(1);
  });

  it('rejects an expired state', async () => {
    const state = await challenge();

    ctx.clock.advance(600);
    const res = await callback('code-1', state);

    expect(res.status).toBe(400);
    expect((await res.json() as ErrorResponse).error_description).toBe('Sign-in state has expired.');
  });

  it('rejects an unknown state', async () => {
    const res = await callback('code-1', 'unknown-state');

    expect(res.status).toBe(400);
  });

  it('rejects a redirect URI outside the allow-list', async () => {
    const res = await ctx.app.request(
      '/auth/external/challenge',
      jsonRequest({ provider: 'fake', redirectUri: 'https://evil.test/callback' })
    );

    expect(res.status).toBe(400);
    expect((await res.json() as ErrorResponse).error_description).toBe('Redirect URI is not allowed.');
  });

  it('rejects an unknown provider', async () => {
    const res = await ctx.app.request(
      '/auth/external/challenge',
      jsonRequest({ provider: 'nope', redirectUri: TEST_REDIRECT_URI })
    );

    expect(res.status).toBe(400);
  });

  it('requires the second factor for 2FA users', async () => {
    const alice = await createTestUser(ctx.identityStore);
    await enableTwoFactor(ctx, alice.id);
    ctx.provider.answer('code-1', { providerKey: 'p-1', email: 'alice@example.com', emailVerified: true });
    const state = await challenge();

    const res = await callback('code-1', state);

    expect(res.status).toBe(200);
    expect((await res.json() as LoginResponse).requiresTwoFactor).toBe(true);
  });

  it('reports provider rejections as 400', async () => {
    const state = await challenge();

    const res = await callback('unknown-code', state);

    expect(res.status).toBe(400);
    expect((await res.json() as ErrorResponse).error).toBe('provider_exchange_failed');
  });

  it('reports provider outages as 502', async () => {
    ctx.provider.answer('code-1', new ProviderUnavailableError('fake', 'fake token returned 503'));
    const state = await challenge();

    const res = await callback('code-1', state);

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: 'provider_unavailable',
      error_description: 'The external provider is unavailable. Please try again later.',
    });
  });

  describe('linked providers', () => {
    let token: string;

    beforeEach(async () => {
      await createTestUser(ctx.identityStore);
      const res = await ctx.app.request('/auth/login', jsonRequest({ username: 'alice', password: TEST_PASSWORD }));
      token = (await res.json() as AuthenticationResponse).accessToken ?? '';
    });

    function authed(path: string, method = 'GET') {
      return ctx.app.request(path, { method, headers: { Authorization: `Bearer ${token}` } });
    }

    function authedJson(path: string, body: unknown) {
      return ctx.app.request(path, jsonRequest(body, { Authorization: `Bearer ${token}` }));
    }

    async function linkedProviders(): Promise<string[]> {
      const res = await authed('/auth/external/linked');
      expect(res.status).toBe(200);
      return (await res.json() as LinkedProvidersResponse).providers;
    }

    it('links the provider when the redirect starts signed in', async () => {
      ctx.provider.answer('code-1', { providerKey: 'p-1', email: 'work@example.com', emailVerified: true });
      const started = await authedJson('/auth/external/challenge', {
        provider: 'fake',
        redirectUri: TEST_REDIRECT_URI,
      });
      const { authorizationUrl } = await started.json() as ExternalChallengeResponse;
      const state = new URL(authorizationUrl).searchParams.get('state') ?? '';

      const res = await callback('code-1', state, '?useCookies=true');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ provider: 'fake', isLinkOnly: true });
      expect(res.headers.getSetCookie()).toEqual([]);
      expect(await linkedProviders()).toEqual(['fake']);
    });

    it('unlinks a provider', async () => {
      const alice = await ctx.identityStore.findByIdentifier('alice');
      await ctx.identityStore.addLogin(alice?.id ?? '', 'fake', 'p-1');

      const res = await authed('/auth/external/linked/fake', 'DELETE');

      expect(res.status).toBe(204);
      expect(await linkedProviders()).toEqual([]);
    });

    it('rejects unlinking a provider that is not linked', async () => {
      const res = await authed('/auth/external/linked/fake', 'DELETE');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'validation_error',
        error_description: 'This provider is not linked to your account.',
      });
    });

    it('refuses to set a password over an existing one', async () => {
      const res = await authedJson('/auth/external/set-password', { newPassword: 'new-password' });

      expect(res.status).toBe(400);
      expect((await res.json() as ErrorResponse).error_description).toBe(
        'A password is already set for this account.'
      );
    });

    it('requires authentication', async () => {
      const res = await ctx.app.request('/auth/external/linked');

      expect(res.status).toBe(401);
    });
  });
});
