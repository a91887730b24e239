import { describe, it, expect, beforeEach } from 'vitest';
import type { Principal } from '@authgate/shared';
import {
  createTestContext,
  createTestUser,
  enableTwoFactor,
  parseSetCookies,
  cookieValue,
  jsonRequest,
  type TestContext,
  type AuthenticationResponse,
  type LoginResponse,
  type ErrorResponse,
  TEST_PASSWORD,
  VALID_TOTP_CODE,
} from '../test-setup.js';

describe('POST /auth/login', () => {
  let ctx: TestContext;
  let user: Principal;

  beforeEach(async () => {
    ctx = createTestContext();
    user = await createTestUser(ctx.identityStore);
  });

  it('returns both tokens in the body for bearer clients', async () => {
    const res = await ctx.app.request(
      '/auth/login',
      jsonRequest({ username: 'alice', password: TEST_PASSWORD, rememberMe: true })
    );

    expect(res.status).toBe(200);
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    expect(res.headers.getSetCookie()).toEqual([]);

    const body = await res.json() as AuthenticationResponse;
    expect(body.requiresTwoFactor).toBe(false);
    expect(body.accessToken).toBeDefined();
    expect(body.refreshToken).toMatch(/^[A-Za-z0-9_-]{43}$/);

    const claims = await ctx.core.codec.verifyAccessToken(body.accessToken ?? '');
    expect(claims.ok && claims.value.sub).toBe(user.id);
  });

  it('sets HttpOnly cookies in cookie mode', async () => {
    const res = await ctx.app.request(
      '/auth/login?useCookies=true',
      jsonRequest({ username: 'alice', password: TEST_PASSWORD })
    );

    expect(res.status).toBe(200);
    const body = await res.json() as AuthenticationResponse;
    expect(body).not.toHaveProperty('accessToken');
    expect(body).not.toHaveProperty('refreshToken');

    const cookies = parseSetCookies(res);
    const access = cookies.get('access_token') ?? '';
    const refresh = cookies.get('refresh_token') ?? '';

    for (const header of [access, refresh]) {
      expect(header).toContain('; HttpOnly');
      expect(header).toContain('; Secure');
      expect(header).toContain('; SameSite=Strict');
      expect(header).toContain('; Path=/');
    }
    expect(access).toContain(`; Expires=${new Date(body.accessTokenExpiresAt).toUTCString()}`);
    // Session login: browser-session refresh cookie
    expect(refresh).not.toContain('Expires=');
    expect(cookieValue(refresh)).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });

  it('gives the refresh cookie an expiry when remembered', async () => {
    const res = await ctx.app.request(
      '/auth/login?useCookies=true',
      jsonRequest({ username: 'alice', password: TEST_PASSWORD, rememberMe: true })
    );
    const body = await res.json() as AuthenticationResponse;

    const refresh = parseSetCookies(res).get('refresh_token');
    expect(refresh).toContain(`; Expires=${new Date(body.refreshTokenExpiresAt).toUTCString()}`);
  });

  it('returns 401 for a wrong password', async () => {
    const res = await ctx.app.request('/auth/login', jsonRequest({ username: 'alice', password: 'wrong-password' }));

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: 'invalid_credentials',
      error_description: 'Invalid username or password.',
    });
  });

  it('returns 423 once the account is locked', async () => {
    for (let attempt = 0; attempt < 4; attempt++) {
      await ctx.app.request('/auth/login', jsonRequest({ username: 'alice', password: 'wrong-password' }));
    }

    const res = await ctx.app.request('/auth/login', jsonRequest({ username: 'alice', password: 'wrong-password' }));

    expect(res.status).toBe(423);
    const body = await res.json() as ErrorResponse;
    expect(body.error).toBe('account_locked');
  });

  it('validates the body', async () => {
    const res = await ctx.app.request('/auth/login', jsonRequest({ username: '  ', password: TEST_PASSWORD }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'validation_error',
      error_description: 'username: username is required',
    });
  });

  describe('with two-factor authentication', () => {
    let recoveryCodes: string[];

    beforeEach(async () => {
      recoveryCodes = await enableTwoFactor(ctx, user.id);
    });

    async function startChallenge(): Promise<string> {
      const res = await ctx.app.request(
        '/auth/login?useCookies=true',
        jsonRequest({ username: 'alice', password: TEST_PASSWORD, rememberMe: true })
      );
      expect(res.status).toBe(200);
      expect(res.headers.getSetCookie()).toEqual([]);

      const body = await res.json() as LoginResponse;
      if (!body.requiresTwoFactor) throw new Error('expected a challenge');
      return body.challengeToken;
    }

    it('completes with a TOTP code', async () => {
      const challengeToken = await startChallenge();

      const res = await ctx.app.request(
        '/auth/login/2fa?useCookies=true',
        jsonRequest({ challengeToken, code: VALID_TOTP_CODE })
      );

      expect(res.status).toBe(200);
      const body = await res.json() as AuthenticationResponse;
      const refresh = parseSetCookies(res).get('refresh_token');
      // Remember-me chosen at the password step
      expect(refresh).toContain(`; Expires=${new Date(body.refreshTokenExpiresAt).toUTCString()}`);
    });

    it('completes with a recovery code', async () => {
      const challengeToken = await startChallenge();

      const res = await ctx.app.request(
        '/auth/login/recovery-code',
        jsonRequest({ challengeToken, recoveryCode: recoveryCodes[0] })
      );

      expect(res.status).toBe(200);
      const body = await res.json() as AuthenticationResponse;
      expect(body.accessToken).toBeDefined();
    });

    it('rejects a wrong code and locks the challenge', async () => {
      const challengeToken = await startChallenge();

      for (let attempt = 0; attempt < 5; attempt++) {
        const res = await ctx.app.request('/auth/login/2fa', jsonRequest({ challengeToken, code: '000000' }));
        expect(res.status).toBe(401);
        expect((await res.json() as ErrorResponse).error).toBe('invalid_code');
      }

      const res = await ctx.app.request('/auth/login/2fa', jsonRequest({ challengeToken, code: VALID_TOTP_CODE }));

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: 'challenge_locked',
        error_description: 'Too many failed attempts. Please log in again.',
      });
    });

    it('rejects a replayed challenge', async () => {
      const challengeToken = await startChallenge();
      await ctx.app.request('/auth/login/2fa', jsonRequest({ challengeToken, code: VALID_TOTP_CODE }));

      const res = await ctx.app.request('/auth/login/2fa', jsonRequest({ challengeToken, code: VALID_TOTP_CODE }));

      expect(res.status).toBe(401);
      expect((await res.json() as ErrorResponse).error).toBe('challenge_not_found');
    });
  });
});
