import { describe, it, expect, beforeEach } from 'vitest';
import type { TwoFactorSetupResponse, RecoveryCodesResponse } from '@authgate/shared';
import {
  createTestContext,
  createTestUser,
  jsonRequest,
  type TestContext,
  type AuthenticationResponse,
  type LoginResponse,
  type ErrorResponse,
  TEST_PASSWORD,
  VALID_TOTP_CODE,
} from '../test-setup.js';

describe('Two-factor endpoints', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = createTestContext();
    await createTestUser(ctx.identityStore);
  });

  async function accessToken(): Promise<string> {
    const res = await ctx.app.request('/auth/login', jsonRequest({ username: 'alice', password: TEST_PASSWORD }));
    const body = await res.json() as AuthenticationResponse;
    return body.accessToken ?? '';
  }

  function post(path: string, token: string, body: unknown = {}) {
    return ctx.app.request(path, jsonRequest(body, { Authorization: `Bearer ${token}` }));
  }

  it('enrols an authenticator', async () => {
    const token = await accessToken();

    const setup = await post('/auth/2fa/setup', token);
    expect(setup.status).toBe(200);
    expect(await setup.json() as TwoFactorSetupResponse).toEqual({
      sharedKey: 'TESTSECRET1',
      authenticatorUri: 'otpauth://totp/Authgate:alice%40example.com?secret=TESTSECRET1&issuer=Authgate',
    });

    const enable = await post('/auth/2fa/enable', token, { code: VALID_TOTP_CODE });
    expect(enable.status).toBe(200);
    const { recoveryCodes } = await enable.json() as RecoveryCodesResponse;
    expect(recoveryCodes).toHaveLength(10);

    // Enabling rotates the security stamp
    expect((await post('/auth/2fa/setup', token)).status).toBe(401);

    const login = await ctx.app.request('/auth/login', jsonRequest({ username: 'alice', password: TEST_PASSWORD }));
    const body = await login.json() as LoginResponse;
    expect(body.requiresTwoFactor).toBe(true);
  });

  it('rejects a wrong enrolment code', async () => {
    const token = await accessToken();
    await post('/auth/2fa/setup', token);

    const res = await post('/auth/2fa/enable', token, { code: '000000' });

    expect(res.status).toBe(401);
    expect((await res.json() as ErrorResponse).error).toBe('invalid_code');
  });

  it('requires authentication', async () => {
    const res = await ctx.app.request('/auth/2fa/setup', { method: 'POST' });

    expect(res.status).toBe(401);
  });

  describe('once enabled', () => {
    let token: string;

    beforeEach(async () => {
      const initial = await accessToken();
      await post('/auth/2fa/setup', initial);
      await post('/auth/2fa/enable', initial, { code: VALID_TOTP_CODE });

      const login = await ctx.app.request('/auth/login', jsonRequest({ username: 'alice', password: TEST_PASSWORD }));
      const challenge = await login.json() as LoginResponse;
      if (!challenge.requiresTwoFactor) throw new Error('expected a challenge');

      const verified = await ctx.app.request(
        '/auth/login/2fa',
        jsonRequest({ challengeToken: challenge.challengeToken, code: VALID_TOTP_CODE })
      );
      token = (await verified.json() as AuthenticationResponse).accessToken ?? '';
    });

    it('regenerates recovery codes with the password', async () => {
      const res = await post('/auth/2fa/recovery-codes', token, { password: TEST_PASSWORD });

      expect(res.status).toBe(200);
      expect((await res.json() as RecoveryCodesResponse).recoveryCodes).toHaveLength(10);
    });

    it('refuses to disable without the password', async () => {
      const res = await post('/auth/2fa/disable', token, { password: 'wrong-password' });

      expect(res.status).toBe(401);
    });

    it('disables 2FA', async () => {
      const res = await post('/auth/2fa/disable', token, { password: TEST_PASSWORD });

      expect(res.status).toBe(204);
      const login = await ctx.app.request('/auth/login', jsonRequest({ username: 'alice', password: TEST_PASSWORD }));
      expect((await login.json() as LoginResponse).requiresTwoFactor).toBe(false);
    });
  });
});
