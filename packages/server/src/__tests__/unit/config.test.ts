import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  loadConfig,
  parseOptions,
  jwtOptionsSchema,
  refreshTokenOptionsSchema,
  externalAuthOptionsSchema,
} from '../../config/index.js';
import { ConfigurationError } from '../../errors/faults.js';
import { TEST_SIGNING_KEY } from '../test-setup.js';

const baseEnv = {
  JWT_SIGNING_KEY: TEST_SIGNING_KEY,
  JWT_ISSUER: 'https://auth.test',
  JWT_AUDIENCE: 'authgate-tests',
};

describe('Configuration', () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it('applies defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config.server.port).toBe(3000);
    expect(config.jwt.accessTokenLifetime).toBe(600);
    expect(config.jwt.securityStampClaim).toBe('security_stamp');
    expect(config.refreshTokens).toEqual({
      persistentLifetime: 604800,
      sessionLifetime: 86400,
      reuseRevocationScope: 'user',
    });
    expect(config.twoFactor).toEqual({
      issuer: 'Authgate',
      challengeLifetime: 300,
      maxFailedAttempts: 5,
    });
    expect(config.externalAuth.allowedRedirectUris).toEqual([]);
    expect(config.cookies.secure).toBe(false);
    expect(config.database.url).toBeUndefined();
    expect(config.devUser).toBeUndefined();
  });

  it('parses numeric and list settings', () => {
    const config = loadConfig({
      ...baseEnv,
      ACCESS_TOKEN_LIFETIME_SECONDS: '300',
      REFRESH_TOKEN_REUSE_SCOPE: 'family',
      EXTERNAL_AUTH_ALLOWED_REDIRECT_URIS: 'https://app.test/a, https://app.test/b,',
    });

    expect(config.jwt.accessTokenLifetime).toBe(300);
    expect(config.refreshTokens.reuseRevocationScope).toBe('family');
    expect(config.externalAuth.allowedRedirectUris).toEqual(['https://app.test/a', 'https://app.test/b']);
  });

  it('defaults secure cookies to production and honours COOKIE_SECURE', () => {
    expect(loadConfig({ ...baseEnv, NODE_ENV: 'production' }).cookies.secure).toBe(true);
    expect(loadConfig({ ...baseEnv, NODE_ENV: 'production', COOKIE_SECURE: 'false' }).cookies.secure).toBe(false);
    expect(loadConfig({ ...baseEnv, COOKIE_SECURE: 'true' }).cookies.secure).toBe(true);
  });

  it('reads the signing key from a secret file', () => {
    tempDir = mkdtempSync(join(tmpdir(), 'authgate-config-'));
    const keyFile = join(tempDir, 'signing-key');
    writeFileSync(keyFile, 'file-secret-file-secret-file-secret!\n');

    const config = loadConfig({
      JWT_SIGNING_KEY_FILE: keyFile,
      JWT_ISSUER: 'https://auth.test',
      JWT_AUDIENCE: 'authgate-tests',
    });

    expect(config.jwt.signingKey).toBe('file-secret-file-secret-file-secret!');
  });

  it('loads the development user', () => {
    const config = loadConfig({ ...baseEnv, DEV_USER_NAME: 'dev', DEV_USER_PASSWORD: 'test-password' });

    expect(config.devUser).toEqual({ userName: 'dev', password: 'test-password' });
  });

  it('rejects a missing signing key', () => {
    expect(() => loadConfig({ JWT_ISSUER: 'https://auth.test', JWT_AUDIENCE: 'a' })).toThrow(ConfigurationError);
  });

  it('rejects a signing key shorter than 32 bytes', () => {
    expect(() => parseOptions(jwtOptionsSchema, { signingKey: 'short', issuer: 'i', audience: 'a' }, 'jwt')).toThrow(
      'signing key must be at least 32 bytes'
    );
  });

  it('rejects a security stamp claim that collides with a reserved claim', () => {
    const attempt = () =>
      parseOptions(
        jwtOptionsSchema,
        { signingKey: TEST_SIGNING_KEY, issuer: 'i', audience: 'a', securityStampClaim: 'SUB' },
        'jwt'
      );

    expect(attempt).toThrow('security stamp claim collides with a reserved claim');
  });

  it('rejects a session lifetime above the persistent lifetime', () => {
    const attempt = () =>
      parseOptions(refreshTokenOptionsSchema, { persistentLifetime: 86400, sessionLifetime: 172800 }, 'refreshTokens');

    expect(attempt).toThrow('sessionLifetime: session lifetime must not exceed persistent lifetime');
  });

  it('rejects an enabled provider without allowed redirect URIs', () => {
    const attempt = () =>
      parseOptions(
        externalAuthOptionsSchema,
        { providers: { github: { clientId: 'test-client', clientSecret: 'test-secret' } } },
        'externalAuth'
      );

    expect(attempt).toThrow(ConfigurationError);
  });

  it('collects every issue on the error', () => {
    try {
      parseOptions(jwtOptionsSchema, { signingKey: 'short', issuer: '', audience: '' }, 'jwt');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual([
          'signingKey: signing key must be at least 32 bytes',
          'issuer: issuer is required',
          'audience: audience is required',
        ]);
      }
    }
  });
});
