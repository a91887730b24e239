import type { ExternalUserInfo, Principal } from '@authgate/shared';
import { createAuthServer } from '../app.js';
import { createSessionCore, type SessionCore, type SessionCoreOptions } from '../core.js';
import { createMemoryStorage, MemoryIdentityStore } from '../storage/memory/index.js';
import type { IStorage } from '../storage/interfaces/index.js';
import type { IExternalAuthProvider } from '../providers/external-provider.js';
import { ExternalProviderRegistry } from '../providers/registry.js';
import type { ITotpProvider } from '../crypto/totp.js';
import { MemoryAuditSink } from '../services/audit.js';
import { MemoryPrincipalCache } from '../services/principal-cache.js';
import { type IClock, addSeconds } from '../services/clock.js';
import { AuthFailure } from '../errors/auth-failure.js';
import { type Result, ok, err } from '../result.js';

/**
 * Test fixtures and helpers
 */

export const TEST_SIGNING_KEY = 'test-secret-test-secret-test-secret!';
export const TEST_ISSUER = 'https://auth.test';
export const TEST_AUDIENCE = 'authgate-tests';
export const TEST_PASSWORD = 'test-password';
export const VALID_TOTP_CODE = '123456';
export const TEST_REDIRECT_URI = 'https://app.test/callback';

export const TEST_JWT_OPTIONS = {
  signingKey: TEST_SIGNING_KEY,
  issuer: TEST_ISSUER,
  audience: TEST_AUDIENCE,
};

/**
 * Clock the test moves by hand
 *
 * Starts at the real current time so cookie expiry stays within what
 * the cookie serializer accepts.
 */
export class ManualClock implements IClock {
  private current: Date;

  constructor(start: Date = new Date()) {
    // Whole seconds keep JWT iat/exp arithmetic exact
    this.current = new Date(Math.floor(start.getTime() / 1000) * 1000);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(seconds: number): void {
    this.current = addSeconds(this.current, seconds);
  }
}

/**
 * TOTP stand-in: accepts VALID_TOTP_CODE for any secret
 */
export class FakeTotpProvider implements ITotpProvider {
  private issued = 0;

  generateSecret(): string {
    this.issued += 1;
    return `TESTSECRET${this.issued}`;
  }

  buildUri(secret: string, issuer: string, label: string): string {
    return `otpauth://totp/${encodeURIComponent(issuer)}:${encodeURIComponent(label)}?secret=${secret}&issuer=${encodeURIComponent(issuer)}`;
  }

  verify(_secret: string, code: string): boolean {
    return code === VALID_TOTP_CODE;
  }
}

type ExchangeAnswer = Result<ExternalUserInfo> | Error;

/**
 * External provider stand-in keyed by authorization code
 */
export class FakeExternalProvider implements IExternalAuthProvider {
  readonly displayName: string;
  readonly exchanges: { code: string; redirectUri: string }[] = [];
  private answers = new Map<string, ExchangeAnswer>();

  constructor(readonly name: string = 'fake') {
    this.displayName = `Fake ${name}`;
  }

  /**
   * Answer `code` with this identity (or failure, or thrown error)
   */
  answer(code: string, answer: ExternalUserInfo | ExchangeAnswer): void {
    this.answers.set(code, answer instanceof Error || 'ok' in answer ? answer : ok(answer));
  }

  buildAuthorizationUrl(state: string, redirectUri: string): string {
    const url = new URL(`https://${this.name}.test/authorize`);
    url.searchParams.set('redirect_uri', redirectUri);
    url.searchParams.set('state', state);
    return url.toString();
  }

  async exchangeCode(code: string, redirectUri: string): Promise<Result<ExternalUserInfo>> {
    this.exchanges.push({ code, redirectUri });
    const answer = this.answers.get(code);
    if (answer instanceof Error) {
      throw answer;
    }
    return answer ?? err(AuthFailure.providerExchangeFailed());
  }
}

export interface TestContext {
  app: ReturnType<typeof createAuthServer>;
  core: SessionCore;
  storage: IStorage;
  identityStore: MemoryIdentityStore;
  clock: ManualClock;
  audit: MemoryAuditSink;
  cache: MemoryPrincipalCache;
  totp: FakeTotpProvider;
  provider: FakeExternalProvider;
}

export type TestContextOverrides = Partial<
  Pick<SessionCoreOptions, 'refreshTokens' | 'twoFactor' | 'externalAuth' | 'auditSink' | 'principalCache'>
>;

/**
 * Session core and app over memory storage and fakes
 */
export function createTestContext(overrides: TestContextOverrides = {}): TestContext {
  const clock = new ManualClock();
  const storage = createMemoryStorage();
  const identityStore = new MemoryIdentityStore({ clock });
  const audit = new MemoryAuditSink();
  const cache = new MemoryPrincipalCache(300, clock);
  const totp = new FakeTotpProvider();
  const provider = new FakeExternalProvider();

  const core = createSessionCore({
    storage,
    identityStore,
    provisioner: identityStore,
    jwt: TEST_JWT_OPTIONS,
    cookies: { secure: true },
    providers: new ExternalProviderRegistry([provider]),
    totp,
    auditSink: audit,
    principalCache: cache,
    clock,
    externalAuth: { allowedRedirectUris: [TEST_REDIRECT_URI] },
    ...overrides,
  });

  const app = createAuthServer({ core, enableLogging: false });

  return { app, core, storage, identityStore, clock, audit, cache, totp, provider };
}

/**
 * Create the standard test user
 */
export function createTestUser(
  identityStore: MemoryIdentityStore,
  userName = 'alice'
): Promise<Principal> {
  return identityStore.createUser({
    userName,
    email: `${userName}@example.com`,
    emailConfirmed: true,
    password: TEST_PASSWORD,
  });
}

/**
 * Enable 2FA directly in the store, returning the plaintext recovery codes
 */
export async function enableTwoFactor(ctx: TestContext, userId: string): Promise<string[]> {
  const setup = await ctx.core.twoFactor.setup(userId);
  if (!setup.ok) throw new Error(setup.error.message);

  const enabled = await ctx.core.twoFactor.enable(userId, VALID_TOTP_CODE);
  if (!enabled.ok) throw new Error(enabled.error.message);

  return enabled.value.recoveryCodes;
}

/**
 * Collect Set-Cookie headers by cookie name
 */
export function parseSetCookies(response: Response): Map<string, string> {
  const cookies = new Map<string, string>();
  for (const header of response.headers.getSetCookie()) {
    const name = header.slice(0, header.indexOf('='));
    cookies.set(name, header);
  }
  return cookies;
}

/**
 * Value part of a Set-Cookie header
 */
export function cookieValue(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const pair = header.split(';')[0] ?? '';
  return pair.slice(pair.indexOf('=') + 1);
}

export function jsonRequest(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

export type { ErrorResponse, AuthenticationResponse, LoginResponse } from '@authgate/shared';
