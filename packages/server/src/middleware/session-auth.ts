import type { MiddlewareHandler } from 'hono';
import type { Principal } from '@authgate/shared';
import type { AppEnv, AppContext } from '../types/hono.js';
import type { IIdentityStore } from '../storage/interfaces/index.js';
import type { IPrincipalCache } from '../services/principal-cache.js';
import type { SessionTransport } from '../transport/session-transport.js';
import { type TokenCodec, hashSecurityStamp } from '../services/token-codec.js';
import { constantTimeCompare } from '../crypto/index.js';
import { AuthFailure } from '../errors/auth-failure.js';
import { type Result, ok, err } from '../result.js';
import { createLogger, describeError } from '../logging/logger.js';
import { HEADER_WWW_AUTHENTICATE } from '../config/constants.js';

const logger = createLogger('session-auth');

export interface SessionAuthOptions {
  codec: TokenCodec;
  identityStore: IIdentityStore;
  principalCache: IPrincipalCache;
  transport: SessionTransport;
}

/**
 * Read-through principal lookup; cache failures fall back to the store
 */
async function loadPrincipal(options: SessionAuthOptions, userId: string): Promise<Principal | null> {
  try {
    const cached = await options.principalCache.get(userId);
    if (cached) return cached;
  } catch (error) {
    logger.warn('Principal cache read failed', { userId, ...describeError(error) });
  }

  const principal = await options.identityStore.findById(userId);
  if (principal) {
    try {
      await options.principalCache.set(principal);
    } catch (error) {
      logger.warn('Principal cache write failed', { userId, ...describeError(error) });
    }
  }
  return principal;
}

async function authenticate(options: SessionAuthOptions, token: string, c: AppContext): Promise<Result<void>> {
  const claims = await options.codec.verifyAccessToken(token);
  if (!claims.ok) return claims;

  const principal = await loadPrincipal(options, claims.value.sub);
  if (!principal) {
    return err(AuthFailure.unauthorized());
  }

  // Stamp rotated since issuance: password change, revocation, role change
  if (!constantTimeCompare(hashSecurityStamp(principal.securityStamp), claims.value.securityStampHash)) {
    return err(AuthFailure.unauthorized('Access token is no longer valid.'));
  }

  c.set('principal', principal);
  c.set('claims', claims.value);
  return ok(undefined);
}

/**
 * Require a valid access token whose security stamp is still current
 *
 * Sets `principal` and `claims` in context variables on success
 */
export function sessionAuth(options: SessionAuthOptions): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const token = options.transport.readAccessToken(c);
    const result = token ? await authenticate(options, token, c) : err(AuthFailure.unauthorized());

    if (!result.ok) {
      c.header(HEADER_WWW_AUTHENTICATE, 'Bearer error="invalid_token"');
      return c.json(result.error.toJSON(), result.error.statusCode);
    }

    await next();
  };
}

/**
 * Like sessionAuth, but an absent or invalid token just leaves `principal` unset
 */
export function optionalSessionAuth(options: SessionAuthOptions): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const token = options.transport.readAccessToken(c);
    if (token) {
      await authenticate(options, token, c);
    }
    await next();
  };
}
