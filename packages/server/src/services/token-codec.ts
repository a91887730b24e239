import { z } from 'zod';
import type { Principal, AccessTokenClaims } from '@authgate/shared';
import { type JwtOptions, jwtOptionsSchema, parseOptions } from '../config/index.js';
import {
  encodeSigningKey,
  signJwt,
  verifyJwt,
  joseErrors,
  generateJti,
  generateRefreshToken,
  sha256Base64Url,
} from '../crypto/index.js';
import { AuthFailure } from '../errors/auth-failure.js';
import { type Result, ok, err } from '../result.js';
import { type IClock, systemClock, toEpochSeconds } from './clock.js';

export interface IssuedAccessToken {
  token: string;
  expiresAt: Date;
}

const registeredClaimsSchema = z.object({
  sub: z.string().min(1),
  iss: z.string(),
  aud: z.union([z.string(), z.array(z.string())]),
  iat: z.number(),
  nbf: z.number(),
  exp: z.number(),
  jti: z.string(),
  unique_name: z.string(),
});

/**
 * Hash of a security stamp as embedded in access tokens
 */
export function hashSecurityStamp(securityStamp: string): string {
  return sha256Base64Url(securityStamp);
}

/**
 * Builds and verifies signed access tokens and mints opaque refresh values
 *
 * Options are validated on construction; a bad key or lifetime is a
 * startup failure, never a per-request one.
 */
export class TokenCodec {
  private readonly options: JwtOptions;
  private readonly key: Uint8Array;

  constructor(
    options: z.input<typeof jwtOptionsSchema>,
    private readonly clock: IClock = systemClock
  ) {
    this.options = parseOptions(jwtOptionsSchema, options, 'jwt');
    this.key = encodeSigningKey(this.options.signingKey);
  }

  get accessTokenLifetime(): number {
    return this.options.accessTokenLifetime;
  }

  get securityStampClaim(): string {
    return this.options.securityStampClaim;
  }

  async issueAccessToken(principal: Principal): Promise<IssuedAccessToken> {
    const issuedAt = toEpochSeconds(this.clock.now());
    const expiresAt = issuedAt + this.options.accessTokenLifetime;

    const token = await signJwt(
      {
        sub: principal.id,
        unique_name: principal.userName,
        iss: this.options.issuer,
        aud: this.options.audience,
        iat: issuedAt,
        nbf: issuedAt,
        exp: expiresAt,
        jti: generateJti(),
        [this.options.securityStampClaim]: hashSecurityStamp(principal.securityStamp),
      },
      this.key
    );

    return { token, expiresAt: new Date(expiresAt * 1000) };
  }

  /**
   * Generate an opaque refresh value (not persisted here)
   */
  issueRefreshTokenValue(): string {
    return generateRefreshToken();
  }

  async verifyAccessToken(token: string): Promise<Result<AccessTokenClaims>> {
    let payload: Record<string, unknown>;
    try {
      payload = await verifyJwt(token, this.key, {
        issuer: this.options.issuer,
        audience: this.options.audience,
        currentDate: this.clock.now(),
      });
    } catch (error) {
      if (error instanceof joseErrors.JOSEError) {
        return err(AuthFailure.unauthorized('Access token is invalid or expired.'));
      }
      throw error;
    }

    const claims = registeredClaimsSchema.safeParse(payload);
    const securityStampHash = payload[this.options.securityStampClaim];

    if (!claims.success || typeof securityStampHash !== 'string') {
      return err(AuthFailure.unauthorized('Access token is missing required claims.'));
    }

    return ok({ ...claims.data, securityStampHash });
  }
}
