import * as jose from 'jose';
import { JWT_ALGORITHM } from '../config/constants.js';

/**
 * HS256 signing and verification using jose
 */

/**
 * Encode a shared secret for HMAC signing
 */
export function encodeSigningKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Sign a JWT with a symmetric key
 *
 * Registered time claims (iat, nbf, exp) are expected in the payload.
 */
export async function signJwt(payload: jose.JWTPayload, key: Uint8Array): Promise<string> {
  return new jose.SignJWT(payload)
    .setProtectedHeader({
      alg: JWT_ALGORITHM,
      typ: 'JWT',
    })
    .sign(key);
}

export interface VerifyJwtOptions {
  issuer: string;
  audience: string | string[];
  currentDate: Date;
  clockTolerance?: number;
}

/**
 * Verify and decode a JWT
 *
 * Throws a jose error when the signature, issuer, audience or time claims do not check out.
 */
export async function verifyJwt(
  token: string,
  key: Uint8Array,
  options: VerifyJwtOptions
): Promise<jose.JWTPayload> {
  const { payload } = await jose.jwtVerify(token, key, {
    algorithms: [JWT_ALGORITHM],
    issuer: options.issuer,
    audience: options.audience,
    currentDate: options.currentDate,
    clockTolerance: options.clockTolerance ?? 0,
  });

  return payload;
}

export { errors as joseErrors } from 'jose';
