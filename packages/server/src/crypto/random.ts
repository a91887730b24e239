import { randomBytes } from 'node:crypto';
import { OPAQUE_TOKEN_BYTES } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as base64url string
 */
export function generateRandomBase64Url(length: number): string {
  return randomBytes(length).toString('base64url');
}

/**
 * Generate an opaque refresh token value (256 bits)
 */
export function generateRefreshToken(length: number = OPAQUE_TOKEN_BYTES): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate an opaque two-factor challenge token
 */
export function generateChallengeToken(length: number = OPAQUE_TOKEN_BYTES): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate an OAuth state value for external sign-in
 */
export function generateStateToken(length: number = OPAQUE_TOKEN_BYTES): string {
  return generateRandomBase64Url(length);
}

/**
 * Generate a unique JWT ID (jti)
 */
export function generateJti(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a unique ID for database records
 */
export function generateId(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a token family ID for refresh token rotation tracking
 */
export function generateFamilyId(): string {
  return generateRandomBase64Url(16);
}

/**
 * Generate a fresh security stamp
 */
export function generateSecurityStamp(): string {
  return generateRandomBase64Url(24);
}
