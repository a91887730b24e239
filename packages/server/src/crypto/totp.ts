import { customAlphabet } from 'nanoid';
import { generateSecret, generateURI, verifySync } from 'otplib';
import {
  TOTP_DIGITS,
  TOTP_PERIOD,
  RECOVERY_CODE_ALPHABET,
  RECOVERY_CODE_COUNT,
  RECOVERY_CODE_LENGTH,
} from '../config/constants.js';
import { sha256 } from './hash.js';
import { type IClock, systemClock, toEpochSeconds } from '../services/clock.js';

/**
 * Time-based one-time password primitive (RFC 6238)
 */
export interface ITotpProvider {
  generateSecret(): string;
  buildUri(secret: string, issuer: string, label: string): string;
  verify(secret: string, code: string): boolean;
}

const TOTP_CODE_PATTERN = new RegExp(`^\\d{${TOTP_DIGITS}}$`);

/**
 * otplib-backed TOTP: SHA1, 6 digits, 30 s period, one step of drift either way
 */
export class OtplibTotpProvider implements ITotpProvider {
  constructor(private readonly clock: IClock = systemClock) {}

  generateSecret(): string {
    return generateSecret();
  }

  buildUri(secret: string, issuer: string, label: string): string {
    return generateURI({
      algorithm: 'sha1',
      digits: TOTP_DIGITS,
      issuer,
      label,
      period: TOTP_PERIOD,
      secret,
    });
  }

  verify(secret: string, code: string): boolean {
    const token = normalizeTotpCode(code);
    if (!TOTP_CODE_PATTERN.test(token)) {
      return false;
    }

    const result = verifySync({
      algorithm: 'sha1',
      digits: TOTP_DIGITS,
      epoch: toEpochSeconds(this.clock.now()),
      epochTolerance: [TOTP_PERIOD, TOTP_PERIOD],
      period: TOTP_PERIOD,
      secret,
      token,
    });

    return result.valid;
  }
}

/**
 * Strip spaces and dashes that authenticator apps display
 */
export function normalizeTotpCode(code: string): string {
  return code.replace(/[\s-]/g, '');
}

const generateRecoveryCode = customAlphabet(RECOVERY_CODE_ALPHABET, RECOVERY_CODE_LENGTH);

/**
 * Generate a fresh set of single-use recovery codes (plaintext, shown once)
 */
export function generateRecoveryCodes(count: number = RECOVERY_CODE_COUNT): string[] {
  return Array.from({ length: count }, () => generateRecoveryCode());
}

/**
 * Canonical form of a recovery code as typed by a user
 */
export function normalizeRecoveryCode(code: string): string {
  return code.replace(/[\s-]/g, '').toUpperCase();
}

/**
 * Hash a recovery code for storage
 */
export function hashRecoveryCode(code: string): string {
  return sha256(normalizeRecoveryCode(code));
}
