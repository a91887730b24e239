import { describe, it, expect } from 'vitest';
import { generateSync } from 'otplib';
import {
  sha256,
  sha256Base64Url,
  constantTimeCompare,
  hashPassword,
  verifyPassword,
  hashToken,
  generateRefreshToken,
  generateRecoveryCodes,
  normalizeRecoveryCode,
  hashRecoveryCode,
  normalizeTotpCode,
  OtplibTotpProvider,
} from '../../crypto/index.js';
import { RECOVERY_CODE_ALPHABET } from '../../config/constants.js';
import { toEpochSeconds } from '../../services/clock.js';
import { ManualClock } from '../test-setup.js';

function flipBit(value: string, index: number): string {
  const buffer = Buffer.from(value, 'utf8');
  buffer[index] = (buffer[index] ?? 0) ^ 0x01;
  return buffer.toString('utf8');
}

describe('Token hashing', () => {
  it('produces a 64 character hex digest', () => {
    expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('produces base64url without padding', () => {
    expect(sha256Base64Url('abc')).toBe('ungWv48Bz-pBQUDeXa4iI7ADYaOWF3qctBD_YfIAFa0');
  });

  it('matches the stored hash for an unmodified value', () => {
    const value = generateRefreshToken();
    const stored = hashToken(value);

    expect(hashToken(value)).toBe(stored);
  });

  it('never matches after a single-bit mutation', () => {
    const value = generateRefreshToken();
    const stored = hashToken(value);

    for (let index = 0; index < value.length; index++) {
      expect(hashToken(flipBit(value, index))).not.toBe(stored);
    }
  });

  it('generates 256-bit url-safe refresh values', () => {
    const value = generateRefreshToken();

    expect(value).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(Buffer.from(value, 'base64url')).toHaveLength(32);
  });
});

describe('constantTimeCompare', () => {
  it('compares equal and unequal strings', () => {
    expect(constantTimeCompare('same', 'same')).toBe(true);
    expect(constantTimeCompare('same', 'diff')).toBe(false);
  });

  it('returns false for different lengths', () => {
    expect(constantTimeCompare('short', 'longer')).toBe(false);
  });
});

describe('Password hashing', () => {
  it('verifies the original password only', async () => {
    const hash = await hashPassword('test-password');

    expect(hash.startsWith('$scrypt$16384$8$1$')).toBe(true);
    expect(await verifyPassword('test-password', hash)).toBe(true);
    expect(await verifyPassword('test-passwore', hash)).toBe(false);
  });

  it('rejects malformed hashes', async () => {
    expect(await verifyPassword('test-password', 'plain')).toBe(false);
    expect(await verifyPassword('test-password', '$bcrypt$10$abc')).toBe(false);
  });
});

describe('Recovery codes', () => {
  it('generates ten codes from the unambiguous alphabet', () => {
    const codes = generateRecoveryCodes();

    expect(codes).toHaveLength(10);
    for (const code of codes) {
      expect(code).toHaveLength(8);
      expect([...code].every((char) => RECOVERY_CODE_ALPHABET.includes(char))).toBe(true);
    }
  });

  it('normalizes case, spaces and dashes', () => {
    expect(normalizeRecoveryCode(' ab12-cd34 ')).toBe('AB12CD34');
    expect(hashRecoveryCode('ab12-cd34')).toBe(hashRecoveryCode('AB12CD34'));
  });
});

describe('TOTP', () => {
  it('strips separators from typed codes', () => {
    expect(normalizeTotpCode('123 456')).toBe('123456');
    expect(normalizeTotpCode('123-456')).toBe('123456');
  });

  it('rejects codes that are not six digits', () => {
    const totp = new OtplibTotpProvider();
    const secret = totp.generateSecret();

    expect(totp.verify(secret, 'abcdef')).toBe(false);
    expect(totp.verify(secret, '12345')).toBe(false);
  });

  it('checks codes against the injected clock', () => {
    const clock = new ManualClock(new Date('2021-06-01T12:00:00.000Z'));
    const totp = new OtplibTotpProvider(clock);
    const secret = totp.generateSecret();
    const code = generateSync({
      algorithm: 'sha1',
      digits: 6,
      epoch: toEpochSeconds(clock.now()),
      period: 30,
      secret,
    });

    expect(totp.verify(secret, code)).toBe(true);

    clock.advance(3600);
    expect(totp.verify(secret, code)).toBe(false);
  });

  it('builds an otpauth URI carrying the secret', () => {
    const totp = new OtplibTotpProvider();
    const secret = totp.generateSecret();
    const uri = totp.buildUri(secret, 'Authgate', 'alice@example.com');

    expect(uri.startsWith('otpauth://totp/')).toBe(true);
    expect(uri).toContain(`secret=${secret}`);
  });
});
