/**
 * Token Codec
 *
 * Turns a registration identity into a compact printable artifact and back:
 *
 *   <PREFIX>.<registrationId>.<verification>
 *
 * `registrationId` is 32 lowercase hex characters. `verification` is the first
 * 128 bits of HMAC-SHA-256 over the prefix and identifier, keyed with the
 * registration's secret, also as lowercase hex. Encoding is deterministic, so a
 * lost code can be regenerated byte for byte.
 *
 * Decoding only checks the shape. Authenticity is established by `verify`,
 * which the caller runs against the secret held by the ledger; the embedded
 * identifier alone is never trusted.
 */

import { hmacSha256, timingSafeEqualString } from '../crypto';
import { InvalidFormatError } from '../errors';

export const DEFAULT_TOKEN_PREFIX = 'CHK1';

const DOMAIN_TAG = 'CHECKIN_TOKEN_V1';
const HEX_128 = /^[0-9a-f]{32}$/;
const PREFIX_PATTERN = /^[A-Z0-9]{1,16}$/;
const MAX_ARTIFACT_LENGTH = 128;

export interface DecodedArtifact {
  registrationId: string;
  verificationValue: string;
}

export type DecodeResult =
  | { ok: true; value: DecodedArtifact }
  | { ok: false; error: 'invalid_format'; message: string };

export type VerifyResult = 'valid' | 'forged';

export function isRegistrationId(value: string): boolean {
  return HEX_128.test(value);
}

export class TokenCodec {
  readonly prefix: string;

  constructor(prefix: string = DEFAULT_TOKEN_PREFIX) {
    if (!PREFIX_PATTERN.test(prefix)) {
      throw new InvalidFormatError(`Token prefix must be 1-16 uppercase letters or digits, got "${prefix}"`);
    }
    this.prefix = prefix;
  }

  encode(registrationId: string, secret: string): string {
    if (!isRegistrationId(registrationId)) {
      throw new InvalidFormatError(`Registration id must be 32 lowercase hex characters`);
    }
    if (!secret) {
      throw new InvalidFormatError('Registration secret is empty');
    }
    return `${this.prefix}.${registrationId}.${this.deriveVerification(registrationId, secret)}`;
  }

  decode(artifact: string): DecodeResult {
    const text = artifact.trim();
    if (text.length === 0 || text.length > MAX_ARTIFACT_LENGTH) {
      return { ok: false, error: 'invalid_format', message: 'Artifact is empty or too long' };
    }

    const parts = text.split('.');
    if (parts.length !== 3) {
      return { ok: false, error: 'invalid_format', message: 'Artifact must have three dot-separated parts' };
    }

    const [prefix, registrationId, verificationValue] = parts;
    if (prefix !== this.prefix) {
      return { ok: false, error: 'invalid_format', message: `Unsupported artifact prefix "${prefix}"` };
    }
    if (!HEX_128.test(registrationId) || !HEX_128.test(verificationValue)) {
      return { ok: false, error: 'invalid_format', message: 'Artifact fields are not 128-bit lowercase hex' };
    }

    return { ok: true, value: { registrationId, verificationValue } };
  }

  /**
   * Re-derives the verification value from the stored secret and compares it
   * with the scanned one.
   */
  verify(decoded: DecodedArtifact, secret: string): VerifyResult {
    const expected = this.deriveVerification(decoded.registrationId, secret);
    return timingSafeEqualString(expected, decoded.verificationValue) ? 'valid' : 'forged';
  }

  private deriveVerification(registrationId: string, secret: string): string {
    return hmacSha256(secret, `${DOMAIN_TAG}\u0000${this.prefix}\u0000${registrationId}`).slice(0, 32);
  }
}
