import * as crypto from 'crypto';

export function sha256(data: string | Buffer): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crypto.createHash('sha256').update(buffer).digest('hex');
}

export function hmacSha256(key: string | Buffer, data: string | Buffer): string {
  return crypto.createHmac('sha256', key).update(data).digest('hex');
}

/**
 * Domain-separated digest: `sha256(tag || 0x00 || body)`.
 */
export function taggedHash(tag: string, body: string | Buffer): string {
  const bodyBytes = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
  return sha256(Buffer.concat([Buffer.from(tag, 'utf8'), Buffer.from([0x00]), bodyBytes]));
}

/**
 * Compares two strings in time independent of where they first differ.
 * Strings of different length are unequal.
 */
export function timingSafeEqualString(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}

// 128-bit identifiers, 256-bit secrets
export function generateId(): string {
  return crypto.randomBytes(16).toString('hex');
}

export function generateSecret(): string {
  return crypto.randomBytes(32).toString('hex');
}

export { canonicalJson } from './canonical-json';
