import { InvalidFormatError } from '../errors';
import { TokenCodec, isRegistrationId } from './token-codec';

const REGISTRATION_ID = '0123456789abcdef0123456789abcdef';
const SECRET = 'test-secret';

describe('TokenCodec', () => {
  const codec = new TokenCodec();

  it('encodes deterministically for the same identity and secret', () => {
    const first = codec.encode(REGISTRATION_ID, SECRET);
    const second = new TokenCodec().encode(REGISTRATION_ID, SECRET);

    expect(first).toBe(second);
    expect(first).toMatch(/^CHK1\.0123456789abcdef0123456789abcdef\.[0-9a-f]{32}$/);
  });

  it('derives different verification values for different secrets', () => {
    expect(codec.encode(REGISTRATION_ID, SECRET)).not.toBe(codec.encode(REGISTRATION_ID, 'other-secret'));
  });

  it('decodes what it encodes and verifies against the secret', () => {
    const artifact = codec.encode(REGISTRATION_ID, SECRET);
    const decoded = codec.decode(artifact);

    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;
    expect(decoded.value.registrationId).toBe(REGISTRATION_ID);
    expect(codec.verify(decoded.value, SECRET)).toBe('valid');
    expect(codec.verify(decoded.value, 'wrong-secret')).toBe('forged');
  });

  it('ignores surrounding whitespace from scanners', () => {
    const artifact = codec.encode(REGISTRATION_ID, SECRET);
    expect(codec.decode(`  ${artifact}\n`).ok).toBe(true);
  });

  it.each([
    ['empty input', ''],
    ['two parts', `CHK1.${REGISTRATION_ID}`],
    ['four parts', `CHK1.${REGISTRATION_ID}.${'a'.repeat(32)}.x`],
    ['wrong prefix', `CHK2.${REGISTRATION_ID}.${'a'.repeat(32)}`],
    ['uppercase hex', `CHK1.${REGISTRATION_ID.toUpperCase()}.${'a'.repeat(32)}`],
    ['short verification', `CHK1.${REGISTRATION_ID}.${'a'.repeat(31)}`],
    ['non-hex identifier', `CHK1.${'g'.repeat(32)}.${'a'.repeat(32)}`],
    ['oversized input', 'x'.repeat(200)],
  ])('rejects %s as invalid_format', (_label, artifact) => {
    const decoded = codec.decode(artifact);
    expect(decoded.ok).toBe(false);
    if (decoded.ok) return;
    expect(decoded.error).toBe('invalid_format');
  });

  it('flags every single-character change of the verification value as forged', () => {
    const artifact = codec.encode(REGISTRATION_ID, SECRET);
    const verificationStart = artifact.lastIndexOf('.') + 1;

    for (let i = verificationStart; i < artifact.length; i++) {
      const replacement = artifact[i] === '0' ? '1' : '0';
      const altered = artifact.slice(0, i) + replacement + artifact.slice(i + 1);
      const decoded = codec.decode(altered);
      expect(decoded.ok).toBe(true);
      if (!decoded.ok) continue;
      expect(codec.verify(decoded.value, SECRET)).toBe('forged');
    }
  });

  it('binds the verification value to the prefix', () => {
    const other = new TokenCodec('EVT9');
    const artifact = other.encode(REGISTRATION_ID, SECRET);
    const reprefixed = artifact.replace(/^EVT9/, 'CHK1');
    const decoded = codec.decode(reprefixed);

    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;
    expect(codec.verify(decoded.value, SECRET)).toBe('forged');
  });

  it('refuses to encode malformed identifiers and prefixes', () => {
    expect(() => codec.encode('not-an-id', SECRET)).toThrow(InvalidFormatError);
    expect(() => codec.encode(REGISTRATION_ID, '')).toThrow(InvalidFormatError);
    expect(() => new TokenCodec('chk1')).toThrow(InvalidFormatError);
  });

  it('recognises registration ids', () => {
    expect(isRegistrationId(REGISTRATION_ID)).toBe(true);
    expect(isRegistrationId(REGISTRATION_ID.slice(1))).toBe(false);
  });
});
