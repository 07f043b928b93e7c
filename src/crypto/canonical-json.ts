/**
 * Canonical JSON
 *
 * Deterministic serialization used for hashing: object keys sorted,
 * no whitespace, `undefined` members dropped. Two structurally equal
 * values always serialize to the same string regardless of key insertion order.
 */

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function canonicalJson(value: unknown): string {
  if (value === null) return 'null';

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return JSON.stringify(value);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new Error(`Canonical JSON cannot encode non-finite number ${value}`);
      }
      return JSON.stringify(value);
    case 'object':
      break;
    default:
      throw new Error(`Canonical JSON cannot encode ${typeof value}`);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item === undefined ? null : item)).join(',')}]`;
  }

  if (!isPlainObject(value)) {
    throw new Error('Canonical JSON only encodes plain objects');
  }

  const keys = Object.keys(value)
    .filter((key) => value[key] !== undefined)
    .sort();
  const members = keys.map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
  return `{${members.join(',')}}`;
}
