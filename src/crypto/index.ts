import * as crypto from 'crypto';

export function sha256(data: string | Buffer): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return crypto.createHash('sha256').update(buffer).digest('hex');
}

/**
 * Deterministic JSON: object keys sorted, bigint rendered as a decimal
 * string, undefined members dropped. Two structurally equal values always
 * encode to the same string, so the encoding can be hashed.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(canonicalize);
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) sorted[key] = canonicalize(member);
    }
    return sorted;
  }
  return value;
}
