import { Codec } from './types.js';

function mapToObject(map: Map<unknown, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, entry] of map) {
    if (typeof key !== 'string') throw new TypeError(`unsupported Map key type: ${typeof key}`);
    out[key] = entry;
  }
  return out;
}

// JSON.stringify silently drops or rewrites these; a response must not.
function rejectUnrepresentable(_key: string, value: unknown): unknown {
  switch (typeof value) {
    case 'function':
    case 'symbol':
      throw new TypeError(`unsupported type: ${typeof value}`);
    case 'number':
      if (!Number.isFinite(value)) throw new TypeError(`unsupported value: ${value}`);
      return value;
    case 'object':
      if (value instanceof Set) return Array.from(value);
      if (value instanceof Map) return mapToObject(value);
      return value;
    default:
      return value;
  }
}

export const jsonCodec: Codec = {
  name: 'json',
  contentTypes: ['application/json', 'text/json'],
  encode(value: unknown): Uint8Array {
    const s = JSON.stringify(value, rejectUnrepresentable, 2);
    // top-level undefined has no JSON form; treat it as an absent value
    return Buffer.from(s === undefined ? 'null' : s, 'utf8');
  },
  decode(buf: Uint8Array | string): unknown {
    const s = typeof buf === 'string' ? buf : Buffer.from(buf).toString('utf8');
    return JSON.parse(s);
  }
};
