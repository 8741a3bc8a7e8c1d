import { Packr } from 'msgpackr';
import { Codec } from './types.js';

const packr = new Packr({ useRecords: false });

export const msgpackCodec: Codec = {
  name: 'msgpack',
  // Standard + vendor media type; x- prefix kept for older clients
  contentTypes: ['application/msgpack', 'application/vnd.msgpack', 'application/x-msgpack'],
  encode(value: unknown): Uint8Array {
    if (typeof value === 'function' || typeof value === 'symbol') {
      throw new TypeError(`unsupported type: ${typeof value}`);
    }
    return packr.pack(value);
  },
  decode(buf: Uint8Array | string): unknown {
    const b = typeof buf === 'string' ? Buffer.from(buf, 'binary') : Buffer.from(buf);
    return packr.unpack(b);
  }
};
