import { EncodeError } from '../errors.js';
import type { HeaderValues, Payload, ResponseHeaders } from '../resource/types.js';
import { Codec } from './types.js';

export interface EncodedBody {
  body: Buffer;
  /** True only when the payload went through the codec. */
  structured: boolean;
}

/**
 * Turns a payload into response bytes. Text and bytes pass through; a
 * structured value is serialized by `codec`, and a failure there surfaces
 * as `EncodeError`.
 */
export function encodePayload(payload: Payload, codec: Codec): EncodedBody {
  switch (payload.kind) {
    case 'text':
      return { body: Buffer.from(payload.text, 'utf8'), structured: false };
    case 'bytes':
      return { body: Buffer.isBuffer(payload.bytes) ? payload.bytes : Buffer.from(payload.bytes), structured: false };
    case 'structured': {
      let encoded: Uint8Array;
      try {
        encoded = codec.encode(payload.value);
      } catch (err) {
        throw new EncodeError(codec.name, { cause: err });
      }
      return { body: Buffer.isBuffer(encoded) ? encoded : Buffer.from(encoded), structured: true };
    }
  }
}

function firstValue(values: HeaderValues): string | undefined {
  return typeof values === 'string' ? values : values[0];
}

export function getHeader(headers: ResponseHeaders | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, values] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return firstValue(values);
  }
  return undefined;
}

/**
 * Adds `contentType` unless the handler already set a non-empty
 * Content-Type. An empty explicit value is replaced. Returns a new record;
 * the handler's headers are not modified.
 */
export function withDefaultContentType(headers: ResponseHeaders | undefined, contentType: string): ResponseHeaders {
  if (!contentType) return headers ?? {};
  if (getHeader(headers, 'content-type')) return headers ?? {};
  const out: Record<string, HeaderValues> = {};
  for (const [key, values] of Object.entries(headers ?? {})) {
    if (key.toLowerCase() !== 'content-type') out[key] = values;
  }
  out['Content-Type'] = contentType;
  return out;
}
