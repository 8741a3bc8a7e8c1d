import { Codec } from './types.js';
import { jsonCodec } from './json.js';
import { msgpackCodec } from './msgpack.js';

const codecs = new Map<string, Codec>();

export function registerCodec(codec: Codec) {
  codecs.set(codec.name, codec);
}

export function getCodecByName(name?: string | null): Codec | undefined {
  if (!name) return undefined;
  return codecs.get(name.toLowerCase());
}

export function listCodecs(): Codec[] {
  return Array.from(codecs.values());
}

// Bootstrap defaults
registerCodec(jsonCodec);
registerCodec(msgpackCodec);
