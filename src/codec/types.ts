export interface Codec {
  name: string; // 'json' | 'msgpack'
  contentTypes: [string, ...string[]]; // first entry is the default response Content-Type
  encode(value: unknown): Uint8Array;
  decode(buf: Uint8Array | string): unknown;
}
