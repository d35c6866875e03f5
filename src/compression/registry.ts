import type { ZipCompressionCodec } from './types.js';
import { DEFLATE_CODEC, STORE_CODEC } from './codecs.js';

const codecs = new Map<number, ZipCompressionCodec>([
  [STORE_CODEC.methodId, STORE_CODEC],
  [DEFLATE_CODEC.methodId, DEFLATE_CODEC]
]);

/** Register a decompression codec for a ZIP method id, replacing any existing one. */
export function registerCompressionCodec(codec: ZipCompressionCodec): void {
  codecs.set(codec.methodId, codec);
}

export function getCompressionCodec(methodId: number): ZipCompressionCodec | undefined {
  return codecs.get(methodId);
}

export function listCompressionCodecs(): ZipCompressionCodec[] {
  return [...codecs.values()];
}
