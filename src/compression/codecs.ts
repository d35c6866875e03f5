import { Duplex } from 'node:stream';
import { createInflateRaw } from 'node:zlib';
import type { ZipCompressionCodec, ZipCompressionStream } from './types.js';

function nodeDuplexToWeb(duplex: Duplex): ZipCompressionStream {
  const { readable, writable } = Duplex.toWeb(duplex);
  return {
    readable: readable as ReadableStream<Uint8Array>,
    writable: writable as WritableStream<Uint8Array>
  };
}

export const STORE_CODEC: ZipCompressionCodec = {
  methodId: 0,
  name: 'store',
  createDecompressStream() {
    return new TransformStream<Uint8Array, Uint8Array>();
  }
};

export const DEFLATE_CODEC: ZipCompressionCodec = {
  methodId: 8,
  name: 'deflate',
  createDecompressStream() {
    return nodeDuplexToWeb(createInflateRaw());
  }
};
