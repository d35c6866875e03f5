import { Readable } from 'node:stream';
import { concatBytes } from '../binary.js';

export function isWebReadable(stream: unknown): stream is ReadableStream<Uint8Array> {
  return typeof stream === 'object' && stream !== null && 'getReader' in stream && typeof stream.getReader === 'function';
}

export function toWebReadable(stream: ReadableStream<Uint8Array> | Readable): ReadableStream<Uint8Array> {
  if (isWebReadable(stream)) return stream;
  return Readable.toWeb(stream) as ReadableStream<Uint8Array>;
}

/** Drains a stream into one buffer, rejecting with the stream's own error if it fails. */
export async function readAllBytes(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return concatBytes(chunks);
}
