import { throwIfAborted } from '../abort.js';
import { getCompressionCodec } from '../compression/registry.js';
import { ZipError, type ZipWarning } from '../errors.js';
import type { ResolvedZipLimits } from '../limits.js';
import { createCrcTransform } from '../streams/crcTransform.js';
import { createLimitTransform } from '../streams/limits.js';
import type { ZipEntry } from '../types.js';
import { readLocalHeader } from './localHeader.js';
import type { RandomAccess } from './RandomAccess.js';

const RANGE_CHUNK_SIZE = 64 * 1024;

export interface OpenEntryOptions {
  strict: boolean;
  limits: ResolvedZipLimits;
  onWarning: (warning: ZipWarning) => void;
  signal?: AbortSignal | undefined;
}

export async function openEntryStream(
  reader: RandomAccess,
  entry: ZipEntry,
  options: OpenEntryOptions
): Promise<ReadableStream<Uint8Array>> {
  const local = await readLocalHeader(reader, entry, options.signal);
  if (entry.encrypted || (local.flags & 0x1) !== 0) {
    throw new ZipError('ZIP_UNSUPPORTED_ENCRYPTION', 'Encrypted entries are not supported', {
      entryName: entry.name
    });
  }
  const codec = getCompressionCodec(entry.method);
  if (!codec) {
    throw new ZipError('ZIP_UNSUPPORTED_METHOD', `Unsupported compression method ${entry.method}`, {
      entryName: entry.name,
      method: entry.method
    });
  }
  return createRangeStream(reader, local.dataOffset, entry.compressedSize, options.signal)
    .pipeThrough(codec.createDecompressStream())
    .pipeThrough(
      createLimitTransform({
        entryName: entry.name,
        compressedSize: entry.compressedSize,
        limits: options.limits,
        strict: options.strict,
        onWarning: options.onWarning,
        signal: options.signal
      })
    )
    .pipeThrough(
      createCrcTransform({
        entryName: entry.name,
        expectedCrc: entry.crc32,
        expectedSize: entry.uncompressedSize,
        strict: options.strict,
        onWarning: options.onWarning
      })
    );
}

function createRangeStream(
  reader: RandomAccess,
  offset: bigint,
  length: bigint,
  signal?: AbortSignal
): ReadableStream<Uint8Array> {
  let position = offset;
  let remaining = length;

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      throwIfAborted(signal);
      if (remaining <= 0n) {
        controller.close();
        return;
      }
      const size = remaining > BigInt(RANGE_CHUNK_SIZE) ? RANGE_CHUNK_SIZE : Number(remaining);
      const chunk = await reader.read(position, size, signal);
      if (chunk.length === 0) {
        controller.error(new ZipError('ZIP_TRUNCATED', 'Entry data truncated', { offset: position }));
        return;
      }
      position += BigInt(chunk.length);
      remaining -= BigInt(chunk.length);
      controller.enqueue(chunk);
    }
  });
}
