import { throwIfAborted } from '../abort.js';
import { ZipError, type ZipWarning } from '../errors.js';
import type { ResolvedZipLimits } from '../limits.js';

export interface LimitTransformOptions {
  entryName: string;
  compressedSize: bigint;
  limits: ResolvedZipLimits;
  strict: boolean;
  onWarning: (warning: ZipWarning) => void;
  signal?: AbortSignal | undefined;
}

export function createLimitTransform(options: LimitTransformOptions): TransformStream<Uint8Array, Uint8Array> {
  let bytesOut = 0n;
  let ratioWarned = false;
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      throwIfAborted(options.signal);
      bytesOut += BigInt(chunk.length);
      if (bytesOut > options.limits.maxUncompressedEntryBytes) {
        throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Entry exceeds max uncompressed size', {
          entryName: options.entryName
        });
      }
      if (!ratioWarned && options.compressedSize > 0n) {
        const ratio = Number(bytesOut) / Number(options.compressedSize);
        if (ratio > options.limits.maxCompressionRatio) {
          const message = 'Compression ratio exceeds safety limit';
          if (options.strict) {
            throw new ZipError('ZIP_LIMIT_EXCEEDED', message, { entryName: options.entryName });
          }
          ratioWarned = true;
          options.onWarning({ code: 'ZIP_LIMIT_EXCEEDED', message, entryName: options.entryName });
        }
      }
      controller.enqueue(chunk);
    }
  });
}
