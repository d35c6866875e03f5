import { Crc32 } from '../crc32.js';
import { ZipError, type ZipWarning } from '../errors.js';

export interface CrcTransformOptions {
  entryName: string;
  expectedCrc: number;
  expectedSize: bigint;
  strict: boolean;
  onWarning: (warning: ZipWarning) => void;
}

/** Passes bytes through and checks CRC-32 and length once the entry is fully read. */
export function createCrcTransform(options: CrcTransformOptions): TransformStream<Uint8Array, Uint8Array> {
  const crc = new Crc32();
  let bytes = 0n;
  const report = (message: string): void => {
    if (options.strict) {
      throw new ZipError('ZIP_BAD_CRC', message, { entryName: options.entryName });
    }
    options.onWarning({ code: 'ZIP_BAD_CRC', message, entryName: options.entryName });
  };
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      crc.update(chunk);
      bytes += BigInt(chunk.length);
      controller.enqueue(chunk);
    },
    flush() {
      if (crc.digest() !== options.expectedCrc) {
        report(`CRC32 mismatch for ${options.entryName}`);
      }
      if (bytes !== options.expectedSize) {
        report(`Uncompressed size mismatch for ${options.entryName}`);
      }
    }
  });
}
