import { open, type FileHandle } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

export type SeekOrigin = 'start' | 'current' | 'end';

/**
 * A byte source with a single cursor. Implementations are not expected to
 * tolerate overlapping seek/read pairs; wrap them in a PositionedReader.
 */
export interface SeekableStream {
  /** Moves the cursor and resolves with the new absolute position. */
  seek(offset: bigint, origin: SeekOrigin): Promise<bigint>;
  /** Reads into `buffer` from the cursor; resolves with 0 at end of stream. */
  read(buffer: Uint8Array): Promise<number>;
  close?(): Promise<void>;
}

function resolveSeek(offset: bigint, origin: SeekOrigin, position: bigint, size: bigint): bigint {
  const base = origin === 'start' ? 0n : origin === 'current' ? position : size;
  const next = base + offset;
  if (next < 0n) {
    throw new RangeError(`Seek to negative position ${next}`);
  }
  return next;
}

export class BufferSeekableStream implements SeekableStream {
  private position = 0n;

  constructor(private readonly data: Uint8Array) {}

  async seek(offset: bigint, origin: SeekOrigin): Promise<bigint> {
    this.position = resolveSeek(offset, origin, this.position, BigInt(this.data.length));
    return this.position;
  }

  async read(buffer: Uint8Array): Promise<number> {
    const start = Number(this.position);
    if (start >= this.data.length) return 0;
    const chunk = this.data.subarray(start, start + buffer.length);
    buffer.set(chunk, 0);
    this.position += BigInt(chunk.length);
    return chunk.length;
  }
}

export class FileSeekableStream implements SeekableStream {
  private position = 0n;

  private constructor(private readonly handle: FileHandle) {}

  static async fromPath(path: string | URL): Promise<FileSeekableStream> {
    const filePath = typeof path === 'string' ? path : fileURLToPath(path);
    return new FileSeekableStream(await open(filePath, 'r'));
  }

  async seek(offset: bigint, origin: SeekOrigin): Promise<bigint> {
    const size = origin === 'end' ? BigInt((await this.handle.stat()).size) : 0n;
    this.position = resolveSeek(offset, origin, this.position, size);
    return this.position;
  }

  async read(buffer: Uint8Array): Promise<number> {
    const position = Number(this.position);
    if (!Number.isSafeInteger(position)) {
      throw new RangeError('File offset exceeds safe integer range');
    }
    const { bytesRead } = await this.handle.read(buffer, 0, buffer.length, position);
    this.position += BigInt(bytesRead);
    return bytesRead;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
