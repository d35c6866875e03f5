import { throwIfAborted } from '../abort.js';
import type { RandomAccess } from './RandomAccess.js';
import type { SeekableStream } from './SeekableStream.js';

/**
 * Positioned reads over a single-cursor stream. Each seek+read pair runs
 * alone against the stream, however many callers are awaiting reads.
 */
export class PositionedReader implements RandomAccess {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly stream: SeekableStream,
    private readonly length: bigint
  ) {}

  /**
   * One seek and one read at `offset`, under the lock. Resolves with the
   * number of bytes placed in `buffer`; 0 means end of stream.
   */
  async readAt(buffer: Uint8Array, offset: bigint): Promise<number> {
    if (offset < 0n) {
      throw new RangeError(`Negative read offset ${offset}`);
    }
    return this.exclusive(async () => {
      await this.stream.seek(offset, 'start');
      return this.stream.read(buffer);
    });
  }

  async size(signal?: AbortSignal): Promise<bigint> {
    throwIfAborted(signal);
    return this.length;
  }

  async read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    throwIfAborted(signal);
    if (length <= 0 || offset >= this.length) return new Uint8Array(0);
    const available = this.length - offset;
    const wanted = available < BigInt(length) ? Number(available) : length;
    const buffer = new Uint8Array(wanted);
    let filled = 0;
    while (filled < wanted) {
      const bytesRead = await this.readAt(buffer.subarray(filled), offset + BigInt(filled));
      if (bytesRead === 0) break;
      filled += bytesRead;
      throwIfAborted(signal);
    }
    return filled === wanted ? buffer : buffer.subarray(0, filled);
  }

  async close(): Promise<void> {
    await this.exclusive(async () => {
      await this.stream.close?.();
    });
  }

  private async exclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => held);
    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}
