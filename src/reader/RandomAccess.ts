/** Positioned byte source consumed by the ZIP parser. */
export interface RandomAccess {
  size(signal?: AbortSignal): Promise<bigint>;
  /** Reads up to `length` bytes at `offset`; a shorter result means end of data. */
  read(offset: bigint, length: number, signal?: AbortSignal): Promise<Uint8Array>;
  close(): Promise<void>;
}
