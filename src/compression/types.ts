/** Readable/writable pair used by ZIP decompression codecs. */
export type ZipCompressionStream = ReadableWritablePair<Uint8Array, Uint8Array>;

/** Codec interface for ZIP compression methods. */
export type ZipCompressionCodec = {
  methodId: number;
  name: string;
  createDecompressStream(): ZipCompressionStream;
};
