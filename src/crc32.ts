const TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n += 1) {
    let c = n;
    for (let bit = 0; bit < 8; bit += 1) {
      c = (c & 1) !== 0 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

/** Incremental CRC-32 (IEEE) used to verify decompressed entry data. */
export class Crc32 {
  private state = 0xffffffff;

  update(chunk: Uint8Array): this {
    let crc = this.state;
    for (const byte of chunk) {
      crc = (TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
    }
    this.state = crc >>> 0;
    return this;
  }

  digest(): number {
    return (this.state ^ 0xffffffff) >>> 0;
  }
}

export function crc32(chunk: Uint8Array): number {
  return new Crc32().update(chunk).digest();
}
