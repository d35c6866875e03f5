const utf8Decoder = new TextDecoder('utf-8');
const utf8DecoderFatal = new TextDecoder('utf-8', { fatal: true });

export function decodeUtf8(bytes: Uint8Array, fatal = false): string {
  return fatal ? utf8DecoderFatal.decode(bytes) : utf8Decoder.decode(bytes);
}

function byteAt(buf: Uint8Array, offset: number): number {
  return buf[offset] ?? 0;
}

export function readUint16LE(buf: Uint8Array, offset: number): number {
  return byteAt(buf, offset) | (byteAt(buf, offset + 1) << 8);
}

export function readUint32LE(buf: Uint8Array, offset: number): number {
  return (
    byteAt(buf, offset) |
    (byteAt(buf, offset + 1) << 8) |
    (byteAt(buf, offset + 2) << 16) |
    (byteAt(buf, offset + 3) << 24)
  ) >>> 0;
}

export function readUint64LE(buf: Uint8Array, offset: number): bigint {
  const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  return view.getBigUint64(offset, true);
}

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
