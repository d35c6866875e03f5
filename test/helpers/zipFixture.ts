import { deflateRawSync } from 'node:zlib';
import { concatBytes } from '../../src/binary.js';
import { crc32 } from '../../src/crc32.js';
import { dateToDos } from '../../src/dosTime.js';

export type FixtureEntry = {
  name: string;
  data?: Uint8Array | string;
  method?: number;
  mtime?: Date;
  /** Unix mode stored in the external attributes. */
  mode?: number;
  /** Bytes written as the entry's compressed data instead of encoding `data`. */
  compressed?: Uint8Array;
  /** CRC written to the headers instead of the real one. */
  crc32?: number;
};

export type FixtureOptions = {
  comment?: string;
  zip64?: boolean;
  /** Bytes appended after the end of central directory record. */
  trailing?: Uint8Array;
};

export const FIXTURE_MTIME = new Date(2024, 4, 17, 9, 30, 12);

const encoder = new TextEncoder();

function bytesOf(value: Uint8Array | string | undefined): Uint8Array {
  if (value === undefined) return new Uint8Array(0);
  return typeof value === 'string' ? encoder.encode(value) : value;
}

function record(size: number, fill: (view: DataView) => void): Uint8Array {
  const out = new Uint8Array(size);
  fill(new DataView(out.buffer));
  return out;
}

/** Builds a complete zip archive in memory. */
export function buildZip(entries: FixtureEntry[], options: FixtureOptions = {}): Uint8Array {
  const parts: Uint8Array[] = [];
  const central: Uint8Array[] = [];
  let offset = 0;

  for (const entry of entries) {
    const name = encoder.encode(entry.name);
    const data = bytesOf(entry.data);
    const method = entry.method ?? 0;
    const payload = entry.compressed ?? (method === 8 ? new Uint8Array(deflateRawSync(data)) : data);
    const crc = entry.crc32 ?? crc32(data);
    const dos = dateToDos(entry.mtime ?? FIXTURE_MTIME);
    const mode = entry.mode ?? (entry.name.endsWith('/') ? 0o040755 : 0o100644);

    const local = record(30, (view) => {
      view.setUint32(0, 0x04034b50, true);
      view.setUint16(4, 20, true);
      view.setUint16(6, 0x0800, true);
      view.setUint16(8, method, true);
      view.setUint16(10, dos.time, true);
      view.setUint16(12, dos.date, true);
      view.setUint32(14, crc, true);
      view.setUint32(18, payload.length, true);
      view.setUint32(22, data.length, true);
      view.setUint16(26, name.length, true);
    });
    parts.push(local, name, payload);

    const headerOffset = offset;
    central.push(
      record(46, (view) => {
        view.setUint32(0, 0x02014b50, true);
        view.setUint16(4, (3 << 8) | 20, true);
        view.setUint16(6, 20, true);
        view.setUint16(8, 0x0800, true);
        view.setUint16(10, method, true);
        view.setUint16(12, dos.time, true);
        view.setUint16(14, dos.date, true);
        view.setUint32(16, crc, true);
        view.setUint32(20, payload.length, true);
        view.setUint32(24, data.length, true);
        view.setUint16(28, name.length, true);
        view.setUint32(38, (mode << 16) >>> 0, true);
        view.setUint32(42, headerOffset, true);
      }),
      name
    );
    offset += local.length + name.length + payload.length;
  }

  const cd = concatBytes(central);
  const cdOffset = offset;
  parts.push(cd);
  offset += cd.length;

  if (options.zip64) {
    const zip64EocdOffset = offset;
    parts.push(
      record(56, (view) => {
        view.setUint32(0, 0x06064b50, true);
        view.setBigUint64(4, 44n, true);
        view.setUint16(12, 45, true);
        view.setUint16(14, 45, true);
        view.setBigUint64(24, BigInt(entries.length), true);
        view.setBigUint64(32, BigInt(entries.length), true);
        view.setBigUint64(40, BigInt(cd.length), true);
        view.setBigUint64(48, BigInt(cdOffset), true);
      }),
      record(20, (view) => {
        view.setUint32(0, 0x07064b50, true);
        view.setBigUint64(8, BigInt(zip64EocdOffset), true);
        view.setUint32(16, 1, true);
      })
    );
  }

  const comment = encoder.encode(options.comment ?? '');
  parts.push(
    record(22, (view) => {
      view.setUint32(0, 0x06054b50, true);
      view.setUint16(8, options.zip64 ? 0xffff : entries.length, true);
      view.setUint16(10, options.zip64 ? 0xffff : entries.length, true);
      view.setUint32(12, options.zip64 ? 0xffffffff : cd.length, true);
      view.setUint32(16, options.zip64 ? 0xffffffff : cdOffset, true);
      view.setUint16(20, comment.length, true);
    }),
    comment
  );
  if (options.trailing) parts.push(options.trailing);
  return concatBytes(parts);
}

/** The three-entry layout used across the file system tests. */
export function sampleZip(): Uint8Array {
  return buildZip([
    { name: 'a.txt', data: 'alpha contents\n' },
    { name: 'dir/' },
    { name: 'dir/b.txt', data: 'bravo '.repeat(200), method: 8 }
  ]);
}
