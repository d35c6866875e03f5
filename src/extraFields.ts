import { readUint16LE, readUint32LE, readUint64LE } from './binary.js';

export const ZIP64_EXTRA_ID = 0x0001;
export const EXTENDED_TIMESTAMP_EXTRA_ID = 0x5455;

export interface Zip64ExtraValues {
  uncompressedSize?: bigint;
  compressedSize?: bigint;
  offset?: bigint;
  diskStart?: number;
}

export function parseExtraFields(extra: Uint8Array): Map<number, Uint8Array> {
  const fields = new Map<number, Uint8Array>();
  let offset = 0;
  while (offset + 4 <= extra.length) {
    const headerId = readUint16LE(extra, offset);
    const dataEnd = offset + 4 + readUint16LE(extra, offset + 2);
    if (dataEnd > extra.length) break;
    fields.set(headerId, extra.subarray(offset + 4, dataEnd));
    offset = dataEnd;
  }
  return fields;
}

// Only the fields whose fixed-size slots hold the 0xffff(ffff) marker are present, in this order.
export function parseZip64Extra(
  data: Uint8Array,
  present: { uncompressed: boolean; compressed: boolean; offset: boolean; diskStart: boolean }
): Zip64ExtraValues {
  const values: Zip64ExtraValues = {};
  let cursor = 0;
  const take64 = (): bigint | undefined => {
    if (cursor + 8 > data.length) return undefined;
    const value = readUint64LE(data, cursor);
    cursor += 8;
    return value;
  };
  if (present.uncompressed) {
    const value = take64();
    if (value !== undefined) values.uncompressedSize = value;
  }
  if (present.compressed) {
    const value = take64();
    if (value !== undefined) values.compressedSize = value;
  }
  if (present.offset) {
    const value = take64();
    if (value !== undefined) values.offset = value;
  }
  if (present.diskStart && cursor + 4 <= data.length) {
    values.diskStart = readUint32LE(data, cursor);
  }
  return values;
}

/** Modification time from the Info-ZIP extended timestamp field, if it carries one. */
export function parseExtendedMtime(data: Uint8Array): Date | undefined {
  const flags = data[0];
  if (flags === undefined || (flags & 0x01) === 0 || data.length < 5) return undefined;
  return new Date(readUint32LE(data, 1) * 1000);
}
