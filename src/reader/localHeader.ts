import { readUint16LE, readUint32LE } from '../binary.js';
import { ZipError } from '../errors.js';
import type { ZipEntry } from '../types.js';
import type { RandomAccess } from './RandomAccess.js';

const LFH_SIGNATURE = 0x04034b50;
const LFH_SIZE = 30;

export interface LocalHeaderInfo {
  flags: number;
  method: number;
  dataOffset: bigint;
}

export async function readLocalHeader(
  reader: RandomAccess,
  entry: ZipEntry,
  signal?: AbortSignal
): Promise<LocalHeaderInfo> {
  const header = await reader.read(entry.offset, LFH_SIZE, signal);
  if (header.length < LFH_SIZE || readUint32LE(header, 0) !== LFH_SIGNATURE) {
    throw new ZipError('ZIP_INVALID_SIGNATURE', 'Invalid local file header signature', {
      entryName: entry.name,
      offset: entry.offset
    });
  }
  // Sizes and CRC in the local header may be zero (data descriptor); the central directory is authoritative.
  const nameLen = readUint16LE(header, 26);
  const extraLen = readUint16LE(header, 28);
  return {
    flags: readUint16LE(header, 6),
    method: readUint16LE(header, 8),
    dataOffset: entry.offset + BigInt(LFH_SIZE + nameLen + extraLen)
  };
}
