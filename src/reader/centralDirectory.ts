import { throwIfAborted } from '../abort.js';
import { decodeUtf8, readUint16LE, readUint32LE } from '../binary.js';
import { dosToDate } from '../dosTime.js';
import { ZipError, type ZipWarning } from '../errors.js';
import {
  EXTENDED_TIMESTAMP_EXTRA_ID,
  ZIP64_EXTRA_ID,
  parseExtendedMtime,
  parseExtraFields,
  parseZip64Extra
} from '../extraFields.js';
import { entryMode, isDirectoryMode } from '../fileMode.js';
import type { ZipEntry } from '../types.js';
import type { RandomAccess } from './RandomAccess.js';

const CDFH_SIGNATURE = 0x02014b50;
const CDFH_MIN_SIZE = 46;
const FLAG_ENCRYPTED = 0x0001;
const FLAG_UTF8 = 0x0800;

export interface CentralDirectoryOptions {
  strict: boolean;
  maxEntries: number;
  onWarning: (warning: ZipWarning) => void;
  signal?: AbortSignal | undefined;
}

export async function readCentralDirectory(
  reader: RandomAccess,
  cdOffset: bigint,
  cdSize: bigint,
  totalEntries: bigint,
  options: CentralDirectoryOptions
): Promise<ZipEntry[]> {
  const buffer = await reader.read(cdOffset, Number(cdSize), options.signal);
  if (BigInt(buffer.length) < cdSize) {
    throw new ZipError('ZIP_TRUNCATED', 'Central directory truncated', { offset: cdOffset });
  }

  const entries: ZipEntry[] = [];
  let ptr = 0;
  while (buffer.length - ptr >= CDFH_MIN_SIZE) {
    throwIfAborted(options.signal);
    if (readUint32LE(buffer, ptr) !== CDFH_SIGNATURE) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Invalid central directory signature', {
        offset: cdOffset + BigInt(ptr)
      });
    }
    const entrySize =
      CDFH_MIN_SIZE + readUint16LE(buffer, ptr + 28) + readUint16LE(buffer, ptr + 30) + readUint16LE(buffer, ptr + 32);
    if (ptr + entrySize > buffer.length) {
      throw new ZipError('ZIP_TRUNCATED', 'Central directory truncated', { offset: cdOffset + BigInt(ptr) });
    }
    entries.push(parseEntry(buffer.subarray(ptr, ptr + entrySize), options));
    if (entries.length > options.maxEntries) {
      throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Too many entries in ZIP', {
        context: { limitEntries: String(options.maxEntries) }
      });
    }
    ptr += entrySize;
  }

  if (ptr !== buffer.length) {
    if (options.strict) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Central directory has trailing data');
    }
    options.onWarning({
      code: 'ZIP_BAD_CENTRAL_DIRECTORY',
      message: 'Central directory has trailing data; ignoring'
    });
  }
  if (BigInt(entries.length) !== totalEntries) {
    if (options.strict) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Central directory entry count mismatch', {
        context: { expected: totalEntries.toString(), parsed: String(entries.length) }
      });
    }
    options.onWarning({
      code: 'ZIP_BAD_CENTRAL_DIRECTORY',
      message: 'Central directory entry count mismatch; using parsed entries'
    });
  }
  return entries;
}

function parseEntry(record: Uint8Array, options: CentralDirectoryOptions): ZipEntry {
  const madeBy = readUint16LE(record, 4);
  const flags = readUint16LE(record, 8);
  const method = readUint16LE(record, 10);
  const modTime = readUint16LE(record, 12);
  const modDate = readUint16LE(record, 14);
  const crc32 = readUint32LE(record, 16);
  const compressedSize32 = readUint32LE(record, 20);
  const uncompressedSize32 = readUint32LE(record, 24);
  const nameLen = readUint16LE(record, 28);
  const extraLen = readUint16LE(record, 30);
  const diskStart = readUint16LE(record, 34);
  const externalAttributes = readUint32LE(record, 38);
  const offset32 = readUint32LE(record, 42);

  const nameBytes = record.subarray(CDFH_MIN_SIZE, CDFH_MIN_SIZE + nameLen);
  const extra = parseExtraFields(record.subarray(CDFH_MIN_SIZE + nameLen, CDFH_MIN_SIZE + nameLen + extraLen));
  const commentBytes = record.subarray(CDFH_MIN_SIZE + nameLen + extraLen);

  const name = decodeName(nameBytes, (flags & FLAG_UTF8) !== 0, options);
  const comment = commentBytes.length > 0 ? decodeUtf8(commentBytes) : undefined;

  let compressedSize = BigInt(compressedSize32);
  let uncompressedSize = BigInt(uncompressedSize32);
  let offset = BigInt(offset32);
  const needsZip64 =
    compressedSize32 === 0xffffffff ||
    uncompressedSize32 === 0xffffffff ||
    offset32 === 0xffffffff ||
    diskStart === 0xffff;
  if (needsZip64) {
    const zip64Extra = extra.get(ZIP64_EXTRA_ID);
    if (!zip64Extra) {
      throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 extra field missing', { entryName: name });
    }
    const values = parseZip64Extra(zip64Extra, {
      uncompressed: uncompressedSize32 === 0xffffffff,
      compressed: compressedSize32 === 0xffffffff,
      offset: offset32 === 0xffffffff,
      diskStart: diskStart === 0xffff
    });
    uncompressedSize = values.uncompressedSize ?? uncompressedSize;
    compressedSize = values.compressedSize ?? compressedSize;
    offset = values.offset ?? offset;
    if (values.diskStart !== undefined && values.diskStart !== 0) {
      throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Multi-disk ZIP is not supported', { entryName: name });
    }
  } else if (diskStart !== 0) {
    throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Multi-disk ZIP is not supported', { entryName: name });
  }

  const timestamp = extra.get(EXTENDED_TIMESTAMP_EXTRA_ID);
  const mtime = (timestamp && parseExtendedMtime(timestamp)) ?? dosToDate(modTime, modDate);
  const mode = entryMode(madeBy, externalAttributes, name);

  return {
    name,
    comment,
    method,
    flags,
    crc32,
    compressedSize,
    uncompressedSize,
    offset,
    mtime,
    mode,
    isDirectory: name.endsWith('/') || isDirectoryMode(mode),
    encrypted: (flags & FLAG_ENCRYPTED) !== 0,
    zip64: needsZip64
  };
}

function decodeName(bytes: Uint8Array, utf8Flag: boolean, options: CentralDirectoryOptions): string {
  if (!utf8Flag) return decodeUtf8(bytes);
  try {
    return decodeUtf8(bytes, true);
  } catch (err) {
    if (options.strict) {
      throw new ZipError('ZIP_INVALID_ENCODING', 'Invalid UTF-8 filename', { cause: err });
    }
    options.onWarning({
      code: 'ZIP_INVALID_ENCODING',
      message: 'Invalid UTF-8 filename; using replacement characters'
    });
    return decodeUtf8(bytes);
  }
}
