import { readUint16LE, readUint32LE, readUint64LE } from '../binary.js';
import { ZipError, type ZipWarning } from '../errors.js';
import { throwIfAborted } from '../abort.js';
import type { RandomAccess } from './RandomAccess.js';

const EOCD_SIGNATURE = 0x06054b50;
const ZIP64_EOCD_SIGNATURE = 0x06064b50;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const EOCD_SIZE = 22;
const ZIP64_LOCATOR_SIZE = 20;
const ZIP64_EOCD_SIZE = 56;

export interface EocdResult {
  eocdOffset: bigint;
  cdOffset: bigint;
  cdSize: bigint;
  totalEntries: bigint;
  comment: Uint8Array;
  zip64: boolean;
}

export interface FindEocdOptions {
  strict: boolean;
  maxCommentBytes: number;
  maxCentralDirectoryBytes: number;
  maxEntries: number;
  onWarning: (warning: ZipWarning) => void;
  signal?: AbortSignal | undefined;
}

export async function findEocd(reader: RandomAccess, options: FindEocdOptions): Promise<EocdResult> {
  const size = await reader.size(options.signal);
  if (size < BigInt(EOCD_SIZE)) {
    throw new ZipError('ZIP_EOCD_NOT_FOUND', 'File too small for EOCD', {
      context: { size: size.toString() }
    });
  }
  // The record sits in the last 64 KiB (maximum comment) plus its own fixed size.
  const window = BigInt(0xffff + EOCD_SIZE);
  const searchSize = size < window ? size : window;
  const searchStart = size - searchSize;
  const buffer = await reader.read(searchStart, Number(searchSize), options.signal);

  const candidates: number[] = [];
  for (let i = buffer.length - EOCD_SIZE; i >= 0; i -= 1) {
    if (readUint32LE(buffer, i) === EOCD_SIGNATURE) {
      candidates.push(i);
    }
  }
  throwIfAborted(options.signal);

  const chosen = candidates[0];
  if (chosen === undefined) {
    throw new ZipError('ZIP_EOCD_NOT_FOUND', 'End of central directory not found');
  }
  if (candidates.length > 1) {
    if (options.strict) {
      throw new ZipError('ZIP_MULTIPLE_EOCD', 'Multiple EOCD records found');
    }
    options.onWarning({
      code: 'ZIP_MULTIPLE_EOCD',
      message: 'Multiple EOCD records found; using last occurrence'
    });
  }

  const eocdOffset = searchStart + BigInt(chosen);
  const diskNumber = readUint16LE(buffer, chosen + 4);
  const cdDisk = readUint16LE(buffer, chosen + 6);
  const entriesOnDisk = readUint16LE(buffer, chosen + 8);
  const totalEntries = readUint16LE(buffer, chosen + 10);
  const cdSize32 = readUint32LE(buffer, chosen + 12);
  const cdOffset32 = readUint32LE(buffer, chosen + 16);
  const commentLength = readUint16LE(buffer, chosen + 20);

  if (commentLength > options.maxCommentBytes) {
    throw new ZipError('ZIP_LIMIT_EXCEEDED', 'ZIP comment exceeds limit', {
      context: { commentBytes: String(commentLength), limitCommentBytes: String(options.maxCommentBytes) }
    });
  }
  if (eocdOffset + BigInt(EOCD_SIZE + commentLength) !== size) {
    if (options.strict) {
      throw new ZipError('ZIP_BAD_EOCD', 'EOCD does not end at EOF');
    }
    options.onWarning({
      code: 'ZIP_BAD_EOCD',
      message: 'EOCD does not end at EOF; continuing in non-strict mode'
    });
  }
  const comment = buffer.subarray(chosen + EOCD_SIZE, chosen + EOCD_SIZE + commentLength);

  const needsZip64 =
    cdDisk === 0xffff || totalEntries === 0xffff || cdSize32 === 0xffffffff || cdOffset32 === 0xffffffff;

  if (!needsZip64) {
    enforceLimits(
      {
        cdSize: BigInt(cdSize32),
        totalEntries: BigInt(totalEntries),
        multiDisk: diskNumber !== 0 || cdDisk !== 0 || entriesOnDisk !== totalEntries
      },
      options
    );
    return {
      eocdOffset,
      cdOffset: BigInt(cdOffset32),
      cdSize: BigInt(cdSize32),
      totalEntries: BigInt(totalEntries),
      comment,
      zip64: false
    };
  }

  const locatorOffset = eocdOffset - BigInt(ZIP64_LOCATOR_SIZE);
  if (locatorOffset < 0n) {
    throw new ZipError('ZIP_BAD_ZIP64', 'Missing ZIP64 locator');
  }
  const locator = await reader.read(locatorOffset, ZIP64_LOCATOR_SIZE, options.signal);
  if (locator.length < ZIP64_LOCATOR_SIZE || readUint32LE(locator, 0) !== ZIP64_LOCATOR_SIGNATURE) {
    throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 locator signature missing', { offset: locatorOffset });
  }
  const zip64EocdOffset = readUint64LE(locator, 8);
  const record = await reader.read(zip64EocdOffset, ZIP64_EOCD_SIZE, options.signal);
  if (record.length < ZIP64_EOCD_SIZE || readUint32LE(record, 0) !== ZIP64_EOCD_SIGNATURE) {
    throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 EOCD signature missing', { offset: zip64EocdOffset });
  }
  const entriesOnDisk64 = readUint64LE(record, 24);
  const totalEntries64 = readUint64LE(record, 32);
  const cdSize64 = readUint64LE(record, 40);
  enforceLimits(
    {
      cdSize: cdSize64,
      totalEntries: totalEntries64,
      multiDisk: readUint32LE(record, 16) !== 0 || readUint32LE(record, 20) !== 0 || entriesOnDisk64 !== totalEntries64
    },
    options
  );
  return {
    eocdOffset,
    cdOffset: readUint64LE(record, 48),
    cdSize: cdSize64,
    totalEntries: totalEntries64,
    comment,
    zip64: true
  };
}

function enforceLimits(
  info: { cdSize: bigint; totalEntries: bigint; multiDisk: boolean },
  limits: { maxCentralDirectoryBytes: number; maxEntries: number }
): void {
  if (info.cdSize > BigInt(limits.maxCentralDirectoryBytes)) {
    throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Central directory size exceeds limit', {
      context: {
        centralDirectoryBytes: info.cdSize.toString(),
        limitCentralDirectoryBytes: String(limits.maxCentralDirectoryBytes)
      }
    });
  }
  if (info.totalEntries > BigInt(limits.maxEntries)) {
    throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Entry count exceeds limit', {
      context: { entries: info.totalEntries.toString(), limitEntries: String(limits.maxEntries) }
    });
  }
  if (info.multiDisk) {
    throw new ZipError('ZIP_UNSUPPORTED_FEATURE', 'Multi-disk ZIP archives are not supported');
  }
}
