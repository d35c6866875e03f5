import type { ZipWarning } from './errors.js';
import type { ZipLimits } from './limits.js';

export type { ZipLimits } from './limits.js';
export type { ZipWarning } from './errors.js';

/** Safety profile for parsing. `strict` turns recoverable inconsistencies into errors. */
export type ZipProfile = 'compat' | 'strict';

/** ZIP entry metadata, as recorded in the central directory. */
export type ZipEntry = {
  name: string;
  comment?: string | undefined;
  method: number;
  flags: number;
  crc32: number;
  compressedSize: bigint;
  uncompressedSize: bigint;
  offset: bigint;
  mtime: Date;
  /** POSIX file type and permission bits. */
  mode: number;
  isDirectory: boolean;
  encrypted: boolean;
  zip64: boolean;
};

/** Options for opening an archive. */
export type ZipArchiveOptions = {
  profile?: ZipProfile;
  isStrict?: boolean;
  limits?: ZipLimits;
  onWarning?: (warning: ZipWarning) => void;
  signal?: AbortSignal;
};
