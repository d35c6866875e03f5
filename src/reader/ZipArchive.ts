import { decodeUtf8 } from '../binary.js';
import { throwIfAborted } from '../abort.js';
import type { ZipWarning } from '../errors.js';
import { resolveLimits, type ResolvedZipLimits } from '../limits.js';
import type { ZipArchiveOptions, ZipEntry } from '../types.js';
import { readCentralDirectory } from './centralDirectory.js';
import { findEocd } from './eocd.js';
import { openEntryStream } from './entryStream.js';
import type { RandomAccess } from './RandomAccess.js';

interface ArchiveSettings {
  strict: boolean;
  limits: ResolvedZipLimits;
  onWarning: ((warning: ZipWarning) => void) | undefined;
}

/**
 * A parsed archive: the central directory listing, frozen at open time, and
 * the byte source entries are decoded from.
 */
export class ZipArchive {
  private constructor(
    private readonly reader: RandomAccess,
    /** Entries in central directory order. */
    readonly entries: readonly ZipEntry[],
    /** Archive comment, decoded as UTF-8. */
    readonly comment: string,
    private readonly warningsList: ZipWarning[],
    private readonly settings: ArchiveSettings
  ) {}

  static async open(reader: RandomAccess, options?: ZipArchiveOptions): Promise<ZipArchive> {
    const strict = options?.isStrict ?? options?.profile === 'strict';
    const limits = resolveLimits(options?.limits);
    const signal = options?.signal;
    const warnings: ZipWarning[] = [];
    const onWarning = (warning: ZipWarning): void => {
      warnings.push(warning);
      options?.onWarning?.(warning);
    };

    const eocd = await findEocd(reader, {
      strict,
      maxCommentBytes: limits.maxCommentBytes,
      maxCentralDirectoryBytes: limits.maxCentralDirectoryBytes,
      maxEntries: limits.maxEntries,
      onWarning,
      signal
    });
    const entries = await readCentralDirectory(reader, eocd.cdOffset, eocd.cdSize, eocd.totalEntries, {
      strict,
      maxEntries: limits.maxEntries,
      onWarning,
      signal
    });
    throwIfAborted(signal);

    return new ZipArchive(
      reader,
      Object.freeze(entries.map((entry) => Object.freeze(entry))),
      decodeUtf8(eocd.comment),
      warnings,
      { strict, limits, onWarning: options?.onWarning }
    );
  }

  warnings(): ZipWarning[] {
    return [...this.warningsList];
  }

  /** A new decompressing stream over one entry's data; streams are independent of each other. */
  async openEntry(entry: ZipEntry, signal?: AbortSignal): Promise<ReadableStream<Uint8Array>> {
    throwIfAborted(signal);
    return openEntryStream(this.reader, entry, {
      strict: this.settings.strict,
      limits: this.settings.limits,
      onWarning: this.warn,
      signal
    });
  }

  async close(): Promise<void> {
    await this.reader.close();
  }

  private readonly warn = (warning: ZipWarning): void => {
    this.warningsList.push(warning);
    this.settings.onWarning?.(warning);
  };
}
