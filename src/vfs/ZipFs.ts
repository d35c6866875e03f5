import path from 'node:path';
import { throwIfAborted } from '../abort.js';
import type { ZipWarning } from '../errors.js';
import { PositionedReader } from '../reader/PositionedReader.js';
import { FileSeekableStream, type SeekableStream } from '../reader/SeekableStream.js';
import { ZipArchive } from '../reader/ZipArchive.js';
import type { ZipArchiveOptions, ZipEntry } from '../types.js';
import { VfsError, notFound } from './errors.js';
import { compileGlob } from './glob.js';
import type { FileInfo, VfsContext, VfsReader } from './types.js';

export type ZipFsOptions = ZipArchiveOptions;

/**
 * The contents of one zip archive as an isolated, read-only file system.
 * Paths must match archive names exactly; a directory may be named with or
 * without its trailing `/`.
 */
export class ZipFs implements VfsReader {
  private constructor(private readonly archive: ZipArchive) {}

  /**
   * Reads the central directory of the archive in `stream`. The stream is
   * read through a {@link PositionedReader} from here on and must stay open
   * for the life of the returned file system.
   */
  static async open(stream: SeekableStream, options?: ZipFsOptions): Promise<ZipFs> {
    let size: bigint;
    try {
      size = await stream.seek(0n, 'end');
    } catch (err) {
      throw new VfsError('VFS_OPEN_FAILED', 'mount', 'Cannot determine archive length', { cause: err });
    }

    let archive: ZipArchive;
    try {
      archive = await ZipArchive.open(new PositionedReader(stream, size), options);
    } catch (err) {
      if (options?.signal?.aborted) throw err;
      throw new VfsError('VFS_OPEN_FAILED', 'mount', 'Stream is not a readable zip archive', {
        cause: err,
        context: { size: size.toString() }
      });
    }
    if (archive.entries.length === 0) {
      throw new VfsError('VFS_EMPTY_ARCHIVE', 'mount', 'archive has no root directory');
    }
    return new ZipFs(archive);
  }

  /** Opens the archive at `pathLike`; the file is closed by {@link ZipFs.close}. */
  static async fromFile(pathLike: string | URL, options?: ZipFsOptions): Promise<ZipFs> {
    const stream = await FileSeekableStream.fromPath(pathLike);
    try {
      return await ZipFs.open(stream, options);
    } catch (err) {
      await stream.close();
      throw err;
    }
  }

  entries(): ZipEntry[] {
    return [...this.archive.entries];
  }

  warnings(): ZipWarning[] {
    return this.archive.warnings();
  }

  get comment(): string {
    return this.archive.comment;
  }

  async stat(name: string, context?: VfsContext): Promise<FileInfo> {
    throwIfAborted(context?.signal);
    const entry = this.find(name);
    if (!entry) throw notFound('stat', name);
    return {
      name: path.posix.basename(entry.name),
      path: entry.name,
      size: entry.uncompressedSize,
      mode: entry.mode,
      mtime: new Date(entry.mtime.getTime()),
      isDirectory: entry.isDirectory
    };
  }

  async open(name: string, context?: VfsContext): Promise<ReadableStream<Uint8Array>> {
    throwIfAborted(context?.signal);
    const entry = this.find(name);
    if (!entry) throw notFound('open', name);
    return this.archive.openEntry(entry, context?.signal);
  }

  async glob(pattern: string, context?: VfsContext): Promise<string[]> {
    throwIfAborted(context?.signal);
    // `dir/` and `*/` name directories only; other patterns see a directory without its slash.
    const dirsOnly = pattern.endsWith('/');
    const matches = compileGlob(dirsOnly ? pattern.slice(0, -1) : pattern);
    return this.archive.entries
      .filter((entry) => (!dirsOnly || entry.isDirectory) && matches(stripTrailingSlash(entry.name)))
      .map((entry) => entry.name);
  }

  /** Closes the underlying stream once queued reads have finished. */
  async close(): Promise<void> {
    await this.archive.close();
  }

  private find(name: string): ZipEntry | undefined {
    const dirName = `${name}/`;
    return this.archive.entries.find((entry) => entry.name === name || entry.name === dirName);
  }
}

// A directory's trailing separator marks its kind; it is not an extra path segment.
function stripTrailingSlash(name: string): string {
  return name.endsWith('/') ? name.slice(0, -1) : name;
}
