import { lstat, open, readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { throwIfAborted } from '../abort.js';
import { toWebReadable } from '../streams/adapters.js';
import { isNotExist, notFound } from './errors.js';
import { compileGlob, hasMagic } from './glob.js';
import type { FileInfo, VfsContext, VfsReader } from './types.js';

/** The host file system, optionally rooted at a directory that relative paths resolve against. */
export class LocalFs implements VfsReader {
  constructor(private readonly root?: string) {}

  async stat(name: string, context?: VfsContext): Promise<FileInfo> {
    throwIfAborted(context?.signal);
    try {
      const stats = await stat(this.resolve(name));
      return {
        name: path.basename(name),
        path: name,
        size: BigInt(stats.size),
        mode: stats.mode,
        mtime: stats.mtime,
        isDirectory: stats.isDirectory()
      };
    } catch (err) {
      if (isNotExist(err)) throw notFound('stat', name, err);
      throw err;
    }
  }

  async open(name: string, context?: VfsContext): Promise<ReadableStream<Uint8Array>> {
    throwIfAborted(context?.signal);
    try {
      const handle = await open(this.resolve(name), 'r');
      return toWebReadable(handle.createReadStream());
    } catch (err) {
      if (isNotExist(err)) throw notFound('open', name, err);
      throw err;
    }
  }

  /**
   * Expands the pattern one segment at a time, listing only directories a
   * wildcard segment needs. Results come out sorted within each directory.
   */
  async glob(pattern: string, context?: VfsContext): Promise<string[]> {
    const signal = context?.signal;
    throwIfAborted(signal);
    if (pattern === '') return [];
    compileGlob(pattern);

    const absolute = pattern.startsWith('/');
    const segments = (absolute ? pattern.slice(1) : pattern).split('/');
    let prefixes = [absolute ? '/' : ''];
    for (const segment of segments) {
      const next: string[] = [];
      if (!hasMagic(segment)) {
        for (const prefix of prefixes) next.push(joinSegment(prefix, segment));
      } else {
        const matches = compileGlob(segment);
        for (const prefix of prefixes) {
          throwIfAborted(signal);
          for (const child of await this.list(prefix)) {
            if (matches(child)) next.push(joinSegment(prefix, child));
          }
        }
      }
      prefixes = next;
    }

    const found: string[] = [];
    for (const candidate of prefixes) {
      if (await this.exists(candidate)) found.push(candidate);
    }
    return found;
  }

  private resolve(name: string): string {
    return this.root === undefined ? name : path.resolve(this.root, name);
  }

  private async list(dir: string): Promise<string[]> {
    try {
      const names = await readdir(this.resolve(dir === '' ? '.' : dir));
      return names.sort();
    } catch (err) {
      if (isNotExist(err) || isNotDirectory(err)) return [];
      throw err;
    }
  }

  private async exists(name: string): Promise<boolean> {
    try {
      await lstat(this.resolve(name));
      return true;
    } catch (err) {
      if (isNotExist(err) || isNotDirectory(err)) return false;
      throw err;
    }
  }
}

function joinSegment(prefix: string, segment: string): string {
  if (prefix === '') return segment;
  if (prefix.endsWith('/')) return `${prefix}${segment}`;
  return `${prefix}/${segment}`;
}

function isNotDirectory(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOTDIR';
}
