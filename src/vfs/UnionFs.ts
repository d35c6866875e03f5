import { throwIfAborted } from '../abort.js';
import { isNotExist, notFound } from './errors.js';
import type { FileInfo, VfsContext, VfsReader } from './types.js';

/**
 * Layers readers in priority order. A path resolves against the first reader
 * that has it; failures other than "does not exist" stop the search.
 */
export class UnionFs implements VfsReader {
  private readonly readers: readonly VfsReader[];

  constructor(readers: readonly VfsReader[]) {
    this.readers = [...readers];
  }

  async stat(path: string, context?: VfsContext): Promise<FileInfo> {
    return this.first('stat', path, context, (reader) => reader.stat(path, context));
  }

  async open(path: string, context?: VfsContext): Promise<ReadableStream<Uint8Array>> {
    return this.first('open', path, context, (reader) => reader.open(path, context));
  }

  /** Matches from every reader, in reader order, each path reported once. */
  async glob(pattern: string, context?: VfsContext): Promise<string[]> {
    const seen = new Set<string>();
    for (const reader of this.readers) {
      throwIfAborted(context?.signal);
      for (const match of await reader.glob(pattern, context)) {
        seen.add(match);
      }
    }
    return [...seen];
  }

  private async first<T>(
    operation: 'stat' | 'open',
    path: string,
    context: VfsContext | undefined,
    call: (reader: VfsReader) => Promise<T>
  ): Promise<T> {
    for (const reader of this.readers) {
      throwIfAborted(context?.signal);
      try {
        return await call(reader);
      } catch (err) {
        if (!isNotExist(err)) throw err;
      }
    }
    throw notFound(operation, path);
  }
}
