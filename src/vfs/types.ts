/** Per-call context. An aborted signal rejects the call with its reason. */
export type VfsContext = {
  signal?: AbortSignal;
};

/** Metadata returned by {@link VfsReader.stat}. */
export type FileInfo = {
  /** Base name, without any trailing separator. */
  name: string;
  /** The path the reader resolved, as it stores it. */
  path: string;
  size: bigint;
  /** POSIX file type and permission bits. */
  mode: number;
  mtime: Date;
  isDirectory: boolean;
};

/** Read-only, path-addressed file system capabilities. Paths use `/` as separator. */
export interface VfsReader {
  stat(path: string, context?: VfsContext): Promise<FileInfo>;
  /** Opens a fresh stream over the file contents; the caller must consume or cancel it. */
  open(path: string, context?: VfsContext): Promise<ReadableStream<Uint8Array>>;
  /** Paths matching a shell pattern, where `*` and `?` never cross a `/`. */
  glob(pattern: string, context?: VfsContext): Promise<string[]>;
}
