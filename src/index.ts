export { ZipFs } from './vfs/ZipFs.js';
export type { ZipFsOptions } from './vfs/ZipFs.js';
export { LocalFs } from './vfs/LocalFs.js';
export { UnionFs } from './vfs/UnionFs.js';
export { VfsError, isNotExist } from './vfs/errors.js';
export type { VfsErrorCode, VfsOperation } from './vfs/errors.js';
export { compileGlob } from './vfs/glob.js';
export type { PathMatcher } from './vfs/glob.js';
export type { FileInfo, VfsContext, VfsReader } from './vfs/types.js';

export { PositionedReader } from './reader/PositionedReader.js';
export { BufferSeekableStream, FileSeekableStream } from './reader/SeekableStream.js';
export type { SeekOrigin, SeekableStream } from './reader/SeekableStream.js';
export { ZipArchive } from './reader/ZipArchive.js';
export type { RandomAccess } from './reader/RandomAccess.js';

export { ZipError } from './errors.js';
export type { ZipErrorCode, ZipWarning, ZipWarningCode } from './errors.js';
export { DEFAULT_LIMITS } from './limits.js';
export type { ZipArchiveOptions, ZipEntry, ZipLimits, ZipProfile } from './types.js';

export { registerCompressionCodec, listCompressionCodecs } from './compression/registry.js';
export type { ZipCompressionCodec, ZipCompressionStream } from './compression/types.js';
export { readAllBytes } from './streams/adapters.js';
