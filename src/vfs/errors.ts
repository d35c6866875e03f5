import { ERROR_SCHEMA_VERSION, sanitizeErrorContext } from '../errorContext.js';

/** Stable VFS error codes. */
export type VfsErrorCode = 'VFS_OPEN_FAILED' | 'VFS_EMPTY_ARCHIVE' | 'VFS_NOT_FOUND' | 'VFS_BAD_PATTERN';

/** Capability call that raised a {@link VfsError}. */
export type VfsOperation = 'mount' | 'stat' | 'open' | 'glob';

/** Error thrown by VFS readers. */
export class VfsError extends Error {
  readonly code: VfsErrorCode;
  readonly operation: VfsOperation;
  /** Requested path, for `stat` and `open` failures. */
  readonly path?: string | undefined;
  /** Rejected pattern, for `glob` failures. */
  readonly pattern?: string | undefined;
  readonly context?: Record<string, string> | undefined;

  constructor(
    code: VfsErrorCode,
    operation: VfsOperation,
    message: string,
    options?: {
      path?: string | undefined;
      pattern?: string | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'VfsError';
    this.code = code;
    this.operation = operation;
    this.path = options?.path;
    this.pattern = options?.pattern;
    this.context = options?.context;
  }

  toJSON(): {
    schemaVersion: string;
    name: string;
    code: VfsErrorCode;
    operation: VfsOperation;
    message: string;
    hint: string;
    context: Record<string, string>;
    path?: string;
    pattern?: string;
  } {
    const topLevelKeys = ['operation'];
    if (this.path !== undefined) topLevelKeys.push('path');
    if (this.pattern !== undefined) topLevelKeys.push('pattern');
    return {
      schemaVersion: ERROR_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      operation: this.operation,
      message: this.message,
      hint: this.message,
      context: sanitizeErrorContext(this.context, topLevelKeys),
      ...(this.path !== undefined ? { path: this.path } : {}),
      ...(this.pattern !== undefined ? { pattern: this.pattern } : {})
    };
  }
}

export function notFound(operation: 'stat' | 'open', path: string, cause?: unknown): VfsError {
  return new VfsError('VFS_NOT_FOUND', operation, `path ${JSON.stringify(path)} does not exist`, {
    path,
    ...(cause !== undefined ? { cause } : {})
  });
}

/**
 * Reports whether `err` means "no such path", whichever reader raised it.
 * Node file system errors with code `ENOENT` count as well.
 */
export function isNotExist(err: unknown): boolean {
  if (err instanceof VfsError) return err.code === 'VFS_NOT_FOUND';
  if (err instanceof Error && 'code' in err) {
    return err.code === 'ENOENT';
  }
  return false;
}
