import { ERROR_SCHEMA_VERSION, sanitizeErrorContext } from './errorContext.js';

/** Stable ZIP error codes. */
export type ZipErrorCode =
  | 'ZIP_EOCD_NOT_FOUND'
  | 'ZIP_MULTIPLE_EOCD'
  | 'ZIP_BAD_EOCD'
  | 'ZIP_BAD_ZIP64'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_UNSUPPORTED_METHOD'
  | 'ZIP_UNSUPPORTED_FEATURE'
  | 'ZIP_UNSUPPORTED_ENCRYPTION'
  | 'ZIP_BAD_CRC'
  | 'ZIP_LIMIT_EXCEEDED'
  | 'ZIP_INVALID_ENCODING'
  | 'ZIP_TRUNCATED'
  | 'ZIP_INVALID_SIGNATURE';

/** Error thrown while parsing ZIP structures or decoding entry data. */
export class ZipError extends Error {
  /** Machine-readable error code. */
  readonly code: ZipErrorCode;
  /** Entry name related to the error, if available. */
  readonly entryName?: string | undefined;
  /** Compression method related to the error, if available. */
  readonly method?: number | undefined;
  /** Offset (in bytes) related to the error, if available. */
  readonly offset?: bigint | undefined;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(
    code: ZipErrorCode,
    message: string,
    options?: {
      entryName?: string | undefined;
      method?: number | undefined;
      offset?: bigint | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ZipError';
    this.code = code;
    this.entryName = options?.entryName;
    this.method = options?.method;
    this.offset = options?.offset;
    this.context = options?.context;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: ZipErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    entryName?: string;
    method?: number;
    offset?: string;
  } {
    const topLevelKeys: string[] = [];
    if (this.entryName !== undefined) topLevelKeys.push('entryName');
    if (this.method !== undefined) topLevelKeys.push('method');
    if (this.offset !== undefined) topLevelKeys.push('offset');
    return {
      schemaVersion: ERROR_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context: sanitizeErrorContext(this.context, topLevelKeys),
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
      ...(this.method !== undefined ? { method: this.method } : {}),
      ...(this.offset !== undefined ? { offset: this.offset.toString() } : {})
    };
  }
}

/** Non-fatal ZIP warning codes. */
export type ZipWarningCode =
  | 'ZIP_MULTIPLE_EOCD'
  | 'ZIP_BAD_EOCD'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_BAD_CRC'
  | 'ZIP_INVALID_ENCODING'
  | 'ZIP_LIMIT_EXCEEDED';

/** Non-fatal warning produced while parsing or reading an archive. */
export type ZipWarning = {
  code: ZipWarningCode;
  message: string;
  entryName?: string;
};
