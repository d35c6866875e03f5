/** Resource ceilings applied while parsing an archive and reading its entries. */
export type ZipLimits = {
  maxEntries?: number;
  maxCentralDirectoryBytes?: number;
  maxCommentBytes?: number;
  maxUncompressedEntryBytes?: bigint | number;
  maxCompressionRatio?: number;
};

export type ResolvedZipLimits = {
  maxEntries: number;
  maxCentralDirectoryBytes: number;
  maxCommentBytes: number;
  maxUncompressedEntryBytes: bigint;
  maxCompressionRatio: number;
};

export const DEFAULT_LIMITS: Readonly<ResolvedZipLimits> = Object.freeze({
  maxEntries: 10000,
  maxCentralDirectoryBytes: 64 * 1024 * 1024,
  maxCommentBytes: 0xffff,
  maxUncompressedEntryBytes: 512n * 1024n * 1024n,
  maxCompressionRatio: 1000
});

export function resolveLimits(limits?: ZipLimits): ResolvedZipLimits {
  return {
    maxEntries: positiveInt(limits?.maxEntries, DEFAULT_LIMITS.maxEntries),
    maxCentralDirectoryBytes: positiveInt(limits?.maxCentralDirectoryBytes, DEFAULT_LIMITS.maxCentralDirectoryBytes),
    maxCommentBytes: positiveInt(limits?.maxCommentBytes, DEFAULT_LIMITS.maxCommentBytes),
    maxUncompressedEntryBytes: toBigInt(limits?.maxUncompressedEntryBytes, DEFAULT_LIMITS.maxUncompressedEntryBytes),
    maxCompressionRatio:
      limits?.maxCompressionRatio !== undefined && limits.maxCompressionRatio > 0
        ? limits.maxCompressionRatio
        : DEFAULT_LIMITS.maxCompressionRatio
  };
}

function positiveInt(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(0, Math.floor(value));
}

function toBigInt(value: bigint | number | undefined, fallback: bigint): bigint {
  if (value === undefined) return fallback;
  if (typeof value === 'bigint') return value < 0n ? 0n : value;
  if (!Number.isFinite(value)) return fallback;
  return BigInt(Math.max(0, Math.floor(value)));
}
