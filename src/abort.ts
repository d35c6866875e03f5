export function throwIfAborted(signal?: AbortSignal | null): void {
  if (!signal) return;
  if (!signal.aborted) return;
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    throw reason;
  }
  throw new DOMException('The operation was aborted', 'AbortError');
}
