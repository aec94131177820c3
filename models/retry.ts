// Shared error classification for the oracle adapters.

export function isRateLimitError(err: Error): boolean {
  const message = err.message.toLowerCase();
  return (
    message.includes("429") ||
    message.includes("rate") ||
    message.includes("quota") ||
    message.includes("resource_exhausted")
  );
}

/**
 * Network hiccups and gateway errors worth retrying in place. Rate limits
 * are never transient here: the caller decides how long to back off.
 */
export function isTransientError(err: Error): boolean {
  if (isRateLimitError(err)) return false;
  const message = err.message.toLowerCase();
  return (
    message.includes("fetch failed") ||
    message.includes("econnreset") ||
    message.includes("etimedout") ||
    message.includes("enotfound") ||
    message.includes("socket hang up") ||
    message.includes("network") ||
    message.includes("connection error") ||
    message.includes("timed out") ||
    message.includes("aborted") ||
    message.includes("503") ||
    message.includes("502")
  );
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
