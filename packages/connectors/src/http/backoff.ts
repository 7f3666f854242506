export const BACKOFF_BASE_MS = 500;
export const BACKOFF_MAX_MS = 8000;

/**
 * Exponential delay for the retry that follows `attempt` (1-based), plus up to 50% jitter.
 */
export function calculateBackoffMs(
  attempt: number,
  baseMs = BACKOFF_BASE_MS,
  maxMs = BACKOFF_MAX_MS,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));
  const jitter = Math.floor(random() * (exponential / 2));
  return exponential + jitter;
}

/**
 * Parse a Retry-After header given in seconds. HTTP-date values are ignored.
 */
export function parseRetryAfterMs(header: string | null, maxMs: number): number | undefined {
  if (!header) return undefined;
  const trimmed = header.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  return Math.min(maxMs, Number.parseInt(trimmed, 10) * 1000);
}

export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error("aborted");
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) throw abortReason(signal);
  if (ms <= 0) return;

  await new Promise<void>((resolve, reject) => {
    const timeout = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);

    const onAbort = () => {
      cleanup();
      reject(signal ? abortReason(signal) : new Error("aborted"));
    };

    const cleanup = () => {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    };

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
