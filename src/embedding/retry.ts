// Retry with exponential backoff + jitter for transient embedding service failures

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryableStatuses?: number[];
  /** Per-attempt timeout (ms); 0 disables it */
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, "fetchImpl" | "sleep">> = {
  maxAttempts: 4,
  baseDelayMs: 250,
  maxDelayMs: 10000,
  retryableStatuses: [429, 500, 502, 503, 504],
  timeoutMs: 30000,
};

function isRetryableError(error: unknown): boolean {
  if (error instanceof Error) {
    if (error.name === "TimeoutError") return true;
    const message = error.message.toLowerCase();
    return (
      message.includes("network") ||
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("socket hang up") ||
      message.includes("fetch failed")
    );
  }
  return false;
}

export function calculateBackoff(attempt: number, baseDelayMs: number, maxDelayMs: number, random: () => number = Math.random): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const jitter = random() * baseDelayMs;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

function retryAfterDelay(header: string | null, fallback: number, maxDelayMs: number): number {
  if (!header) return fallback;
  const retryAfterMs = parseInt(header, 10) * 1000;
  return isNaN(retryAfterMs) ? fallback : Math.min(retryAfterMs, maxDelayMs);
}

export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  options?: RetryOptions
): Promise<Response> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const doFetch = options?.fetchImpl ?? fetch;
  const wait = options?.sleep ?? ((ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms)));
  let lastError: Error | null = null;

  for (let attempt = 0; attempt < opts.maxAttempts; attempt++) {
    const isLastAttempt = attempt === opts.maxAttempts - 1;

    try {
      const signal = opts.timeoutMs > 0 ? AbortSignal.timeout(opts.timeoutMs) : undefined;
      const response = await doFetch(url, { ...init, signal });

      if (response.ok || !opts.retryableStatuses.includes(response.status) || isLastAttempt) {
        return response;
      }

      const delay = retryAfterDelay(
        response.headers.get("retry-after"),
        calculateBackoff(attempt, opts.baseDelayMs, opts.maxDelayMs),
        opts.maxDelayMs
      );
      console.warn(
        `[embedding] Retryable status ${response.status} from ${url}, attempt ${attempt + 1}/${opts.maxAttempts}, waiting ${Math.round(delay)}ms`
      );
      await wait(delay);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryableError(error) || isLastAttempt) {
        throw lastError;
      }

      const delay = calculateBackoff(attempt, opts.baseDelayMs, opts.maxDelayMs);
      console.warn(
        `[embedding] Network error: ${lastError.message}, attempt ${attempt + 1}/${opts.maxAttempts}, waiting ${Math.round(delay)}ms`
      );
      await wait(delay);
    }
  }

  throw lastError ?? new Error(`Failed after ${opts.maxAttempts} attempts`);
}
