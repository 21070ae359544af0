// HTTP fetcher for profile probes: redirects followed, bounded time and size

import type { Failure, FailureKind, PageFetcher, PageFetchOptions, PageResponse } from "../types";

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

/** A fetch failure that already knows its place in the failure taxonomy */
export class FetchFailure extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string
  ) {
    super(message);
    this.name = "FetchFailure";
  }

  toFailure(): Failure {
    return { kind: this.kind, message: this.message };
  }
}

function causeCode(error: Error): string | null {
  const cause = error.cause;
  if (typeof cause === "object" && cause !== null && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

export function classifyFetchError(error: unknown, timedOut = false): Failure {
  if (error instanceof FetchFailure) {
    return error.toFailure();
  }

  const err = error instanceof Error ? error : new Error(String(error));

  if (timedOut || err.name === "AbortError" || err.name === "TimeoutError") {
    return { kind: "timeout", message: timedOut ? "request timed out" : err.message };
  }

  const code = causeCode(err);
  if ((code && CONNECTION_ERROR_CODES.has(code)) || err.message.toLowerCase().includes("fetch failed")) {
    return { kind: "connection_error", message: code ? `${err.message} (${code})` : err.message };
  }

  return { kind: "other", message: err.message };
}

/**
 * Reads the body, refusing anything beyond maxBytes. The declared
 * Content-Length is checked first, then the running total while streaming.
 */
export async function readBodyWithLimit(response: Response, maxBytes: number): Promise<Buffer> {
  const declared = Number(response.headers.get("content-length"));
  if (Number.isFinite(declared) && declared > maxBytes) {
    await response.body?.cancel();
    throw new FetchFailure("content_too_large", `body of ${declared} bytes exceeds limit of ${maxBytes}`);
  }

  if (!response.body) {
    return Buffer.alloc(0);
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new FetchFailure("content_too_large", `body exceeds limit of ${maxBytes} bytes`);
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks);
}

export interface HttpPageFetcherOptions {
  timeout?: number;
  maxBytes?: number;
  userAgents?: string[];
  random?: () => number;
}

export class HttpPageFetcher implements PageFetcher {
  private timeout: number;
  private maxBytes: number;
  private userAgents: string[];
  private random: () => number;

  constructor(options?: HttpPageFetcherOptions) {
    this.timeout = options?.timeout ?? 15000;
    this.maxBytes = options?.maxBytes ?? 5 * 1024 * 1024;
    this.userAgents = options?.userAgents?.length ? options.userAgents : ["Mozilla/5.0 (compatible; facetrail/0.1)"];
    this.random = options?.random ?? Math.random;
  }

  /** Non-2xx statuses are returned, not thrown; failures throw FetchFailure */
  async fetch(url: string, options?: PageFetchOptions): Promise<PageResponse> {
    const timeout = options?.timeout ?? this.timeout;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);

    try {
      const response = await fetch(url, {
        headers: {
          "User-Agent": options?.userAgent ?? this.pickUserAgent(),
          "Accept": "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.5",
        },
        signal: controller.signal,
        redirect: "follow",
      });

      const body = await readBodyWithLimit(response, this.maxBytes);

      return {
        finalUrl: response.url || url,
        statusCode: response.status,
        body: body.toString("utf-8"),
        contentType: response.headers.get("Content-Type") ?? "text/html",
      };
    } catch (error) {
      const failure = classifyFetchError(error, timedOut);
      throw new FetchFailure(failure.kind, failure.message);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  pickUserAgent(): string {
    const index = Math.min(Math.floor(this.random() * this.userAgents.length), this.userAgents.length - 1);
    return this.userAgents[index] ?? this.userAgents[0] ?? "";
  }
}
