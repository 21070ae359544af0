import { describe, test, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { fetchWithRetry, calculateBackoff } from "../src/embedding/retry";

function responses(...items: Array<Response | Error>) {
  const queue = [...items];
  return vi.fn(async (_input: RequestInfo | URL, _init?: RequestInit): Promise<Response> => {
    const next = queue.shift();
    if (!next) throw new Error("no more responses");
    if (next instanceof Error) throw next;
    return next;
  });
}

describe("fetchWithRetry", () => {
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    sleep = vi.fn(async (_ms: number) => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("should return the first successful response", async () => {
    const fetchImpl = responses(new Response("ok", { status: 200 }));

    const response = await fetchWithRetry("https://faces.test/encode", { method: "POST" }, { fetchImpl, sleep });

    expect(response.status).toBe(200);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[1]?.method).toBe("POST");
    expect(sleep).not.toHaveBeenCalled();
  });

  test("should retry rate limited and server error responses", async () => {
    const fetchImpl = responses(
      new Response("slow down", { status: 429 }),
      new Response("oops", { status: 503 }),
      new Response("ok", { status: 200 })
    );

    const response = await fetchWithRetry("https://faces.test/encode", {}, { fetchImpl, sleep });

    expect(response.status).toBe(200);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  test("should return the last response once attempts run out", async () => {
    const fetchImpl = responses(
      new Response("", { status: 500 }),
      new Response("", { status: 502 })
    );

    const response = await fetchWithRetry("https://faces.test/encode", {}, { fetchImpl, sleep, maxAttempts: 2 });

    expect(response.status).toBe(502);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  test("should not retry client errors", async () => {
    const fetchImpl = responses(new Response("bad", { status: 400 }));

    const response = await fetchWithRetry("https://faces.test/encode", {}, { fetchImpl, sleep });

    expect(response.status).toBe(400);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  test("should honour retry-after in seconds", async () => {
    const fetchImpl = responses(
      new Response("", { status: 429, headers: { "Retry-After": "2" } }),
      new Response("ok", { status: 200 })
    );

    await fetchWithRetry("https://faces.test/encode", {}, { fetchImpl, sleep });

    expect(sleep).toHaveBeenCalledWith(2000);
  });

  test("should retry network errors", async () => {
    const fetchImpl = responses(new TypeError("fetch failed"), new Response("ok", { status: 200 }));

    const response = await fetchWithRetry("https://faces.test/encode", {}, { fetchImpl, sleep });

    expect(response.status).toBe(200);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  test("should throw errors that are not transient", async () => {
    const fetchImpl = responses(new Error("invalid header value"));

    await expect(fetchWithRetry("https://faces.test/encode", {}, { fetchImpl, sleep })).rejects.toThrow("invalid header value");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  test("should throw the last network error after the final attempt", async () => {
    const fetchImpl = responses(new TypeError("fetch failed"), new TypeError("fetch failed"));

    await expect(fetchWithRetry("https://faces.test/encode", {}, { fetchImpl, sleep, maxAttempts: 2 })).rejects.toThrow("fetch failed");
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});

describe("calculateBackoff", () => {
  test("should double per attempt", () => {
    expect(calculateBackoff(0, 100, 10000, () => 0)).toBe(100);
    expect(calculateBackoff(2, 100, 10000, () => 0)).toBe(400);
  });

  test("should add up to one base delay of jitter", () => {
    expect(calculateBackoff(1, 100, 10000, () => 0.5)).toBe(250);
  });

  test("should cap at maxDelayMs", () => {
    expect(calculateBackoff(10, 100, 1000, () => 0)).toBe(1000);
  });
});
