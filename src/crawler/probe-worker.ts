// Probe one (username, platform) pair: rate limit, jitter, GET, classify, extract

import type { Failure, PageFetcher, ProbeRequest, ProbeResult } from "../types";
import type { PlatformCatalog } from "../config/platforms";
import type { AvatarExtractor } from "./avatar-extractor";
import type { ExistenceStrategyRegistry } from "./strategies";
import { classifyFetchError } from "./fetcher";
import type { DomainRateLimiter } from "./rate-limiter";
import { domainOf, sleep } from "./rate-limiter";

export interface JitterRange {
  minMs: number;
  maxMs: number;
}

export interface ProbeWorkerDeps {
  catalog: PlatformCatalog;
  fetcher: PageFetcher;
  rateLimiter: DomainRateLimiter;
  strategies: ExistenceStrategyRegistry;
  extractor: AvatarExtractor;
  jitter?: JitterRange;
  timeout?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/** Builds a frozen result, dropping candidates whenever the profile is absent */
export function makeProbeResult(fields: ProbeResult): ProbeResult {
  const candidates = fields.exists ? [...fields.candidateImageUrls] : [];
  return Object.freeze({
    ...fields,
    candidateImageUrls: Object.freeze(candidates),
  });
}

export function failedProbe(request: ProbeRequest, error: Failure): ProbeResult {
  return makeProbeResult({
    username: request.username,
    platformId: request.platformId,
    exists: false,
    statusCode: 0,
    finalUrl: request.url,
    candidateImageUrls: [],
    error,
    contentLength: 0,
  });
}

export class ProbeWorker {
  private catalog: PlatformCatalog;
  private fetcher: PageFetcher;
  private rateLimiter: DomainRateLimiter;
  private strategies: ExistenceStrategyRegistry;
  private extractor: AvatarExtractor;
  private jitter: JitterRange;
  private timeout: number | undefined;
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;

  constructor(deps: ProbeWorkerDeps) {
    this.catalog = deps.catalog;
    this.fetcher = deps.fetcher;
    this.rateLimiter = deps.rateLimiter;
    this.strategies = deps.strategies;
    this.extractor = deps.extractor;
    this.jitter = deps.jitter ?? { minMs: 0, maxMs: 0 };
    this.timeout = deps.timeout;
    this.sleep = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;
  }

  /** Never rejects: every failure comes back as a result with error set */
  async probe(request: ProbeRequest): Promise<ProbeResult> {
    try {
      return await this.runProbe(request);
    } catch (error) {
      return failedProbe(request, classifyFetchError(error));
    }
  }

  private async runProbe(request: ProbeRequest): Promise<ProbeResult> {
    const template = this.catalog.get(request.platformId);

    await this.rateLimiter.acquire(domainOf(request.url));

    const delay = this.jitterDelay();
    if (delay > 0) {
      await this.sleep(delay);
    }

    const response = await this.fetcher.fetch(request.url, { timeout: this.timeout });

    const exists = this.strategies.evaluate(template?.existenceStrategy, response, request.username);

    let candidates: string[] = [];
    if (exists) {
      candidates = this.extractor.extract(response.body, response.finalUrl, {
        selector: template?.avatarSelector,
      });
    }

    return makeProbeResult({
      username: request.username,
      platformId: request.platformId,
      exists,
      statusCode: response.statusCode,
      finalUrl: response.finalUrl,
      candidateImageUrls: candidates,
      error: null,
      contentLength: response.body.length,
    });
  }

  private jitterDelay(): number {
    const { minMs, maxMs } = this.jitter;
    if (maxMs <= minMs) return minMs;
    return minMs + this.random() * (maxMs - minMs);
  }
}
