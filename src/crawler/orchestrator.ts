// Crawl orchestrator - fans (username x platform) probes out to a bounded worker pool

import type { CrawlResults, CrawlerConfig, PageFetcher, PlatformTemplate, ProbeRequest, ProbeResult } from "../types";
import type { PlatformCatalog } from "../config/platforms";
import { AvatarExtractor } from "./avatar-extractor";
import { HttpPageFetcher } from "./fetcher";
import { failedProbe, ProbeWorker } from "./probe-worker";
import { DomainRateLimiter } from "./rate-limiter";
import { createDefaultStrategyRegistry, type ExistenceStrategyRegistry } from "./strategies";

export interface ProbeRunner {
  probe(request: ProbeRequest): Promise<ProbeResult>;
}

export interface CrawlProgress {
  completed: number;
  total: number;
}

export interface CrawlOptions {
  onResult?: (result: ProbeResult, progress: CrawlProgress) => void;
}

interface CrawlOrchestratorOptions {
  catalog: PlatformCatalog;
  worker: ProbeRunner;
  maxWorkers: number;
  verbose?: boolean;
}

export interface CrawlerOverrides {
  fetcher?: PageFetcher;
  strategies?: ExistenceStrategyRegistry;
  extractor?: AvatarExtractor;
  rateLimiter?: DomainRateLimiter;
}

/** Trims, drops blanks and collapses duplicates, keeping first-seen order */
export function normalizeUsernames(usernames: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const raw of usernames) {
    const username = raw.trim();
    if (username) seen.add(username);
  }
  return Array.from(seen);
}

export class CrawlOrchestrator {
  private catalog: PlatformCatalog;
  private worker: ProbeRunner;
  private maxWorkers: number;
  private verbose: boolean;

  constructor(options: CrawlOrchestratorOptions) {
    this.catalog = options.catalog;
    this.worker = options.worker;
    this.maxWorkers = Math.max(1, options.maxWorkers);
    this.verbose = options.verbose ?? false;
  }

  static fromConfig(config: CrawlerConfig, catalog: PlatformCatalog, overrides: CrawlerOverrides = {}): CrawlOrchestrator {
    const worker = new ProbeWorker({
      catalog,
      fetcher: overrides.fetcher ?? new HttpPageFetcher({
        timeout: config.timeout,
        maxBytes: config.maxPageBytes,
        userAgents: config.userAgents,
      }),
      rateLimiter: overrides.rateLimiter ?? new DomainRateLimiter({ minIntervalMs: config.rateLimitMs }),
      strategies: overrides.strategies ?? createDefaultStrategyRegistry(),
      extractor: overrides.extractor ?? new AvatarExtractor({ maxCandidates: config.maxCandidates }),
      jitter: { minMs: config.jitterMinMs, maxMs: config.jitterMaxMs },
      timeout: config.timeout,
    });

    return new CrawlOrchestrator({
      catalog,
      worker,
      maxWorkers: config.maxWorkers,
      verbose: config.verbose,
    });
  }

  /**
   * Enabled templates for the given ids (every enabled template when omitted).
   * Unknown and disabled ids are skipped with a warning.
   */
  resolvePlatforms(platformIds?: readonly string[]): PlatformTemplate[] {
    if (!platformIds) {
      return this.catalog.enabled();
    }

    const selected: PlatformTemplate[] = [];
    const seen = new Set<string>();
    for (const id of platformIds) {
      if (seen.has(id)) continue;
      seen.add(id);

      const template = this.catalog.get(id);
      if (!template) {
        console.warn(`[crawl] Unknown platform "${id}", skipping`);
        continue;
      }
      if (!template.enabled) {
        console.warn(`[crawl] Platform "${id}" is disabled, skipping`);
        continue;
      }
      selected.push(template);
    }
    return selected;
  }

  /**
   * One ProbeResult per (username, platform) pair, grouped by username in
   * platform order. Failures are results with error set, never omissions.
   */
  async crawl(usernames: Iterable<string>, platformIds?: readonly string[], options: CrawlOptions = {}): Promise<CrawlResults> {
    const names = normalizeUsernames(usernames);
    const platforms = this.resolvePlatforms(platformIds);
    const results: CrawlResults = new Map();

    for (const username of names) {
      results.set(username, []);
    }
    if (names.length === 0 || platforms.length === 0) {
      return results;
    }

    const jobs: ProbeRequest[] = [];
    for (const username of names) {
      for (const template of platforms) {
        jobs.push(this.catalog.buildRequest(template, username));
      }
    }

    const slots: (ProbeResult | undefined)[] = new Array(jobs.length);
    const total = jobs.length;
    let next = 0;
    let completed = 0;

    const spawnWorker = async (): Promise<void> => {
      while (next < jobs.length) {
        const index = next++;
        const request = jobs[index]!;

        const result = await this.runProbe(request);
        slots[index] = result;
        completed++;

        this.report(result, { completed, total }, options);
      }
    };

    const poolSize = Math.min(this.maxWorkers, platforms.length);
    if (this.verbose) {
      console.log(`[crawl] ${names.length} username(s) x ${platforms.length} platform(s) with ${poolSize} worker(s)`);
    }

    const workers: Promise<void>[] = [];
    for (let i = 0; i < poolSize; i++) {
      workers.push(spawnWorker());
    }
    await Promise.all(workers);

    jobs.forEach((request, index) => {
      const result = slots[index] ?? failedProbe(request, { kind: "other", message: "probe did not complete" });
      results.get(request.username)?.push(result);
    });

    return results;
  }

  private async runProbe(request: ProbeRequest): Promise<ProbeResult> {
    try {
      return await this.worker.probe(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return failedProbe(request, { kind: "other", message });
    }
  }

  private report(result: ProbeResult, progress: CrawlProgress, options: CrawlOptions): void {
    if (this.verbose) {
      const status = result.exists ? "found" : "absent";
      const images = result.candidateImageUrls.length > 0 ? ` (${result.candidateImageUrls.length} img)` : "";
      const error = result.error ? ` - ${result.error.kind}: ${result.error.message}` : "";
      console.log(`[crawl] [${progress.completed}/${progress.total}] ${result.platformId}/${result.username}: ${status}${images}${error}`);
    }

    if (options.onResult) {
      try {
        options.onResult(result, progress);
      } catch (err) {
        console.error(`[crawl] onResult callback failed:`, err);
      }
    }
  }
}
