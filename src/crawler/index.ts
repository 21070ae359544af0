// Crawler module barrel export

export { DomainRateLimiter, domainOf } from "./rate-limiter";
export { ExistenceStrategyRegistry, createDefaultStrategyRegistry, parseStrategyDefinitions } from "./strategies";
export { AvatarExtractor, DEFAULT_PHASE_ORDER } from "./avatar-extractor";
export { HttpPageFetcher, FetchFailure, classifyFetchError } from "./fetcher";
export { ProbeWorker } from "./probe-worker";
export { CrawlOrchestrator, normalizeUsernames } from "./orchestrator";
export { ImageFetcher } from "./image-fetcher";
