// facetrail - username probing across platforms and a searchable face index

// Re-export all types
export * from "./types";

// Config
export {
  loadConfig,
  saveConfig,
  resolveIndexPath,
  validateConfig,
  DEFAULT_CONFIG,
  ConfigValidationError,
} from "./config";
export {
  PlatformCatalog,
  PlatformConfigError,
  parsePlatformTemplates,
  loadPlatformCatalog,
  loadBundledPlatforms,
  resolveProfileUrl,
} from "./config/platforms";

// Storage
export * from "./storage";

// Crawler
export * from "./crawler";

// Embedding
export * from "./embedding";

// Pipeline
export { IndexingPipeline } from "./pipeline/indexing";
export { FaceMatcher } from "./pipeline/matcher";
