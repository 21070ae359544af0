// Core types and interfaces for facetrail

export interface PlatformTemplate {
  /** Unique platform key (e.g., "github") */
  id: string;
  /** Profile URL with exactly one "{}" username placeholder */
  urlPattern: string;
  /** Existence strategy id; unknown ids fall back to "universal" */
  existenceStrategy: string;
  /** Optional CSS selector pointing at the avatar image */
  avatarSelector?: string;
  enabled: boolean;
}

export interface ProbeRequest {
  username: string;
  platformId: string;
  /** Profile URL with the username substituted in */
  url: string;
}

export type FailureKind =
  | "timeout"
  | "connection_error"
  | "content_too_large"
  | "invalid_image"
  | "no_face_detected"
  | "other";

export interface Failure {
  kind: FailureKind;
  message: string;
}

export interface ProbeResult {
  username: string;
  platformId: string;
  exists: boolean;
  /** HTTP status of the final response, 0 when no response arrived */
  statusCode: number;
  /** URL after redirects (the request URL when no response arrived) */
  finalUrl: string;
  /** Most likely avatar first; always empty when exists is false */
  candidateImageUrls: readonly string[];
  error: Failure | null;
  /** Length of the response body in characters */
  contentLength: number;
}

export type CrawlResults = Map<string, ProbeResult[]>;

export interface PageResponse {
  finalUrl: string;
  statusCode: number;
  body: string;
  contentType: string;
}

export interface PageFetchOptions {
  timeout?: number;
  userAgent?: string;
}

export interface PageFetcher {
  fetch(url: string, options?: PageFetchOptions): Promise<PageResponse>;
}

export type ImageFetchOutcome =
  | { ok: true; bytes: Buffer; contentType: string | null }
  | { ok: false; error: Failure };

export interface ImageSource {
  /** Load a data URI, http(s) URL or local path */
  fetch(source: string): Promise<ImageFetchOutcome>;
}

export type DistanceMetric = "euclidean" | "cosine";

export interface FaceEmbeddingProvider {
  readonly name: string;
  readonly metric: DistanceMetric;
  /** Vector for the first detected face, or null when the image has no face */
  encode(image: Buffer): Promise<number[] | null>;
}

export type RecordSource = "crawl" | "manual";

export interface FaceRecord {
  id: string;
  username: string;
  platformId: string;
  pageUrl: string;
  imageUrl: string;
  /** Frozen once stored */
  vector: readonly number[];
  /** Epoch milliseconds */
  insertedAt: number;
  source: RecordSource;
}

export type NewFaceRecord = Omit<FaceRecord, "id" | "insertedAt">;

export interface MatchResult {
  recordId: string;
  username: string;
  platformId: string;
  pageUrl: string;
  imageUrl: string;
  distance: number;
  similarity: number;
  isMatch: boolean;
}

export interface SearchOptions {
  /** Distance below which a result counts as a match */
  threshold: number;
  topK: number;
  /** Drop results that are not matches */
  matchesOnly?: boolean;
}

export interface IndexStats {
  total: number;
  dimensions: number;
  byPlatform: Record<string, number>;
  byUsername: Record<string, number>;
}

export interface ImageAttempt {
  username: string;
  platformId: string;
  imageUrl: string;
  recordId: string | null;
  error: Failure | null;
}

export interface IndexingReport {
  records: FaceRecord[];
  attempts: ImageAttempt[];
}

export interface FacetrailConfig {
  /** Data directory (defaults to ~/.facetrail) */
  dataDir: string;

  /** Probe crawler config */
  crawler: CrawlerConfig;

  /** Image download config */
  images: ImageConfig;

  /** Face embedding provider config */
  embedding: EmbeddingConfig;

  /** Face index config */
  index: IndexConfig;

  /** Custom platform template file (bundled templates when unset) */
  platformsFile?: string;
}

export interface CrawlerConfig {
  /** Upper bound on concurrent probes */
  maxWorkers: number;
  /** Minimum gap between requests to the same domain (ms) */
  rateLimitMs: number;
  /** Random pre-request delay range (ms) */
  jitterMinMs: number;
  jitterMaxMs: number;
  /** Request timeout (ms) */
  timeout: number;
  /** Largest profile page body read (bytes) */
  maxPageBytes: number;
  /** User agents rotated per request */
  userAgents: string[];
  /** Maximum avatar candidates kept per profile */
  maxCandidates: number;
  /** Print a line per finished probe */
  verbose: boolean;
}

export interface ImageConfig {
  /** Largest image downloaded (bytes) */
  maxBytes: number;
  /** Download timeout (ms) */
  timeout: number;
  /** Candidate images tried per existing profile */
  perProfile: number;
}

export interface EmbeddingConfig {
  /** Provider type: "local" | "remote" | "deepface" */
  provider: string;
  /** Model name (provider-specific) */
  model?: string;
  /** API key (for service providers) */
  apiKey?: string;
  /** Service base URL */
  apiBase?: string;
}

export interface IndexConfig {
  /** Index file name, relative to the data dir unless absolute */
  file: string;
  /** Default match threshold */
  threshold: number;
  /** Default number of search results */
  topK: number;
}
