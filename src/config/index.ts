// Config loading from ~/.facetrail/config.json

import { mkdir, readFile, writeFile } from "fs/promises";
import { homedir } from "os";
import { isAbsolute, join } from "path";
import { z } from "zod/v4";
import type { FacetrailConfig, CrawlerConfig, ImageConfig, EmbeddingConfig, IndexConfig } from "../types";

const DEFAULT_DATA_DIR = process.env.FACETRAIL_DATA_DIR || join(homedir(), ".facetrail");

const EMBEDDING_PROVIDERS = ["local", "remote", "deepface"] as const;

const MIB = 1024 * 1024;

const CrawlerConfigSchema = z.object({
  maxWorkers: z.number().int().min(1, "crawler.maxWorkers must be at least 1").max(64, "crawler.maxWorkers must be at most 64"),
  rateLimitMs: z.number().int().min(0, "crawler.rateLimitMs cannot be negative").max(60000, "crawler.rateLimitMs must be at most 60000ms"),
  jitterMinMs: z.number().int().min(0, "crawler.jitterMinMs cannot be negative").max(60000, "crawler.jitterMinMs must be at most 60000ms"),
  jitterMaxMs: z.number().int().min(0, "crawler.jitterMaxMs cannot be negative").max(60000, "crawler.jitterMaxMs must be at most 60000ms"),
  timeout: z.number().int().min(1000, "crawler.timeout must be at least 1000ms").max(120000, "crawler.timeout must be at most 120000ms"),
  maxPageBytes: z.number().int().min(1024, "crawler.maxPageBytes must be at least 1024").max(50 * MIB, "crawler.maxPageBytes must be at most 50 MiB"),
  userAgents: z.array(z.string().min(1, "crawler.userAgents entries cannot be empty")).min(1, "crawler.userAgents needs at least one entry"),
  maxCandidates: z.number().int().min(1, "crawler.maxCandidates must be at least 1").max(10, "crawler.maxCandidates must be at most 10"),
  verbose: z.boolean(),
});

const ImageConfigSchema = z.object({
  maxBytes: z.number().int().min(1024, "images.maxBytes must be at least 1024").max(50 * MIB, "images.maxBytes must be at most 50 MiB"),
  timeout: z.number().int().min(1000, "images.timeout must be at least 1000ms").max(120000, "images.timeout must be at most 120000ms"),
  perProfile: z.number().int().min(1, "images.perProfile must be at least 1").max(10, "images.perProfile must be at most 10"),
});

const EmbeddingConfigSchema = z.object({
  provider: z.enum(EMBEDDING_PROVIDERS, {
    error: `Invalid embedding provider. Must be one of: ${EMBEDDING_PROVIDERS.join(", ")}`,
  }),
  model: z.string().optional(),
  apiKey: z.string().optional(),
  apiBase: z.url({ message: "embedding.apiBase must be a valid URL" }).optional(),
});

const IndexConfigSchema = z.object({
  file: z.string().min(1, "index.file cannot be empty"),
  threshold: z.number().min(0, "index.threshold cannot be negative").max(2, "index.threshold must be at most 2"),
  topK: z.number().int().min(1, "index.topK must be at least 1").max(1000, "index.topK must be at most 1000"),
});

const UserConfigSchema = z.object({
  dataDir: z.string().optional(),
  crawler: CrawlerConfigSchema.partial().optional(),
  images: ImageConfigSchema.partial().optional(),
  embedding: EmbeddingConfigSchema.partial().optional(),
  index: IndexConfigSchema.partial().optional(),
  platformsFile: z.string().min(1, "platformsFile cannot be empty").optional(),
}).strict();

type ValidatedUserConfig = z.infer<typeof UserConfigSchema>;

class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly invalidFields: string[],
    public readonly details: string[]
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

function formatZodError(error: z.ZodError): { invalidFields: string[]; details: string[] } {
  const invalidFields: string[] = [];
  const details: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.join(".");
    invalidFields.push(path || "(root)");
    details.push(path ? `${path}: ${issue.message}` : issue.message);
  }

  return { invalidFields, details };
}

function validateUserConfig(userConfig: unknown, configPath: string): ValidatedUserConfig {
  const result = UserConfigSchema.safeParse(userConfig);

  if (!result.success) {
    const { invalidFields, details } = formatZodError(result.error);
    const message = [
      `Invalid config in ${configPath}:`,
      "",
      "Validation errors:",
      ...details.map((d) => `  - ${d}`),
      "",
      `Invalid fields: ${invalidFields.join(", ")}`,
    ].join("\n");

    throw new ConfigValidationError(message, invalidFields, details);
  }

  const crawler = result.data.crawler;
  if (crawler?.jitterMinMs !== undefined && crawler.jitterMaxMs !== undefined && crawler.jitterMinMs > crawler.jitterMaxMs) {
    throw new ConfigValidationError(
      `Invalid config in ${configPath}: crawler.jitterMinMs must not exceed crawler.jitterMaxMs`,
      ["crawler.jitterMinMs"],
      ["crawler.jitterMinMs: must not exceed crawler.jitterMaxMs"]
    );
  }

  return result.data;
}

const DEFAULT_CRAWLER_CONFIG: CrawlerConfig = {
  maxWorkers: 10,
  rateLimitMs: 1000,
  jitterMinMs: 1000,
  jitterMaxMs: 3000,
  timeout: 15000,
  maxPageBytes: 5 * MIB,
  userAgents: [
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (X11; Linux x86_64; rv:121.0) Gecko/20100101 Firefox/121.0",
  ],
  maxCandidates: 10,
  verbose: true,
};

const DEFAULT_IMAGE_CONFIG: ImageConfig = {
  maxBytes: 5 * MIB,
  timeout: 10000,
  perProfile: 2,
};

const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  provider: "local",
};

const DEFAULT_INDEX_CONFIG: IndexConfig = {
  file: "face_index.json",
  threshold: 0.6,
  topK: 10,
};

const DEFAULT_CONFIG: FacetrailConfig = {
  dataDir: DEFAULT_DATA_DIR,
  crawler: DEFAULT_CRAWLER_CONFIG,
  images: DEFAULT_IMAGE_CONFIG,
  embedding: DEFAULT_EMBEDDING_CONFIG,
  index: DEFAULT_INDEX_CONFIG,
};

let cachedConfig: FacetrailConfig | null = null;

export async function loadConfig(dataDir: string = DEFAULT_DATA_DIR): Promise<FacetrailConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = join(dataDir, "config.json");
  const defaults: FacetrailConfig = { ...DEFAULT_CONFIG, dataDir };

  let raw: string | null = null;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    if (!isMissingFile(err)) {
      console.warn(`Failed to read config from ${configPath}, using defaults:`, err);
    }
  }

  if (raw === null) {
    cachedConfig = defaults;
  } else {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigValidationError(
        `Invalid JSON in ${configPath}: ${message}`,
        ["(json)"],
        [message]
      );
    }
    cachedConfig = mergeConfig(defaults, validateUserConfig(parsed, configPath));
  }

  await ensureDataDir(cachedConfig.dataDir);

  return cachedConfig;
}

export function getConfigSync(): FacetrailConfig {
  if (!cachedConfig) {
    return { ...DEFAULT_CONFIG };
  }
  return cachedConfig;
}

function mergeConfig(defaults: FacetrailConfig, user: ValidatedUserConfig): FacetrailConfig {
  const crawler = { ...defaults.crawler, ...user.crawler };
  if (crawler.jitterMinMs > crawler.jitterMaxMs) {
    crawler.jitterMaxMs = crawler.jitterMinMs;
  }

  return {
    dataDir: user.dataDir ?? defaults.dataDir,
    crawler,
    images: { ...defaults.images, ...user.images },
    embedding: { ...defaults.embedding, ...user.embedding },
    index: { ...defaults.index, ...user.index },
    platformsFile: user.platformsFile ?? defaults.platformsFile,
  };
}

async function ensureDataDir(dataDir: string): Promise<void> {
  await mkdir(dataDir, { recursive: true });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function saveConfig(config: FacetrailConfig): Promise<void> {
  await ensureDataDir(config.dataDir);
  const configPath = join(config.dataDir, "config.json");
  await writeFile(configPath, JSON.stringify(config, null, 2));
  cachedConfig = config;
}

export function resolveIndexPath(config: FacetrailConfig): string {
  return isAbsolute(config.index.file) ? config.index.file : join(config.dataDir, config.index.file);
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function validateConfig(config: unknown): ValidatedUserConfig {
  return validateUserConfig(config, "(inline)");
}

export {
  DEFAULT_CONFIG,
  DEFAULT_DATA_DIR,
  ConfigValidationError,
  EMBEDDING_PROVIDERS,
};
