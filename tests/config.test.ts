import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  loadConfig,
  saveConfig,
  validateConfig,
  resetConfigCache,
  resolveIndexPath,
  getConfigSync,
  ConfigValidationError,
  DEFAULT_CONFIG,
} from "../src/config";

describe("validateConfig", () => {
  test("should accept a partial config", () => {
    const config = validateConfig({ crawler: { maxWorkers: 4 }, embedding: { provider: "deepface" } });
    expect(config.crawler?.maxWorkers).toBe(4);
    expect(config.embedding?.provider).toBe("deepface");
  });

  test("should name the invalid field", () => {
    try {
      validateConfig({ embedding: { provider: "bogus" } });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.invalidFields).toEqual(["embedding.provider"]);
        expect(error.details[0]).toContain("Invalid embedding provider");
      }
    }
  });

  test("should reject a jitter range that runs backwards", () => {
    try {
      validateConfig({ crawler: { jitterMinMs: 3000, jitterMaxMs: 1000 } });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.invalidFields).toEqual(["crawler.jitterMinMs"]);
      }
    }
  });

  test("should reject unknown top-level keys", () => {
    try {
      validateConfig({ colour: "blue" });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.invalidFields).toEqual(["(root)"]);
      }
    }
  });

  test("should reject out-of-range numbers", () => {
    expect(() => validateConfig({ crawler: { maxWorkers: 0 } })).toThrow("crawler.maxWorkers must be at least 1");
    expect(() => validateConfig({ index: { threshold: -1 } })).toThrow("index.threshold cannot be negative");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    resetConfigCache();
    dir = await mkdtemp(join(tmpdir(), "facetrail-config-"));
  });

  afterEach(async () => {
    resetConfigCache();
    await rm(dir, { recursive: true, force: true });
  });

  test("should use defaults when there is no config file", async () => {
    const config = await loadConfig(dir);

    expect(config.dataDir).toBe(dir);
    expect(config.crawler).toEqual(DEFAULT_CONFIG.crawler);
    expect(config.embedding.provider).toBe("local");
    expect(config.index.threshold).toBe(0.6);
  });

  test("should merge the user file over the defaults", async () => {
    await writeFile(join(dir, "config.json"), JSON.stringify({
      crawler: { maxWorkers: 3, verbose: false },
      index: { topK: 25 },
    }));

    const config = await loadConfig(dir);

    expect(config.crawler.maxWorkers).toBe(3);
    expect(config.crawler.verbose).toBe(false);
    expect(config.crawler.rateLimitMs).toBe(1000);
    expect(config.index).toEqual({ file: "face_index.json", threshold: 0.6, topK: 25 });
  });

  test("should widen jitterMaxMs when only jitterMinMs is raised", async () => {
    await writeFile(join(dir, "config.json"), JSON.stringify({ crawler: { jitterMinMs: 5000 } }));

    const config = await loadConfig(dir);

    expect(config.crawler.jitterMinMs).toBe(5000);
    expect(config.crawler.jitterMaxMs).toBe(5000);
  });

  test("should cache until reset", async () => {
    const first = await loadConfig(dir);
    await writeFile(join(dir, "config.json"), JSON.stringify({ crawler: { maxWorkers: 2 } }));

    expect(await loadConfig(dir)).toBe(first);
    expect(getConfigSync()).toBe(first);

    resetConfigCache();
    expect((await loadConfig(dir)).crawler.maxWorkers).toBe(2);
  });

  test("should report invalid JSON", async () => {
    await writeFile(join(dir, "config.json"), "{ nope");
    await expect(loadConfig(dir)).rejects.toThrow(ConfigValidationError);
  });

  test("should report invalid values with the file path", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, JSON.stringify({ images: { perProfile: 50 } }));
    await expect(loadConfig(dir)).rejects.toThrow(`Invalid config in ${path}`);
  });

  test("saveConfig should write a file loadConfig reads back", async () => {
    const config = { ...DEFAULT_CONFIG, dataDir: dir, index: { ...DEFAULT_CONFIG.index, topK: 7 } };
    await saveConfig(config);

    const written = JSON.parse(await readFile(join(dir, "config.json"), "utf-8"));
    expect(written.index.topK).toBe(7);
  });
});

describe("resolveIndexPath", () => {
  test("should resolve relative index files inside the data dir", () => {
    const config = { ...DEFAULT_CONFIG, dataDir: "/data/facetrail" };
    expect(resolveIndexPath(config)).toBe(join("/data/facetrail", "face_index.json"));
  });

  test("should keep absolute index files as they are", () => {
    const config = { ...DEFAULT_CONFIG, dataDir: "/data/facetrail", index: { ...DEFAULT_CONFIG.index, file: "/srv/faces.json" } };
    expect(resolveIndexPath(config)).toBe("/srv/faces.json");
  });
});
