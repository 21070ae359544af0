import { describe, test, expect, vi } from "vitest";
import { FaceMatcher } from "../src/pipeline/matcher";
import { FaceIndex } from "../src/storage/face-index";
import type { DistanceMetric, ImageFetchOutcome } from "../src/types";

const VECTORS: Record<string, number[] | null> = {
  origin: [0, 0],
  far: [3, 4],
  near: [0.3, 0.4],
  blank: null,
  wide: [1, 0, 0],
};

function createMatcher(metric: DistanceMetric = "euclidean") {
  const images = {
    fetch: vi.fn(async (source: string): Promise<ImageFetchOutcome> => {
      if (source === "missing") {
        return { ok: false, error: { kind: "other", message: "file not found: missing" } };
      }
      return { ok: true, bytes: Buffer.from(source), contentType: "image/png" };
    }),
  };
  const embedding = {
    name: "fake",
    metric,
    encode: vi.fn(async (image: Buffer) => {
      const key = image.toString();
      if (key === "broken") throw new Error("service down");
      return VECTORS[key] ?? null;
    }),
  };
  const index = new FaceIndex({ metric });
  return { matcher: new FaceMatcher(images, embedding, index), index };
}

function record(username: string, vector: number[]) {
  return {
    username,
    platformId: "github",
    pageUrl: `https://github.com/${username}`,
    imageUrl: `https://e.test/${username}.jpg`,
    vector,
    source: "crawl" as const,
  };
}

describe("FaceMatcher", () => {
  describe("matchImage", () => {
    test("should rank indexed faces against the query image", async () => {
      const { matcher, index } = createMatcher();
      index.insert(record("alice", [3, 4]));
      index.insert(record("bob", [0, 0]));

      const outcome = await matcher.matchImage("origin", { threshold: 0.6, topK: 5 });

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.matches.map(m => m.username)).toEqual(["bob", "alice"]);
        expect(outcome.matches.map(m => m.distance)).toEqual([0, 5]);
        expect(outcome.matches.map(m => m.isMatch)).toEqual([true, false]);
      }
    });

    test("should pass image failures through", async () => {
      const { matcher } = createMatcher();
      const outcome = await matcher.matchImage("missing", { threshold: 0.6, topK: 5 });
      expect(outcome).toEqual({ ok: false, error: { kind: "other", message: "file not found: missing" } });
    });

    test("should report a query image without a face", async () => {
      const { matcher } = createMatcher();
      const outcome = await matcher.matchImage("blank", { threshold: 0.6, topK: 5 });
      expect(outcome).toEqual({ ok: false, error: { kind: "no_face_detected", message: "no face found in image" } });
    });

    test("should report a query that does not fit the index", async () => {
      const { matcher, index } = createMatcher();
      index.insert(record("alice", [1, 0]));

      const outcome = await matcher.matchImage("wide", { threshold: 0.6, topK: 5 });

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) expect(outcome.error.kind).toBe("other");
    });
  });

  describe("compare", () => {
    test("should compute euclidean distance between two images", async () => {
      const { matcher } = createMatcher();
      expect(await matcher.compare("origin", "far", 0.6)).toEqual({
        ok: true,
        distance: 5,
        similarity: 0,
        isMatch: false,
      });
    });

    test("should match identical images", async () => {
      const { matcher } = createMatcher();
      expect(await matcher.compare("near", "near", 0.6)).toEqual({
        ok: true,
        distance: 0,
        similarity: 1,
        isMatch: true,
      });
    });

    test("should use the provider metric", async () => {
      const { matcher } = createMatcher("cosine");
      const outcome = await matcher.compare("near", "far", 0.4);

      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.distance).toBeCloseTo(0);
        expect(outcome.isMatch).toBe(true);
      }
    });

    test("should say which image failed", async () => {
      const { matcher } = createMatcher();

      expect(await matcher.compare("broken", "near", 0.6)).toEqual({
        ok: false,
        error: { kind: "other", message: "encoding failed: service down" },
        image: "first",
      });
      expect(await matcher.compare("near", "blank", 0.6)).toEqual({
        ok: false,
        error: { kind: "no_face_detected", message: "no face found in image" },
        image: "second",
      });
    });

    test("should refuse vectors of different lengths", async () => {
      const { matcher } = createMatcher();
      expect(await matcher.compare("near", "wide", 0.6)).toEqual({
        ok: false,
        error: { kind: "other", message: "vector length mismatch: 2 vs 3" },
        image: "second",
      });
    });
  });
});
