// Face matching: search the index by image, compare two images

import type { FaceEmbeddingProvider, Failure, ImageSource, MatchResult, SearchOptions } from "../types";
import type { FaceIndex } from "../storage/face-index";
import { cosineDistance, euclideanDistance, similarityFromDistance } from "../storage/face-index";

export type ImageSearchOutcome =
  | { ok: true; matches: MatchResult[] }
  | { ok: false; error: Failure };

export type CompareOutcome =
  | { ok: true; distance: number; similarity: number; isMatch: boolean }
  | { ok: false; error: Failure; image: "first" | "second" };

type EncodeOutcome = { ok: true; vector: number[] } | { ok: false; error: Failure };

export class FaceMatcher {
  constructor(
    private images: ImageSource,
    private embedding: FaceEmbeddingProvider,
    private index: FaceIndex
  ) {}

  async encodeSource(source: string): Promise<EncodeOutcome> {
    const fetched = await this.images.fetch(source);
    if (!fetched.ok) {
      return fetched;
    }

    let vector: number[] | null;
    try {
      vector = await this.embedding.encode(fetched.bytes);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: { kind: "other", message: `encoding failed: ${message}` } };
    }

    if (!vector || vector.length === 0) {
      return { ok: false, error: { kind: "no_face_detected", message: "no face found in image" } };
    }
    return { ok: true, vector };
  }

  async matchImage(source: string, options: SearchOptions): Promise<ImageSearchOutcome> {
    const encoded = await this.encodeSource(source);
    if (!encoded.ok) {
      return encoded;
    }

    try {
      return { ok: true, matches: this.index.search(encoded.vector, options) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: { kind: "other", message } };
    }
  }

  async compare(first: string, second: string, threshold: number): Promise<CompareOutcome> {
    const a = await this.encodeSource(first);
    if (!a.ok) {
      return { ok: false, error: a.error, image: "first" };
    }
    const b = await this.encodeSource(second);
    if (!b.ok) {
      return { ok: false, error: b.error, image: "second" };
    }

    if (a.vector.length !== b.vector.length) {
      return {
        ok: false,
        error: { kind: "other", message: `vector length mismatch: ${a.vector.length} vs ${b.vector.length}` },
        image: "second",
      };
    }

    const distance = this.embedding.metric === "cosine"
      ? cosineDistance(a.vector, b.vector)
      : euclideanDistance(a.vector, b.vector);

    return {
      ok: true,
      distance,
      similarity: similarityFromDistance(distance),
      isMatch: distance < threshold,
    };
  }
}
