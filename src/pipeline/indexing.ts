// Indexing pipeline - crawl results -> image fetch -> face encoding -> FaceIndex

import type {
  CrawlResults,
  FaceEmbeddingProvider,
  FaceRecord,
  Failure,
  ImageAttempt,
  ImageSource,
  IndexingReport,
  ProbeResult,
  RecordSource,
} from "../types";
import type { FaceIndex } from "../storage/face-index";

export interface IndexingPipelineOptions {
  images: ImageSource;
  embedding: FaceEmbeddingProvider;
  index: FaceIndex;
  /** Candidate URLs tried per existing profile */
  perProfile?: number;
  verbose?: boolean;
}

export interface ManualFace {
  username: string;
  platformId: string;
  /** Data URI, http(s) URL or local path */
  imageSource: string;
  pageUrl?: string;
}

interface ImageTarget {
  username: string;
  platformId: string;
  pageUrl: string;
  imageUrl: string;
  source: RecordSource;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function flatten(results: CrawlResults | Iterable<ProbeResult>): ProbeResult[] {
  if (results instanceof Map) {
    return Array.from(results.values()).flat();
  }
  return Array.from(results);
}

export class IndexingPipeline {
  private images: ImageSource;
  private embedding: FaceEmbeddingProvider;
  private faceIndex: FaceIndex;
  private perProfile: number;
  private verbose: boolean;

  constructor(options: IndexingPipelineOptions) {
    this.images = options.images;
    this.embedding = options.embedding;
    this.faceIndex = options.index;
    this.perProfile = Math.max(1, options.perProfile ?? 2);
    this.verbose = options.verbose ?? false;
  }

  /** Records created from the crawl results; per-image failures are skipped */
  async index(results: CrawlResults | Iterable<ProbeResult>): Promise<FaceRecord[]> {
    const report = await this.indexWithReport(results);
    return report.records;
  }

  async indexWithReport(results: CrawlResults | Iterable<ProbeResult>): Promise<IndexingReport> {
    const records: FaceRecord[] = [];
    const attempts: ImageAttempt[] = [];

    for (const result of flatten(results)) {
      if (!result.exists) continue;

      for (const imageUrl of result.candidateImageUrls.slice(0, this.perProfile)) {
        const attempt = await this.indexImage({
          username: result.username,
          platformId: result.platformId,
          pageUrl: result.finalUrl,
          imageUrl,
          source: "crawl",
        });
        attempts.push(attempt);

        const record = attempt.recordId ? this.faceIndex.get(attempt.recordId) : undefined;
        if (record) records.push(record);
      }
    }

    if (this.verbose) {
      const failed = attempts.filter(a => a.error).length;
      console.log(`[index] ${records.length} face(s) indexed from ${attempts.length} image(s), ${failed} failed`);
    }

    return { records, attempts };
  }

  async addManual(face: ManualFace): Promise<ImageAttempt> {
    return this.indexImage({
      username: face.username,
      platformId: face.platformId,
      pageUrl: face.pageUrl ?? "",
      imageUrl: face.imageSource,
      source: "manual",
    });
  }

  /** One image end to end; never throws */
  private async indexImage(target: ImageTarget): Promise<ImageAttempt> {
    const attempt = (recordId: string | null, error: Failure | null): ImageAttempt => ({
      username: target.username,
      platformId: target.platformId,
      imageUrl: target.imageUrl,
      recordId,
      error,
    });

    const fetched = await this.images.fetch(target.imageUrl);
    if (!fetched.ok) {
      this.logFailure(target, fetched.error);
      return attempt(null, fetched.error);
    }

    let vector: number[] | null;
    try {
      vector = await this.embedding.encode(fetched.bytes);
    } catch (error) {
      const failure: Failure = { kind: "other", message: `encoding failed: ${errorMessage(error)}` };
      this.logFailure(target, failure);
      return attempt(null, failure);
    }

    if (!vector || vector.length === 0) {
      const failure: Failure = { kind: "no_face_detected", message: "no face found in image" };
      this.logFailure(target, failure);
      return attempt(null, failure);
    }

    try {
      const recordId = this.faceIndex.insert({
        username: target.username,
        platformId: target.platformId,
        pageUrl: target.pageUrl,
        imageUrl: target.imageUrl,
        vector,
        source: target.source,
      });
      if (this.verbose) {
        console.log(`[index] Face indexed: ${target.username}@${target.platformId}`);
      }
      return attempt(recordId, null);
    } catch (error) {
      const failure: Failure = { kind: "other", message: errorMessage(error) };
      this.logFailure(target, failure);
      return attempt(null, failure);
    }
  }

  private logFailure(target: ImageTarget, failure: Failure): void {
    if (this.verbose) {
      console.warn(`[index] ${target.username}@${target.platformId} ${target.imageUrl}: ${failure.kind} - ${failure.message}`);
    }
  }
}
