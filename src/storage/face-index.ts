// In-memory face index with brute-force search and JSON file persistence

import { randomUUID } from "crypto";
import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod/v4";
import type {
  DistanceMetric,
  FaceRecord,
  IndexStats,
  MatchResult,
  NewFaceRecord,
  SearchOptions,
} from "../types";

export const INDEX_FORMAT_VERSION = 1;

const FaceRecordSchema = z.object({
  id: z.string().min(1),
  username: z.string(),
  platformId: z.string(),
  pageUrl: z.string(),
  imageUrl: z.string(),
  vector: z.array(z.number()).min(1),
  insertedAt: z.number(),
  source: z.enum(["crawl", "manual"]),
});

const IndexFileSchema = z.object({
  faces: z.array(FaceRecordSchema),
  metadata: z.object({
    total: z.number().int().min(0),
    timestamp: z.string(),
    dimensions: z.number().int().min(0),
    metric: z.enum(["euclidean", "cosine"]),
    version: z.number().int(),
  }),
});

export type IndexFile = z.infer<typeof IndexFileSchema>;

export class DimensionMismatchError extends Error {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Vector length mismatch: index holds ${expected}-dimensional vectors, got ${actual}`);
    this.name = "DimensionMismatchError";
  }
}

export class IndexFileError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = "IndexFileError";
  }
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i]! - b[i]!;
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/** 1 - cosine similarity, floored at 0; zero vectors are at distance 1 */
export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i]! * b[i]!;
    normA += a[i]! * a[i]!;
    normB += b[i]! * b[i]!;
  }

  if (normA === 0 || normB === 0) {
    return 1;
  }

  return Math.max(0, 1 - dotProduct / (Math.sqrt(normA) * Math.sqrt(normB)));
}

export function similarityFromDistance(distance: number): number {
  return Math.max(0, 1 - Math.min(distance, 1));
}

export interface FaceIndexOptions {
  metric?: DistanceMetric;
  /** Default file for persist/restore */
  path?: string;
  now?: () => number;
}

export class FaceIndex {
  readonly metric: DistanceMetric;
  private path: string | undefined;
  private now: () => number;
  private faces: FaceRecord[] = [];
  private byId = new Map<string, FaceRecord>();
  private dims = 0;

  constructor(options: FaceIndexOptions = {}) {
    this.metric = options.metric ?? "euclidean";
    this.path = options.path;
    this.now = options.now ?? (() => Date.now());
  }

  get size(): number {
    return this.faces.length;
  }

  /** 0 until the first record is inserted */
  get dimensions(): number {
    return this.dims;
  }

  /** Records in insertion order, oldest first */
  get records(): readonly FaceRecord[] {
    return this.faces;
  }

  get(id: string): FaceRecord | undefined {
    return this.byId.get(id);
  }

  insert(record: NewFaceRecord): string {
    if (record.vector.length === 0) {
      throw new DimensionMismatchError(this.dims, 0);
    }
    if (this.dims !== 0 && record.vector.length !== this.dims) {
      throw new DimensionMismatchError(this.dims, record.vector.length);
    }

    const stored: FaceRecord = Object.freeze({
      id: randomUUID(),
      username: record.username,
      platformId: record.platformId,
      pageUrl: record.pageUrl,
      imageUrl: record.imageUrl,
      vector: Object.freeze([...record.vector]),
      insertedAt: this.now(),
      source: record.source,
    });

    this.dims = stored.vector.length;
    this.faces.push(stored);
    this.byId.set(stored.id, stored);
    return stored.id;
  }

  /**
   * Brute-force nearest records, most similar first. Equal similarity
   * keeps insertion order, so every record at distance >= 1 ties at 0.
   * Does not mutate the index.
   */
  search(query: readonly number[], options: SearchOptions): MatchResult[] {
    if (options.topK <= 0 || this.faces.length === 0) {
      return [];
    }
    if (query.length !== this.dims) {
      throw new DimensionMismatchError(this.dims, query.length);
    }

    const distance = this.metric === "cosine" ? cosineDistance : euclideanDistance;

    const scored = this.faces.map(record => {
      const d = distance(query, record.vector);
      return {
        recordId: record.id,
        username: record.username,
        platformId: record.platformId,
        pageUrl: record.pageUrl,
        imageUrl: record.imageUrl,
        distance: d,
        similarity: similarityFromDistance(d),
        isMatch: d < options.threshold,
      };
    });

    scored.sort((a, b) => b.similarity - a.similarity);

    const ranked = options.matchesOnly ? scored.filter(r => r.isMatch) : scored;
    return ranked.slice(0, options.topK);
  }

  clear(): void {
    this.faces = [];
    this.byId = new Map();
    this.dims = 0;
  }

  stats(): IndexStats {
    const byPlatform: Record<string, number> = {};
    const byUsername: Record<string, number> = {};
    for (const record of this.faces) {
      byPlatform[record.platformId] = (byPlatform[record.platformId] ?? 0) + 1;
      byUsername[record.username] = (byUsername[record.username] ?? 0) + 1;
    }
    return { total: this.faces.length, dimensions: this.dims, byPlatform, byUsername };
  }

  toJSON(): IndexFile {
    return {
      faces: this.faces.map(record => ({ ...record, vector: [...record.vector] })),
      metadata: {
        total: this.faces.length,
        timestamp: new Date(this.now()).toISOString(),
        dimensions: this.dims,
        metric: this.metric,
        version: INDEX_FORMAT_VERSION,
      },
    };
  }

  /** Writes a temporary file next to the target, then renames it over */
  async persist(path?: string): Promise<string> {
    const target = this.resolvePath(path);
    const tmpPath = `${target}.${process.pid}.${randomUUID()}.tmp`;

    await mkdir(dirname(target), { recursive: true });
    await writeFile(tmpPath, JSON.stringify(this.toJSON(), null, 2));
    await rename(tmpPath, target);

    console.log(`[face-index] Saved ${this.faces.length} face(s) to ${target}`);
    return target;
  }

  /**
   * Replaces the records with the file's contents. The whole file is
   * validated first; on any error the current records are kept.
   */
  async restore(path?: string): Promise<number> {
    const source = this.resolvePath(path);

    let raw: string;
    try {
      raw = await readFile(source, "utf-8");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new IndexFileError(`Cannot read index file ${source}: ${message}`, source);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new IndexFileError(`Invalid JSON in index file ${source}: ${message}`, source);
    }

    const file = this.validateFile(parsed, source);

    const records = file.faces.map(face => Object.freeze({ ...face, vector: Object.freeze([...face.vector]) }));
    this.faces = records;
    this.byId = new Map(records.map(record => [record.id, record]));
    this.dims = records[0]?.vector.length ?? 0;

    console.log(`[face-index] Loaded ${records.length} face(s) from ${source}`);
    return records.length;
  }

  private validateFile(parsed: unknown, source: string): IndexFile {
    const result = IndexFileSchema.safeParse(parsed);
    if (!result.success) {
      const details = result.error.issues.map(issue => {
        const path = issue.path.join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      });
      throw new IndexFileError(`Invalid index file ${source}:\n${details.map(d => `  - ${d}`).join("\n")}`, source, details);
    }

    const file = result.data;
    const problems: string[] = [];

    if (file.metadata.total !== file.faces.length) {
      problems.push(`metadata.total is ${file.metadata.total} but the file holds ${file.faces.length} face(s)`);
    }
    if (file.metadata.metric !== this.metric) {
      problems.push(`metadata.metric is ${file.metadata.metric}, this index uses ${this.metric}`);
    }

    const dims = file.faces[0]?.vector.length;
    const ids = new Set<string>();
    file.faces.forEach((face, i) => {
      if (dims !== undefined && face.vector.length !== dims) {
        problems.push(`faces.${i}.vector has ${face.vector.length} dimensions, expected ${dims}`);
      }
      if (ids.has(face.id)) {
        problems.push(`faces.${i}.id ${face.id} is duplicated`);
      }
      ids.add(face.id);
    });

    if (problems.length > 0) {
      throw new IndexFileError(`Invalid index file ${source}:\n${problems.map(d => `  - ${d}`).join("\n")}`, source, problems);
    }

    return file;
  }

  private resolvePath(path: string | undefined): string {
    const resolved = path ?? this.path;
    if (!resolved) {
      throw new IndexFileError("No index file path configured", "");
    }
    return resolved;
  }
}
