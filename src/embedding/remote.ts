// Generic face-encoding service: POST image bytes, get { faces: [{ embedding }] }

import { z } from "zod/v4";
import type { DistanceMetric, EmbeddingConfig, FaceEmbeddingProvider } from "../types";
import { fetchWithRetry, type RetryOptions } from "./retry";

const EncodeResponseSchema = z.object({
  faces: z.array(z.object({
    embedding: z.array(z.number()).min(1),
  })),
});

export class RemoteEmbeddingProvider implements FaceEmbeddingProvider {
  readonly name = "remote";
  readonly metric: DistanceMetric = "euclidean";

  private apiBase: string;
  private apiKey: string | undefined;
  private model: string | undefined;
  private retry: RetryOptions | undefined;

  constructor(config: EmbeddingConfig, retry?: RetryOptions) {
    if (!config.apiBase) {
      throw new Error("Remote embedding provider requires embedding.apiBase");
    }
    this.apiBase = config.apiBase.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.retry = retry;
  }

  async encode(image: Buffer): Promise<number[] | null> {
    const headers: Record<string, string> = {
      "Content-Type": "application/octet-stream",
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const query = this.model ? `?model=${encodeURIComponent(this.model)}` : "";
    const response = await fetchWithRetry(`${this.apiBase}/encode${query}`, {
      method: "POST",
      headers,
      body: new Uint8Array(image),
    }, this.retry);

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Face encoding service error: ${response.status} ${error}`);
    }

    const parsed = EncodeResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected face encoding response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
    }

    return parsed.data.faces[0]?.embedding ?? null;
  }
}
