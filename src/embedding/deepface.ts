// DeepFace API provider (/represent)

import { z } from "zod/v4";
import type { DistanceMetric, EmbeddingConfig, FaceEmbeddingProvider } from "../types";
import { fetchWithRetry, type RetryOptions } from "./retry";

const RepresentResponseSchema = z.object({
  results: z.array(z.object({
    embedding: z.array(z.number()).min(1),
  })),
});

const NO_FACE_MARKERS = ["could not be detected", "face could not be", "no face"];

export class DeepFaceEmbeddingProvider implements FaceEmbeddingProvider {
  readonly name = "deepface";
  readonly metric: DistanceMetric = "cosine";

  private apiBase: string;
  private apiKey: string | undefined;
  private model: string;
  private retry: RetryOptions | undefined;

  constructor(config: EmbeddingConfig, retry?: RetryOptions) {
    this.apiBase = (config.apiBase || "http://localhost:5005").replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.model = config.model || "Facenet512";
    this.retry = retry;
  }

  async encode(image: Buffer): Promise<number[] | null> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    const response = await fetchWithRetry(`${this.apiBase}/represent`, {
      method: "POST",
      headers,
      body: JSON.stringify({
        img: `data:image/jpeg;base64,${image.toString("base64")}`,
        model_name: this.model,
        enforce_detection: true,
      }),
    }, this.retry);

    if (!response.ok) {
      const error = await response.text();
      if (response.status === 400 && NO_FACE_MARKERS.some(marker => error.toLowerCase().includes(marker))) {
        return null;
      }
      throw new Error(`DeepFace API error: ${response.status} ${error}`);
    }

    const parsed = RepresentResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected DeepFace response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
    }

    return parsed.data.results[0]?.embedding ?? null;
  }
}
