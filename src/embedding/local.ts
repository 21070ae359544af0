// Local image fingerprint provider (sharp): offline stand-in for a face encoder

import sharp from "sharp";
import type { DistanceMetric, EmbeddingConfig, FaceEmbeddingProvider } from "../types";

const DEFAULT_GRID = 16;

/**
 * Downsamples the image to a grayscale grid, centres it on its mean and
 * scales it to unit length. Not a face detector: any image with some
 * contrast yields a vector, a flat image yields null.
 */
export class LocalEmbeddingProvider implements FaceEmbeddingProvider {
  readonly name = "local";
  readonly metric: DistanceMetric = "euclidean";
  readonly dimensions: number;

  private grid: number;

  constructor(config?: EmbeddingConfig) {
    const size = Number(config?.model);
    this.grid = Number.isInteger(size) && size >= 4 && size <= 64 ? size : DEFAULT_GRID;
    this.dimensions = this.grid * this.grid;
  }

  async encode(image: Buffer): Promise<number[] | null> {
    const pixels = await sharp(image)
      .removeAlpha()
      .grayscale()
      .resize(this.grid, this.grid, { fit: "fill" })
      .raw()
      .toBuffer();

    const values = Array.from(pixels.subarray(0, this.dimensions), v => v / 255);
    if (values.length !== this.dimensions) {
      return null;
    }

    const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
    const centred = values.map(v => v - mean);
    return this.normalize(centred);
  }

  private normalize(vector: number[]): number[] | null {
    const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    if (magnitude < 1e-6) return null;
    return vector.map(v => v / magnitude);
  }
}
