// Image loading for indexing and search: data URIs, http(s) URLs and local files

import { readFile, stat } from "fs/promises";
import sharp from "sharp";
import type { Failure, ImageFetchOutcome, ImageSource } from "../types";
import { classifyFetchError, readBodyWithLimit } from "./fetcher";

const ACCEPTED_CONTENT_TYPES = ["image/", "octet-stream", "binary"];

export interface ImageFetcherOptions {
  maxBytes?: number;
  timeout?: number;
  userAgent?: string;
  /** Decode the bytes with sharp before accepting them */
  validate?: boolean;
}

function fail(kind: Failure["kind"], message: string): ImageFetchOutcome {
  return { ok: false, error: { kind, message } };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class ImageFetcher implements ImageSource {
  private maxBytes: number;
  private timeout: number;
  private userAgent: string;
  private validate: boolean;

  constructor(options?: ImageFetcherOptions) {
    this.maxBytes = options?.maxBytes ?? 5 * 1024 * 1024;
    this.timeout = options?.timeout ?? 10000;
    this.userAgent = options?.userAgent ?? "Mozilla/5.0 (compatible; facetrail/0.1)";
    this.validate = options?.validate ?? true;
  }

  async fetch(source: string): Promise<ImageFetchOutcome> {
    let outcome: ImageFetchOutcome;
    try {
      if (source.startsWith("data:")) {
        outcome = this.decodeDataUri(source);
      } else if (/^https?:\/\//i.test(source)) {
        outcome = await this.download(source);
      } else {
        outcome = await this.readLocal(source);
      }
    } catch (error) {
      return { ok: false, error: classifyFetchError(error) };
    }

    if (!outcome.ok || !this.validate) {
      return outcome;
    }
    return this.checkDecodable(outcome.bytes, outcome.contentType);
  }

  /** Bytes, or null for any failure */
  async fetchBytes(source: string): Promise<Buffer | null> {
    const outcome = await this.fetch(source);
    return outcome.ok ? outcome.bytes : null;
  }

  private decodeDataUri(source: string): ImageFetchOutcome {
    const comma = source.indexOf(",");
    if (comma === -1) {
      return fail("invalid_image", "malformed data URI");
    }

    const header = source.slice("data:".length, comma);
    const payload = source.slice(comma + 1);
    const isBase64 = header.split(";").includes("base64");
    const bytes = isBase64
      ? Buffer.from(payload, "base64")
      : Buffer.from(decodeURIComponent(payload), "utf-8");

    if (bytes.length > this.maxBytes) {
      return fail("content_too_large", `data URI of ${bytes.length} bytes exceeds limit of ${this.maxBytes}`);
    }

    const mediaType = header.split(";")[0] || null;
    return { ok: true, bytes, contentType: mediaType };
  }

  private async download(url: string): Promise<ImageFetchOutcome> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);

    try {
      const response = await fetch(url, {
        headers: {
          "User-Agent": this.userAgent,
          "Accept": "image/*,*/*;q=0.8",
        },
        signal: controller.signal,
        redirect: "follow",
      });

      if (!response.ok) {
        await response.body?.cancel();
        return fail("other", `HTTP ${response.status}: ${response.statusText}`);
      }

      const contentType = response.headers.get("Content-Type")?.toLowerCase() ?? null;
      if (contentType && !ACCEPTED_CONTENT_TYPES.some(accepted => contentType.includes(accepted))) {
        await response.body?.cancel();
        return fail("invalid_image", `unexpected content type ${contentType}`);
      }

      const bytes = await readBodyWithLimit(response, this.maxBytes);
      return { ok: true, bytes, contentType };
    } catch (error) {
      return { ok: false, error: classifyFetchError(error, timedOut) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async readLocal(path: string): Promise<ImageFetchOutcome> {
    try {
      const info = await stat(path);
      if (!info.isFile()) {
        return fail("other", `${path} is not a file`);
      }
      if (info.size > this.maxBytes) {
        return fail("content_too_large", `${path} is ${info.size} bytes, limit is ${this.maxBytes}`);
      }
      return { ok: true, bytes: await readFile(path), contentType: null };
    } catch (error) {
      if (isMissingFile(error)) {
        return fail("other", `file not found: ${path}`);
      }
      throw error;
    }
  }

  private async checkDecodable(bytes: Buffer, contentType: string | null): Promise<ImageFetchOutcome> {
    if (bytes.length === 0) {
      return fail("invalid_image", "empty image");
    }

    try {
      const metadata = await sharp(bytes).metadata();
      if (!metadata.width || !metadata.height) {
        return fail("invalid_image", "could not determine image dimensions");
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return fail("invalid_image", message);
    }

    return { ok: true, bytes, contentType };
  }
}
