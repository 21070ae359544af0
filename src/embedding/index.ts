// Face embedding providers - barrel export

import type { EmbeddingConfig, FaceEmbeddingProvider } from "../types";

// Provider implementations
export { LocalEmbeddingProvider } from "./local";
export { RemoteEmbeddingProvider } from "./remote";
export { DeepFaceEmbeddingProvider } from "./deepface";
export { fetchWithRetry } from "./retry";

// Lazy imports for tree-shaking
async function loadProvider(provider: string): Promise<new (config: EmbeddingConfig) => FaceEmbeddingProvider> {
  switch (provider) {
    case "remote": {
      const { RemoteEmbeddingProvider } = await import("./remote");
      return RemoteEmbeddingProvider;
    }
    case "deepface": {
      const { DeepFaceEmbeddingProvider } = await import("./deepface");
      return DeepFaceEmbeddingProvider;
    }
    case "local":
    default: {
      const { LocalEmbeddingProvider } = await import("./local");
      return LocalEmbeddingProvider;
    }
  }
}

/**
 * Create a face embedding provider from config (async)
 */
export async function createEmbeddingProvider(config?: EmbeddingConfig): Promise<FaceEmbeddingProvider> {
  const cfg = config ?? { provider: "local" };
  const Provider = await loadProvider(cfg.provider);
  return new Provider(cfg);
}
