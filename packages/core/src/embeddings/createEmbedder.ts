import type { Embedder } from "@lectern/shared";
import type { EmbeddingsConfig } from "../config/Config.js";
import { HashingEmbedder } from "./HashingEmbedder.js";
import { HttpEmbedder } from "./HttpEmbedder.js";

export const createEmbedder = (config: EmbeddingsConfig, timeoutMs?: number): Embedder => {
  if (config.provider === "hashing") {
    return new HashingEmbedder(config.dimensions);
  }
  return new HttpEmbedder({
    flavor: config.provider,
    model: config.model,
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    dimensions: config.dimensions,
    timeoutMs,
  });
};
