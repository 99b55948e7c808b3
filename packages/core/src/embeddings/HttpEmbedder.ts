import { isRecord, type Embedder } from "@lectern/shared";

export type HttpEmbedderFlavor = "openai-compatible" | "ollama";

export interface HttpEmbedderOptions {
  flavor: HttpEmbedderFlavor;
  model: string;
  baseUrl?: string;
  apiKey?: string;
  dimensions: number;
  timeoutMs?: number;
}

const DEFAULT_BASE_URLS: Record<HttpEmbedderFlavor, string> = {
  "openai-compatible": "https://api.openai.com/v1",
  ollama: "http://127.0.0.1:11434",
};

const isVector = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "number");

const readOpenAiVectors = (payload: unknown): number[][] => {
  const data: unknown[] = isRecord(payload) && Array.isArray(payload.data) ? payload.data : [];
  return data
    .flatMap((entry, position) => {
      if (!isRecord(entry) || !isVector(entry.embedding)) return [];
      const index = typeof entry.index === "number" ? entry.index : position;
      return [{ index, embedding: entry.embedding }];
    })
    .sort((a, b) => a.index - b.index)
    .map((entry) => entry.embedding);
};

const readOllamaVectors = (payload: unknown): number[][] => {
  const embeddings: unknown[] = isRecord(payload) && Array.isArray(payload.embeddings) ? payload.embeddings : [];
  return embeddings.filter(isVector);
};

export class HttpEmbedder implements Embedder {
  readonly name: string;
  readonly dimensions: number;

  constructor(private options: HttpEmbedderOptions) {
    this.name = `${options.flavor}:${options.model}`;
    this.dimensions = options.dimensions;
  }

  private resolveUrl(): string {
    const base = (this.options.baseUrl ?? DEFAULT_BASE_URLS[this.options.flavor]).trim();
    const root = base.endsWith("/") ? base : `${base}/`;
    const endpoint = this.options.flavor === "ollama" ? "api/embed" : "embeddings";
    return new URL(endpoint, root).toString();
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) return [];
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.options.apiKey) headers.authorization = `Bearer ${this.options.apiKey}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs ?? 60_000);
    try {
      const response = await fetch(this.resolveUrl(), {
        method: "POST",
        headers,
        body: JSON.stringify({ model: this.options.model, input: texts }),
        signal: controller.signal,
      });
      if (!response.ok) {
        const body = await response.text();
        throw new Error(`Embedding request failed (${response.status}): ${body}`);
      }
      const payload: unknown = await response.json();
      const vectors =
        this.options.flavor === "ollama" ? readOllamaVectors(payload) : readOpenAiVectors(payload);
      if (vectors.length !== texts.length) {
        throw new Error(`Embedding response returned ${vectors.length} vectors for ${texts.length} inputs`);
      }
      return vectors;
    } finally {
      clearTimeout(timeout);
    }
  }
}
