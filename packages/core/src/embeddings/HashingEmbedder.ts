import type { Embedder } from "@lectern/shared";

const TOKEN_SPLIT = /[^\p{L}\p{N}]+/u;

const fnv1a = (value: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i += 1) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

export const tokenize = (text: string): string[] =>
  text
    .toLowerCase()
    .split(TOKEN_SPLIT)
    .filter(Boolean);

/**
 * Local feature-hashing embedder. Needs no model download or network access,
 * so it is the default for fresh workspaces and for tests; quality is limited
 * to lexical overlap.
 */
export class HashingEmbedder implements Embedder {
  readonly name = "hashing";

  constructor(readonly dimensions = 384) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Invalid embedding dimensions: ${dimensions}`);
    }
  }

  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }
}
