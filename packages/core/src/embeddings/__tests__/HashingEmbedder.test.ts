import test from "node:test";
import assert from "node:assert/strict";
import { HashingEmbedder, tokenize } from "../HashingEmbedder.js";
import { HttpEmbedder } from "../HttpEmbedder.js";
import { createEmbedder } from "../createEmbedder.js";

const norm = (vector: number[]): number => Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));

test("tokenize lowercases and splits on non-word characters", () => {
  assert.deepEqual(tokenize("What's RAG? Retrieval-Augmented Generation!"), [
    "what",
    "s",
    "rag",
    "retrieval",
    "augmented",
    "generation",
  ]);
});

test("HashingEmbedder produces deterministic unit vectors", async () => {
  const embedder = new HashingEmbedder(64);
  const [first, second, empty] = await embedder.embed(["vector search basics", "Vector SEARCH basics", ""]);

  assert.equal(first.length, 64);
  assert.deepEqual(first, second);
  assert.ok(Math.abs(norm(first) - 1) < 1e-9);
  assert.equal(norm(empty), 0);
});

test("HashingEmbedder rejects invalid dimensions", () => {
  assert.throws(() => new HashingEmbedder(0), /Invalid embedding dimensions: 0/);
});

test("createEmbedder picks the configured backend", () => {
  const hashing = createEmbedder({ provider: "hashing", model: "feature-hashing", dimensions: 32 });
  assert.ok(hashing instanceof HashingEmbedder);
  assert.equal(hashing.dimensions, 32);

  const remote = createEmbedder({ provider: "ollama", model: "nomic-embed-text", dimensions: 768 });
  assert.ok(remote instanceof HttpEmbedder);
  assert.equal(remote.name, "ollama:nomic-embed-text");
});
