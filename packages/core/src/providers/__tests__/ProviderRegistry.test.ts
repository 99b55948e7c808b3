import test from "node:test";
import assert from "node:assert/strict";
import { AnthropicProvider } from "../AnthropicProvider.js";
import { OpenAiCompatibleProvider } from "../OpenAiCompatibleProvider.js";
import { ProviderRegistry, createProvider, defaultProviderRegistry } from "../ProviderRegistry.js";
import type { Provider } from "../ProviderTypes.js";

const stubProvider: Provider = {
  name: "stub",
  generate: async () => ({ stopReason: "end_turn", content: [{ type: "text", text: "stub" }] }),
};

test("default registry knows the built-in providers", () => {
  assert.deepEqual(defaultProviderRegistry.list(), ["anthropic", "openai-compatible"]);
  assert.ok(createProvider("anthropic", { model: "test-model" }) instanceof AnthropicProvider);
  assert.ok(createProvider("openai-compatible", { model: "test-model" }) instanceof OpenAiCompatibleProvider);
});

test("ProviderRegistry rejects duplicates and unknown names", () => {
  const registry = new ProviderRegistry();
  registry.register("stub", () => stubProvider);
  assert.equal(registry.create("stub", { model: "test-model" }), stubProvider);
  assert.throws(() => registry.register("stub", () => stubProvider), /Provider already registered: stub/);
  assert.throws(() => registry.create("missing", { model: "test-model" }), /Unknown provider: missing/);
});
