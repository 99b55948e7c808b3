import test from "node:test";
import assert from "node:assert/strict";
import { AnthropicProvider, parseAnthropicResponse } from "../AnthropicProvider.js";
import { ProviderError, extractText, type ProviderRequest } from "../ProviderTypes.js";

interface CapturedRequest {
  url: string;
  headers: Headers;
  body: unknown;
}

const withStubbedFetch = async (
  status: number,
  payload: unknown,
  fn: (captured: CapturedRequest[]) => Promise<void>,
): Promise<void> => {
  const original = globalThis.fetch;
  const captured: CapturedRequest[] = [];
  globalThis.fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const body = typeof init?.body === "string" ? init.body : "{}";
    captured.push({ url: String(input), headers: new Headers(init?.headers), body: JSON.parse(body) });
    const text = typeof payload === "string" ? payload : JSON.stringify(payload);
    return new Response(text, { status, headers: { "content-type": "application/json" } });
  };
  try {
    await fn(captured);
  } finally {
    globalThis.fetch = original;
  }
};

const request: ProviderRequest = {
  model: "test-model",
  system: "be brief",
  messages: [
    { role: "user", content: "What is RAG?" },
    { role: "assistant", content: [{ type: "tool_use", id: "toolu_1", name: "search_course_content", input: { query: "RAG" } }] },
    { role: "user", content: [{ type: "tool_result", toolUseId: "toolu_1", content: "[Intro - Lesson 1]\nRAG basics" }] },
  ],
  tools: [
    {
      name: "search_course_content",
      description: "Search",
      input_schema: { type: "object", properties: { query: { type: "string" } }, required: ["query"] },
    },
  ],
  toolChoice: "auto",
  maxTokens: 800,
  temperature: 0,
};

test("AnthropicProvider posts the Messages API shape", { concurrency: false }, async () => {
  await withStubbedFetch(
    200,
    { content: [{ type: "text", text: "Retrieval-augmented generation." }], stop_reason: "end_turn" },
    async (captured) => {
      const provider = new AnthropicProvider({ model: "fallback-model", apiKey: "test-secret" });
      const response = await provider.generate(request);

      assert.equal(extractText(response), "Retrieval-augmented generation.");
      assert.equal(response.stopReason, "end_turn");
      assert.equal(captured.length, 1);
      assert.equal(captured[0].url, "https://api.anthropic.com/v1/messages");
      assert.equal(captured[0].headers.get("x-api-key"), "test-secret");
      assert.equal(captured[0].headers.get("anthropic-version"), "2023-06-01");
      assert.deepEqual(captured[0].body, {
        model: "test-model",
        system: "be brief",
        messages: [
          { role: "user", content: "What is RAG?" },
          {
            role: "assistant",
            content: [{ type: "tool_use", id: "toolu_1", name: "search_course_content", input: { query: "RAG" } }],
          },
          {
            role: "user",
            content: [{ type: "tool_result", tool_use_id: "toolu_1", content: "[Intro - Lesson 1]\nRAG basics" }],
          },
        ],
        tools: request.tools,
        tool_choice: { type: "auto" },
        max_tokens: 800,
        temperature: 0,
      });
    },
  );
});

test("AnthropicProvider omits tool_choice when no tools are offered", { concurrency: false }, async () => {
  await withStubbedFetch(200, { content: [{ type: "text", text: "ok" }], stop_reason: "end_turn" }, async (captured) => {
    const provider = new AnthropicProvider({ model: "test-model", baseUrl: "http://127.0.0.1:9999/v1" });
    await provider.generate({ model: "test-model", system: "", messages: [{ role: "user", content: "hi" }], maxTokens: 10 });

    assert.equal(captured[0].url, "http://127.0.0.1:9999/v1/messages");
    const body = captured[0].body;
    assert.ok(typeof body === "object" && body !== null);
    assert.equal("tool_choice" in body, false);
    assert.equal("tools" in body, false);
  });
});

test("AnthropicProvider raises ProviderError on HTTP failure", { concurrency: false }, async () => {
  await withStubbedFetch(529, "overloaded", async () => {
    const provider = new AnthropicProvider({ model: "test-model" });
    await assert.rejects(
      () => provider.generate(request),
      (error: unknown) =>
        error instanceof ProviderError &&
        error.status === 529 &&
        error.body === "overloaded" &&
        error.message === "Anthropic error 529: overloaded",
    );
  });
});

test("parseAnthropicResponse keeps tool_use blocks and usage", () => {
  const response = parseAnthropicResponse({
    content: [
      { type: "text", text: "Let me check." },
      { type: "tool_use", id: "toolu_9", name: "get_course_outline", input: { course_title: "MCP" } },
      { type: "thinking", thinking: "ignored" },
    ],
    stop_reason: "tool_use",
    usage: { input_tokens: 12, output_tokens: 8 },
  });

  assert.equal(response.stopReason, "tool_use");
  assert.deepEqual(response.content, [
    { type: "text", text: "Let me check." },
    { type: "tool_use", id: "toolu_9", name: "get_course_outline", input: { course_title: "MCP" } },
  ]);
  assert.deepEqual(response.usage, { inputTokens: 12, outputTokens: 8, totalTokens: 20 });
});

test("parseAnthropicResponse rejects payloads without content", () => {
  assert.throws(() => parseAnthropicResponse({ stop_reason: "end_turn" }), /Anthropic response missing content/);
});
