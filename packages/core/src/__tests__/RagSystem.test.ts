import test from "node:test";
import assert from "node:assert/strict";
import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadConfig } from "../config/ConfigLoader.js";
import { HashingEmbedder } from "../embeddings/HashingEmbedder.js";
import type { Provider, ProviderRequest, ProviderResponse } from "../providers/ProviderTypes.js";
import { RagSystem } from "../RagSystem.js";
import { RunLogger } from "../runtime/RunLogger.js";
import { SemanticStore } from "../store/SemanticStore.js";
import { FakeVectorCollection } from "../store/__tests__/FakeVectorCollection.js";

class ScriptProvider implements Provider {
  name = "script";
  requests: ProviderRequest[] = [];
  active = 0;
  maxActive = 0;

  constructor(private responses: ProviderResponse[]) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    this.requests.push(request);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise<void>((resolve) => setImmediate(resolve));
    this.active -= 1;
    return this.responses.shift() ?? { stopReason: "end_turn", content: [{ type: "text", text: "default answer" }] };
  }
}

const COURSE_A = [
  "Course Title: Intro to RAG",
  "Course Link: https://example.com/rag",
  "Course Instructor: Test Instructor",
  "Lesson 1: Basics",
  "Lesson Link: https://example.com/rag/1",
  "Retrieval augmented generation grounds answers in documents.",
].join("\n");

const COURSE_B = ["Course Title: MCP Servers", "Lesson 1: Tools", "Servers expose tools to clients."].join("\n");

const createSystem = async (responses: ProviderResponse[] = []) => {
  const workspaceRoot = await mkdtemp(path.join(os.tmpdir(), "lectern-rag-"));
  const config = await loadConfig({ cwd: workspaceRoot, env: {} });
  const logger = new RunLogger(workspaceRoot, "logs", "rag", "debug");
  const catalog = new FakeVectorCollection("course_catalog");
  const content = new FakeVectorCollection("course_content");
  const store = new SemanticStore(catalog, content, { maxResults: config.search.maxResults });
  const provider = new ScriptProvider(responses);
  const system = new RagSystem({ config, store, provider, logger });
  return { workspaceRoot, config, logger, catalog, content, store, provider, system };
};

const writeDocs = async (workspaceRoot: string): Promise<string> => {
  const folder = path.join(workspaceRoot, "docs");
  await mkdir(folder, { recursive: true });
  await writeFile(path.join(folder, "course_a.txt"), COURSE_A, "utf8");
  await writeFile(path.join(folder, "course_b.md"), COURSE_B, "utf8");
  await writeFile(path.join(folder, "slides.pdf"), "binary", "utf8");
  return folder;
};

test("query returns the answer with harvested sources and records the exchange", async () => {
  const { workspaceRoot, provider, system } = await createSystem([
    {
      stopReason: "tool_use",
      content: [{ type: "tool_use", id: "toolu_1", name: "search_course_content", input: { query: "RAG", course_name: "RAG" } }],
    },
    { stopReason: "end_turn", content: [{ type: "text", text: "RAG grounds answers." }] },
  ]);
  await system.addCourseFolder(await writeDocs(workspaceRoot));
  const sessionId = system.sessions.createSession();

  const result = await system.query("What is RAG?", sessionId);

  assert.equal(result.answer, "RAG grounds answers.");
  assert.deepEqual(result.sources, [{ text: "Intro to RAG - Lesson 1", link: "https://example.com/rag/1" }]);
  assert.deepEqual(provider.requests[0].messages, [
    { role: "user", content: "Answer this question about course materials: What is RAG?" },
  ]);
  assert.deepEqual(system.toolManager.getLastSources(), []);
  assert.equal(system.sessions.getConversationHistory(sessionId), "User: What is RAG?\nAssistant: RAG grounds answers.");
});

test("an unwritable run log neither fails a query nor leaks its sources", async () => {
  const { workspaceRoot, config, catalog, content, store } = await createSystem();
  await writeFile(path.join(workspaceRoot, "broken-logs"), "not a directory", "utf8");
  const logger = new RunLogger(workspaceRoot, "broken-logs", "rag", "debug");
  const provider = new ScriptProvider([
    {
      stopReason: "tool_use",
      content: [{ type: "tool_use", id: "toolu_1", name: "search_course_content", input: { query: "RAG", course_name: "RAG" } }],
    },
    { stopReason: "end_turn", content: [{ type: "text", text: "RAG grounds answers." }] },
  ]);
  const system = new RagSystem({ config, store, provider, logger });

  const ingested = await system.addCourseFolder(await writeDocs(workspaceRoot));
  assert.deepEqual(ingested, { courses: 2, chunks: 2 });
  assert.equal(await catalog.count(), 2);
  assert.equal(await content.count(), 2);

  const result = await system.query("What is RAG?");
  assert.equal(result.answer, "RAG grounds answers.");
  assert.deepEqual(result.sources, [{ text: "Intro to RAG - Lesson 1", link: "https://example.com/rag/1" }]);
  assert.deepEqual(system.toolManager.getLastSources(), []);
});

test("follow-up queries carry the session history into the system prompt", async () => {
  const { provider, system } = await createSystem();
  const sessionId = system.sessions.createSession();
  await system.query("first", sessionId);
  await system.query("second", sessionId);
  await system.query("third");

  assert.doesNotMatch(provider.requests[0].system, /Previous conversation/);
  assert.ok(provider.requests[1].system.endsWith("\n\nPrevious conversation:\nUser: first\nAssistant: default answer"));
  assert.doesNotMatch(provider.requests[2].system, /Previous conversation/);
});

test("concurrent queries run one at a time", async () => {
  const { provider, system } = await createSystem();
  const answers = await Promise.all([system.query("a"), system.query("b"), system.query("c")]);
  assert.deepEqual(
    answers.map((answer) => answer.answer),
    ["default answer", "default answer", "default answer"],
  );
  assert.equal(provider.maxActive, 1);
});

test("addCourseFolder ingests text and markdown once and can clear first", async () => {
  const { workspaceRoot, system, catalog, content } = await createSystem();
  const folder = await writeDocs(workspaceRoot);

  assert.deepEqual(await system.addCourseFolder(folder), { courses: 2, chunks: 2 });
  assert.deepEqual(await system.addCourseFolder(folder), { courses: 0, chunks: 0 });
  assert.deepEqual(await system.getCourseAnalytics(), {
    totalCourses: 2,
    courseTitles: ["Intro to RAG", "MCP Servers"],
  });

  assert.deepEqual(await system.addCourseFolder(folder, true), { courses: 2, chunks: 2 });
  assert.equal(catalog.records.length, 2);
  assert.deepEqual(
    content.records.map((record) => record.id),
    ["Intro_to_RAG_0", "MCP_Servers_0"],
  );
  assert.deepEqual(await system.addCourseFolder(path.join(workspaceRoot, "missing")), { courses: 0, chunks: 0 });
});

test("addCourseDocument reports failures as an empty result", async () => {
  const { workspaceRoot, logger, system } = await createSystem();
  const missing = path.join(workspaceRoot, "nope.txt");

  assert.deepEqual(await system.addCourseDocument(missing), { course: undefined, chunkCount: 0 });
  const events = await logger.read();
  assert.equal(events.at(-1)?.type, "ingest_error");
  assert.equal(events.at(-1)?.data.file, missing);
});

test("addCourseDocument indexes one course", async () => {
  const { workspaceRoot, system } = await createSystem();
  const folder = await writeDocs(workspaceRoot);
  const result = await system.addCourseDocument(path.join(folder, "course_b.md"));

  assert.equal(result.course?.title, "MCP Servers");
  assert.equal(result.chunkCount, 1);
});

test("RagSystem.open answers an outline question over a SQLite index", async () => {
  const workspaceRoot = await mkdtemp(path.join(os.tmpdir(), "lectern-e2e-"));
  const folder = await writeDocs(workspaceRoot);
  const config = await loadConfig({ cwd: workspaceRoot, env: {} });
  const provider = new ScriptProvider([
    {
      stopReason: "tool_use",
      content: [{ type: "tool_use", id: "toolu_1", name: "get_course_outline", input: { course_title: "Intro to RAG" } }],
    },
    { stopReason: "end_turn", content: [{ type: "text", text: "It has one lesson." }] },
  ]);
  const system = await RagSystem.open(config, { provider, embedder: new HashingEmbedder(128) });
  try {
    assert.deepEqual(await system.addCourseFolder(folder), { courses: 2, chunks: 2 });
    const result = await system.query("Outline the RAG course");

    assert.equal(result.answer, "It has one lesson.");
    assert.deepEqual(result.sources, []);
    const toolMessage = provider.requests[1].messages[2];
    assert.deepEqual(toolMessage, {
      role: "user",
      content: [
        {
          type: "tool_result",
          toolUseId: "toolu_1",
          content:
            "**Course:** Intro to RAG\n**Course Link:** https://example.com/rag\n**Lessons:**\n  1. Basics",
        },
      ],
    });
  } finally {
    await system.close();
  }
});
