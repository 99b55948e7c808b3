import test, { after, before } from "node:test";
import assert from "node:assert/strict";
import type { CourseAnalytics, QueryResult } from "../../RagSystem.js";
import { SessionManager } from "../../session/SessionManager.js";
import { ApiServer, ROOT_MESSAGE, type QueryBackend } from "../ApiServer.js";

class FakeBackend implements QueryBackend {
  readonly sessions = new SessionManager();
  queries: Array<{ query: string; sessionId?: string }> = [];
  cleared: string[] = [];
  failWith?: Error;

  constructor() {
    const clear = this.sessions.clearSession.bind(this.sessions);
    this.sessions.clearSession = (sessionId: string) => {
      this.cleared.push(sessionId);
      clear(sessionId);
    };
  }

  async query(query: string, sessionId?: string): Promise<QueryResult> {
    this.queries.push({ query, sessionId });
    if (this.failWith) throw this.failWith;
    return {
      answer: `answer to ${query}`,
      sources: [{ text: "Intro to RAG - Lesson 1", link: "https://example.com/rag/1" }, { text: "Intro to RAG" }],
    };
  }

  async getCourseAnalytics(): Promise<CourseAnalytics> {
    return { totalCourses: 2, courseTitles: ["Intro to RAG", "MCP Servers"] };
  }
}

let backend: FakeBackend;
let server: ApiServer;
let baseUrl: string;

before(async () => {
  backend = new FakeBackend();
  server = new ApiServer(backend);
  const address = await server.listen(0);
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
  await server.close();
});

const postQuery = (body: string): Promise<Response> =>
  fetch(`${baseUrl}/api/query`, { method: "POST", headers: { "content-type": "application/json" }, body });

test("POST /api/query creates a session when none is given", { concurrency: false }, async () => {
  backend.failWith = undefined;
  const response = await postQuery(JSON.stringify({ query: "What is RAG?" }));

  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), {
    answer: "answer to What is RAG?",
    sources: [
      { text: "Intro to RAG - Lesson 1", link: "https://example.com/rag/1" },
      { text: "Intro to RAG", link: null },
    ],
    session_id: "session_1",
  });
  assert.deepEqual(backend.queries.at(-1), { query: "What is RAG?", sessionId: "session_1" });
});

test("POST /api/query reuses the given session", { concurrency: false }, async () => {
  const response = await postQuery(JSON.stringify({ query: "again", session_id: "session_7" }));
  const body: unknown = await response.json();

  assert.equal(response.status, 200);
  assert.ok(typeof body === "object" && body !== null && "session_id" in body);
  assert.equal(body.session_id, "session_7");
  assert.deepEqual(backend.queries.at(-1), { query: "again", sessionId: "session_7" });
});

test("POST /api/query validates the body", { concurrency: false }, async () => {
  const malformed = await postQuery("{not json");
  assert.equal(malformed.status, 422);
  assert.deepEqual(await malformed.json(), { detail: "Request body must be valid JSON" });

  const missing = await postQuery(JSON.stringify({ session_id: "session_1" }));
  assert.equal(missing.status, 422);
  assert.deepEqual(await missing.json(), { detail: "Field 'query' is required and must be a string" });
});

test("POST /api/query maps backend failures to 500", { concurrency: false }, async () => {
  backend.failWith = new Error("index offline");
  try {
    const response = await postQuery(JSON.stringify({ query: "x", session_id: "session_1" }));
    assert.equal(response.status, 500);
    assert.deepEqual(await response.json(), { detail: "index offline" });
  } finally {
    backend.failWith = undefined;
  }
});

test("GET /api/courses returns the course analytics", { concurrency: false }, async () => {
  const response = await fetch(`${baseUrl}/api/courses`);
  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { total_courses: 2, course_titles: ["Intro to RAG", "MCP Servers"] });
});

test("DELETE /api/sessions/:id/clear clears the session", { concurrency: false }, async () => {
  const response = await fetch(`${baseUrl}/api/sessions/session_3/clear`, { method: "DELETE" });
  assert.equal(response.status, 200);
  assert.deepEqual(await response.json(), { message: "Session session_3 cleared successfully" });
  assert.deepEqual(backend.cleared, ["session_3"]);
});

test("DELETE /api/sessions/:id/clear rejects a malformed escape", { concurrency: false }, async () => {
  const clearedBefore = backend.cleared.length;
  const response = await fetch(`${baseUrl}/api/sessions/bad%ZZ/clear`, { method: "DELETE" });

  assert.equal(response.status, 400);
  assert.deepEqual(await response.json(), { detail: "Session id is not valid percent-encoding" });
  assert.equal(backend.cleared.length, clearedBefore);
});

test("health, root, unknown routes and wrong methods", { concurrency: false }, async () => {
  const health = await fetch(`${baseUrl}/api/health`);
  assert.deepEqual(await health.json(), { status: "ok" });

  const root = await fetch(`${baseUrl}/`);
  assert.deepEqual(await root.json(), { message: ROOT_MESSAGE });

  const unknown = await fetch(`${baseUrl}/api/nothing`);
  assert.equal(unknown.status, 404);
  assert.deepEqual(await unknown.json(), { detail: "Not Found" });

  const wrongMethod = await fetch(`${baseUrl}/api/courses`, { method: "POST" });
  assert.equal(wrongMethod.status, 405);
  assert.deepEqual(await wrongMethod.json(), { detail: "Method Not Allowed" });
});
