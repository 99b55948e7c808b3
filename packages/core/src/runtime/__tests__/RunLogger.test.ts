import test from "node:test";
import assert from "node:assert/strict";
import { appendFileSync, existsSync, mkdtempSync, readFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { RunLogger, createRunId } from "../RunLogger.js";

test("RunLogger writes JSONL entries", { concurrency: false }, async () => {
  const workspaceRoot = mkdtempSync(path.join(os.tmpdir(), "lectern-logs-"));
  const logger = new RunLogger(workspaceRoot, "logs", "run-1");
  await logger.log("query", { ok: true });

  assert.equal(logger.logPath, path.join(workspaceRoot, "logs", "run-1.jsonl"));
  const lines = readFileSync(logger.logPath, "utf8").trim().split("\n");
  assert.equal(lines.length, 1);
  const event: unknown = JSON.parse(lines[0]);
  assert.ok(typeof event === "object" && event !== null);
  assert.match(lines[0], /"type":"query"/);
  assert.match(lines[0], /"level":"info"/);
  assert.match(lines[0], /"data":\{"ok":true\}/);
});

test("RunLogger drops events below its level", { concurrency: false }, async () => {
  const workspaceRoot = mkdtempSync(path.join(os.tmpdir(), "lectern-logs-"));
  const logger = new RunLogger(workspaceRoot, "logs", "run-2", "warn");
  await logger.log("round_start", { round: 1 }, "debug");
  await logger.log("query", {});

  assert.equal(existsSync(logger.logPath), false);
  assert.deepEqual(await logger.read(), []);

  await logger.log("round_error", { round: 1 }, "error");
  const events = await logger.read();
  assert.deepEqual(
    events.map((event) => [event.type, event.level]),
    [["round_error", "error"]],
  );
  assert.equal(logger.enabled("warn"), true);
  assert.equal(logger.enabled("info"), false);
});

test("RunLogger.read skips lines that are not log events", { concurrency: false }, async () => {
  const workspaceRoot = mkdtempSync(path.join(os.tmpdir(), "lectern-logs-"));
  const logger = new RunLogger(workspaceRoot, "logs", "run-3");
  await logger.log("query", { ok: true });
  appendFileSync(logger.logPath, '[1,2]\n{"type":"query","level":"loud","timestamp":"t","data":{}}\n"text"\n', "utf8");
  await logger.log("ingest_document", { chunks: 2 });

  const events = await logger.read();
  assert.deepEqual(
    events.map((event) => [event.type, event.level, event.data]),
    [
      ["query", "info", { ok: true }],
      ["ingest_document", "info", { chunks: 2 }],
    ],
  );
});

test("createRunId prefixes the command name", () => {
  assert.match(createRunId("serve"), /^serve-\d{4}-\d{2}-\d{2}T/);
});
