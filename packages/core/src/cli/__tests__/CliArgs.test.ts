import test from "node:test";
import assert from "node:assert/strict";
import { parseArgs, toConfigSource } from "../CliArgs.js";

test("parseArgs collects flags and positionals", () => {
  const parsed = parseArgs([
    "what",
    "is",
    "--base-url",
    "http://localhost:9999",
    "RAG?",
    "--port",
    "9000",
    "--log-level",
    "DEBUG",
    "--clear",
  ]);

  assert.deepEqual(parsed, {
    positionals: ["what", "is", "RAG?"],
    baseUrl: "http://localhost:9999",
    port: 9000,
    logLevel: "debug",
    clear: true,
  });
});

test("parseArgs rejects unknown options", () => {
  assert.throws(() => parseArgs(["--verbose"]), /Unknown option: --verbose/);
  assert.throws(() => parseArgs(["question", "--session", "session_2"]), /Unknown option: --session/);
});

test("toConfigSource maps CLI overrides onto config groups", () => {
  const source = toConfigSource(
    parseArgs(["--provider", "openai-compatible", "--model", "test-model", "--max-rounds", "3", "--host", "0.0.0.0"]),
  );
  assert.deepEqual(source, {
    provider: "openai-compatible",
    model: "test-model",
    generation: { maxRounds: 3 },
    server: { host: "0.0.0.0" },
  });
});
