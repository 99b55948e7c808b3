#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { isRecord } from "@lectern/shared";
import { AskCommand } from "./cli/AskCommand.js";
import { CoursesCommand } from "./cli/CoursesCommand.js";
import { IngestCommand } from "./cli/IngestCommand.js";
import { ServeCommand } from "./cli/ServeCommand.js";

export const HELP_TEXT =
  "Usage: lectern <command> [options]\n" +
  "\n" +
  "Commands:\n" +
  "  serve                           Ingest the docs folder, then start the HTTP API.\n" +
  "  ask <question...>               Answer one question from the command line.\n" +
  "  ingest [folder] [--clear]       Add course documents (.txt, .md) to the index.\n" +
  "  courses                         List indexed courses.\n" +
  "\n" +
  "Options:\n" +
  "  --workspace-root <path>  Workspace directory (default: cwd)\n" +
  "  --config <file>          Config file (default: lectern.config.{json,yaml,yml} or .lecternrc)\n" +
  "  --provider <name>        LLM provider (anthropic, openai-compatible)\n" +
  "  --model <model>          Model name\n" +
  "  --api-key <key>          Provider API key\n" +
  "  --base-url <url>         Provider base URL\n" +
  "  --max-rounds <n>         Tool rounds per question\n" +
  "  --host <host>            serve: bind address\n" +
  "  --port <port>            serve: port\n" +
  "  --no-ingest              serve: skip ingesting the docs folder\n" +
  "  --log-level <level>      debug, info, warn or error\n" +
  "  --help, -h               Show help\n" +
  "  --version, -v            Show version\n";

const resolveReal = (value: string): string => {
  try {
    return fs.realpathSync(value);
  } catch {
    return path.resolve(value);
  }
};

export const readVersion = (): string => {
  const current = fileURLToPath(import.meta.url);
  const pkgJson = path.resolve(path.dirname(current), "..", "package.json");
  if (!fs.existsSync(pkgJson)) return "dev";
  const parsed: unknown = JSON.parse(fs.readFileSync(pkgJson, "utf8"));
  return isRecord(parsed) && typeof parsed.version === "string" ? parsed.version : "dev";
};

export const runCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  if (argv.includes("--help") || argv.includes("-h") || argv.length === 0) {
    // eslint-disable-next-line no-console
    console.log(HELP_TEXT);
    return;
  }

  const [command, ...rest] = argv;
  if (command === "--version" || command === "-v" || command === "version") {
    // eslint-disable-next-line no-console
    console.log(readVersion());
    return;
  }

  switch (command) {
    case "serve":
      await ServeCommand.run(rest);
      return;
    case "ask":
      await AskCommand.run(rest);
      return;
    case "ingest":
      await IngestCommand.run(rest);
      return;
    case "courses":
      await CoursesCommand.run(rest);
      return;
    default:
      throw new Error(`Unknown command: ${command}\n\n${HELP_TEXT}`);
  }
};

const isMain = (() => {
  const scriptPath = process.argv[1];
  if (!scriptPath) return false;
  const current = fileURLToPath(import.meta.url);
  return resolveReal(scriptPath) === resolveReal(current);
})();

if (isMain) {
  runCli().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
