import type { LogLevel } from "../config/Config.js";
import { LOG_LEVELS } from "../config/Config.js";
import type { ConfigSource } from "../config/ConfigLoader.js";

export interface ParsedArgs {
  workspaceRoot?: string;
  configPath?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  maxRounds?: number;
  host?: string;
  port?: number;
  logLevel?: LogLevel;
  clear?: boolean;
  noIngest?: boolean;
  positionals: string[];
}

const parseNumberArg = (value?: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const STRING_FLAGS = {
  "--workspace-root": "workspaceRoot",
  "--config": "configPath",
  "--provider": "provider",
  "--model": "model",
  "--api-key": "apiKey",
  "--base-url": "baseUrl",
  "--host": "host",
} as const;

const isStringFlag = (arg: string): arg is keyof typeof STRING_FLAGS => Object.hasOwn(STRING_FLAGS, arg);

export const parseArgs = (argv: string[]): ParsedArgs => {
  const parsed: ParsedArgs = { positionals: [] };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (isStringFlag(arg) && next) {
      parsed[STRING_FLAGS[arg]] = next;
      i += 1;
      continue;
    }
    if (arg === "--port" && next) {
      parsed.port = parseNumberArg(next);
      i += 1;
      continue;
    }
    if (arg === "--max-rounds" && next) {
      parsed.maxRounds = parseNumberArg(next);
      i += 1;
      continue;
    }
    if (arg === "--log-level" && next) {
      parsed.logLevel = LOG_LEVELS.find((level) => level === next.toLowerCase());
      i += 1;
      continue;
    }
    if (arg === "--clear") {
      parsed.clear = true;
      continue;
    }
    if (arg === "--no-ingest") {
      parsed.noIngest = true;
      continue;
    }
    if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`);
    }
    parsed.positionals.push(arg);
  }
  return parsed;
};

export const toConfigSource = (parsed: ParsedArgs): ConfigSource => {
  const source: ConfigSource = {};
  if (parsed.workspaceRoot) source.workspaceRoot = parsed.workspaceRoot;
  if (parsed.provider) source.provider = parsed.provider;
  if (parsed.model) source.model = parsed.model;
  if (parsed.apiKey) source.apiKey = parsed.apiKey;
  if (parsed.baseUrl) source.baseUrl = parsed.baseUrl;
  if (parsed.maxRounds !== undefined) source.generation = { maxRounds: parsed.maxRounds };
  if (parsed.host || parsed.port !== undefined) {
    source.server = {};
    if (parsed.host) source.server.host = parsed.host;
    if (parsed.port !== undefined) source.server.port = parsed.port;
  }
  if (parsed.logLevel) source.logging = { level: parsed.logLevel };
  return source;
};
