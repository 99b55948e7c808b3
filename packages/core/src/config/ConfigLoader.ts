import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { isRecord } from "@lectern/shared";
import {
  DEFAULT_EMBEDDINGS,
  DEFAULT_GENERATION,
  DEFAULT_INDEX_PATH,
  DEFAULT_INGESTION,
  DEFAULT_LOGGING,
  DEFAULT_MODEL,
  DEFAULT_PROVIDER,
  DEFAULT_SEARCH,
  DEFAULT_SERVER,
  DEFAULT_SESSION,
  EMBEDDINGS_PROVIDERS,
  LOG_LEVELS,
  type EmbeddingsConfig,
  type EmbeddingsProviderName,
  type GenerationConfig,
  type IndexConfig,
  type IngestionConfig,
  type LogLevel,
  type LoggingConfig,
  type RagConfig,
  type SearchConfig,
  type ServerConfig,
  type SessionConfig,
} from "./Config.js";

export interface ConfigSource {
  workspaceRoot?: string;
  provider?: string;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  generation?: Partial<GenerationConfig>;
  embeddings?: Partial<EmbeddingsConfig>;
  index?: Partial<IndexConfig>;
  search?: Partial<SearchConfig>;
  ingestion?: Partial<IngestionConfig>;
  session?: Partial<SessionConfig>;
  server?: Partial<ServerConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
}

export const CONFIG_FILE_NAMES = [
  "lectern.config.json",
  "lectern.config.yaml",
  "lectern.config.yml",
  ".lecternrc",
];

const parseNumber = (value: string | undefined): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parseEnum = <T extends string>(value: string | undefined, allowed: readonly T[]): T | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return allowed.find((entry) => entry === normalized);
};

const assign = <T, K extends keyof T>(target: Partial<T>, key: K, value: T[K] | undefined): void => {
  if (value !== undefined) target[key] = value;
};

const normalizeStringField = (value: unknown, label: string): string | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Invalid ${label}: expected string.`);
  }
  return value;
};

const normalizeNumberField = (value: unknown, label: string): number | undefined => {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Invalid ${label}: expected number.`);
  }
  return value;
};

const normalizeEnumField = <T extends string>(
  value: unknown,
  allowed: readonly T[],
  label: string,
): T | undefined => {
  if (value === undefined) return undefined;
  const match = allowed.find((entry) => entry === value);
  if (!match) {
    throw new Error(`Invalid ${label}: expected one of ${allowed.join(", ")}.`);
  }
  return match;
};

const normalizeSection = (value: unknown, label: string): Record<string, unknown> | undefined => {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new Error(`Invalid ${label}: expected object.`);
  }
  return value;
};

export const normalizeConfigSource = (raw: unknown, label = "config"): ConfigSource => {
  if (!isRecord(raw)) {
    throw new Error(`Invalid ${label}: expected object.`);
  }
  const source: ConfigSource = {};
  assign(source, "workspaceRoot", normalizeStringField(raw.workspaceRoot, `${label}.workspaceRoot`));
  assign(source, "provider", normalizeStringField(raw.provider, `${label}.provider`));
  assign(source, "model", normalizeStringField(raw.model, `${label}.model`));
  assign(source, "apiKey", normalizeStringField(raw.apiKey, `${label}.apiKey`));
  assign(source, "baseUrl", normalizeStringField(raw.baseUrl, `${label}.baseUrl`));

  const generation = normalizeSection(raw.generation, `${label}.generation`);
  if (generation) {
    const section: Partial<GenerationConfig> = {};
    assign(section, "maxTokens", normalizeNumberField(generation.maxTokens, `${label}.generation.maxTokens`));
    assign(section, "temperature", normalizeNumberField(generation.temperature, `${label}.generation.temperature`));
    assign(section, "maxRounds", normalizeNumberField(generation.maxRounds, `${label}.generation.maxRounds`));
    assign(section, "timeoutMs", normalizeNumberField(generation.timeoutMs, `${label}.generation.timeoutMs`));
    source.generation = section;
  }

  const embeddings = normalizeSection(raw.embeddings, `${label}.embeddings`);
  if (embeddings) {
    const section: Partial<EmbeddingsConfig> = {};
    assign(
      section,
      "provider",
      normalizeEnumField(embeddings.provider, EMBEDDINGS_PROVIDERS, `${label}.embeddings.provider`),
    );
    assign(section, "model", normalizeStringField(embeddings.model, `${label}.embeddings.model`));
    assign(section, "baseUrl", normalizeStringField(embeddings.baseUrl, `${label}.embeddings.baseUrl`));
    assign(section, "apiKey", normalizeStringField(embeddings.apiKey, `${label}.embeddings.apiKey`));
    assign(
      section,
      "dimensions",
      normalizeNumberField(embeddings.dimensions, `${label}.embeddings.dimensions`),
    );
    source.embeddings = section;
  }

  const index = normalizeSection(raw.index, `${label}.index`);
  if (index) {
    const section: Partial<IndexConfig> = {};
    assign(section, "path", normalizeStringField(index.path, `${label}.index.path`));
    source.index = section;
  }

  const search = normalizeSection(raw.search, `${label}.search`);
  if (search) {
    const section: Partial<SearchConfig> = {};
    assign(section, "maxResults", normalizeNumberField(search.maxResults, `${label}.search.maxResults`));
    source.search = section;
  }

  const ingestion = normalizeSection(raw.ingestion, `${label}.ingestion`);
  if (ingestion) {
    const section: Partial<IngestionConfig> = {};
    assign(section, "chunkSize", normalizeNumberField(ingestion.chunkSize, `${label}.ingestion.chunkSize`));
    assign(
      section,
      "chunkOverlap",
      normalizeNumberField(ingestion.chunkOverlap, `${label}.ingestion.chunkOverlap`),
    );
    assign(section, "docsPath", normalizeStringField(ingestion.docsPath, `${label}.ingestion.docsPath`));
    source.ingestion = section;
  }

  const session = normalizeSection(raw.session, `${label}.session`);
  if (session) {
    const section: Partial<SessionConfig> = {};
    assign(section, "maxHistory", normalizeNumberField(session.maxHistory, `${label}.session.maxHistory`));
    source.session = section;
  }

  const server = normalizeSection(raw.server, `${label}.server`);
  if (server) {
    const section: Partial<ServerConfig> = {};
    assign(section, "host", normalizeStringField(server.host, `${label}.server.host`));
    assign(section, "port", normalizeNumberField(server.port, `${label}.server.port`));
    source.server = section;
  }

  const logging = normalizeSection(raw.logging, `${label}.logging`);
  if (logging) {
    const section: Partial<LoggingConfig> = {};
    assign(section, "directory", normalizeStringField(logging.directory, `${label}.logging.directory`));
    assign(section, "level", normalizeEnumField(logging.level, LOG_LEVELS, `${label}.logging.level`));
    source.logging = section;
  }

  return source;
};

const findConfigFile = (cwd: string): string | undefined => {
  for (const candidate of CONFIG_FILE_NAMES) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const readConfigFile = async (configPath?: string): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  if (!existsSync(configPath)) return undefined;
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  const extension = path.extname(configPath).toLowerCase();
  const parsed: unknown =
    extension === ".yaml" || extension === ".yml" ? YAML.parse(content) : JSON.parse(content);
  return normalizeConfigSource(parsed, path.basename(configPath));
};

const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const source: ConfigSource = {};
  assign(source, "workspaceRoot", env.LECTERN_WORKSPACE_ROOT);
  assign(source, "provider", env.LECTERN_PROVIDER);
  assign(source, "model", env.LECTERN_MODEL);
  assign(source, "apiKey", env.LECTERN_API_KEY);
  assign(source, "baseUrl", env.LECTERN_BASE_URL);

  const generation: Partial<GenerationConfig> = {};
  assign(generation, "maxTokens", parseNumber(env.LECTERN_MAX_TOKENS));
  assign(generation, "temperature", parseNumber(env.LECTERN_TEMPERATURE));
  assign(generation, "maxRounds", parseNumber(env.LECTERN_MAX_ROUNDS));
  assign(generation, "timeoutMs", parseNumber(env.LECTERN_TIMEOUT_MS));
  if (Object.keys(generation).length) source.generation = generation;

  const embeddings: Partial<EmbeddingsConfig> = {};
  assign(
    embeddings,
    "provider",
    parseEnum<EmbeddingsProviderName>(env.LECTERN_EMBEDDINGS_PROVIDER, EMBEDDINGS_PROVIDERS),
  );
  assign(embeddings, "model", env.LECTERN_EMBEDDINGS_MODEL);
  assign(embeddings, "baseUrl", env.LECTERN_EMBEDDINGS_BASE_URL);
  assign(embeddings, "apiKey", env.LECTERN_EMBEDDINGS_API_KEY);
  assign(embeddings, "dimensions", parseNumber(env.LECTERN_EMBEDDINGS_DIMENSIONS));
  if (Object.keys(embeddings).length) source.embeddings = embeddings;

  if (env.LECTERN_INDEX_PATH) source.index = { path: env.LECTERN_INDEX_PATH };

  const maxResults = parseNumber(env.LECTERN_MAX_RESULTS);
  if (maxResults !== undefined) source.search = { maxResults };

  const ingestion: Partial<IngestionConfig> = {};
  assign(ingestion, "chunkSize", parseNumber(env.LECTERN_CHUNK_SIZE));
  assign(ingestion, "chunkOverlap", parseNumber(env.LECTERN_CHUNK_OVERLAP));
  assign(ingestion, "docsPath", env.LECTERN_DOCS_PATH);
  if (Object.keys(ingestion).length) source.ingestion = ingestion;

  const maxHistory = parseNumber(env.LECTERN_MAX_HISTORY);
  if (maxHistory !== undefined) source.session = { maxHistory };

  const server: Partial<ServerConfig> = {};
  assign(server, "host", env.LECTERN_HOST);
  assign(server, "port", parseNumber(env.LECTERN_PORT));
  if (Object.keys(server).length) source.server = server;

  const logging: Partial<LoggingConfig> = {};
  assign(logging, "directory", env.LECTERN_LOG_DIR);
  assign(logging, "level", parseEnum<LogLevel>(env.LECTERN_LOG_LEVEL, LOG_LEVELS));
  if (Object.keys(logging).length) source.logging = logging;

  return source;
};

const mergeConfigs = (defaults: RagConfig, ...sources: Array<ConfigSource | undefined>): RagConfig => {
  const present = sources.filter((source): source is ConfigSource => source !== undefined);
  let merged = defaults;
  for (const source of present) {
    merged = {
      ...merged,
      workspaceRoot: source.workspaceRoot ?? merged.workspaceRoot,
      provider: source.provider ?? merged.provider,
      model: source.model ?? merged.model,
      apiKey: source.apiKey ?? merged.apiKey,
      baseUrl: source.baseUrl ?? merged.baseUrl,
      generation: { ...merged.generation, ...source.generation },
      embeddings: { ...merged.embeddings, ...source.embeddings },
      index: { ...merged.index, ...source.index },
      search: { ...merged.search, ...source.search },
      ingestion: { ...merged.ingestion, ...source.ingestion },
      session: { ...merged.session, ...source.session },
      server: { ...merged.server, ...source.server },
      logging: { ...merged.logging, ...source.logging },
    };
  }
  return merged;
};

const providerApiKey = (provider: string, env: NodeJS.ProcessEnv): string | undefined => {
  if (provider === "anthropic") return env.ANTHROPIC_API_KEY;
  if (provider === "openai-compatible") return env.OPENAI_API_KEY;
  return undefined;
};

const finalizeConfig = (cwd: string, env: NodeJS.ProcessEnv, config: RagConfig): RagConfig => {
  const workspaceRoot = path.resolve(cwd, config.workspaceRoot);
  return {
    ...config,
    workspaceRoot,
    apiKey: config.apiKey || providerApiKey(config.provider, env),
    index: { path: path.resolve(workspaceRoot, config.index.path) },
    ingestion: {
      ...config.ingestion,
      docsPath: path.resolve(workspaceRoot, config.ingestion.docsPath),
    },
    logging: {
      ...config.logging,
      directory: path.resolve(workspaceRoot, config.logging.directory),
    },
  };
};

const assertRequired = (config: RagConfig): void => {
  const missing: string[] = [];
  if (!config.provider) missing.push("provider");
  if (!config.model) missing.push("model");
  if (missing.length) {
    throw new Error(`Missing required config: ${missing.join(", ")}`);
  }
};

const assertValid = (config: RagConfig): void => {
  const errors: string[] = [];
  const { generation, ingestion } = config;
  if (generation.maxTokens <= 0) errors.push("generation.maxTokens");
  if (generation.temperature < 0) errors.push("generation.temperature");
  if (!Number.isInteger(generation.maxRounds) || generation.maxRounds < 1) {
    errors.push("generation.maxRounds");
  }
  if (generation.timeoutMs <= 0) errors.push("generation.timeoutMs");
  if (!Number.isInteger(config.embeddings.dimensions) || config.embeddings.dimensions <= 0) {
    errors.push("embeddings.dimensions");
  }
  if (!Number.isInteger(config.search.maxResults) || config.search.maxResults < 1) {
    errors.push("search.maxResults");
  }
  if (ingestion.chunkSize <= 0) errors.push("ingestion.chunkSize");
  if (ingestion.chunkOverlap < 0 || ingestion.chunkOverlap >= ingestion.chunkSize) {
    errors.push("ingestion.chunkOverlap");
  }
  if (config.session.maxHistory < 0) errors.push("session.maxHistory");
  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    errors.push("server.port");
  }
  if (errors.length) {
    throw new Error(`Invalid config values: ${errors.join(", ")}`);
  }
};

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<RagConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? findConfigFile(cwd);
  const fileConfig = await readConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  const defaults: RagConfig = {
    workspaceRoot: ".",
    provider: DEFAULT_PROVIDER,
    model: DEFAULT_MODEL,
    apiKey: undefined,
    baseUrl: undefined,
    generation: DEFAULT_GENERATION,
    embeddings: DEFAULT_EMBEDDINGS,
    index: { path: DEFAULT_INDEX_PATH },
    search: DEFAULT_SEARCH,
    ingestion: DEFAULT_INGESTION,
    session: DEFAULT_SESSION,
    server: DEFAULT_SERVER,
    logging: DEFAULT_LOGGING,
  };

  const merged = mergeConfigs(defaults, fileConfig, envConfig, options.cli);
  const finalized = finalizeConfig(cwd, env, merged);
  assertRequired(finalized);
  assertValid(finalized);
  return finalized;
};
