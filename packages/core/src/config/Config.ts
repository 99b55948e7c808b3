export type EmbeddingsProviderName = "hashing" | "openai-compatible" | "ollama";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface GenerationConfig {
  maxTokens: number;
  temperature: number;
  maxRounds: number;
  timeoutMs: number;
}

export interface EmbeddingsConfig {
  provider: EmbeddingsProviderName;
  model: string;
  baseUrl?: string;
  apiKey?: string;
  dimensions: number;
}

export interface IndexConfig {
  path: string;
}

export interface SearchConfig {
  maxResults: number;
}

export interface IngestionConfig {
  chunkSize: number;
  chunkOverlap: number;
  docsPath: string;
}

export interface SessionConfig {
  maxHistory: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface LoggingConfig {
  directory: string;
  level: LogLevel;
}

export interface RagConfig {
  workspaceRoot: string;
  provider: string;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  generation: GenerationConfig;
  embeddings: EmbeddingsConfig;
  index: IndexConfig;
  search: SearchConfig;
  ingestion: IngestionConfig;
  session: SessionConfig;
  server: ServerConfig;
  logging: LoggingConfig;
}

export const DEFAULT_PROVIDER = "anthropic";
export const DEFAULT_MODEL = "claude-sonnet-4-20250514";
export const DEFAULT_INDEX_PATH = ".lectern/index.db";
export const DEFAULT_LOG_DIR = "logs/lectern";

export const DEFAULT_GENERATION: GenerationConfig = {
  maxTokens: 800,
  temperature: 0,
  maxRounds: 2,
  timeoutMs: 60_000,
};

export const DEFAULT_EMBEDDINGS: EmbeddingsConfig = {
  provider: "hashing",
  model: "feature-hashing",
  dimensions: 384,
};

export const DEFAULT_SEARCH: SearchConfig = {
  maxResults: 5,
};

export const DEFAULT_INGESTION: IngestionConfig = {
  chunkSize: 800,
  chunkOverlap: 100,
  docsPath: "docs",
};

export const DEFAULT_SESSION: SessionConfig = {
  maxHistory: 2,
};

export const DEFAULT_SERVER: ServerConfig = {
  host: "127.0.0.1",
  port: 8000,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  directory: DEFAULT_LOG_DIR,
  level: "info",
};

export const EMBEDDINGS_PROVIDERS: EmbeddingsProviderName[] = ["hashing", "openai-compatible", "ollama"];

export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];
