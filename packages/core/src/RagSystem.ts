import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import type { Course, Embedder, Source } from "@lectern/shared";
import { Connection, IndexMigrations } from "@lectern/db";
import type { LogLevel, RagConfig } from "./config/Config.js";
import { createEmbedder } from "./embeddings/createEmbedder.js";
import { DocumentProcessor } from "./ingestion/DocumentProcessor.js";
import { buildQueryPrompt } from "./prompts/SystemPrompts.js";
import { createProvider } from "./providers/ProviderRegistry.js";
import type { Provider } from "./providers/ProviderTypes.js";
import { RoundOrchestrator, type OrchestratorResult } from "./runtime/RoundOrchestrator.js";
import type { RunLogger } from "./runtime/RunLogger.js";
import { SessionManager } from "./session/SessionManager.js";
import { SemanticStore } from "./store/SemanticStore.js";
import { OutlineTool } from "./tools/outline/OutlineTool.js";
import { ContentSearchTool } from "./tools/search/ContentSearchTool.js";
import { ToolManager } from "./tools/ToolManager.js";

export const COURSE_FILE_EXTENSIONS = [".txt", ".md"];

export interface RagSystemOptions {
  config: RagConfig;
  store: SemanticStore;
  provider: Provider;
  logger?: RunLogger;
  connection?: Connection;
}

export interface OpenRagSystemOptions {
  provider?: Provider;
  embedder?: Embedder;
  logger?: RunLogger;
}

export interface QueryResult {
  answer: string;
  sources: Source[];
}

export interface IngestResult {
  course?: Course;
  chunkCount: number;
}

export interface FolderIngestResult {
  courses: number;
  chunks: number;
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Entry point tying ingestion, the course index, the tool-calling orchestrator
 * and session history together.
 */
export class RagSystem {
  readonly store: SemanticStore;
  readonly sessions: SessionManager;
  readonly toolManager: ToolManager;
  readonly processor: DocumentProcessor;
  readonly orchestrator: RoundOrchestrator;
  private logger?: RunLogger;
  private connection?: Connection;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: RagSystemOptions) {
    const { config } = options;
    this.store = options.store;
    this.logger = options.logger;
    this.connection = options.connection;
    this.sessions = new SessionManager(config.session.maxHistory);
    this.processor = new DocumentProcessor(config.ingestion);
    this.toolManager = new ToolManager();
    this.toolManager.registerTool(new ContentSearchTool(this.store));
    this.toolManager.registerTool(new OutlineTool(this.store));
    this.orchestrator = new RoundOrchestrator({
      provider: options.provider,
      model: config.model,
      maxTokens: config.generation.maxTokens,
      temperature: config.generation.temperature,
      maxRounds: config.generation.maxRounds,
      logger: options.logger,
    });
  }

  static async open(config: RagConfig, options: OpenRagSystemOptions = {}): Promise<RagSystem> {
    const connection = await Connection.open(config.index.path);
    await IndexMigrations.run(connection.db);
    const embedder = options.embedder ?? createEmbedder(config.embeddings, config.generation.timeoutMs);
    const store = await SemanticStore.open(connection.db, embedder, {
      maxResults: config.search.maxResults,
      logger: options.logger,
    });
    const provider =
      options.provider ??
      createProvider(config.provider, {
        model: config.model,
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        timeoutMs: config.generation.timeoutMs,
      });
    return new RagSystem({ config, store, provider, logger: options.logger, connection });
  }

  /** Queries share the tools' source state, so they run one at a time. */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  query(query: string, sessionId?: string): Promise<QueryResult> {
    return this.serialize(() => this.runQuery(query, sessionId));
  }

  private async runQuery(query: string, sessionId?: string): Promise<QueryResult> {
    const conversationHistory = this.sessions.getConversationHistory(sessionId);
    const { result, sources } = await this.answer(query, conversationHistory);
    if (sessionId) {
      this.sessions.addExchange(sessionId, query, result.answer);
    }
    await this.logQuietly("query", {
      sessionId: sessionId ?? null,
      executedTools: result.executedTools,
      llmCalls: result.llmCalls,
      errors: result.errors,
      sources: sources.length,
    });
    return { answer: result.answer, sources };
  }

  private async answer(
    query: string,
    conversationHistory: string | undefined,
  ): Promise<{ result: OrchestratorResult; sources: Source[] }> {
    try {
      const result = await this.orchestrator.run(buildQueryPrompt(query), {
        conversationHistory,
        tools: this.toolManager.getToolDefinitions(),
        toolManager: this.toolManager,
      });
      return { result, sources: this.toolManager.getLastSources() };
    } finally {
      this.toolManager.resetSources();
    }
  }

  private async logQuietly(type: string, data: Record<string, unknown>, level?: LogLevel): Promise<void> {
    try {
      await this.logger?.log(type, data, level);
    } catch {
      return;
    }
  }

  addCourseDocument(filePath: string): Promise<IngestResult> {
    return this.serialize(() => this.ingestDocument(filePath));
  }

  private async ingestDocument(filePath: string): Promise<IngestResult> {
    try {
      const { course, chunks } = await this.processor.processCourseDocument(filePath);
      await this.store.addCourseMetadata(course);
      await this.store.addCourseContent(chunks);
      await this.logQuietly("ingest_document", { file: filePath, course: course.title, chunks: chunks.length });
      return { course, chunkCount: chunks.length };
    } catch (error) {
      await this.logQuietly("ingest_error", { file: filePath, error: errorMessage(error) }, "error");
      return { course: undefined, chunkCount: 0 };
    }
  }

  addCourseFolder(folder: string, clearExisting = false): Promise<FolderIngestResult> {
    return this.serialize(() => this.ingestFolder(folder, clearExisting));
  }

  private async ingestFolder(folder: string, clearExisting: boolean): Promise<FolderIngestResult> {
    const totals: FolderIngestResult = { courses: 0, chunks: 0 };
    if (clearExisting) {
      await this.store.clearAllData();
    }
    if (!existsSync(folder)) {
      await this.logQuietly("ingest_error", { folder, error: `Folder not found: ${folder}` }, "warn");
      return totals;
    }

    const existing = new Set(await this.store.getExistingCourseTitles());
    const entries = await readdir(folder, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile() && COURSE_FILE_EXTENSIONS.includes(path.extname(entry.name).toLowerCase()))
      .map((entry) => path.join(folder, entry.name))
      .sort();

    for (const file of files) {
      try {
        const { course, chunks } = await this.processor.processCourseDocument(file);
        if (existing.has(course.title)) {
          await this.logQuietly("ingest_document", { file, course: course.title, skipped: true }, "debug");
          continue;
        }
        await this.store.addCourseMetadata(course);
        await this.store.addCourseContent(chunks);
        existing.add(course.title);
        totals.courses += 1;
        totals.chunks += chunks.length;
        await this.logQuietly("ingest_document", { file, course: course.title, chunks: chunks.length });
      } catch (error) {
        await this.logQuietly("ingest_error", { file, error: errorMessage(error) }, "error");
      }
    }
    return totals;
  }

  async getCourseAnalytics(): Promise<CourseAnalytics> {
    return {
      totalCourses: await this.store.getCourseCount(),
      courseTitles: await this.store.getExistingCourseTitles(),
    };
  }

  async close(): Promise<void> {
    await this.queue;
    await this.connection?.close();
  }
}
