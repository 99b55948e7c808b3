import { promises as fs } from "node:fs";
import path from "node:path";
import { isRecord } from "@lectern/shared";
import type { LogLevel } from "../config/Config.js";

export interface RunLogEvent {
  type: string;
  level: LogLevel;
  timestamp: string;
  data: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);

const parseEvent = (line: string): RunLogEvent | undefined => {
  const parsed: unknown = JSON.parse(line);
  if (!isRecord(parsed)) return undefined;
  const { type, level, timestamp, data } = parsed;
  if (typeof type !== "string" || !isLogLevel(level) || typeof timestamp !== "string" || !isRecord(data)) {
    return undefined;
  }
  return { type, level, timestamp, data };
};

export const createRunId = (prefix = "run"): string =>
  `${prefix}-${new Date().toISOString().replace(/[:.]/g, "-")}-${process.pid}`;

/** Appends one JSON event per line to `<logDir>/<runId>.jsonl`. */
export class RunLogger {
  readonly logPath: string;
  readonly logDir: string;
  readonly runId: string;

  constructor(
    workspaceRoot: string,
    logDir: string,
    runId: string,
    readonly level: LogLevel = "info",
  ) {
    const resolvedDir = path.resolve(workspaceRoot, logDir);
    this.logDir = resolvedDir;
    this.runId = runId;
    this.logPath = path.join(resolvedDir, `${runId}.jsonl`);
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  async log(type: string, data: Record<string, unknown>, level: LogLevel = "info"): Promise<void> {
    if (!this.enabled(level)) return;
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    const event: RunLogEvent = {
      type,
      level,
      timestamp: new Date().toISOString(),
      data,
    };
    await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
  }

  async read(): Promise<RunLogEvent[]> {
    let content: string;
    try {
      content = await fs.readFile(this.logPath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }
    const events: RunLogEvent[] = [];
    for (const line of content.split("\n")) {
      if (!line.trim()) continue;
      const event = parseEvent(line);
      if (event) events.push(event);
    }
    return events;
  }
}
