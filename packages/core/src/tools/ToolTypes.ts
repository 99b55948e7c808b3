import type { Source } from "@lectern/shared";
import type { ProviderToolDefinition } from "../providers/ProviderTypes.js";

export type ToolDefinition = ProviderToolDefinition;

export type ToolInput = Record<string, unknown>;

export interface Tool {
  getToolDefinition(): ToolDefinition;
  execute(input: ToolInput): Promise<string>;
}

/** Tools that remember the provenance of their most recent result. */
export interface SourceTracking {
  getSources(): Source[];
  resetSources(): void;
}

export const isSourceTracking = (tool: Tool): tool is Tool & SourceTracking =>
  "getSources" in tool &&
  typeof tool.getSources === "function" &&
  "resetSources" in tool &&
  typeof tool.resetSources === "function";

export class ToolInputError extends Error {
  constructor(
    message: string,
    readonly toolName: string,
  ) {
    super(message);
    this.name = "ToolInputError";
  }
}
