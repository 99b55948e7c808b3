import type { ProviderMessage, ToolResultBlock } from "../providers/ProviderTypes.js";
import type { ToolDefinition } from "../tools/ToolTypes.js";

/** Per-query conversation state. Owned by one orchestrator run; never shared. */
export class RoundContext {
  readonly messages: ProviderMessage[];
  readonly errors: string[] = [];
  currentRound = 0;

  constructor(
    readonly originalQuery: string,
    readonly conversationHistory: string | undefined,
    readonly tools: ToolDefinition[],
  ) {
    this.messages = [{ role: "user", content: originalQuery }];
  }
}

export interface ToolExecutionResult {
  failed: boolean;
  errorMessage?: string;
  toolResults: ToolResultBlock[];
  executedTools: string[];
}
