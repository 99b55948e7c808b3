import {
  extractText,
  isToolUseBlock,
  type Provider,
  type ProviderMessage,
  type ProviderRequest,
  type ProviderResponse,
} from "../providers/ProviderTypes.js";
import { COURSE_ASSISTANT_PROMPT } from "../prompts/SystemPrompts.js";
import type { ToolManager } from "../tools/ToolManager.js";
import type { ToolDefinition } from "../tools/ToolTypes.js";
import { RoundContext, type ToolExecutionResult } from "./RoundContext.js";
import type { LogLevel } from "../config/Config.js";
import type { RunLogger } from "./RunLogger.js";

export const DEFAULT_MAX_ROUNDS = 2;

export const LLM_FAILURE_MESSAGE =
  "I encountered an error while processing your request. Please try rephrasing your question.";

export interface RoundOrchestratorOptions {
  provider: Provider;
  model: string;
  maxTokens: number;
  temperature?: number;
  maxRounds?: number;
  systemPrompt?: string;
  logger?: RunLogger;
}

export interface GenerateOptions {
  conversationHistory?: string;
  tools?: ToolDefinition[];
  toolManager?: ToolManager;
}

export interface OrchestratorResult {
  answer: string;
  executedTools: string[];
  llmCalls: number;
  errors: string[];
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Drives a bounded tool-calling conversation. Each round is one model call
 * followed by the tool calls it requested; once `maxRounds` tool rounds have
 * run, one last call without tools produces the answer.
 */
export class RoundOrchestrator {
  private provider: Provider;
  private model: string;
  private maxTokens: number;
  private temperature: number;
  private maxRounds: number;
  private systemPrompt: string;
  private logger?: RunLogger;

  constructor(options: RoundOrchestratorOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature ?? 0;
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.systemPrompt = options.systemPrompt ?? COURSE_ASSISTANT_PROMPT;
    this.logger = options.logger;
  }

  async generateResponse(query: string, options: GenerateOptions = {}): Promise<string> {
    const result = await this.run(query, options);
    return result.answer;
  }

  async run(query: string, options: GenerateOptions = {}): Promise<OrchestratorResult> {
    const tools = options.tools ?? [];
    const context = new RoundContext(query, options.conversationHistory, tools);
    const executedTools: string[] = [];
    let llmCalls = 0;

    const finish = (answer: string): OrchestratorResult => ({
      answer,
      executedTools,
      llmCalls,
      errors: context.errors,
    });

    const call = async (request: ProviderRequest): Promise<ProviderResponse> => {
      llmCalls += 1;
      const response = await this.provider.generate(request);
      await this.log(
        "provider_response",
        {
          round: context.currentRound,
          stopReason: response.stopReason,
          usage: response.usage ?? null,
        },
        "debug",
      );
      return response;
    };

    if (!tools.length || !options.toolManager) {
      try {
        const response = await call(this.buildRequest(context, this.baseSystem(context)));
        return finish(extractText(response));
      } catch (error) {
        return finish(await this.handleRoundError(context, error));
      }
    }
    const toolManager = options.toolManager;

    for (;;) {
      context.currentRound += 1;

      if (context.currentRound > this.maxRounds) {
        await this.log("max_rounds", { rounds: this.maxRounds });
        const system = `${this.baseSystem(context)}\n\nProvide your final answer based on the tool results above.`;
        try {
          const response = await call(this.buildRequest(context, system));
          return finish(extractText(response));
        } catch (error) {
          return finish(await this.handleRoundError(context, error));
        }
      }

      await this.log("round_start", { round: context.currentRound }, "debug");
      let response: ProviderResponse;
      try {
        response = await call(this.buildRequest(context, this.roundSystem(context), context.tools));
      } catch (error) {
        return finish(await this.handleRoundError(context, error));
      }

      if (response.stopReason !== "tool_use") {
        return finish(extractText(response));
      }

      const execution = await this.executeTools(response, context, toolManager);
      executedTools.push(...execution.executedTools);

      if (execution.failed) {
        return finish(await this.handleToolFailure(context, execution, call));
      }

      context.messages.push({ role: "assistant", content: response.content });
      if (execution.toolResults.length) {
        context.messages.push({ role: "user", content: execution.toolResults });
      }
    }
  }

  private baseSystem(context: RoundContext): string {
    return context.conversationHistory
      ? `${this.systemPrompt}\n\nPrevious conversation:\n${context.conversationHistory}`
      : this.systemPrompt;
  }

  private roundSystem(context: RoundContext): string {
    const base = this.baseSystem(context);
    if (context.currentRound <= 1) return base;
    return (
      `${base}\n\nThis is round ${context.currentRound} of up to ${this.maxRounds} rounds. ` +
      "Consider if additional tool calls would improve your answer based on previous results."
    );
  }

  private buildRequest(context: RoundContext, system: string, tools?: ToolDefinition[]): ProviderRequest {
    const messages: ProviderMessage[] = [...context.messages];
    const request: ProviderRequest = {
      model: this.model,
      system,
      messages,
      maxTokens: this.maxTokens,
      temperature: this.temperature,
    };
    if (tools?.length) {
      request.tools = tools;
      request.toolChoice = "auto";
    }
    return request;
  }

  private async executeTools(
    response: ProviderResponse,
    context: RoundContext,
    toolManager: ToolManager,
  ): Promise<ToolExecutionResult> {
    const result: ToolExecutionResult = { failed: false, toolResults: [], executedTools: [] };

    for (const block of response.content.filter(isToolUseBlock)) {
      await this.log("tool_call", { round: context.currentRound, name: block.name, input: block.input });
      try {
        const output = await toolManager.executeTool(block.name, block.input);
        result.toolResults.push({ type: "tool_result", toolUseId: block.id, content: output });
        result.executedTools.push(block.name);
      } catch (error) {
        result.failed = true;
        result.errorMessage = `Tool execution failed: ${errorMessage(error)}`;
        context.errors.push(`Round ${context.currentRound}: ${result.errorMessage}`);
        await this.log(
          "tool_failure",
          { round: context.currentRound, name: block.name, error: errorMessage(error) },
          "warn",
        );
        break;
      }
    }
    return result;
  }

  private async handleToolFailure(
    context: RoundContext,
    execution: ToolExecutionResult,
    call: (request: ProviderRequest) => Promise<ProviderResponse>,
  ): Promise<string> {
    const note =
      `Tool execution failed in round ${context.currentRound}: ${execution.errorMessage ?? "unknown error"}`;
    const system =
      `${this.baseSystem(context)}\n\nNote: ${note}. ` +
      "Please provide the best answer you can based on available information.";
    try {
      const response = await call(this.buildRequest(context, system));
      return extractText(response);
    } catch (error) {
      await this.log("fallback_error", { round: context.currentRound, error: errorMessage(error) }, "error");
      return `I encountered an error while processing your request: ${execution.errorMessage ?? errorMessage(error)}`;
    }
  }

  // Logging never changes the outcome of a run.
  private async log(type: string, data: Record<string, unknown>, level?: LogLevel): Promise<void> {
    try {
      await this.logger?.log(type, data, level);
    } catch {
      return;
    }
  }

  private async handleRoundError(context: RoundContext, error: unknown): Promise<string> {
    const message = `Error in round ${context.currentRound}: ${errorMessage(error)}`;
    context.errors.push(message);
    await this.log("round_error", { round: context.currentRound, error: errorMessage(error) }, "error");
    return LLM_FAILURE_MESSAGE;
  }
}
