export type ProviderRole = "user" | "assistant";

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: "tool_result";
  toolUseId: string;
  content: string;
  isError?: boolean;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export interface ProviderMessage {
  role: ProviderRole;
  content: string | ContentBlock[];
}

export interface ProviderToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export type ProviderStopReason = "end_turn" | "tool_use" | "max_tokens" | "stop_sequence";

export interface ProviderUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface ProviderRequest {
  model: string;
  system: string;
  messages: ProviderMessage[];
  tools?: ProviderToolDefinition[];
  toolChoice?: "auto" | "any" | "none";
  maxTokens: number;
  temperature?: number;
}

export interface ProviderResponse {
  stopReason: ProviderStopReason;
  content: ContentBlock[];
  usage?: ProviderUsage;
  raw?: unknown;
}

export interface ProviderConfig {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface Provider {
  name: string;
  generate(request: ProviderRequest): Promise<ProviderResponse>;
}

export class ProviderError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, options: { status?: number; body?: string } = {}) {
    super(message);
    this.name = "ProviderError";
    this.status = options.status;
    this.body = options.body;
  }
}

export const isToolUseBlock = (block: ContentBlock): block is ToolUseBlock => block.type === "tool_use";

export const isTextBlock = (block: ContentBlock): block is TextBlock => block.type === "text";

/** First text block of a response, or an empty string when the model sent none. */
export const extractText = (response: Pick<ProviderResponse, "content">): string =>
  response.content.find(isTextBlock)?.text ?? "";
