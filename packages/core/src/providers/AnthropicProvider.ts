import { isRecord, optionalNumber } from "@lectern/shared";
import {
  ProviderError,
  type ContentBlock,
  type Provider,
  type ProviderConfig,
  type ProviderMessage,
  type ProviderRequest,
  type ProviderResponse,
  type ProviderStopReason,
  type ProviderUsage,
} from "./ProviderTypes.js";

export const ANTHROPIC_VERSION = "2023-06-01";

const STOP_REASONS: ProviderStopReason[] = ["end_turn", "tool_use", "max_tokens", "stop_sequence"];

const normalizeBaseUrl = (baseUrl?: string): string => {
  const root = baseUrl ?? "https://api.anthropic.com/v1";
  return root.endsWith("/") ? root : `${root}/`;
};

const toWireContent = (content: ProviderMessage["content"]): unknown => {
  if (typeof content === "string") return content;
  return content.map((block) => {
    if (block.type === "tool_result") {
      return {
        type: "tool_result",
        tool_use_id: block.toolUseId,
        content: block.content,
        ...(block.isError ? { is_error: true } : {}),
      };
    }
    return block;
  });
};

const parseBlock = (value: unknown): ContentBlock | undefined => {
  if (!isRecord(value)) return undefined;
  if (value.type === "text" && typeof value.text === "string") {
    return { type: "text", text: value.text };
  }
  if (value.type === "tool_use" && typeof value.id === "string" && typeof value.name === "string") {
    return {
      type: "tool_use",
      id: value.id,
      name: value.name,
      input: isRecord(value.input) ? value.input : {},
    };
  }
  return undefined;
};

const parseStopReason = (value: unknown): ProviderStopReason => {
  const match = STOP_REASONS.find((reason) => reason === value);
  return match ?? "end_turn";
};

const parseUsage = (value: unknown): ProviderUsage | undefined => {
  if (!isRecord(value)) return undefined;
  const inputTokens = optionalNumber(value.input_tokens);
  const outputTokens = optionalNumber(value.output_tokens);
  return {
    inputTokens,
    outputTokens,
    totalTokens:
      inputTokens !== undefined && outputTokens !== undefined ? inputTokens + outputTokens : undefined,
  };
};

export const parseAnthropicResponse = (raw: unknown): ProviderResponse => {
  if (!isRecord(raw) || !Array.isArray(raw.content)) {
    throw new ProviderError("Anthropic response missing content");
  }
  const blocks: unknown[] = raw.content;
  const content = blocks.flatMap((block) => {
    const parsed = parseBlock(block);
    return parsed ? [parsed] : [];
  });
  return {
    stopReason: parseStopReason(raw.stop_reason),
    content,
    usage: parseUsage(raw.usage),
    raw,
  };
};

/**
 * Messages API client. Tool definitions are already in the provider's
 * declaration shape and pass through untouched.
 */
export class AnthropicProvider implements Provider {
  name = "anthropic";

  constructor(private config: ProviderConfig) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    const url = new URL("messages", normalizeBaseUrl(this.config.baseUrl)).toString();

    const headers: Record<string, string> = {
      "content-type": "application/json",
      "anthropic-version": ANTHROPIC_VERSION,
    };
    if (this.config.apiKey) {
      headers["x-api-key"] = this.config.apiKey;
    }

    const body = {
      model: request.model || this.config.model,
      system: request.system,
      messages: request.messages.map((message) => ({
        role: message.role,
        content: toWireContent(message.content),
      })),
      tools: request.tools?.length ? request.tools : undefined,
      tool_choice: request.tools?.length && request.toolChoice ? { type: request.toolChoice } : undefined,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    };

    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs ?? 60_000;
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new ProviderError(`Anthropic error ${response.status}: ${errorBody}`, {
          status: response.status,
          body: errorBody,
        });
      }

      const raw: unknown = await response.json();
      return parseAnthropicResponse(raw);
    } finally {
      clearTimeout(timeout);
    }
  }
}
