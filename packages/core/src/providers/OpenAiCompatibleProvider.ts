import { isRecord, optionalNumber } from "@lectern/shared";
import {
  ProviderError,
  isTextBlock,
  isToolUseBlock,
  type ContentBlock,
  type Provider,
  type ProviderConfig,
  type ProviderMessage,
  type ProviderRequest,
  type ProviderResponse,
  type ProviderStopReason,
} from "./ProviderTypes.js";

type OpenAiMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: Array<{
        id: string;
        type: "function";
        function: { name: string; arguments: string };
      }>;
    }
  | { role: "tool"; tool_call_id: string; content: string };

const parseToolArgs = (raw: unknown): Record<string, unknown> => {
  if (typeof raw !== "string") return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
};

const normalizeBaseUrl = (baseUrl?: string): string => {
  const root = baseUrl ?? "https://api.openai.com/v1";
  return root.endsWith("/") ? root : `${root}/`;
};

const joinText = (blocks: ContentBlock[]): string =>
  blocks
    .filter(isTextBlock)
    .map((block) => block.text)
    .join("\n");

export const toOpenAiMessages = (system: string, messages: ProviderMessage[]): OpenAiMessage[] => {
  const wire: OpenAiMessage[] = [];
  if (system) wire.push({ role: "system", content: system });
  for (const message of messages) {
    if (typeof message.content === "string") {
      if (message.role === "user") {
        wire.push({ role: "user", content: message.content });
      } else {
        wire.push({ role: "assistant", content: message.content });
      }
      continue;
    }
    if (message.role === "assistant") {
      const toolCalls = message.content.filter(isToolUseBlock).map((block) => ({
        id: block.id,
        type: "function" as const,
        function: { name: block.name, arguments: JSON.stringify(block.input) },
      }));
      const text = joinText(message.content);
      wire.push({
        role: "assistant",
        content: text || null,
        ...(toolCalls.length ? { tool_calls: toolCalls } : {}),
      });
      continue;
    }
    for (const block of message.content) {
      if (block.type === "tool_result") {
        wire.push({ role: "tool", tool_call_id: block.toolUseId, content: block.content });
      }
    }
    const text = joinText(message.content);
    if (text) wire.push({ role: "user", content: text });
  }
  return wire;
};

const toToolChoice = (choice: ProviderRequest["toolChoice"]): string | undefined => {
  if (choice === "any") return "required";
  return choice;
};

const toStopReason = (finishReason: unknown, hasToolCalls: boolean): ProviderStopReason => {
  if (finishReason === "tool_calls" || (hasToolCalls && finishReason !== "length")) return "tool_use";
  if (finishReason === "length") return "max_tokens";
  return "end_turn";
};

export const parseOpenAiResponse = (raw: unknown): ProviderResponse => {
  const choices: unknown[] = isRecord(raw) && Array.isArray(raw.choices) ? raw.choices : [];
  const choice = choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) {
    throw new ProviderError("OpenAI-compatible response missing choices");
  }
  const message = choice.message;
  const content: ContentBlock[] = [];
  if (typeof message.content === "string" && message.content) {
    content.push({ type: "text", text: message.content });
  }
  const toolCalls: unknown[] = Array.isArray(message.tool_calls) ? message.tool_calls : [];
  toolCalls.forEach((call, index) => {
    if (!isRecord(call) || !isRecord(call.function) || typeof call.function.name !== "string") return;
    content.push({
      type: "tool_use",
      id: typeof call.id === "string" ? call.id : `call_${index + 1}`,
      name: call.function.name,
      input: parseToolArgs(call.function.arguments),
    });
  });
  const usage = isRecord(raw) && isRecord(raw.usage) ? raw.usage : undefined;
  return {
    stopReason: toStopReason(choice.finish_reason, content.some(isToolUseBlock)),
    content,
    usage: usage
      ? {
          inputTokens: optionalNumber(usage.prompt_tokens),
          outputTokens: optionalNumber(usage.completion_tokens),
          totalTokens: optionalNumber(usage.total_tokens),
        }
      : undefined,
    raw,
  };
};

export class OpenAiCompatibleProvider implements Provider {
  name = "openai-compatible";

  constructor(private config: ProviderConfig) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    const url = new URL("chat/completions", normalizeBaseUrl(this.config.baseUrl)).toString();

    const headers: Record<string, string> = {
      "content-type": "application/json",
    };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const body = {
      model: request.model || this.config.model,
      messages: toOpenAiMessages(request.system, request.messages),
      tools: request.tools?.length
        ? request.tools.map((tool) => ({
            type: "function",
            function: {
              name: tool.name,
              description: tool.description,
              parameters: tool.input_schema,
            },
          }))
        : undefined,
      tool_choice: request.tools?.length ? toToolChoice(request.toolChoice) : undefined,
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
        throw new ProviderError(`OpenAI-compatible error ${response.status}: ${errorBody}`, {
          status: response.status,
          body: errorBody,
        });
      }

      const raw: unknown = await response.json();
      return parseOpenAiResponse(raw);
    } finally {
      clearTimeout(timeout);
    }
  }
}
