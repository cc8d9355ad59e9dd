import Anthropic from "@anthropic-ai/sdk";
import type { ProviderId } from "../config.js";
import { BackendError, ConfigurationError, classifyBackendError } from "../errors.js";
import { ProviderCallLimiter } from "../services/ProviderCallLimiter.js";
import type {
  BackendGenerationOptions,
  ModelBackend,
  ModelMessage,
  ModelRequest,
  ModelResponse,
  ToolCallRequest
} from "./types.js";

/** The part of a Messages API reply the backend reads. */
export type AnthropicReply = Pick<Anthropic.Message, "content" | "stop_reason">;

export interface AnthropicMessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal }
    ): Promise<AnthropicReply>;
  };
}

export interface AnthropicBackendConfig extends BackendGenerationOptions {
  apiKey: string;
  model: string;
}

/** Native tool_use backend over the Anthropic Messages API. */
export class AnthropicBackend implements ModelBackend {
  readonly provider: ProviderId = "anthropic";
  readonly toolFormat = "anthropic";
  readonly supportsToolCalls = true;
  readonly model: string;
  private readonly client: AnthropicMessagesClient;
  private readonly limiter: ProviderCallLimiter;
  private readonly options: BackendGenerationOptions;

  constructor(
    config: AnthropicBackendConfig,
    deps?: {
      client?: AnthropicMessagesClient;
      limiter?: ProviderCallLimiter;
    }
  ) {
    this.model = config.model;
    this.options = { maxTokens: config.maxTokens, temperature: config.temperature };
    this.client = deps?.client ?? new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
    this.limiter = deps?.limiter ?? new ProviderCallLimiter(this.provider);
  }

  async complete(request: ModelRequest): Promise<ModelResponse> {
    const tools = anthropicTools(request);
    const body: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.options.maxTokens,
      temperature: this.options.temperature,
      system: request.system,
      messages: toAnthropicMessages(request.messages)
    };
    if (tools.length > 0) {
      body.tools = tools;
    }

    let message: AnthropicReply;
    try {
      message = await this.limiter.run((signal) => this.client.messages.create(body, { signal }));
    } catch (error) {
      throw classifyBackendError(this.provider, error);
    }

    return this.readResponse(message);
  }

  private readResponse(message: AnthropicReply): ModelResponse {
    const textParts: string[] = [];
    const toolCalls: ToolCallRequest[] = [];

    for (const block of message.content) {
      if (block.type === "text") {
        textParts.push(block.text);
      } else if (block.type === "tool_use") {
        toolCalls.push(toToolCallRequest(block));
      }
    }

    const text = textParts.join("").trim();
    if (toolCalls.length > 0) {
      return { kind: "tool_calls", text, toolCalls };
    }
    if (text.length === 0) {
      throw new BackendError({
        kind: "malformed_response",
        provider: this.provider,
        detail: `empty response (stop_reason=${message.stop_reason ?? "none"})`
      });
    }
    return { kind: "answer", text };
  }
}

function anthropicTools(request: ModelRequest): Anthropic.Tool[] {
  if (!request.tools) {
    return [];
  }
  if (request.tools.format !== "anthropic") {
    throw new ConfigurationError(`Anthropic backend cannot send ${request.tools.format} tool schemas`);
  }
  return request.tools.schemas;
}

function toToolCallRequest(block: Anthropic.ToolUseBlock): ToolCallRequest {
  const { input } = block;
  if (typeof input === "object" && input !== null && !Array.isArray(input)) {
    return { id: block.id, name: block.name, arguments: { ...input } };
  }
  return {
    id: block.id,
    name: block.name,
    arguments: {},
    malformedArguments: JSON.stringify(input) ?? ""
  };
}

/** Consecutive tool results are merged into one user turn of tool_result blocks. */
export function toAnthropicMessages(messages: ModelMessage[]): Anthropic.MessageParam[] {
  const converted: Anthropic.MessageParam[] = [];
  let pendingResults: Anthropic.ToolResultBlockParam[] = [];

  const flushResults = (): void => {
    if (pendingResults.length > 0) {
      converted.push({ role: "user", content: pendingResults });
      pendingResults = [];
    }
  };

  for (const message of messages) {
    if (message.role === "tool") {
      const result: Anthropic.ToolResultBlockParam = {
        type: "tool_result",
        tool_use_id: message.toolCallId,
        content: message.content
      };
      if (message.isError) {
        result.is_error = true;
      }
      pendingResults.push(result);
      continue;
    }

    flushResults();
    if (message.role === "user" || !message.toolCalls || message.toolCalls.length === 0) {
      converted.push({ role: message.role, content: message.content });
      continue;
    }

    const blocks: Array<Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam> = [];
    if (message.content.trim().length > 0) {
      blocks.push({ type: "text", text: message.content });
    }
    for (const call of message.toolCalls) {
      blocks.push({ type: "tool_use", id: call.id, name: call.name, input: call.arguments });
    }
    converted.push({ role: "assistant", content: blocks });
  }

  flushResults();
  return converted;
}
