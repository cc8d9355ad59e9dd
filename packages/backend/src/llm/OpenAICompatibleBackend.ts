import OpenAI from "openai";
import type { ProviderId } from "../config.js";
import { BackendError, ConfigurationError, classifyBackendError } from "../errors.js";
import { ProviderCallLimiter } from "../services/ProviderCallLimiter.js";
import type {
  BackendGenerationOptions,
  ModelBackend,
  ModelMessage,
  ModelRequest,
  ModelResponse,
  OpenAIToolSchema,
  ToolCallRequest
} from "./types.js";

type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatCompletionChoice = OpenAI.Chat.Completions.ChatCompletion.Choice;

/** The part of a chat completion the backend reads. */
export interface ChatCompletionReply {
  choices: Array<
    Pick<ChatCompletionChoice, "finish_reason"> & {
      message: Pick<ChatCompletionChoice["message"], "content" | "refusal" | "tool_calls">;
    }
  >;
}

export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<ChatCompletionReply>;
    };
  };
}

export interface OpenAICompatibleBackendConfig extends BackendGenerationOptions {
  provider: ProviderId;
  apiKey: string;
  baseURL: string;
  model: string;
  /** false for endpoints without function calling; they are never sent tool schemas. */
  supportsToolCalls?: boolean;
}

/**
 * Chat Completions backend for OpenAI and the OpenAI-compatible endpoints of
 * other providers (Gemini, xAI), using function calling for tools.
 */
export class OpenAICompatibleBackend implements ModelBackend {
  readonly provider: ProviderId;
  readonly toolFormat = "openai";
  readonly supportsToolCalls: boolean;
  readonly model: string;
  private readonly client: ChatCompletionsClient;
  private readonly limiter: ProviderCallLimiter;
  private readonly options: BackendGenerationOptions;

  constructor(
    config: OpenAICompatibleBackendConfig,
    deps?: {
      client?: ChatCompletionsClient;
      limiter?: ProviderCallLimiter;
    }
  ) {
    this.provider = config.provider;
    this.model = config.model;
    this.supportsToolCalls = config.supportsToolCalls ?? true;
    this.options = { maxTokens: config.maxTokens, temperature: config.temperature };
    this.client =
      deps?.client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        maxRetries: 0
      });
    this.limiter = deps?.limiter ?? new ProviderCallLimiter(this.provider);
  }

  async complete(request: ModelRequest): Promise<ModelResponse> {
    const tools = this.supportsToolCalls ? openAITools(request) : [];
    const body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.options.maxTokens,
      temperature: this.options.temperature,
      messages: [{ role: "system", content: request.system }, ...toOpenAIMessages(request.messages)]
    };
    if (tools.length > 0) {
      body.tools = tools;
      body.tool_choice = "auto";
    }

    let completion: ChatCompletionReply;
    try {
      completion = await this.limiter.run((signal) => this.client.chat.completions.create(body, { signal }));
    } catch (error) {
      throw classifyBackendError(this.provider, error);
    }

    return this.readResponse(completion);
  }

  private readResponse(completion: ChatCompletionReply): ModelResponse {
    const choice = completion.choices[0];
    if (!choice) {
      throw new BackendError({
        kind: "malformed_response",
        provider: this.provider,
        detail: "completion contained no choices"
      });
    }

    const { message } = choice;
    const text = (message.content ?? message.refusal ?? "").trim();
    const toolCalls = this.supportsToolCalls
      ? (message.tool_calls ?? []).map((call) => parseToolCall(call))
      : [];

    if (toolCalls.length > 0) {
      return { kind: "tool_calls", text, toolCalls };
    }
    if (text.length === 0) {
      throw new BackendError({
        kind: "malformed_response",
        provider: this.provider,
        detail: `empty response (finish_reason=${choice.finish_reason})`
      });
    }
    return { kind: "answer", text };
  }
}

function openAITools(request: ModelRequest): OpenAIToolSchema[] {
  if (!request.tools) {
    return [];
  }
  if (request.tools.format !== "openai") {
    throw new ConfigurationError(`OpenAI-compatible backend cannot send ${request.tools.format} tool schemas`);
  }
  return request.tools.schemas;
}

function parseToolCall(call: OpenAI.Chat.Completions.ChatCompletionMessageToolCall): ToolCallRequest {
  const raw = call.function.arguments;
  let parsed: unknown;
  try {
    parsed = raw.trim().length === 0 ? {} : JSON.parse(raw);
  } catch {
    parsed = undefined;
  }

  if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
    return { id: call.id, name: call.function.name, arguments: { ...parsed } };
  }
  return { id: call.id, name: call.function.name, arguments: {}, malformedArguments: raw };
}

export function toOpenAIMessages(messages: ModelMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case "user":
        return { role: "user", content: message.content };
      case "tool":
        return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
      case "assistant": {
        if (!message.toolCalls || message.toolCalls.length === 0) {
          return { role: "assistant", content: message.content };
        }
        return {
          role: "assistant",
          content: message.content.length > 0 ? message.content : null,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: "function",
            function: {
              name: call.name,
              arguments: call.malformedArguments ?? JSON.stringify(call.arguments)
            }
          }))
        };
      }
    }
  });
}
