import type Anthropic from "@anthropic-ai/sdk";
import type OpenAI from "openai";
import type { ProviderId } from "../config.js";

export type ToolFormat = "anthropic" | "openai";

export type AnthropicToolSchema = Anthropic.Tool;
export type OpenAIToolSchema = OpenAI.Chat.Completions.ChatCompletionTool;

/** Tool declarations already translated into one backend's native shape. */
export type ToolSchemaSet =
  | { format: "anthropic"; schemas: AnthropicToolSchema[] }
  | { format: "openai"; schemas: OpenAIToolSchema[] };

export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Raw argument text when the model sent something that is not a JSON object. */
  malformedArguments?: string;
}

export type ModelMessage =
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: ToolCallRequest[] }
  | { role: "tool"; toolCallId: string; toolName: string; content: string; isError?: boolean };

export type ModelResponse =
  | { kind: "answer"; text: string }
  | { kind: "tool_calls"; text: string; toolCalls: ToolCallRequest[] };

export interface ModelRequest {
  system: string;
  messages: ModelMessage[];
  tools: ToolSchemaSet | null;
}

export interface ModelBackend {
  readonly provider: ProviderId;
  readonly model: string;
  readonly toolFormat: ToolFormat;
  /** Text-only backends are never sent tool schemas. */
  readonly supportsToolCalls: boolean;
  complete(request: ModelRequest): Promise<ModelResponse>;
}

export interface BackendGenerationOptions {
  maxTokens: number;
  temperature: number;
}
