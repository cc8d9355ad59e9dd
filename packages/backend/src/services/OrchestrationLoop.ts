import type { ConversationTurn, ToolCallRecord } from "@coursemate/shared";
import { RetrievalError, ToolInvocationError } from "../errors.js";
import type { ModelBackend, ModelMessage, ModelResponse, ToolCallRequest, ToolSchemaSet } from "../llm/types.js";
import { buildSystemPrompt } from "../prompts/index.js";
import type { ToolRegistry } from "../tools/ToolRegistry.js";
import { logger } from "../utils/logger.js";

export type OrchestrationState = "AWAITING_MODEL" | "TOOL_REQUESTED" | "TOOL_EXECUTED" | "TERMINAL";

export interface OrchestrationInput {
  query: string;
  history: ConversationTurn[];
}

export interface OrchestrationResult {
  answer: string;
  /** Source labels from this query's tool results, deduplicated, first-seen order. */
  sources: string[];
  toolCalls: ToolCallRecord[];
  modelCalls: number;
}

export const UNANSWERED_FALLBACK =
  "I couldn't complete an answer from the course materials for this question. Please try rephrasing it.";

interface ExecutedTool {
  record: ToolCallRecord;
  message: ModelMessage;
  sources: string[];
}

/**
 * One query: a model call, at most one round of tool execution, and one
 * follow-up model call. A tool request in the follow-up response is not
 * executed; its text (or a fixed fallback) becomes the answer.
 */
export class OrchestrationLoop {
  constructor(
    private readonly backend: ModelBackend,
    private readonly registry: ToolRegistry
  ) {}

  get provider(): string {
    return this.backend.provider;
  }

  async run(input: OrchestrationInput): Promise<OrchestrationResult> {
    const system = buildSystemPrompt(input.history);
    const tools = this.toolSchemas();
    const messages: ModelMessage[] = [{ role: "user", content: input.query }];
    let modelCalls = 0;

    const callModel = async (): Promise<ModelResponse> => {
      this.transition("AWAITING_MODEL", { modelCalls });
      modelCalls += 1;
      return this.backend.complete({ system, messages: [...messages], tools });
    };

    const first = await callModel();
    if (first.kind === "answer") {
      this.transition("TERMINAL", { modelCalls });
      return { answer: first.text, sources: [], toolCalls: [], modelCalls };
    }

    this.transition("TOOL_REQUESTED", { tools: first.toolCalls.map((call) => call.name) });
    const executed: ExecutedTool[] = [];
    for (const call of first.toolCalls) {
      executed.push(await this.executeTool(call));
    }
    this.transition("TOOL_EXECUTED", { failed: executed.filter((item) => item.record.failed).length });

    messages.push({ role: "assistant", content: first.text, toolCalls: first.toolCalls });
    messages.push(...executed.map((item) => item.message));

    const second = await callModel();
    if (second.kind === "tool_calls") {
      logger.debug(
        { provider: this.backend.provider, tools: second.toolCalls.map((call) => call.name) },
        "Ignoring tool request after the tool round"
      );
    }
    this.transition("TERMINAL", { modelCalls });

    const sources: string[] = [];
    for (const label of executed.flatMap((item) => item.sources)) {
      if (!sources.includes(label)) {
        sources.push(label);
      }
    }

    const answer = second.text.trim().length > 0 ? second.text : UNANSWERED_FALLBACK;
    return {
      answer,
      sources,
      toolCalls: executed.map((item) => item.record),
      modelCalls
    };
  }

  private toolSchemas(): ToolSchemaSet | null {
    if (!this.backend.supportsToolCalls || this.registry.size === 0) {
      return null;
    }
    return this.registry.schemaSet(this.backend.toolFormat);
  }

  private async executeTool(call: ToolCallRequest): Promise<ExecutedTool> {
    let resultText: string;
    let sources: string[] = [];
    let failed = false;

    if (call.malformedArguments !== undefined) {
      failed = true;
      resultText = `Tool error: arguments for ${call.name} must be a JSON object, received ${call.malformedArguments}`;
    } else {
      try {
        const result = await this.registry.invoke(call.name, call.arguments);
        resultText = result.text;
        sources = result.sources;
      } catch (error) {
        failed = true;
        resultText = describeToolFailure(call.name, error);
        logger.warn({ err: error, tool: call.name }, "Tool execution failed");
      }
    }

    return {
      record: { toolName: call.name, arguments: call.arguments, resultText, failed },
      message: failed
        ? { role: "tool", toolCallId: call.id, toolName: call.name, content: resultText, isError: true }
        : { role: "tool", toolCallId: call.id, toolName: call.name, content: resultText },
      sources
    };
  }

  private transition(state: OrchestrationState, details: Record<string, unknown>): void {
    logger.debug({ state, provider: this.backend.provider, ...details }, "Orchestration state");
  }
}

function describeToolFailure(toolName: string, error: unknown): string {
  if (error instanceof ToolInvocationError) {
    return `Tool error: ${error.message}`;
  }
  if (error instanceof RetrievalError) {
    return `Search failed: the course index is unavailable (${error.message}).`;
  }
  return `Tool error: ${toolName} failed (${error instanceof Error ? error.message : String(error)}).`;
}
