import type OpenAI from "openai";
import { describe, expect, it, vi } from "vitest";
import {
  OpenAICompatibleBackend,
  toOpenAIMessages,
  type ChatCompletionReply
} from "../../../src/llm/OpenAICompatibleBackend.js";
import type { ModelRequest } from "../../../src/llm/types.js";
import { ProviderCallLimiter } from "../../../src/services/ProviderCallLimiter.js";

type CreateBody = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

function createBackend(reply: ChatCompletionReply | Error, supportsToolCalls = true) {
  const create = vi.fn(async (_body: CreateBody, _options?: { signal?: AbortSignal }): Promise<ChatCompletionReply> => {
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  });
  const backend = new OpenAICompatibleBackend(
    {
      provider: "xai",
      apiKey: "test-secret",
      baseURL: "http://localhost:9999/v1",
      model: "grok-test",
      maxTokens: 500,
      temperature: 0.2,
      supportsToolCalls
    },
    { client: { chat: { completions: { create } } }, limiter: new ProviderCallLimiter("xai") }
  );
  return { backend, create };
}

function textReply(content: string | null): ChatCompletionReply {
  return { choices: [{ finish_reason: "stop", message: { content, refusal: null } }] };
}

const searchTools: ModelRequest["tools"] = {
  format: "openai",
  schemas: [
    {
      type: "function",
      function: {
        name: "search_course_content",
        description: "Search course materials",
        parameters: { type: "object", properties: { query: { type: "string" } }, required: ["query"] }
      }
    }
  ]
};

describe("OpenAICompatibleBackend", () => {
  it("prepends the system prompt and offers tools with auto choice", async () => {
    const { backend, create } = createBackend(textReply("An answer."));

    const response = await backend.complete({
      system: "You answer course questions.",
      messages: [{ role: "user", content: "Question?" }],
      tools: searchTools
    });

    expect(response).toEqual({ kind: "answer", text: "An answer." });
    expect(create).toHaveBeenCalledWith(
      {
        model: "grok-test",
        max_tokens: 500,
        temperature: 0.2,
        messages: [
          { role: "system", content: "You answer course questions." },
          { role: "user", content: "Question?" }
        ],
        tools: searchTools?.schemas,
        tool_choice: "auto"
      },
      { signal: expect.any(AbortSignal) }
    );
  });

  it("parses function call arguments", async () => {
    const { backend } = createBackend({
      choices: [
        {
          finish_reason: "tool_calls",
          message: {
            content: null,
            refusal: null,
            tool_calls: [
              {
                id: "call_a",
                type: "function",
                function: { name: "search_course_content", arguments: '{"query":"MCP","course_name":"Intro"}' }
              },
              { id: "call_b", type: "function", function: { name: "search_course_content", arguments: "{oops" } },
              { id: "call_c", type: "function", function: { name: "get_course_outline", arguments: "" } }
            ]
          }
        }
      ]
    });

    const response = await backend.complete({ system: "s", messages: [{ role: "user", content: "q" }], tools: searchTools });

    expect(response).toEqual({
      kind: "tool_calls",
      text: "",
      toolCalls: [
        { id: "call_a", name: "search_course_content", arguments: { query: "MCP", course_name: "Intro" } },
        { id: "call_b", name: "search_course_content", arguments: {}, malformedArguments: "{oops" },
        { id: "call_c", name: "get_course_outline", arguments: {} }
      ]
    });
  });

  it("never sends tools to a text-only endpoint", async () => {
    const { backend, create } = createBackend(textReply("Plain."), false);

    await backend.complete({ system: "s", messages: [{ role: "user", content: "q" }], tools: searchTools });

    const body = create.mock.calls[0]?.[0];
    expect(body).not.toHaveProperty("tools");
    expect(body).not.toHaveProperty("tool_choice");
  });

  it("uses a refusal as the answer text", async () => {
    const { backend } = createBackend({
      choices: [{ finish_reason: "stop", message: { content: null, refusal: "I can't help with that." } }]
    });

    const response = await backend.complete({ system: "s", messages: [{ role: "user", content: "q" }], tools: null });

    expect(response).toEqual({ kind: "answer", text: "I can't help with that." });
  });

  it("rejects replies without choices or text", async () => {
    const request: ModelRequest = { system: "s", messages: [{ role: "user", content: "q" }], tools: null };

    await expect(createBackend({ choices: [] }).backend.complete(request)).rejects.toMatchObject({
      kind: "malformed_response",
      provider: "xai"
    });
    await expect(createBackend(textReply("   ")).backend.complete(request)).rejects.toMatchObject({
      kind: "malformed_response"
    });
  });

  it("classifies rate limiting and connection failures", async () => {
    const request: ModelRequest = { system: "s", messages: [{ role: "user", content: "q" }], tools: null };

    await expect(
      createBackend(Object.assign(new Error("Too many requests"), { status: 429 })).backend.complete(request)
    ).rejects.toMatchObject({ kind: "rate_limited", status: 429 });
    await expect(
      createBackend(Object.assign(new Error("connect failed"), { code: "ECONNREFUSED" })).backend.complete(request)
    ).rejects.toMatchObject({ kind: "unavailable" });
  });
});

describe("toOpenAIMessages", () => {
  it("maps assistant tool calls and tool results", () => {
    expect(
      toOpenAIMessages([
        { role: "user", content: "q" },
        {
          role: "assistant",
          content: "",
          toolCalls: [
            { id: "c1", name: "search_course_content", arguments: { query: "a" } },
            { id: "c2", name: "search_course_content", arguments: {}, malformedArguments: "{bad" }
          ]
        },
        { role: "tool", toolCallId: "c1", toolName: "search_course_content", content: "found" },
        { role: "assistant", content: "done" }
      ])
    ).toEqual([
      { role: "user", content: "q" },
      {
        role: "assistant",
        content: null,
        tool_calls: [
          { id: "c1", type: "function", function: { name: "search_course_content", arguments: '{"query":"a"}' } },
          { id: "c2", type: "function", function: { name: "search_course_content", arguments: "{bad" } }
        ]
      },
      { role: "tool", tool_call_id: "c1", content: "found" },
      { role: "assistant", content: "done" }
    ]);
  });
});
