import { describe, expect, it } from "vitest";
import { BackendError } from "../../../src/errors.js";
import { InMemoryVectorStore } from "../../../src/retrieval/InMemoryVectorStore.js";
import { RetrievalIndex } from "../../../src/retrieval/RetrievalIndex.js";
import { CourseQAService } from "../../../src/services/CourseQAService.js";
import { InMemoryConversationStore } from "../../../src/services/InMemoryConversationStore.js";
import { OrchestrationLoop } from "../../../src/services/OrchestrationLoop.js";
import { CourseSearchTool } from "../../../src/tools/CourseSearchTool.js";
import { ToolRegistry } from "../../../src/tools/ToolRegistry.js";
import { FakeEmbeddingProvider } from "../../helpers/FakeEmbeddingProvider.js";
import { ScriptedModelBackend, answer } from "../../helpers/ScriptedModelBackend.js";

function createService(backend: ScriptedModelBackend, queryTimeoutMs = 1_000) {
  const index = new RetrievalIndex(new InMemoryVectorStore(), new FakeEmbeddingProvider(["alpha"]));
  const registry = new ToolRegistry().register(new CourseSearchTool(index));
  const conversations = new InMemoryConversationStore();
  const service = new CourseQAService(new OrchestrationLoop(backend, registry), conversations, { queryTimeoutMs });
  return { service, conversations };
}

describe("CourseQAService", () => {
  it("creates a session and records the exchange", async () => {
    const backend = new ScriptedModelBackend([answer("Hello!")]);
    const { service, conversations } = createService(backend);

    const result = await service.query({ query: "Hi" });

    expect(result.answer).toBe("Hello!");
    expect(result.sources).toEqual([]);
    expect(result.sessionId).toEqual(expect.any(String));
    expect(conversations.snapshot(result.sessionId)).toEqual([
      { role: "user", text: "Hi" },
      { role: "assistant", text: "Hello!" }
    ]);
  });

  it("passes earlier turns of the same session to the model", async () => {
    const backend = new ScriptedModelBackend([answer("Lesson 1 covers basics."), answer("Lesson 2 goes deeper.")]);
    const { service } = createService(backend);

    const first = await service.query({ query: "What does lesson 1 cover?" });
    await service.query({ query: "And lesson 2?", sessionId: first.sessionId });

    expect(backend.requests[0]?.system).not.toContain("Previous conversation:");
    expect(
      backend.requests[1]?.system.endsWith(
        "Previous conversation:\nUser: What does lesson 1 cover?\nAssistant: Lesson 1 covers basics."
      )
    ).toBe(true);
  });

  it("fails with a timeout when the model is too slow", async () => {
    const backend = new ScriptedModelBackend([
      () =>
        new Promise((resolve) => {
          setTimeout(() => resolve(answer("late")), 50);
        })
    ]);
    const { service, conversations } = createService(backend, 10);

    const failure = service.query({ query: "Slow?", sessionId: "s1" });

    await expect(failure).rejects.toBeInstanceOf(BackendError);
    await expect(failure).rejects.toMatchObject({ kind: "timeout", provider: "anthropic" });
    expect(conversations.snapshot("s1")).toEqual([]);
  });

  it("clears a session", async () => {
    const backend = new ScriptedModelBackend([answer("Hello!")]);
    const { service } = createService(backend);
    const { sessionId } = await service.query({ query: "Hi" });

    expect(service.clearSession(sessionId)).toBe(true);
    expect(service.clearSession(sessionId)).toBe(false);
  });
});
