import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import type { QueryAnswer, QueryRequest } from "@coursemate/shared";
import { BackendError, ConfigurationError } from "../../src/errors.js";
import { createQueryRouter } from "../../src/routes/query.js";
import { createSessionsRouter } from "../../src/routes/sessions.js";
import { InMemoryVectorStore } from "../../src/retrieval/InMemoryVectorStore.js";
import { RetrievalIndex } from "../../src/retrieval/RetrievalIndex.js";
import { CourseQAService, type CourseQAServiceLike } from "../../src/services/CourseQAService.js";
import { InMemoryConversationStore } from "../../src/services/InMemoryConversationStore.js";
import { OrchestrationLoop } from "../../src/services/OrchestrationLoop.js";
import { CourseSearchTool } from "../../src/tools/CourseSearchTool.js";
import { ToolRegistry } from "../../src/tools/ToolRegistry.js";
import { FakeEmbeddingProvider } from "../helpers/FakeEmbeddingProvider.js";
import { ScriptedModelBackend, answer, searchCall, toolCalls } from "../helpers/ScriptedModelBackend.js";
import { buildChunks, buildCourse } from "../helpers/courseFixtures.js";

class StubQAService implements CourseQAServiceLike {
  readonly requests: QueryRequest[] = [];

  constructor(private readonly outcome: QueryAnswer | Error) {}

  async query(request: QueryRequest): Promise<QueryAnswer> {
    this.requests.push(request);
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }

  clearSession(sessionId: string): boolean {
    return sessionId === "known";
  }
}

function createApp(service: CourseQAServiceLike): ReturnType<typeof express> {
  const app = express();
  app.use(express.json());
  app.use("/api/query", createQueryRouter({ service }));
  app.use("/api/sessions", createSessionsRouter({ service }));
  return app;
}

describe("query api", () => {
  it("returns the answer, sources and session id", async () => {
    const service = new StubQAService({ answer: "MCP is a protocol.", sources: ["Intro – Lesson 1"], sessionId: "s-1" });

    const response = await request(createApp(service)).post("/api/query").send({ query: "  What is MCP? " });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ answer: "MCP is a protocol.", sources: ["Intro – Lesson 1"], sessionId: "s-1" });
    expect(service.requests).toEqual([{ query: "What is MCP?", sessionId: null }]);
  });

  it("validates the request body", async () => {
    const service = new StubQAService({ answer: "x", sources: [], sessionId: "s" });

    const response = await request(createApp(service)).post("/api/query").send({ query: "   " });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Validation failed");
    expect(service.requests).toHaveLength(0);
  });

  it("maps backend failures to 502 with a fixed message", async () => {
    const service = new StubQAService(
      new BackendError({ kind: "authentication", provider: "anthropic", status: 401, detail: "invalid x-api-key test-secret" })
    );

    const response = await request(createApp(service)).post("/api/query").send({ query: "Hi" });

    expect(response.status).toBe(502);
    expect(response.body).toEqual({
      error: "The language model provider rejected the configured credentials.",
      kind: "authentication"
    });
  });

  it("maps missing configuration to 503", async () => {
    const service = new StubQAService(new ConfigurationError("No language model credentials configured."));

    const response = await request(createApp(service)).post("/api/query").send({ query: "Hi" });

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ error: "The service is not configured to answer queries." });
  });

  it("answers from course content and keeps the session across queries", async () => {
    const index = new RetrievalIndex(new InMemoryVectorStore(), new FakeEmbeddingProvider(["alpha"]));
    await index.ingest(buildCourse("Intro to X"), buildChunks("Intro to X", [{ text: "alpha basics", lesson: 1 }]));
    const backend = new ScriptedModelBackend([
      toolCalls([searchCall({ query: "alpha" })]),
      answer("Alpha is introduced in lesson 1."),
      answer("Yes, that is lesson 1.")
    ]);
    const service = new CourseQAService(
      new OrchestrationLoop(backend, new ToolRegistry().register(new CourseSearchTool(index))),
      new InMemoryConversationStore(),
      { queryTimeoutMs: 1_000 }
    );
    const app = createApp(service);

    const first = await request(app).post("/api/query").send({ query: "Where is alpha introduced?" });
    expect(first.status).toBe(200);
    expect(first.body.answer).toBe("Alpha is introduced in lesson 1.");
    expect(first.body.sources).toEqual(["Intro to X – Lesson 1"]);

    const second = await request(app)
      .post("/api/query")
      .send({ query: "Lesson 1, right?", sessionId: first.body.sessionId });
    expect(second.body.sources).toEqual([]);
    expect(second.body.sessionId).toBe(first.body.sessionId);
    expect(backend.requests[2]?.system).toContain("User: Where is alpha introduced?");

    const reset = await request(app).delete(`/api/sessions/${first.body.sessionId}`);
    expect(reset.status).toBe(204);
  });
});

describe("sessions api", () => {
  it("returns 404 for an unknown session", async () => {
    const app = createApp(new StubQAService({ answer: "x", sources: [], sessionId: "s" }));

    const response = await request(app).delete("/api/sessions/unknown");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "Session not found" });
    expect((await request(app).delete("/api/sessions/known")).status).toBe(204);
  });
});
