import type {
  ConversationTurn,
  QueryAnswer,
  QueryRequest
} from "@coursemate/shared";
import { BackendError } from "../errors.js";
import { logger } from "../utils/logger.js";
import type { ConversationStoreLike } from "./ConversationStore.js";
import type { OrchestrationLoop, OrchestrationResult } from "./OrchestrationLoop.js";

export interface CourseQAServiceOptions {
  queryTimeoutMs: number;
}

export interface CourseQAServiceLike {
  query(request: QueryRequest): Promise<QueryAnswer>;
  clearSession(sessionId: string): boolean;
}

/**
 * Session-level entry point: reads history, runs the orchestration loop under
 * a timeout and records the exchange. Concurrent queries on one session are
 * not serialized; the last append wins.
 */
export class CourseQAService implements CourseQAServiceLike {
  constructor(
    private readonly loop: OrchestrationLoop,
    private readonly conversations: ConversationStoreLike,
    private readonly options: CourseQAServiceOptions
  ) {}

  async query(request: QueryRequest): Promise<QueryAnswer> {
    const sessionId = request.sessionId ?? this.conversations.createSession();
    const history = this.conversations.snapshot(sessionId);

    const result = await this.runWithTimeout(request.query, history);
    this.conversations.append(sessionId, [
      { role: "user", text: request.query },
      { role: "assistant", text: result.answer }
    ]);

    logger.info(
      {
        sessionId,
        modelCalls: result.modelCalls,
        toolCalls: result.toolCalls.map((call) => call.toolName),
        sourceCount: result.sources.length
      },
      "Query answered"
    );
    return { answer: result.answer, sources: result.sources, sessionId };
  }

  clearSession(sessionId: string): boolean {
    return this.conversations.clear(sessionId);
  }

  private async runWithTimeout(
    query: string,
    history: ConversationTurn[]
  ): Promise<OrchestrationResult> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(
          new BackendError({
            kind: "timeout",
            provider: this.loop.provider,
            detail: `query exceeded ${this.options.queryTimeoutMs}ms`
          })
        );
      }, this.options.queryTimeoutMs);
    });

    try {
      return await Promise.race([this.loop.run({ query, history }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
