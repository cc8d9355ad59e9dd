import { randomUUID } from "node:crypto";
import type { ConversationTurn } from "@coursemate/shared";
import type { ConversationStoreLike, EvictionPolicy } from "./ConversationStore.js";
import { FifoWindowPolicy } from "./ConversationStore.js";

const DEFAULT_MAX_EXCHANGES = 2;

export class InMemoryConversationStore implements ConversationStoreLike {
  private readonly sessions = new Map<string, ConversationTurn[]>();
  private readonly policy: EvictionPolicy;

  constructor(policy: EvictionPolicy = new FifoWindowPolicy(DEFAULT_MAX_EXCHANGES * 2)) {
    this.policy = policy;
  }

  createSession(id: string = randomUUID()): string {
    if (!this.sessions.has(id)) {
      this.sessions.set(id, []);
    }
    return id;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  append(sessionId: string, turns: ConversationTurn[]): void {
    const current = this.sessions.get(sessionId) ?? [];
    const next = [...current, ...turns.map((turn) => ({ ...turn }))];
    this.sessions.set(sessionId, this.policy.apply(next));
  }

  snapshot(sessionId: string): ConversationTurn[] {
    return (this.sessions.get(sessionId) ?? []).map((turn) => ({ ...turn }));
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }
}
