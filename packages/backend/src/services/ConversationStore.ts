import type { ConversationTurn } from "@coursemate/shared";

export interface ConversationStoreLike {
  createSession(id?: string): string;
  has(sessionId: string): boolean;
  /** Appends turns and applies the eviction policy; unknown ids start a new session. */
  append(sessionId: string, turns: ConversationTurn[]): void;
  snapshot(sessionId: string): ConversationTurn[];
  clear(sessionId: string): boolean;
}

export interface EvictionPolicy {
  apply(turns: ConversationTurn[]): ConversationTurn[];
}

/** Keeps the newest `maxTurns` turns, dropping the oldest first. */
export class FifoWindowPolicy implements EvictionPolicy {
  constructor(readonly maxTurns: number) {
    if (!Number.isInteger(maxTurns) || maxTurns < 0) {
      throw new RangeError(`maxTurns must be a non-negative integer, got ${maxTurns}`);
    }
  }

  apply(turns: ConversationTurn[]): ConversationTurn[] {
    if (this.maxTurns === 0) {
      return [];
    }
    return turns.length > this.maxTurns ? turns.slice(turns.length - this.maxTurns) : turns;
  }
}
