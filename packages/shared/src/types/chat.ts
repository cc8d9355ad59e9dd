export type ConversationRole = "user" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  text: string;
}

export interface ToolCallRecord {
  toolName: string;
  arguments: Record<string, unknown>;
  resultText: string;
  failed: boolean;
}

export interface QueryRequest {
  query: string;
  sessionId?: string | null;
}

export interface QueryAnswer {
  answer: string;
  sources: string[];
  sessionId: string;
}
