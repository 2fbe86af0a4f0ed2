// ============================================
// Profile Agent — Shared Types
// ============================================
// Conversation shapes shared by the providers, the tool registry
// and the conversation engine.

import type { ToolCall } from "./tools/types.js";

/** The person the agent speaks for, plus the grounding context. */
export interface AgentIdentity {
  readonly name: string;
  readonly summary: string;
  readonly profile: string;
}

/** A prior turn supplied by the caller. Tool scaffolding is never part of it. */
export interface HistoryMessage {
  role: "user" | "assistant";
  content: string;
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; toolCalls?: ToolCall[] }
  | { role: "tool"; toolCallId: string; content: string };
