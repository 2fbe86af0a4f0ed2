import { vi, type Mock } from "vitest";
import {
  ChatProvider,
  type ChatCompletion,
  type ChatRequest,
  type StructuredChatRequest,
} from "../core/llm-adapter.js";
import type { Notifier } from "../channels/pushover.js";
import type { AgentIdentity } from "../types.js";
import type { ToolCall } from "../tools/types.js";

export const identity: AgentIdentity = {
  name: "Jane Doe",
  summary: "Backend engineer based in Lisbon.",
  profile: "Staff Engineer at Example Payments Co.",
};

/** Plays back queued completions and records each request as it was at call time. */
export class ScriptedProvider extends ChatProvider {
  readonly requests: ChatRequest[] = [];
  readonly structuredRequests: StructuredChatRequest[] = [];
  private readonly completions: ChatCompletion[];
  private readonly structured: unknown[];

  constructor(
    name: string,
    script: { completions?: ChatCompletion[]; structured?: unknown[] } = {},
  ) {
    super(name, "test-key", `${name}-model`);
    this.completions = [...(script.completions ?? [])];
    this.structured = [...(script.structured ?? [])];
  }

  async complete(request: ChatRequest): Promise<ChatCompletion> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const next = this.completions.shift();
    if (!next) throw new Error(`${this.provider}: no scripted completion left`);
    return next;
  }

  async completeStructured(request: StructuredChatRequest): Promise<unknown> {
    this.structuredRequests.push({ ...request, messages: [...request.messages] });
    if (this.structured.length === 0) throw new Error(`${this.provider}: no scripted payload left`);
    return this.structured.shift();
  }
}

export function textCompletion(content: string): ChatCompletion {
  return { finishReason: "stop", content, toolCalls: [], provider: "stub", model: "stub-model" };
}

export function toolCompletion(toolCalls: ToolCall[]): ChatCompletion {
  return { finishReason: "tool_calls", content: null, toolCalls, provider: "stub", model: "stub-model" };
}

export function recordingNotifier(): Notifier & { notify: Mock<(message: string) => Promise<void>> } {
  return { notify: vi.fn(async (_message: string) => {}) };
}

/** Keep test output readable; the code under test logs every step. */
export function silenceConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
}
