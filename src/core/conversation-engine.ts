// ============================================
// Conversation Engine — one user turn
// ============================================
//
// For each turn:
//   1. Ask the primary model, with tools, until it answers in plain text
//   2. Run every requested tool call in order and feed the results back
//   3. Have the evaluator judge the candidate reply once
//   4. If rejected, ask the secondary model once, without tools, using a
//      system prompt annotated with the rejected reply and the feedback
// ============================================

import type { AgentIdentity, ChatMessage, HistoryMessage } from "../types.js";
import type { ToolExecutor } from "../tools/tool-executor.js";
import { LLMResponseError } from "./errors.js";
import type { Evaluation } from "./evaluator.js";
import type { ChatCompletion, ChatProvider } from "./llm-adapter.js";
import { buildRejectionSystemPrompt, buildSystemPrompt } from "./prompts.js";

export const DEFAULT_MAX_TOOL_ROUNDS = 10;

/** Anything that can judge a finished candidate reply. */
export interface ReplyEvaluator {
  evaluate(
    reply: string,
    message: string,
    history: HistoryMessage[],
    signal?: AbortSignal,
  ): Promise<Evaluation>;
}

export interface ConversationEngineOptions {
  identity: AgentIdentity;
  /** Answers with tool access. */
  primary: ChatProvider;
  /** Rewrites a rejected reply, without tools. */
  secondary: ChatProvider;
  evaluator: ReplyEvaluator;
  tools: ToolExecutor;
  maxToolRounds?: number;
}

export interface TurnOptions {
  signal?: AbortSignal;
}

export interface TurnResult {
  /** The reply handed back to the caller. */
  reply: string;
  /** The primary model's answer that went through evaluation. */
  candidate: string;
  evaluation: Evaluation;
  regenerated: boolean;
  toolRounds: number;
}

export class ConversationEngine {
  private readonly identity: AgentIdentity;
  private readonly primary: ChatProvider;
  private readonly secondary: ChatProvider;
  private readonly evaluator: ReplyEvaluator;
  private readonly tools: ToolExecutor;
  private readonly maxToolRounds: number;
  private readonly systemPrompt: string;

  constructor(options: ConversationEngineOptions) {
    this.identity = options.identity;
    this.primary = options.primary;
    this.secondary = options.secondary;
    this.evaluator = options.evaluator;
    this.tools = options.tools;
    this.maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    this.systemPrompt = buildSystemPrompt(options.identity);
  }

  /** Answer `message` given the prior `history`; returns only the final reply. */
  async chat(message: string, history: HistoryMessage[], options: TurnOptions = {}): Promise<string> {
    const result = await this.respond(message, history, options);
    return result.reply;
  }

  async respond(
    message: string,
    history: HistoryMessage[],
    options: TurnOptions = {},
  ): Promise<TurnResult> {
    const { signal } = options;
    const { candidate, toolRounds } = await this.generateCandidate(message, history, signal);

    const evaluation = await this.evaluator.evaluate(candidate, message, history, signal);

    if (evaluation.is_acceptable) {
      console.log("[Engine] Passed evaluation - returning reply");
      return { reply: candidate, candidate, evaluation, regenerated: false, toolRounds };
    }

    console.log("[Engine] Failed evaluation - retrying");
    console.log(`[Engine] Feedback: ${evaluation.feedback}`);

    const reply = await this.regenerate(candidate, evaluation.feedback, message, history, signal);
    return { reply, candidate, evaluation, regenerated: true, toolRounds };
  }

  // --------------------------------------------------
  // Internal
  // --------------------------------------------------

  /** Run the primary model and its tool calls until a plain answer comes back. */
  private async generateCandidate(
    message: string,
    history: HistoryMessage[],
    signal: AbortSignal | undefined,
  ): Promise<{ candidate: string; toolRounds: number }> {
    const messages = this.buildMessages(this.systemPrompt, message, history);
    const tools = this.tools.getDefinitions();

    let toolRounds = 0;
    let completion = await this.primary.complete({ messages, tools, signal });

    while (isToolRequest(completion)) {
      if (toolRounds >= this.maxToolRounds) {
        // The pending request is dropped, not appended, so no call is left unanswered.
        console.warn(
          `[Engine] Max tool rounds (${this.maxToolRounds}) reached — requesting a plain answer.`,
        );
        completion = await this.primary.complete({ messages, signal });
        break;
      }

      toolRounds++;
      const results = await this.tools.executeAll(completion.toolCalls);

      messages.push({ role: "assistant", content: completion.content, toolCalls: completion.toolCalls });
      for (const result of results) {
        messages.push({ role: "tool", toolCallId: result.toolCallId, content: result.content });
      }

      completion = await this.primary.complete({ messages, tools, signal });
    }

    console.log(
      `[Engine] Candidate reply ready after ${toolRounds} tool round(s) ` +
        `(${completion.provider}/${completion.model}` +
        `${completion.tokensUsed ? `, ${completion.tokensUsed} tokens` : ""})`,
    );

    return { candidate: requireText(completion), toolRounds };
  }

  private async regenerate(
    rejectedReply: string,
    feedback: string,
    message: string,
    history: HistoryMessage[],
    signal: AbortSignal | undefined,
  ): Promise<string> {
    const systemPrompt = buildRejectionSystemPrompt(this.identity, rejectedReply, feedback);
    const completion = await this.secondary.complete({
      messages: this.buildMessages(systemPrompt, message, history),
      signal,
    });
    return requireText(completion);
  }

  private buildMessages(
    systemPrompt: string,
    message: string,
    history: HistoryMessage[],
  ): ChatMessage[] {
    return [
      { role: "system", content: systemPrompt },
      ...history.map(
        (m): ChatMessage =>
          m.role === "user"
            ? { role: "user", content: m.content }
            : { role: "assistant", content: m.content },
      ),
      { role: "user", content: message },
    ];
  }
}

function isToolRequest(completion: ChatCompletion): boolean {
  return completion.finishReason === "tool_calls" && completion.toolCalls.length > 0;
}

function requireText(completion: ChatCompletion): string {
  if (completion.content === null) {
    throw new LLMResponseError(
      completion.provider,
      `${completion.provider}/${completion.model} returned no reply text`,
    );
  }
  return completion.content;
}
