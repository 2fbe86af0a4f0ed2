// ============================================
// Chat Provider Adapter
// ============================================
//
// A uniform "chat completion provider" capability. The engine never picks a
// backend itself: the primary, secondary and evaluator roles each receive a
// provider built by `createChatProvider`.
//
// Supports tool-use completion and schema-constrained (structured) output
// against any OpenAI-compatible endpoint. When no API key is provided a
// placeholder answers instead, so the rest of the pipeline still runs.
// ============================================

import { z } from "zod";
import type { ProviderConfig } from "../config/config.js";
import type { ChatMessage } from "../types.js";
import type { ToolCall, ToolDefinition } from "../tools/types.js";
import { LLMRequestError, LLMResponseError, ProfileAgentError, describeError } from "./errors.js";

const MAX_TOKENS = 4096;
const DEFAULT_TIMEOUT_MS = 60_000;

// ---- Request / response types ----

export type FinishReason = "tool_calls" | "stop" | "length";

export interface ChatRequest {
  messages: ChatMessage[];
  /** Omitted or empty: the model cannot request tools. */
  tools?: ToolDefinition[];
  signal?: AbortSignal;
}

/** JSON Schema the model output must conform to. */
export interface StructuredOutputSchema {
  name: string;
  schema: {
    type: "object";
    properties: Record<string, { type: string; description?: string }>;
    required: string[];
    additionalProperties: false;
  };
}

export interface StructuredChatRequest {
  messages: ChatMessage[];
  schema: StructuredOutputSchema;
  signal?: AbortSignal;
}

export interface ChatCompletion {
  finishReason: FinishReason;
  content: string | null;
  /** In the order the model listed them. */
  toolCalls: ToolCall[];
  provider: string;
  model: string;
  tokensUsed?: number;
}

// ---- Abstract base ----

export abstract class ChatProvider {
  constructor(
    readonly provider: string,
    protected readonly apiKey: string,
    readonly model: string,
  ) {}

  /** Send a conversation, optionally with tool definitions. */
  abstract complete(request: ChatRequest): Promise<ChatCompletion>;

  /**
   * Send a conversation and require JSON output shaped by `request.schema`.
   * Resolves to the parsed JSON; callers validate it.
   */
  abstract completeStructured(request: StructuredChatRequest): Promise<unknown>;
}

// ---- Abort helpers ----

/**
 * Combine the caller's signal with a per-call deadline. `cleanup` must run
 * once the call settles so neither the timer nor the listener leaks.
 */
export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref();

  const onCallerAbort = () => {
    if (!controller.signal.aborted) controller.abort(callerSignal?.reason);
  };

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener("abort", onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener("abort", onCallerAbort);
  };

  return { signal: controller.signal, cleanup };
}

// ---- OpenAI-compatible adapter ----

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() }),
              }),
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
  usage: z.object({ total_tokens: z.number() }).nullish(),
});

type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

export interface OpenAICompatibleOptions {
  baseUrl: string;
  timeoutMs?: number;
}

export class OpenAICompatibleProvider extends ChatProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(provider: string, apiKey: string, model: string, options: OpenAICompatibleOptions) {
    super(provider, apiKey, model);
    // Strip trailing slash for consistent URL building
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async complete(request: ChatRequest): Promise<ChatCompletion> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: request.messages.map(toWireMessage),
      max_tokens: MAX_TOKENS,
    };

    const tools = request.tools ?? [];
    if (tools.length > 0) {
      body.tools = tools.map((t) => ({
        type: "function",
        function: {
          name: t.name,
          description: t.description,
          parameters: t.parameters,
        },
      }));
    }

    const data = await this.post(body, request.signal);
    const choice = data.choices[0];
    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

    const finishReason: FinishReason =
      choice.finish_reason === "tool_calls" || toolCalls.length > 0
        ? "tool_calls"
        : choice.finish_reason === "length"
          ? "length"
          : "stop";

    return {
      finishReason,
      content: choice.message.content ?? null,
      toolCalls,
      provider: this.provider,
      model: this.model,
      tokensUsed: data.usage?.total_tokens,
    };
  }

  async completeStructured(request: StructuredChatRequest): Promise<unknown> {
    const data = await this.post(
      {
        model: this.model,
        messages: request.messages.map(toWireMessage),
        max_tokens: MAX_TOKENS,
        response_format: {
          type: "json_schema",
          json_schema: {
            name: request.schema.name,
            schema: request.schema.schema,
            strict: true,
          },
        },
      },
      request.signal,
    );

    const content = data.choices[0].message.content;
    if (!content) {
      throw new LLMResponseError(this.provider, `${this.provider} returned no structured content`);
    }

    try {
      return JSON.parse(content);
    } catch (err) {
      throw new LLMResponseError(
        this.provider,
        `${this.provider} returned structured content that is not JSON: ${content.slice(0, 200)}`,
        { cause: err },
      );
    }
  }

  private async post(
    body: Record<string, unknown>,
    callerSignal: AbortSignal | undefined,
  ): Promise<ChatCompletionResponse> {
    const text = await this.send(body, callerSignal);

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new LLMResponseError(this.provider, `${this.provider} returned a non-JSON body`, {
        cause: err,
      });
    }

    const parsed = ChatCompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new LLMResponseError(
        this.provider,
        `${this.provider} returned an unexpected response shape: ${parsed.error.message}`,
      );
    }
    return parsed.data;
  }

  /** POST to the chat-completions endpoint and return the raw body text. */
  private async send(
    body: Record<string, unknown>,
    callerSignal: AbortSignal | undefined,
  ): Promise<string> {
    const { signal, cleanup } = createCombinedAbortSignal(callerSignal, this.timeoutMs);

    try {
      const res = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal,
      });

      const text = await res.text();

      if (!res.ok) {
        throw new LLMRequestError(
          this.provider,
          `${this.provider} API error ${res.status}: ${text.slice(0, 500)}`,
          res.status,
        );
      }
      return text;
    } catch (err) {
      if (err instanceof ProfileAgentError) throw err;
      const reason = signal.aborted ? signal.reason : err;
      throw new LLMRequestError(
        this.provider,
        `${this.provider} request failed: ${describeError(reason)}`,
        undefined,
        { cause: err },
      );
    } finally {
      cleanup();
    }
  }
}

/** Map a conversation message to the chat-completions wire format. */
function toWireMessage(msg: ChatMessage): Record<string, unknown> {
  switch (msg.role) {
    case "system":
    case "user":
      return { role: msg.role, content: msg.content };
    case "assistant": {
      const wire: Record<string, unknown> = { role: "assistant", content: msg.content };
      if (msg.toolCalls && msg.toolCalls.length > 0) {
        wire.tool_calls = msg.toolCalls.map((tc) => ({
          id: tc.id,
          type: "function",
          function: { name: tc.name, arguments: tc.arguments },
        }));
      }
      return wire;
    }
    case "tool":
      return { role: "tool", tool_call_id: msg.toolCallId, content: msg.content };
  }
}

// ---- Placeholder adapter (no API key) ----

export const PLACEHOLDER_REPLY = "[LLM response placeholder -- configure an API key to enable]";

export class PlaceholderProvider extends ChatProvider {
  async complete(request: ChatRequest): Promise<ChatCompletion> {
    console.log("[LLM Placeholder] Messages:", request.messages.length);
    return {
      finishReason: "stop",
      content: PLACEHOLDER_REPLY,
      toolCalls: [],
      provider: "placeholder",
      model: "none",
    };
  }

  /** Fill every schema property with a neutral value of its declared type. */
  async completeStructured(request: StructuredChatRequest): Promise<unknown> {
    console.log("[LLM Placeholder] Structured output:", request.schema.name);
    const result: Record<string, unknown> = {};
    for (const [key, prop] of Object.entries(request.schema.schema.properties)) {
      result[key] = prop.type === "boolean" ? true : prop.type === "number" ? 0 : PLACEHOLDER_REPLY;
    }
    return result;
  }
}

// ---- Factory ----

const BASE_URLS: Record<string, string> = {
  openai: "https://api.openai.com/v1",
  google: "https://generativelanguage.googleapis.com/v1beta/openai",
};

/**
 * Create the provider for one role. Falls back to a placeholder if no API key
 * is supplied or the provider name is unknown and no base URL is configured.
 */
export function createChatProvider(config: ProviderConfig, timeoutMs?: number): ChatProvider {
  if (!config.apiKey) {
    console.warn(
      `[LLM] No API key for ${config.provider}/${config.model} — using placeholder provider.`,
    );
    return new PlaceholderProvider("placeholder", "", "none");
  }

  const name = config.provider.toLowerCase();
  const baseUrl = config.baseUrl || BASE_URLS[name];
  if (!baseUrl) {
    console.warn(`[LLM] Unknown provider "${config.provider}" — using placeholder provider.`);
    return new PlaceholderProvider("placeholder", "", "none");
  }

  return new OpenAICompatibleProvider(name, config.apiKey, config.model, { baseUrl, timeoutMs });
}
