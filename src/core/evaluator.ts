// ============================================
// Evaluator — quality gate over a candidate reply
// ============================================

import { z } from "zod";
import type { AgentIdentity, HistoryMessage } from "../types.js";
import { EvaluationSchemaError } from "./errors.js";
import type { ChatProvider, StructuredOutputSchema } from "./llm-adapter.js";
import { buildEvaluatorSystemPrompt, buildEvaluatorUserPrompt } from "./prompts.js";

export const EvaluationSchema = z
  .object({
    is_acceptable: z.boolean(),
    feedback: z.string(),
  })
  .strict();

export type Evaluation = z.infer<typeof EvaluationSchema>;

/** Output contract sent with every evaluator call. */
export const EVALUATION_OUTPUT_SCHEMA: StructuredOutputSchema = {
  name: "Evaluation",
  schema: {
    type: "object",
    properties: {
      is_acceptable: {
        type: "boolean",
        description: "Whether the Agent's latest response is acceptable",
      },
      feedback: { type: "string", description: "Feedback on the response" },
    },
    required: ["is_acceptable", "feedback"],
    additionalProperties: false,
  },
};

export class Evaluator {
  private readonly systemPrompt: string;

  constructor(
    identity: AgentIdentity,
    private readonly llm: ChatProvider,
  ) {
    this.systemPrompt = buildEvaluatorSystemPrompt(identity);
  }

  /**
   * Judge `reply` as the answer to `message` after `history`. A payload that
   * is not exactly `{is_acceptable, feedback}` throws `EvaluationSchemaError`.
   */
  async evaluate(
    reply: string,
    message: string,
    history: HistoryMessage[],
    signal?: AbortSignal,
  ): Promise<Evaluation> {
    const payload = await this.llm.completeStructured({
      messages: [
        { role: "system", content: this.systemPrompt },
        { role: "user", content: buildEvaluatorUserPrompt(reply, message, history) },
      ],
      schema: EVALUATION_OUTPUT_SCHEMA,
      signal,
    });

    const parsed = EvaluationSchema.safeParse(payload);
    if (!parsed.success) {
      throw new EvaluationSchemaError(
        `Evaluator returned a non-conformant payload: ${parsed.error.message}`,
        payload,
      );
    }

    console.log(
      `[Evaluator] ${parsed.data.is_acceptable ? "Accepted" : "Rejected"} ` +
        `(${this.llm.provider}/${this.llm.model})`,
    );
    return parsed.data;
  }
}
