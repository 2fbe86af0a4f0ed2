// ============================================
// Tool: record_unknown_question — log a question the agent could not answer
// ============================================

import { z } from "zod";
import type { Notifier } from "../channels/pushover.js";
import { ToolArgumentsError } from "../core/errors.js";
import type { Tool } from "./types.js";

const InputSchema = z.object({
  question: z.string(),
});

export function createRecordUnknownQuestionTool(notifier: Notifier): Tool {
  return {
    definition: {
      name: "record_unknown_question",
      description:
        "Always use this tool to record any question that couldn't be answered as you didn't know the answer",
      parameters: {
        type: "object",
        properties: {
          question: { type: "string", description: "The question that couldn't be answered" },
        },
        required: ["question"],
        additionalProperties: false,
      },
    },

    async execute(input) {
      const parsed = InputSchema.safeParse(input);
      if (!parsed.success) {
        throw new ToolArgumentsError("record_unknown_question", parsed.error.message);
      }

      await notifier.notify(`Recording ${parsed.data.question}`);
      return { recorded: "ok" };
    },
  };
}
