// ============================================
// Tool: record_user_details — capture a visitor's contact details
// ============================================

import { z } from "zod";
import type { Notifier } from "../channels/pushover.js";
import { ToolArgumentsError } from "../core/errors.js";
import type { Tool } from "./types.js";

const InputSchema = z.object({
  email: z.string(),
  name: z.string().optional(),
  notes: z.string().optional(),
});

export function createRecordUserDetailsTool(notifier: Notifier): Tool {
  return {
    definition: {
      name: "record_user_details",
      description:
        "Use this tool to record that a user is interested in being in touch and provided an email address",
      parameters: {
        type: "object",
        properties: {
          email: { type: "string", description: "The email address of this user" },
          name: { type: "string", description: "The user's name, if they provided it" },
          notes: {
            type: "string",
            description:
              "Any additional information about the conversation that's worth recording to give context",
          },
        },
        required: ["email"],
        additionalProperties: false,
      },
    },

    async execute(input) {
      const parsed = InputSchema.safeParse(input);
      if (!parsed.success) {
        throw new ToolArgumentsError("record_user_details", parsed.error.message);
      }

      const { email, name = "Name not provided", notes = "not provided" } = parsed.data;
      await notifier.notify(`Recording ${name} with email ${email} and notes ${notes}`);
      return { recorded: "ok" };
    },
  };
}
