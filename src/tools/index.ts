import type { Notifier } from "../channels/pushover.js";
import { createRecordUnknownQuestionTool } from "./record-unknown-question.js";
import { createRecordUserDetailsTool } from "./record-user-details.js";
import { ToolExecutor } from "./tool-executor.js";

/** Build the registry with every tool the agent exposes to the model. */
export function createProfileTools(notifier: Notifier): ToolExecutor {
  const executor = new ToolExecutor();
  executor.register(createRecordUserDetailsTool(notifier));
  executor.register(createRecordUnknownQuestionTool(notifier));
  return executor;
}
