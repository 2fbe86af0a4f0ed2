// ============================================
// Profile Agent Runtime
// ============================================

import type { ProfileAgentConfig } from "../config/config.js";
import { PushoverNotifier } from "../channels/pushover.js";
import { createProfileTools } from "../tools/index.js";
import type { HistoryMessage } from "../types.js";
import { ConversationEngine, type TurnOptions } from "./conversation-engine.js";
import { Evaluator } from "./evaluator.js";
import { createChatProvider } from "./llm-adapter.js";
import { loadIdentity } from "./profile-loader.js";

export class ProfileAgent {
  private constructor(
    readonly name: string,
    private readonly engine: ConversationEngine,
  ) {}

  /**
   * Load the grounding context and wire every collaborator. A context that
   * cannot be loaded rejects here, before any conversation is served.
   */
  static async create(config: ProfileAgentConfig): Promise<ProfileAgent> {
    console.log(`[ProfileAgent] Starting agent for "${config.profileName}"...`);
    console.log(`[ProfileAgent] Primary: ${config.primary.provider} / ${config.primary.model}`);
    console.log(`[ProfileAgent] Secondary: ${config.secondary.provider} / ${config.secondary.model}`);
    console.log(`[ProfileAgent] Evaluator: ${config.evaluator.provider} / ${config.evaluator.model}`);

    const identity = await loadIdentity(
      config.profileName,
      config.summaryPath,
      config.profileDocumentPath,
    );

    const notifier = new PushoverNotifier(config.pushoverToken, config.pushoverUser);
    const tools = createProfileTools(notifier);
    console.log(
      `[ProfileAgent] ${tools.getToolNames().length} tool(s) available: ${tools.getToolNames().join(", ")}`,
    );

    const engine = new ConversationEngine({
      identity,
      primary: createChatProvider(config.primary, config.llmTimeoutMs),
      secondary: createChatProvider(config.secondary, config.llmTimeoutMs),
      evaluator: new Evaluator(identity, createChatProvider(config.evaluator, config.llmTimeoutMs)),
      tools,
      maxToolRounds: config.maxToolRounds,
    });

    return new ProfileAgent(identity.name, engine);
  }

  /** Answer one message; `history` holds the prior turns of this conversation. */
  async chat(message: string, history: HistoryMessage[], options?: TurnOptions): Promise<string> {
    return this.engine.chat(message, history, options);
  }
}
