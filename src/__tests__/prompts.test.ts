import { describe, it, expect } from "vitest";
import {
  buildEvaluatorSystemPrompt,
  buildRejectionSystemPrompt,
  buildSystemPrompt,
  renderHistory,
} from "../core/prompts.js";
import { identity } from "./fixtures.js";

describe("prompts", () => {
  it("grounds the agent prompt with the summary and profile", () => {
    const prompt = buildSystemPrompt(identity);

    expect(prompt.startsWith("You are acting as Jane Doe. You are answering questions on Jane Doe's website,")).toBe(
      true,
    );
    expect(prompt).toContain(
      "\n\n## Summary:\nBackend engineer based in Lisbon.\n\n## Profile:\nStaff Engineer at Example Payments Co.\n\n",
    );
    expect(prompt.endsWith("please chat with the user, always staying in character as Jane Doe.")).toBe(true);
  });

  it("names both tools in the agent prompt", () => {
    const prompt = buildSystemPrompt(identity);

    expect(prompt).toContain("use your record_unknown_question tool");
    expect(prompt).toContain("record it using your record_user_details tool");
  });

  it("appends the rejected answer and the feedback to the agent prompt", () => {
    const prompt = buildRejectionSystemPrompt(identity, "meh", "Be more specific.");

    expect(prompt).toBe(
      buildSystemPrompt(identity) +
        "\n\n## Previous answer rejected\n" +
        "You just tried to reply, but the quality control rejected your reply\n" +
        "## Your attempted answer:\nmeh\n\n" +
        "## Reason for rejection:\nBe more specific.\n",
    );
  });

  it("restates the persona and context for the evaluator", () => {
    const prompt = buildEvaluatorSystemPrompt(identity);

    expect(prompt).toContain("The Agent is playing the role of Jane Doe and is representing Jane Doe on their website.");
    expect(prompt).toContain("## Summary:\nBackend engineer based in Lisbon.");
    expect(prompt.endsWith("replying with whether the response is acceptable and your feedback.")).toBe(true);
  });

  it("renders history as a transcript", () => {
    expect(renderHistory([])).toBe("(no prior messages)");
    expect(
      renderHistory([
        { role: "user", content: "Hi" },
        { role: "assistant", content: "Hello!" },
      ]),
    ).toBe("User: Hi\nAgent: Hello!");
  });
});
