// ============================================
// Prompt builders
// ============================================
//
// Plain string assembly. Every prompt restates the persona and carries the
// summary and profile text so each model call is grounded on its own.
// ============================================

import type { AgentIdentity, HistoryMessage } from "../types.js";

function groundingContext(identity: AgentIdentity): string {
  return [
    "",
    "",
    "## Summary:",
    identity.summary,
    "",
    "## Profile:",
    identity.profile,
    "",
    "",
  ].join("\n");
}

/** System prompt for the answering agent. */
export function buildSystemPrompt(identity: AgentIdentity): string {
  const { name } = identity;
  const persona = [
    `You are acting as ${name}. You are answering questions on ${name}'s website,`,
    `particularly questions related to ${name}'s career, background, skills and experience.`,
    `Your responsibility is to represent ${name} for interactions on the website as faithfully as possible.`,
    `You are given a summary of ${name}'s background and profile which you can use to answer questions.`,
    "Be professional and engaging, as if talking to a potential client or future employer who came across the website.",
    "If you don't know the answer to any question, use your record_unknown_question tool to record the question that you couldn't answer, even if it's about something trivial or unrelated to career.",
    "If the user is engaging in discussion, try to steer them towards getting in touch via email; ask for their email and record it using your record_user_details tool.",
  ].join(" ");

  return (
    persona +
    groundingContext(identity) +
    `With this context, please chat with the user, always staying in character as ${name}.`
  );
}

/** System prompt for regenerating a reply the evaluator rejected. */
export function buildRejectionSystemPrompt(
  identity: AgentIdentity,
  rejectedReply: string,
  feedback: string,
): string {
  return [
    buildSystemPrompt(identity),
    "",
    "## Previous answer rejected",
    "You just tried to reply, but the quality control rejected your reply",
    "## Your attempted answer:",
    rejectedReply,
    "",
    "## Reason for rejection:",
    feedback,
    "",
  ].join("\n");
}

/** System prompt for the evaluator model. */
export function buildEvaluatorSystemPrompt(identity: AgentIdentity): string {
  const { name } = identity;
  const instructions = [
    "You are an evaluator that decides whether a response to a question is acceptable.",
    "You are provided with a conversation between a User and an Agent. Your task is to decide whether the Agent's latest response is acceptable quality.",
    `The Agent is playing the role of ${name} and is representing ${name} on their website.`,
    "The Agent has been instructed to be professional and engaging, as if talking to a potential client or future employer who came across the website.",
    `The Agent has been provided with context on ${name} in the form of their summary and profile details. Here's the information:`,
  ].join(" ");

  return (
    instructions +
    groundingContext(identity) +
    "With this context, please evaluate the latest response, replying with whether the response is acceptable and your feedback."
  );
}

/** Render caller history as a transcript, one `Role: content` line per turn. */
export function renderHistory(history: HistoryMessage[]): string {
  if (history.length === 0) return "(no prior messages)";
  return history
    .map((m) => `${m.role === "user" ? "User" : "Agent"}: ${m.content}`)
    .join("\n");
}

/** User prompt for the evaluator: transcript, latest message and the candidate reply. */
export function buildEvaluatorUserPrompt(
  reply: string,
  message: string,
  history: HistoryMessage[],
): string {
  return [
    "Here's the conversation between the User and the Agent: ",
    "",
    renderHistory(history),
    "",
    "Here's the latest message from the User: ",
    "",
    message,
    "",
    "Here's the latest response from the Agent: ",
    "",
    reply,
    "",
    "Please evaluate the response, replying with whether it is acceptable and your feedback.",
  ].join("\n");
}
