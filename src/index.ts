#!/usr/bin/env node
// ============================================
// Profile Agent — Entry Point
// ============================================

import * as fs from "node:fs";
import * as path from "node:path";
import * as readline from "node:readline";
import { fileURLToPath } from "node:url";
import { config as dotenvConfig } from "dotenv";
import { loadConfig } from "./config/config.js";
import { ProfileAgent } from "./core/agent.js";
import { describeError } from "./core/errors.js";
import type { HistoryMessage } from "./types.js";

// ---- Package info ----

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const PKG_PATH = path.resolve(__dirname, "../package.json");

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(PKG_PATH, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (err) {
    console.warn("[ProfileAgent] Could not read package.json:", describeError(err));
  }
  return "0.0.0";
}

// ---- Helpers ----

function printBanner(): void {
  console.log();
  console.log(`  Profile Agent  v${getVersion()}`);
  console.log("  Answers questions on your behalf, grounded in your profile");
  console.log();
}

function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

// ---- Init command ----

async function runInit(): Promise<void> {
  printBanner();
  console.log("=== Agent Initialization ===\n");

  const profileName = (await prompt("Your name: ")) || "Profile Owner";
  const summaryPath =
    (await prompt("Summary file (default: me/summary.txt): ")) || "me/summary.txt";
  const documentPath =
    (await prompt("Profile document, PDF or text (default: me/profile.pdf): ")) ||
    "me/profile.pdf";

  const primaryKey = await prompt("OpenAI API key for the primary model (optional, can set later): ");
  const secondaryKey = await prompt(
    "Google API key for the evaluator and regeneration model (optional, can set later): ",
  );
  const pushoverToken = await prompt("Pushover app token (optional): ");
  const pushoverUser = await prompt("Pushover user key (optional): ");

  const envLines = [
    `# Profile Agent Configuration`,
    `# Generated on ${new Date().toISOString()}`,
    ``,
    `PROFILE_NAME=${profileName}`,
    `PROFILE_SUMMARY_PATH=${summaryPath}`,
    `PROFILE_DOCUMENT_PATH=${documentPath}`,
    ``,
    `PRIMARY_LLM_PROVIDER=openai`,
    `PRIMARY_LLM_API_KEY=${primaryKey}`,
    `PRIMARY_LLM_MODEL=gpt-4o-mini`,
    ``,
    `SECONDARY_LLM_PROVIDER=google`,
    `SECONDARY_LLM_API_KEY=${secondaryKey}`,
    `SECONDARY_LLM_MODEL=gemini-2.0-flash`,
    ``,
    `PUSHOVER_TOKEN=${pushoverToken}`,
    `PUSHOVER_USER=${pushoverUser}`,
    ``,
    `# Tool rounds allowed per turn before a plain answer is forced`,
    `MAX_TOOL_ROUNDS=10`,
    `LLM_TIMEOUT_MS=60000`,
    ``,
  ];

  const envPath = path.resolve(process.cwd(), ".env");
  fs.writeFileSync(envPath, envLines.join("\n"), "utf-8");
  console.log(`\nConfiguration saved to ${envPath}`);
  console.log('Run "profile-agent" to start chatting.\n');
}

// ---- Ask command ----

async function runAsk(question: string): Promise<void> {
  if (!question) {
    console.error('Usage: profile-agent ask "<question>"');
    process.exitCode = 1;
    return;
  }

  dotenvConfig();
  const agent = await ProfileAgent.create(loadConfig());
  const reply = await agent.chat(question, []);
  console.log();
  console.log(reply);
}

// ---- Default: interactive chat ----

async function runChat(): Promise<void> {
  // Load .env from the current working directory
  dotenvConfig();

  printBanner();

  const agent = await ProfileAgent.create(loadConfig());
  const history: HistoryMessage[] = [];

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "You: ",
  });

  // Ctrl+C cancels the running turn, or ends the session when idle.
  let turn: AbortController | null = null;
  rl.on("SIGINT", () => {
    if (turn) {
      turn.abort(new Error("cancelled by user"));
    } else {
      rl.close();
    }
  });

  console.log(`\nChatting with ${agent.name}. Type "exit" to quit.\n`);
  rl.prompt();

  for await (const line of rl) {
    const message = line.trim();

    if (message === "exit" || message === "quit") break;

    if (message) {
      turn = new AbortController();
      try {
        const reply = await agent.chat(message, history, { signal: turn.signal });
        console.log(`\n${agent.name}: ${reply}\n`);
        history.push({ role: "user", content: message }, { role: "assistant", content: reply });
      } catch (err) {
        // The failed turn is not added to history; the session continues.
        console.error("[ProfileAgent] Turn failed:", describeError(err));
      } finally {
        turn = null;
      }
    }

    rl.prompt();
  }

  rl.close();
  console.log("[ProfileAgent] Bye.");
}

// ---- CLI dispatch ----

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0]?.toLowerCase();

  switch (command) {
    case "init":
      await runInit();
      break;

    case "ask":
      await runAsk(args.slice(1).join(" ").trim());
      break;

    case "version":
    case "--version":
    case "-v":
      console.log(`profile-agent v${getVersion()}`);
      break;

    case "help":
    case "--help":
    case "-h":
      printBanner();
      console.log("Usage:");
      console.log("  profile-agent                   Start an interactive chat");
      console.log('  profile-agent ask "<question>"  Answer a single question');
      console.log("  profile-agent init              Interactive setup");
      console.log("  profile-agent version           Show version");
      console.log("  profile-agent help              Show this help message");
      console.log();
      break;

    default:
      await runChat();
      break;
  }
}

main().catch((err) => {
  console.error("[ProfileAgent] Fatal error:", err);
  process.exit(1);
});
