// ============================================
// Tool Executor — dispatches tool calls
// ============================================

import { ToolArgumentsError } from "../core/errors.js";
import type { Tool, ToolCall, ToolDefinition, ToolResult } from "./types.js";

/** Serialized result handed back for a tool name that is not registered. */
export const UNKNOWN_TOOL_RESULT = "{}";

export class ToolExecutor {
  private tools = new Map<string, Tool>();

  register(tool: Tool): void {
    const name = tool.definition.name;
    if (this.tools.has(name)) {
      throw new Error(`Tool "${name}" is already registered`);
    }
    this.tools.set(name, tool);
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.definition);
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Run one call. Unknown tools yield an empty object; arguments that do not
   * parse into an object throw `ToolArgumentsError`.
   */
  async execute(call: ToolCall): Promise<ToolResult> {
    console.log(`[Tool] Tool called: ${call.name}`);

    const tool = this.tools.get(call.name);

    if (!tool) {
      console.warn(`[Tool] Unknown tool "${call.name}", returning empty result`);
      return { toolCallId: call.id, content: UNKNOWN_TOOL_RESULT };
    }

    const input = parseArguments(call);
    const output = await tool.execute(input);
    return { toolCallId: call.id, content: JSON.stringify(output) };
  }

  /** Run calls one after another; results keep the order of `calls`. */
  async executeAll(calls: ToolCall[]): Promise<ToolResult[]> {
    const results: ToolResult[] = [];
    for (const call of calls) {
      results.push(await this.execute(call));
    }
    return results;
  }
}

function parseArguments(call: ToolCall): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(call.arguments === "" ? "{}" : call.arguments);
  } catch (err) {
    throw new ToolArgumentsError(call.name, "arguments are not valid JSON", { cause: err });
  }

  if (!isRecord(parsed)) {
    throw new ToolArgumentsError(call.name, "arguments must be a JSON object");
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
