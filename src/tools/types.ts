// ============================================
// Tool System — Type Definitions
// ============================================

/** A single property in a tool's parameter schema. */
export interface ToolParameter {
  type: "string" | "number" | "boolean";
  description: string;
}

/** JSON Schema definition sent to the LLM so it knows how to call a tool. */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, ToolParameter>;
    required: string[];
    additionalProperties: false;
  };
}

/** A tool call request from the LLM. `arguments` is the raw JSON text the model produced. */
export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

/** Result returned to the LLM after executing a tool. */
export interface ToolResult {
  toolCallId: string;
  content: string;
}

/** Interface that each tool must implement. */
export interface Tool {
  definition: ToolDefinition;
  /** `input` is the parsed JSON object; the tool validates it against its own schema. */
  execute(input: Record<string, unknown>): Promise<Record<string, unknown>>;
}
