// ============================================
// Error kinds
// ============================================

/** Base class for every failure that aborts a turn or startup. */
export class ProfileAgentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Tool arguments that are not JSON, not an object, or fail the tool's schema. */
export class ToolArgumentsError extends ProfileAgentError {
  constructor(
    readonly toolName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Invalid arguments for tool "${toolName}": ${message}`, options);
  }
}

/** The provider could not be reached, timed out, was aborted or answered non-2xx. */
export class LLMRequestError extends ProfileAgentError {
  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The provider answered, but the body does not have the expected shape. */
export class LLMResponseError extends ProfileAgentError {
  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The evaluator returned a payload that is not a valid Evaluation. */
export class EvaluationSchemaError extends ProfileAgentError {
  constructor(
    message: string,
    readonly payload: unknown,
  ) {
    super(message);
  }
}

/** The summary or profile document could not be loaded. */
export class ContextLoadError extends ProfileAgentError {
  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to load ${filePath}: ${message}`, options);
  }
}

/** Short description of an unknown thrown value, for log lines. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
