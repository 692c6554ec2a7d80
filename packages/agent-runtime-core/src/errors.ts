/**
 * Agent Runtime Errors
 *
 * Every failure the runtime surfaces carries a stable `code` and whether a
 * retry may succeed.
 */

export type AgentErrorCode =
  | "POLICY_VIOLATION"
  | "TOOL_EXECUTION_ERROR"
  | "TRANSIENT_INFRA_ERROR"
  | "SCHEMA_ERROR"
  | "CONSTRAINT_VIOLATION"
  | "CORRUPT_CHECKPOINT"
  | "CONFIG_ERROR"
  | "UNKNOWN_TOOL"
  | "TOOL_TIMEOUT"
  | "CANCELLED";

export interface AgentRuntimeErrorOptions {
  retryable?: boolean;
  cause?: unknown;
}

export class AgentRuntimeError extends Error {
  readonly code: AgentErrorCode;
  readonly retryable: boolean;

  constructor(code: AgentErrorCode, message: string, options: AgentRuntimeErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AgentRuntimeError";
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

/** A call was denied, or its approval was denied or timed out. */
export class PolicyViolationError extends AgentRuntimeError {
  constructor(message: string) {
    super("POLICY_VIOLATION", message);
    this.name = "PolicyViolationError";
  }
}

/** The tool ran but failed. */
export class ToolExecutionError extends AgentRuntimeError {
  readonly toolName: string;

  constructor(toolName: string, message: string, options: AgentRuntimeErrorOptions = {}) {
    super("TOOL_EXECUTION_ERROR", message, options);
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

export class ToolTimeoutError extends AgentRuntimeError {
  readonly toolName: string;
  readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super("TOOL_TIMEOUT", `Tool "${toolName}" timed out after ${timeoutMs}ms`, {
      retryable: true,
    });
    this.name = "ToolTimeoutError";
    this.toolName = toolName;
    this.timeoutMs = timeoutMs;
  }
}

/** Network-level failure of a model or tool call. */
export class TransientInfraError extends AgentRuntimeError {
  constructor(message: string, options: Omit<AgentRuntimeErrorOptions, "retryable"> = {}) {
    super("TRANSIENT_INFRA_ERROR", message, { ...options, retryable: true });
    this.name = "TransientInfraError";
  }
}

/** Arguments that could not be parsed or validated. Never retried. */
export class SchemaError extends AgentRuntimeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("SCHEMA_ERROR", message);
    this.name = "SchemaError";
    this.issues = issues;
  }
}

/** A hard time, cost or turn limit was exceeded. Fatal to the session. */
export class ConstraintViolationError extends AgentRuntimeError {
  constructor(message: string) {
    super("CONSTRAINT_VIOLATION", message);
    this.name = "ConstraintViolationError";
  }
}

/** Persisted session state could not be read back. Fatal to the session. */
export class CorruptCheckpointError extends AgentRuntimeError {
  readonly sessionId: string;

  constructor(sessionId: string, message: string, options: AgentRuntimeErrorOptions = {}) {
    super("CORRUPT_CHECKPOINT", message, options);
    this.name = "CorruptCheckpointError";
    this.sessionId = sessionId;
  }
}

export class ConfigError extends AgentRuntimeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIG_ERROR", message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class UnknownToolError extends AgentRuntimeError {
  readonly toolName: string;

  constructor(toolName: string) {
    super("UNKNOWN_TOOL", `Unknown tool "${toolName}"`);
    this.name = "UnknownToolError";
    this.toolName = toolName;
  }
}

export class CancelledError extends AgentRuntimeError {
  constructor(message = "Operation cancelled") {
    super("CANCELLED", message);
    this.name = "CancelledError";
  }
}

/**
 * Classifies failures that may succeed on retry: network errors, timeouts,
 * rate limits and 5xx-style server errors.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof AgentRuntimeError) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    // Network errors
    if (
      message.includes("network") ||
      message.includes("timeout") ||
      message.includes("timed out") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("socket hang up")
    ) {
      return true;
    }

    // Rate limiting
    if (message.includes("rate limit") || message.includes("too many requests")) {
      return true;
    }

    // Transient server errors
    if (message.includes("502") || message.includes("503") || message.includes("504")) {
      return true;
    }

    if (message.includes("overloaded")) {
      return true;
    }
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return status === 429 || status === 502 || status === 503 || status === 504;
  }

  return false;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  return typeof status === "number" ? status : undefined;
}

export function errorCode(error: unknown): string {
  return error instanceof AgentRuntimeError ? error.code : "TOOL_EXECUTION_ERROR";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
