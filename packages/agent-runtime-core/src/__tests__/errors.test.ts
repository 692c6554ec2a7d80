import { describe, expect, it } from "vitest";

import {
  AgentRuntimeError,
  CorruptCheckpointError,
  errorCode,
  isTransientError,
  SchemaError,
  ToolTimeoutError,
  TransientInfraError,
} from "../errors";

describe("error taxonomy", () => {
  it("should expose codes and retryability", () => {
    const schema = new SchemaError("bad args", ["command: Required"]);

    expect(schema).toBeInstanceOf(AgentRuntimeError);
    expect(schema.code).toBe("SCHEMA_ERROR");
    expect(schema.retryable).toBe(false);
    expect(new TransientInfraError("reset").retryable).toBe(true);
    expect(new ToolTimeoutError("shell", 500).message).toBe('Tool "shell" timed out after 500ms');
  });

  it("should keep the cause", () => {
    const cause = new SyntaxError("Unexpected token");
    const error = new CorruptCheckpointError("s-1", "unreadable", { cause });

    expect(error.cause).toBe(cause);
    expect(error.sessionId).toBe("s-1");
  });

  it("should map unknown errors to a tool execution code", () => {
    expect(errorCode(new Error("boom"))).toBe("TOOL_EXECUTION_ERROR");
    expect(errorCode(new SchemaError("x"))).toBe("SCHEMA_ERROR");
  });
});

describe("isTransientError", () => {
  it("should classify network and rate-limit failures", () => {
    expect(isTransientError(new Error("ECONNRESET while reading"))).toBe(true);
    expect(isTransientError(new Error("Rate limit exceeded"))).toBe(true);
    expect(isTransientError(new Error("upstream returned 503"))).toBe(true);
  });

  it("should classify status codes", () => {
    expect(isTransientError({ status: 429 })).toBe(true);
    expect(isTransientError({ statusCode: 500 })).toBe(false);
  });

  it("should not retry runtime errors marked permanent", () => {
    expect(isTransientError(new SchemaError("timeout in schema"))).toBe(false);
    expect(isTransientError(new Error("file not found"))).toBe(false);
  });
});
