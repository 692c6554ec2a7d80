import { describe, expect, it } from "vitest";

import { parseGoal, parseRuntimeConfig, resolveRuntimeConfig } from "../config";
import { ConfigError } from "../errors";

describe("parseRuntimeConfig", () => {
  it("should apply defaults", () => {
    const config = parseRuntimeConfig({});

    expect(config.security.policy).toEqual({
      autoApproveUpTo: "T1",
      denyAbove: "T3",
      approvalTimeoutSecs: 60,
      toolOverrides: {},
    });
    expect(config.security.subAgentOverlay).toEqual({
      autoApproveUpTo: "T0",
      toolOverrides: {},
      dangerousPatterns: [],
    });
    expect(config.guardian).toEqual({
      enabled: true,
      stallTimeoutSecs: 120,
      doomLoopThreshold: 3,
      windowSize: 10,
      budgetTokens: 0,
      budgetWarnPct: 80,
    });
    expect(config.loop.maxTurns).toBe(25);
    expect(config.loop.maxDurationSecs).toBe(600);
    expect(config.loop.retry).toEqual({ maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 30_000 });
    expect(config.judge.confidenceFloor).toBe(0.5);
  });

  it("should accept lowercase tiers and overrides", () => {
    const config = parseRuntimeConfig({
      security: { policy: { autoApproveUpTo: "t0", toolOverrides: { shell: "t4" } } },
    });

    expect(config.security.policy.autoApproveUpTo).toBe("T0");
    expect(config.security.policy.toolOverrides).toEqual({ shell: "T4" });
  });

  it("should reject unknown keys with a ConfigError listing the path", () => {
    let caught: unknown;
    try {
      parseRuntimeConfig({ loop: { maxTurnz: 3 } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toEqual(
      expect.objectContaining({ code: "CONFIG_ERROR", issues: [expect.stringContaining("loop")] })
    );
  });

  it("should reject invalid tiers", () => {
    expect(() => parseRuntimeConfig({ security: { policy: { denyAbove: "T9" } } })).toThrow(
      ConfigError
    );
  });
});

describe("resolveRuntimeConfig", () => {
  it("should layer numeric environment overrides", () => {
    const config = resolveRuntimeConfig(
      { loop: { maxTurns: 10 } },
      {
        AGENT_MAX_TURNS: "5",
        AGENT_MAX_DURATION_SECS: "30",
        AGENT_APPROVAL_TIMEOUT_SECS: "15",
        AGENT_BUDGET_TOKENS: "5000",
      }
    );

    expect(config.loop.maxTurns).toBe(5);
    expect(config.loop.maxDurationSecs).toBe(30);
    expect(config.security.policy.approvalTimeoutSecs).toBe(15);
    expect(config.guardian.budgetTokens).toBe(5000);
  });

  it("should ignore empty variables", () => {
    const config = resolveRuntimeConfig({ loop: { maxTurns: 10 } }, { AGENT_MAX_TURNS: "" });

    expect(config.loop.maxTurns).toBe(10);
  });

  it("should reject non-numeric and out-of-range overrides", () => {
    expect(() => resolveRuntimeConfig({}, { AGENT_MAX_TURNS: "many" })).toThrow(ConfigError);
    expect(() => resolveRuntimeConfig({}, { AGENT_MAX_TURNS: "0" })).toThrow(ConfigError);
  });
});

describe("parseGoal", () => {
  it("should default weights, case sensitivity and threshold", () => {
    const goal = parseGoal({
      description: "finish the report",
      criteria: [{ id: "c1", kind: "output_contains", pattern: "done" }],
    });

    expect(goal).toEqual({
      description: "finish the report",
      criteria: [
        { id: "c1", kind: "output_contains", pattern: "done", weight: 1, caseSensitive: false },
      ],
      constraints: [],
      acceptanceThreshold: 0.9,
    });
  });

  it("should reject unknown criterion kinds", () => {
    expect(() =>
      parseGoal({ description: "x", criteria: [{ id: "c1", kind: "regex", pattern: "a" }] })
    ).toThrow(ConfigError);
  });
});
