import type { ToolResult } from "@warden/agent-runtime-core";
import { describe, expect, it } from "vitest";

import { FailureTracker, reflexionHint } from "../orchestrator/failureTracker";
import { naturalCompare } from "../utils/naturalCompare";

function result(toolName: string, status: ToolResult["status"]): ToolResult {
  return { callId: `call_${toolName}`, toolName, status, attempts: 1, durationMs: 0 };
}

describe("FailureTracker", () => {
  it("should return a hint when a tool fails threshold times in a row", () => {
    const tracker = new FailureTracker(3);

    expect(tracker.record(result("web_search", "error"))).toBeUndefined();
    expect(tracker.record(result("web_search", "policy_violation"))).toBeUndefined();
    expect(tracker.record(result("web_search", "error"))).toBe(
      "The tool `web_search` has failed 3 times in a row. " +
        "Try a different approach or use a different tool to accomplish the task."
    );
    expect(tracker.failures("web_search")).toBe(0);
  });

  it("should reset the count on success", () => {
    const tracker = new FailureTracker(2);

    tracker.record(result("shell", "error"));
    tracker.record(result("shell", "success"));

    expect(tracker.failures("shell")).toBe(0);
    expect(tracker.record(result("shell", "error"))).toBeUndefined();
  });

  it("should count each tool separately", () => {
    const tracker = new FailureTracker(2);

    tracker.record(result("a", "error"));
    tracker.record(result("b", "error"));

    expect(tracker.failures("a")).toBe(1);
    expect(tracker.failures("b")).toBe(1);
    tracker.reset();
    expect(tracker.failures("a")).toBe(0);
  });

  it("should never hint with a zero threshold", () => {
    const tracker = new FailureTracker(0);

    for (let i = 0; i < 5; i++) {
      expect(tracker.record(result("a", "error"))).toBeUndefined();
    }
    expect(tracker.failures("a")).toBe(5);
  });

  it("should format the hint", () => {
    expect(reflexionHint("x", 4)).toContain("`x` has failed 4 times");
  });
});

describe("naturalCompare", () => {
  it("should order digit runs by value", () => {
    expect(["call_10", "call_2", "call_1"].sort(naturalCompare)).toEqual([
      "call_1",
      "call_2",
      "call_10",
    ]);
  });

  it("should compare text segments lexically", () => {
    expect(naturalCompare("a_1", "b_1")).toBe(-1);
    expect(naturalCompare("call_1", "call_1")).toBe(0);
    expect(naturalCompare("call", "call_1")).toBe(-1);
  });

  it("should stay antisymmetric for digit runs beyond safe integers", () => {
    const larger = "call_9007199254740993";
    const smaller = "call_9007199254740992";

    expect(naturalCompare(larger, smaller)).toBe(1);
    expect(naturalCompare(smaller, larger)).toBe(-1);
    expect(naturalCompare("call_00012", "call_9")).toBe(1);
  });

  it("should order equal values by digit run length", () => {
    expect(naturalCompare("call_01", "call_1")).toBe(1);
  });
});
