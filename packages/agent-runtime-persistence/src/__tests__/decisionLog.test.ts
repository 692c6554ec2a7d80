import type { DecisionLog, DecisionLogEntry } from "@warden/agent-runtime-core";
import Database from "better-sqlite3";
import { describe, expect, it } from "vitest";

import { InMemoryDecisionLog, SQLiteDecisionLog } from "../decisions/decisionLog";

function entry(overrides: Partial<DecisionLogEntry>): DecisionLogEntry {
  return {
    sessionId: "s-1",
    callId: "call-1",
    toolName: "shell",
    outcome: "deny",
    baseTier: "T3",
    effectiveTier: "T4",
    matchedPattern: "recursive delete",
    reason: "matched dangerous pattern: recursive delete",
    isSubAgent: false,
    timestamp: 1,
    ...overrides,
  };
}

const implementations: Array<[string, () => DecisionLog]> = [
  ["InMemoryDecisionLog", () => new InMemoryDecisionLog()],
  ["SQLiteDecisionLog", () => new SQLiteDecisionLog({ database: new Database(":memory:") })],
];

describe.each(implementations)("%s", (_name, createLog) => {
  it("should return entries in recording order", async () => {
    const log = createLog();
    await log.record(entry({ callId: "call-1", timestamp: 1 }));
    await log.record(
      entry({
        callId: "call-2",
        outcome: "allow",
        baseTier: "T0",
        effectiveTier: "T0",
        matchedPattern: undefined,
        reason: "tier T0 is auto-approved",
        timestamp: 2,
      })
    );

    const entries = await log.list();

    expect(entries.map((e) => e.callId)).toEqual(["call-1", "call-2"]);
    expect(entries[0]).toEqual(entry({ callId: "call-1", timestamp: 1 }));
    expect(entries[1].matchedPattern).toBeUndefined();
  });

  it("should filter by session, tool and outcome", async () => {
    const log = createLog();
    await log.record(entry({ sessionId: "s-1", callId: "a" }));
    await log.record(entry({ sessionId: "s-2", callId: "b" }));
    await log.record(entry({ sessionId: "s-2", callId: "c", toolName: "file_read" }));
    await log.record(entry({ sessionId: "s-2", callId: "d", outcome: "needs_approval" }));

    expect((await log.list({ sessionId: "s-2" })).map((e) => e.callId)).toEqual(["b", "c", "d"]);
    expect((await log.list({ toolName: "file_read" })).map((e) => e.callId)).toEqual(["c"]);
    expect((await log.list({ outcome: "needs_approval" })).map((e) => e.callId)).toEqual(["d"]);
  });

  it("should keep the most recent entries under a limit", async () => {
    const log = createLog();
    for (const callId of ["a", "b", "c"]) {
      await log.record(entry({ callId }));
    }

    expect((await log.list({ limit: 2 })).map((e) => e.callId)).toEqual(["b", "c"]);
  });

  it("should record sub-agent decisions", async () => {
    const log = createLog();
    await log.record(entry({ isSubAgent: true }));

    expect((await log.list())[0].isSubAgent).toBe(true);
  });
});
