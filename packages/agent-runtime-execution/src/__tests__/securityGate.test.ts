import type {
  DecisionLog,
  SecurityPolicy,
  SubAgentOverlay,
  ToolCall,
} from "@warden/agent-runtime-core";
import { InMemoryDecisionLog } from "@warden/agent-runtime-persistence";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";

import { applyThresholds, SecurityGate } from "../security/securityGate";
import { defineTool, InMemoryToolRegistry } from "../tools/toolRegistry";

function createRegistry(): InMemoryToolRegistry {
  return new InMemoryToolRegistry([
    defineTool({
      name: "shell",
      description: "Run a shell command",
      tier: "T3",
      schema: z.object({ command: z.string() }),
      invoke: async ({ command }) => `ran ${command}`,
    }),
    defineTool({
      name: "file_write",
      description: "Write a file",
      tier: "T2",
      schema: z.object({ path: z.string(), content: z.string() }),
      invoke: async ({ path }) => `wrote ${path}`,
    }),
    defineTool({
      name: "read_file",
      description: "Read a file",
      tier: "T0",
      schema: z.object({ path: z.string() }),
      invoke: async ({ path }) => `contents of ${path}`,
    }),
    defineTool({
      name: "web_search",
      description: "Search the web",
      tier: "T1",
      schema: z.object({ query: z.string() }),
      invoke: async ({ query }) => `results for ${query}`,
    }),
  ]);
}

const policy: SecurityPolicy = {
  autoApproveUpTo: "T1",
  denyAbove: "T3",
  approvalTimeoutSecs: 60,
  toolOverrides: {},
};

const parent = { isSubAgent: false };

function call(name: string, args: unknown, id = "call-1"): ToolCall {
  return { id, name, arguments: args, rawArguments: JSON.stringify(args) };
}

describe("SecurityGate", () => {
  it("should deny a recursive delete even though the tool sits below the deny threshold", () => {
    const gate = new SecurityGate({ registry: createRegistry(), now: () => 42 });

    const decision = gate.decide(call("shell", { command: "rm -rf /" }), policy, parent);

    expect(decision).toEqual({
      callId: "call-1",
      toolName: "shell",
      outcome: "deny",
      baseTier: "T3",
      effectiveTier: "T4",
      matchedPattern: "recursive delete",
      reason: 'matched dangerous pattern "recursive delete"; tier T4 exceeds deny threshold T3',
      isSubAgent: false,
      decidedAt: 42,
    });
  });

  it("should hold a T2 write for approval", () => {
    const gate = new SecurityGate({ registry: createRegistry() });
    const lenient = { ...policy, denyAbove: "T4" } satisfies SecurityPolicy;

    const decision = gate.decide(
      call("file_write", { path: "notes.md", content: "hello" }),
      lenient,
      parent
    );

    expect(decision.outcome).toBe("needs_approval");
    expect(decision.effectiveTier).toBe("T2");
    expect(decision.reason).toBe("tier T2 requires approval");
  });

  it("should auto-approve tiers up to the threshold", () => {
    const gate = new SecurityGate({ registry: createRegistry() });

    const decision = gate.decide(call("web_search", { query: "weather" }), policy, parent);

    expect(decision.outcome).toBe("allow");
    expect(decision.reason).toBe("tier T1 is auto-approved (up to T1)");
    expect(decision.matchedPattern).toBeUndefined();
  });

  it("should escalate a T0 tool to T4 when an argument matches a pattern", () => {
    const gate = new SecurityGate({ registry: createRegistry() });
    const lenient = { ...policy, denyAbove: "T4" } satisfies SecurityPolicy;

    const decision = gate.decide(
      call("read_file", { path: "notes.md && sudo reboot" }),
      lenient,
      parent
    );

    expect(decision.baseTier).toBe("T0");
    expect(decision.effectiveTier).toBe("T4");
    expect(decision.matchedPattern).toBe("privilege escalation");
    expect(decision.outcome).toBe("needs_approval");
  });

  it("should scan nested string arguments", () => {
    const tool = defineTool({
      name: "batch",
      description: "Run several commands",
      tier: "T1",
      schema: z.object({ steps: z.array(z.object({ run: z.string() })) }),
      invoke: async () => "ok",
    });
    const registry = createRegistry();
    registry.register(tool);
    const gate = new SecurityGate({ registry });

    const decision = gate.decide(
      call("batch", { steps: [{ run: "ls" }, { run: "git push origin main --force" }] }),
      policy,
      parent
    );

    expect(decision.matchedPattern).toBe("force push");
    expect(decision.outcome).toBe("deny");
  });

  it("should deny unknown tools at T4", () => {
    const gate = new SecurityGate({ registry: createRegistry() });

    const decision = gate.decide(call("teleport", {}), policy, parent);

    expect(decision.outcome).toBe("deny");
    expect(decision.baseTier).toBe("T4");
    expect(decision.effectiveTier).toBe("T4");
    expect(decision.reason).toBe('unknown tool "teleport"');
  });

  it("should deny arguments that are not valid JSON", () => {
    const gate = new SecurityGate({ registry: createRegistry() });
    const raw: ToolCall = { id: "call-1", name: "read_file", rawArguments: '{"path": ' };

    const decision = gate.decide(raw, policy, parent);

    expect(decision.outcome).toBe("deny");
    expect(decision.baseTier).toBe("T0");
    expect(decision.effectiveTier).toBe("T4");
    expect(decision.reason).toBe("arguments are not valid JSON");
  });

  it("should deny arguments that fail the tool schema", () => {
    const gate = new SecurityGate({ registry: createRegistry() });

    const evaluation = gate.evaluate(call("read_file", { path: 42 }), policy, parent);

    expect(evaluation.decision.outcome).toBe("deny");
    expect(evaluation.decision.reason).toBe(
      "arguments failed schema validation (path: Expected string, received number)"
    );
    expect(evaluation.args).toBeUndefined();
  });

  it("should hand back schema-parsed arguments", () => {
    const gate = new SecurityGate({ registry: createRegistry() });

    const evaluation = gate.evaluate(
      call("read_file", { path: "notes.md", extra: true }),
      policy,
      parent
    );

    expect(evaluation.args).toEqual({ path: "notes.md" });
  });

  it("should apply per-tool overrides before thresholds", () => {
    const gate = new SecurityGate({ registry: createRegistry() });
    const overridden: SecurityPolicy = { ...policy, toolOverrides: { web_search: "T3" } };

    const decision = gate.decide(call("web_search", { query: "weather" }), overridden, parent);

    expect(decision.baseTier).toBe("T1");
    expect(decision.effectiveTier).toBe("T3");
    expect(decision.outcome).toBe("needs_approval");
  });

  it("should use the policy's pattern list instead of the defaults", () => {
    const gate = new SecurityGate({ registry: createRegistry() });
    const custom: SecurityPolicy = {
      ...policy,
      dangerousPatterns: [{ label: "production host", pattern: "prod\\.internal" }],
    };

    const builtIn = gate.decide(call("shell", { command: "rm -rf /tmp/x" }), custom, parent);
    const configured = gate.decide(call("shell", { command: "ssh prod.internal" }), custom, parent);

    expect(builtIn.matchedPattern).toBeUndefined();
    expect(configured.matchedPattern).toBe("production host");
  });

  describe("sub-agents", () => {
    const overlay: SubAgentOverlay = {
      autoApproveUpTo: "T0",
      toolOverrides: { shell: "T0" },
      dangerousPatterns: [{ label: "secrets file", pattern: "\\.env\\b" }],
    };

    it("should narrow the auto-approve threshold", () => {
      const gate = new SecurityGate({ registry: createRegistry(), subAgentOverlay: overlay });

      const asParent = gate.decide(call("web_search", { query: "x" }), policy, parent);
      const asChild = gate.decide(call("web_search", { query: "x" }), policy, {
        isSubAgent: true,
      });

      expect(asParent.outcome).toBe("allow");
      expect(asChild.outcome).toBe("needs_approval");
      expect(asChild.isSubAgent).toBe(true);
    });

    it("should not let an overlay override lower a tool's tier", () => {
      const gate = new SecurityGate({ registry: createRegistry(), subAgentOverlay: overlay });

      const decision = gate.decide(call("shell", { command: "ls" }), policy, { isSubAgent: true });

      expect(decision.effectiveTier).toBe("T3");
      expect(decision.outcome).toBe("needs_approval");
    });

    it("should add overlay patterns to the parent's", () => {
      const gate = new SecurityGate({ registry: createRegistry(), subAgentOverlay: overlay });

      const asParent = gate.decide(call("read_file", { path: ".env" }), policy, parent);
      const asChild = gate.decide(call("read_file", { path: ".env" }), policy, {
        isSubAgent: true,
      });
      const defaultsKept = gate.decide(call("shell", { command: "rm -rf /" }), policy, {
        isSubAgent: true,
      });

      expect(asParent.outcome).toBe("allow");
      expect(asChild.matchedPattern).toBe("secrets file");
      expect(asChild.outcome).toBe("deny");
      expect(defaultsKept.matchedPattern).toBe("recursive delete");
    });

    it("should expose the narrowed policy", () => {
      const gate = new SecurityGate({
        registry: createRegistry(),
        subAgentOverlay: { ...overlay, approvalTimeoutSecs: 15 },
      });

      expect(gate.effectivePolicy(policy, false)).toBe(policy);
      expect(gate.effectivePolicy(policy, true).approvalTimeoutSecs).toBe(15);
    });
  });

  it("should record every decision in the decision log", async () => {
    const decisionLog = new InMemoryDecisionLog();
    const gate = new SecurityGate({ registry: createRegistry(), decisionLog, now: () => 7 });

    gate.decide(call("shell", { command: "rm -rf /" }), policy, {
      isSubAgent: false,
      sessionId: "s-1",
    });

    await vi.waitFor(async () => {
      expect(await decisionLog.list()).toHaveLength(1);
    });
    const [entry] = await decisionLog.list();
    expect(entry).toMatchObject({
      sessionId: "s-1",
      callId: "call-1",
      toolName: "shell",
      outcome: "deny",
      matchedPattern: "recursive delete",
      timestamp: 7,
    });
  });

  it("should settle pending decision log writes on flush", async () => {
    const recorded: string[] = [];
    const decisionLog: DecisionLog = {
      record: async (entry) => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        recorded.push(entry.callId);
      },
      list: async () => [],
    };
    const gate = new SecurityGate({ registry: createRegistry(), decisionLog });

    gate.decide(call("read_file", { path: "a.md" }), policy, parent);
    await gate.flush();

    expect(recorded).toEqual(["call-1"]);
  });

  it("should not reject flush when a decision log write fails", async () => {
    const decisionLog: DecisionLog = {
      record: async () => {
        throw new Error("disk full");
      },
      list: async () => [],
    };
    const gate = new SecurityGate({ registry: createRegistry(), decisionLog });

    gate.decide(call("read_file", { path: "a.md" }), policy, parent);

    await expect(gate.flush()).resolves.toBeUndefined();
  });

  it("should deny a call whose id was already used in its batch", () => {
    const gate = new SecurityGate({ registry: createRegistry() });

    const decision = gate.decide(call("read_file", { path: "a.md" }), policy, {
      isSubAgent: false,
      duplicateId: true,
    });

    expect(decision).toMatchObject({
      outcome: "deny",
      baseTier: "T0",
      effectiveTier: "T4",
      reason: 'duplicate call id "call-1"',
    });
  });
});

describe("applyThresholds", () => {
  it("should let deny win when the thresholds overlap", () => {
    const overlapping: SecurityPolicy = { ...policy, autoApproveUpTo: "T3", denyAbove: "T1" };

    expect(applyThresholds("T2", overlapping)).toBe("deny");
    expect(applyThresholds("T1", overlapping)).toBe("allow");
  });
});
