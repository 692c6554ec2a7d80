/**
 * Security Gate
 *
 * The single interception point between a proposed tool call and its
 * execution. Every call gets exactly one decision:
 *
 * 0. A call reusing an id already seen in its batch: T4, denied.
 * 1. Base tier from the registry (unknown tools are T4 and denied).
 * 2. Per-tool overrides from the policy.
 * 3. Arguments that did not parse or fail the tool schema: T4, denied.
 * 4. Dangerous-pattern scan over every string argument: T4.
 * 5. Sub-agents run under the parent policy narrowed by the overlay.
 * 6. Thresholds: allow up to `autoApproveUpTo`, deny above `denyAbove`,
 *    approval in between. Deny wins when the two overlap.
 *
 * Fails closed: anything the gate cannot establish trust for is denied.
 */

import {
  compareTiers,
  type DangerousPatternDefinition,
  type DecisionLog,
  type DecisionOutcome,
  maxTier,
  type SecurityDecision,
  type SecurityPolicy,
  type SecurityTier,
  type SubAgentOverlay,
  type ToolCall,
  type ToolRegistry,
  toDecisionLogEntry,
} from "@warden/agent-runtime-core";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";

import {
  compileDangerousPatterns,
  DEFAULT_DANGEROUS_PATTERNS,
  type DangerousPattern,
  findDangerousPattern,
} from "./dangerousPatterns";
import { overlayPolicy, resolveToolTier } from "./policyOverlay";

const logger = getLogger("security-gate");

export interface SecurityGateConfig {
  registry: ToolRegistry;
  /** Restrictions applied on top of the policy for sub-agent calls */
  subAgentOverlay?: SubAgentOverlay;
  decisionLog?: DecisionLog;
  now?: () => number;
}

export interface DecisionContext {
  isSubAgent: boolean;
  /** Recorded with the decision in the audit log */
  sessionId?: string;
  /** An earlier call in the same batch carried this call's id */
  duplicateId?: boolean;
}

export interface GateEvaluation {
  decision: SecurityDecision;
  /** Schema-validated arguments, present unless the call was rejected for its arguments */
  args?: unknown;
}

const EMPTY_OVERLAY: SubAgentOverlay = { toolOverrides: {}, dangerousPatterns: [] };

export class SecurityGate {
  private readonly registry: ToolRegistry;
  private readonly subAgentOverlay: SubAgentOverlay;
  private readonly decisionLog?: DecisionLog;
  private readonly now: () => number;
  private readonly compiledPatterns = new WeakMap<
    readonly DangerousPatternDefinition[],
    DangerousPattern[]
  >();
  private readonly overlaidPolicies = new WeakMap<SecurityPolicy, SecurityPolicy>();
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(config: SecurityGateConfig) {
    this.registry = config.registry;
    this.subAgentOverlay = config.subAgentOverlay ?? EMPTY_OVERLAY;
    this.decisionLog = config.decisionLog;
    this.now = config.now ?? Date.now;
  }

  decide(call: ToolCall, policy: SecurityPolicy, context: DecisionContext): SecurityDecision {
    return this.evaluate(call, policy, context).decision;
  }

  evaluate(call: ToolCall, policy: SecurityPolicy, context: DecisionContext): GateEvaluation {
    const evaluation = this.classify(call, policy, context);
    this.record(evaluation.decision, context);
    return evaluation;
  }

  private classify(
    call: ToolCall,
    parentPolicy: SecurityPolicy,
    context: DecisionContext
  ): GateEvaluation {
    const tool = this.registry.get(call.name);
    if (context.duplicateId) {
      const baseTier = tool?.tier ?? "T4";
      return {
        decision: this.build(
          call,
          context,
          "deny",
          baseTier,
          "T4",
          `duplicate call id "${call.id}"`
        ),
      };
    }
    if (!tool) {
      return {
        decision: this.build(call, context, "deny", "T4", "T4", `unknown tool "${call.name}"`),
      };
    }

    const policy = this.effectivePolicy(parentPolicy, context.isSubAgent);

    let tier = resolveToolTier(call.name, tool.tier, policy);
    if (context.isSubAgent) {
      // An overlay override may not take a tool below where the parent runs it
      tier = maxTier(tier, resolveToolTier(call.name, tool.tier, parentPolicy));
    }

    if (call.arguments === undefined) {
      return {
        decision: this.build(call, context, "deny", tool.tier, "T4", "arguments are not valid JSON"),
      };
    }

    const parsed = tool.schema.safeParse(call.arguments);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      return {
        decision: this.build(
          call,
          context,
          "deny",
          tool.tier,
          "T4",
          `arguments failed schema validation (${issues})`
        ),
      };
    }

    const match = findDangerousPattern(call.arguments, this.patternsFor(policy));
    if (match) {
      tier = "T4";
    }

    const outcome = applyThresholds(tier, policy);
    const reason = [
      match ? `matched dangerous pattern "${match.label}"` : undefined,
      describeOutcome(outcome, tier, policy),
    ]
      .filter((part): part is string => part !== undefined)
      .join("; ");

    return {
      decision: this.build(call, context, outcome, tool.tier, tier, reason, match?.label),
      args: parsed.data,
    };
  }

  /**
   * Resolves once every decision-log write issued so far has settled.
   * Failed writes are logged, so this never rejects.
   */
  async flush(): Promise<void> {
    await Promise.all(this.pendingWrites);
  }

  /** The policy calls are judged under: the parent's, narrowed for sub-agents. */
  effectivePolicy(parent: SecurityPolicy, isSubAgent: boolean): SecurityPolicy {
    if (!isSubAgent) {
      return parent;
    }
    let policy = this.overlaidPolicies.get(parent);
    if (!policy) {
      policy = overlayPolicy(parent, this.subAgentOverlay);
      this.overlaidPolicies.set(parent, policy);
    }
    return policy;
  }

  private patternsFor(policy: SecurityPolicy): DangerousPattern[] {
    const definitions = policy.dangerousPatterns ?? DEFAULT_DANGEROUS_PATTERNS;
    let compiled = this.compiledPatterns.get(definitions);
    if (!compiled) {
      compiled = compileDangerousPatterns(definitions);
      this.compiledPatterns.set(definitions, compiled);
    }
    return compiled;
  }

  private build(
    call: ToolCall,
    context: DecisionContext,
    outcome: DecisionOutcome,
    baseTier: SecurityTier,
    effectiveTier: SecurityTier,
    reason: string,
    matchedPattern?: string
  ): SecurityDecision {
    return {
      callId: call.id,
      toolName: call.name,
      outcome,
      baseTier,
      effectiveTier,
      matchedPattern,
      reason,
      isSubAgent: context.isSubAgent,
      decidedAt: this.now(),
    };
  }

  private record(decision: SecurityDecision, context: DecisionContext): void {
    logger.debug("Tool call decided", {
      callId: decision.callId,
      tool: decision.toolName,
      outcome: decision.outcome,
      baseTier: decision.baseTier,
      effectiveTier: decision.effectiveTier,
      matchedPattern: decision.matchedPattern,
    });

    if (!this.decisionLog) {
      return;
    }
    const log = this.decisionLog;
    const entry = toDecisionLogEntry(context.sessionId ?? "", decision);
    const write: Promise<void> = Promise.resolve()
      .then(() => log.record(entry))
      .catch((error: unknown) => {
        logger.warn("Decision log write failed", {
          callId: decision.callId,
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });
    this.pendingWrites.add(write);
  }
}

export function applyThresholds(tier: SecurityTier, policy: SecurityPolicy): DecisionOutcome {
  if (compareTiers(tier, policy.denyAbove) > 0) {
    return "deny";
  }
  if (compareTiers(tier, policy.autoApproveUpTo) <= 0) {
    return "allow";
  }
  return "needs_approval";
}

function describeOutcome(
  outcome: DecisionOutcome,
  tier: SecurityTier,
  policy: SecurityPolicy
): string {
  switch (outcome) {
    case "allow":
      return `tier ${tier} is auto-approved (up to ${policy.autoApproveUpTo})`;
    case "deny":
      return `tier ${tier} exceeds deny threshold ${policy.denyAbove}`;
    case "needs_approval":
      return `tier ${tier} requires approval`;
  }
}
