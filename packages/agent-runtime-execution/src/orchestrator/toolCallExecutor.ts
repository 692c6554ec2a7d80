/**
 * Tool Call Executor
 *
 * Takes one turn's tool calls from proposal to result:
 * gate -> schedule -> (approval) -> invoke with timeout and retries.
 *
 * Every call yields exactly one ToolResult. A failure in one call never
 * cancels its siblings; only calls that declared it in `dependsOn` are
 * skipped.
 */

import type { ApprovalBroker, EventBus } from "@warden/agent-runtime-control";
import {
  CancelledError,
  errorCode,
  errorMessage,
  type LoopConfig,
  type SecurityDecision,
  type SecurityPolicy,
  type ToolCall,
  type ToolCapability,
  type ToolRegistry,
  type ToolResult,
  ToolTimeoutError,
} from "@warden/agent-runtime-core";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";

import { summarizeToolCall } from "../security/approvalSummary";
import type { GateEvaluation, SecurityGate } from "../security/securityGate";
import { naturalCompare } from "../utils/naturalCompare";
import { retry } from "../utils/retry";
import { DependencyAnalyzer } from "./dependencyAnalyzer";

const logger = getLogger("tool-executor");

export const TRUNCATION_MARKER = "\n[truncated]";

export interface ToolCallExecutorConfig {
  registry: ToolRegistry;
  gate: SecurityGate;
  approvals: ApprovalBroker;
  eventBus: EventBus;
  loop: Pick<
    LoopConfig,
    "defaultToolTimeoutSecs" | "maxToolOutputChars" | "parallelTools" | "retry"
  >;
  now?: () => number;
}

export interface ToolBatchContext {
  sessionId: string;
  isSubAgent: boolean;
  policy: SecurityPolicy;
  signal: AbortSignal;
}

export interface ToolBatchOutcome {
  /** One per call, in proposal order */
  decisions: SecurityDecision[];
  /** One per call, in natural call-id order */
  results: ToolResult[];
}

/**
 * Cut output to `maxChars`, at the last line break when there is one, and
 * mark the cut.
 */
export function compactToolOutput(output: string, maxChars: number): string {
  if (output.length <= maxChars) {
    return output;
  }
  const head = output.slice(0, maxChars);
  const lastNewline = head.lastIndexOf("\n");
  const cut = lastNewline > 0 ? head.slice(0, lastNewline) : head;
  return `${cut}${TRUNCATION_MARKER}`;
}

export class ToolCallExecutor {
  private readonly registry: ToolRegistry;
  private readonly gate: SecurityGate;
  private readonly approvals: ApprovalBroker;
  private readonly eventBus: EventBus;
  private readonly loop: ToolCallExecutorConfig["loop"];
  private readonly now: () => number;
  private readonly analyzer: DependencyAnalyzer;

  constructor(config: ToolCallExecutorConfig) {
    this.registry = config.registry;
    this.gate = config.gate;
    this.approvals = config.approvals;
    this.eventBus = config.eventBus;
    this.loop = config.loop;
    this.now = config.now ?? Date.now;
    this.analyzer = new DependencyAnalyzer(
      (toolName) => this.registry.get(toolName)?.concurrency
    );
  }

  async executeBatch(calls: ToolCall[], context: ToolBatchContext): Promise<ToolBatchOutcome> {
    const evaluations = new Map<string, GateEvaluation>();
    const decisions: SecurityDecision[] = [];
    // Calls reusing an id are denied by the gate and never scheduled
    const scheduled: ToolCall[] = [];
    const rejected: Array<{ call: ToolCall; decision: SecurityDecision }> = [];

    for (const call of calls) {
      const duplicateId = evaluations.has(call.id);
      const evaluation = this.gate.evaluate(call, context.policy, {
        isSubAgent: context.isSubAgent,
        sessionId: context.sessionId,
        duplicateId,
      });
      if (duplicateId) {
        rejected.push({ call, decision: evaluation.decision });
      } else {
        evaluations.set(call.id, evaluation);
        scheduled.push(call);
      }
      decisions.push(evaluation.decision);
      this.eventBus.emit(
        "tool:decided",
        { sessionId: context.sessionId, call, decision: evaluation.decision },
        { source: "security-gate" }
      );
    }

    // Audit entries are durable before anything runs
    await this.gate.flush();

    const analysis = this.analyzer.analyze(scheduled, { serial: !this.loop.parallelTools });
    if (analysis.cycles.length > 0) {
      logger.warn("Tool call dependency cycle", {
        sessionId: context.sessionId,
        cycles: analysis.cycles,
      });
    }

    const results = new Map<string, ToolResult>();
    for (const group of analysis.groups) {
      const settled = await Promise.all(
        group.map(async (call) => {
          const evaluation = evaluations.get(call.id);
          const prerequisites = analysis.prerequisites.get(call.id) ?? [];
          const result = evaluation
            ? await this.runCall(call, evaluation, prerequisites, results, context)
            : this.errorResult(call, "TOOL_EXECUTION_ERROR", "call was never decided", 0);
          this.complete(call, result, context);
          return result;
        })
      );
      for (const result of settled) {
        results.set(result.callId, result);
      }
    }

    const denied = rejected.map(({ call, decision }) => {
      const result = this.policyViolation(call, decision.reason);
      this.complete(call, result, context);
      return result;
    });

    return {
      decisions,
      // Stable sort keeps a reused id's results in proposal order
      results: [...results.values(), ...denied].sort((a, b) =>
        naturalCompare(a.callId, b.callId)
      ),
    };
  }

  private complete(call: ToolCall, result: ToolResult, context: ToolBatchContext): void {
    this.eventBus.emit(
      "tool:completed",
      { sessionId: context.sessionId, call, result },
      { source: "tool-executor" }
    );
  }

  private async runCall(
    call: ToolCall,
    evaluation: GateEvaluation,
    prerequisites: string[],
    completed: Map<string, ToolResult>,
    context: ToolBatchContext
  ): Promise<ToolResult> {
    const unmet = prerequisites.find((id) => completed.get(id)?.status !== "success");
    if (unmet !== undefined) {
      return this.errorResult(
        call,
        "DEPENDENCY_FAILED",
        `prerequisite call "${unmet}" did not succeed`,
        0
      );
    }

    const { decision } = evaluation;
    if (decision.outcome === "deny") {
      return this.policyViolation(call, decision.reason);
    }

    if (decision.outcome === "needs_approval") {
      const policy = this.gate.effectivePolicy(context.policy, context.isSubAgent);
      const outcome = await this.approvals.request(call, decision, {
        sessionId: context.sessionId,
        timeoutMs: policy.approvalTimeoutSecs * 1000,
        summary: summarizeToolCall(call),
        signal: context.signal,
      });
      if (outcome.status !== "approved") {
        const detail = outcome.reason ? `: ${outcome.reason}` : "";
        return this.policyViolation(call, `approval ${outcome.status}${detail}`);
      }
    }

    const tool = this.registry.get(call.name);
    if (!tool) {
      // Unregistered between decision and execution
      return this.policyViolation(call, `unknown tool "${call.name}"`);
    }

    return this.invoke(tool, evaluation.args, call, context);
  }

  private async invoke(
    tool: ToolCapability,
    args: unknown,
    call: ToolCall,
    context: ToolBatchContext
  ): Promise<ToolResult> {
    const startedAt = this.now();
    const timeoutMs = tool.timeoutMs ?? this.loop.defaultToolTimeoutSecs * 1000;

    const outcome = await retry(
      (attempt) => {
        this.eventBus.emit(
          "tool:started",
          { sessionId: context.sessionId, call, attempt },
          { source: "tool-executor" }
        );
        return this.invokeOnce(tool, args, call, context, timeoutMs);
      },
      {
        maxAttempts: tool.maxAttempts ?? 1,
        initialDelayMs: this.loop.retry.initialDelayMs,
        maxDelayMs: this.loop.retry.maxDelayMs,
        signal: context.signal,
        onRetry: (attempt, error, nextDelayMs) => {
          logger.info("Retrying tool call", {
            callId: call.id,
            tool: tool.name,
            attempt,
            delayMs: Math.round(nextDelayMs),
            error: errorMessage(error),
          });
        },
      }
    );

    const durationMs = this.now() - startedAt;
    if (outcome.success) {
      return {
        callId: call.id,
        toolName: call.name,
        status: "success",
        output: compactToolOutput(outcome.result, this.loop.maxToolOutputChars),
        attempts: outcome.attempts,
        durationMs,
      };
    }

    logger.warn("Tool call failed", {
      callId: call.id,
      tool: tool.name,
      attempts: outcome.attempts,
      error: errorMessage(outcome.error),
    });
    return {
      ...this.errorResult(
        call,
        errorCode(outcome.error),
        errorMessage(outcome.error),
        outcome.attempts
      ),
      durationMs,
    };
  }

  /**
   * One attempt. The tool's own signal fires on timeout or run cancellation
   * so whatever it spawned can be killed.
   */
  private invokeOnce(
    tool: ToolCapability,
    args: unknown,
    call: ToolCall,
    context: ToolBatchContext,
    timeoutMs: number
  ): Promise<string> {
    if (context.signal.aborted) {
      return Promise.reject(new CancelledError("run cancelled"));
    }

    const controller = new AbortController();

    return new Promise<string>((resolve, reject) => {
      let settled = false;
      const finish = (action: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        context.signal.removeEventListener("abort", onAbort);
        action();
      };

      const onAbort = () => {
        controller.abort();
        finish(() => reject(new CancelledError("run cancelled")));
      };
      const timer = setTimeout(() => {
        controller.abort();
        finish(() => reject(new ToolTimeoutError(tool.name, timeoutMs)));
      }, timeoutMs);

      context.signal.addEventListener("abort", onAbort, { once: true });

      Promise.resolve()
        .then(() =>
          tool.invoke(args, {
            sessionId: context.sessionId,
            callId: call.id,
            signal: controller.signal,
            isSubAgent: context.isSubAgent,
          })
        )
        .then(
          (output) => finish(() => resolve(output)),
          (error: unknown) => finish(() => reject(error))
        );
    });
  }

  private policyViolation(call: ToolCall, message: string): ToolResult {
    return {
      callId: call.id,
      toolName: call.name,
      status: "policy_violation",
      error: { code: "POLICY_VIOLATION", message },
      attempts: 0,
      durationMs: 0,
    };
  }

  private errorResult(call: ToolCall, code: string, message: string, attempts: number): ToolResult {
    return {
      callId: call.id,
      toolName: call.name,
      status: "error",
      error: { code, message },
      attempts,
      durationMs: 0,
    };
  }
}

export function createToolCallExecutor(config: ToolCallExecutorConfig): ToolCallExecutor {
  return new ToolCallExecutor(config);
}
