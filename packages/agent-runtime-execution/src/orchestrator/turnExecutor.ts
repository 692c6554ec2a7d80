/**
 * Turn Executor
 *
 * Runs the model step of a turn: builds the request from the session
 * context, streams the reply and folds it into text, tool calls and usage.
 *
 * @module orchestrator/turnExecutor
 */

import {
  CancelledError,
  type Goal,
  type LoopConfig,
  type Message,
  type ModelClient,
  type ModelRequest,
  type ToolDescriptor,
  type ToolRegistry,
} from "@warden/agent-runtime-core";

import { getLogger } from "@warden/agent-runtime-telemetry/logging";

import { pruneContext } from "./contextWindow";
import { type AccumulatedStep, StreamAccumulator } from "./streamAccumulator";

const logger = getLogger("turn-executor");

// ============================================================================
// Types
// ============================================================================

export interface TurnExecutorConfig {
  model: ModelClient;
  registry: ToolRegistry;
  loop: Pick<LoopConfig, "reasoningEffort" | "maxTokens" | "systemPrompt" | "context">;
}

// ============================================================================
// Prompt
// ============================================================================

export const DEFAULT_SYSTEM_PROMPT =
  "You are an autonomous agent. Use the available tools to complete the task. " +
  "Every tool call is checked against a security policy and may be denied or held for approval. " +
  "When the task is complete, reply with your final answer and no tool calls.";

export function buildSystemPrompt(base: string, goal?: Goal): string {
  if (!goal) {
    return base;
  }

  const lines = [base, "", `Goal: ${goal.description}`];
  if (goal.criteria.length > 0) {
    lines.push("", "Success criteria:");
    for (const criterion of goal.criteria) {
      switch (criterion.kind) {
        case "output_contains":
          lines.push(`- The answer contains "${criterion.pattern}"`);
          break;
        case "output_equals":
          lines.push(`- The answer is exactly "${criterion.expected}"`);
          break;
        case "custom":
          lines.push(`- ${criterion.description ?? criterion.name}`);
          break;
        case "llm_judge":
          lines.push(`- ${criterion.prompt}`);
          break;
      }
    }
  }
  if (goal.constraints.length > 0) {
    lines.push("", "Constraints:");
    for (const constraint of goal.constraints) {
      const limit = constraint.limit === undefined ? "" : ` (limit ${constraint.limit})`;
      lines.push(`- [${constraint.kind}] ${constraint.description}${limit}`);
    }
  }
  return lines.join("\n");
}

// ============================================================================
// Turn Executor
// ============================================================================

export class TurnExecutor {
  private readonly model: ModelClient;
  private readonly registry: ToolRegistry;
  private readonly loop: TurnExecutorConfig["loop"];

  constructor(config: TurnExecutorConfig) {
    this.model = config.model;
    this.registry = config.registry;
    this.loop = config.loop;
  }

  buildRequest(history: Message[], goal?: Goal): ModelRequest {
    const system: Message = {
      role: "system",
      content: buildSystemPrompt(this.loop.systemPrompt ?? DEFAULT_SYSTEM_PROMPT, goal),
    };
    const context = pruneContext(history, this.loop.context);
    if (context.removed > 0) {
      logger.info("Pruned messages to fit context budget", {
        removed: context.removed,
        budgetTokens: this.loop.context.budgetTokens,
      });
    }
    return {
      messages: [system, ...context.messages],
      tools: this.describeTools(),
      options: { reasoningEffort: this.loop.reasoningEffort, maxTokens: this.loop.maxTokens },
    };
  }

  /**
   * Stream one model reply. Rejects with CancelledError when `signal` aborts
   * mid-stream; other stream errors propagate for the caller to retry.
   */
  async execute(history: Message[], signal: AbortSignal, goal?: Goal): Promise<AccumulatedStep> {
    const request = this.buildRequest(history, goal);
    const accumulator = new StreamAccumulator();

    for await (const delta of this.model.stream(request, signal)) {
      if (signal.aborted) {
        break;
      }
      accumulator.push(delta);
    }

    const step = accumulator.result();
    if (signal.aborted || step.stopReason === "cancelled") {
      throw new CancelledError("model step cancelled");
    }
    return step;
  }

  private describeTools(): ToolDescriptor[] {
    return this.registry.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      tier: tool.tier,
    }));
  }
}

export function createTurnExecutor(config: TurnExecutorConfig): TurnExecutor {
  return new TurnExecutor(config);
}
