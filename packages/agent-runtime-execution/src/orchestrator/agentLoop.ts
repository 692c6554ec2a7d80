/**
 * Agent Loop
 *
 * Drives a session turn by turn until the goal is met, a limit is reached,
 * the judge escalates or the run is cancelled:
 *
 *   limits -> context (+ hints) -> model step (retried) -> tool calls
 *   -> turn appended -> checkpoint -> verdict
 *
 * Every tool call passes the security gate exactly once. The watchdog and
 * the approval broker talk to the loop only through the event bus.
 */

import { randomUUID } from "node:crypto";

import {
  type ApprovalBroker,
  createApprovalBroker,
  createEventBus,
  type EventBus,
} from "@warden/agent-runtime-control";
import {
  addUsage,
  CorruptCheckpointError,
  type DecisionLog,
  errorCode,
  errorMessage,
  type Goal,
  isTerminalStatus,
  type Message,
  type ModelClient,
  type RuntimeConfig,
  type SecurityDecision,
  type Session,
  type SessionStatus,
  type TokenUsage,
  type ToolRegistry,
  type ToolResult,
  type Turn,
  type TurnError,
  type Verdict,
} from "@warden/agent-runtime-core";
import type { CheckpointStore } from "@warden/agent-runtime-persistence";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";

import { GoalEvaluator } from "../goals/goalEvaluator";
import { LlmJudge } from "../goals/llmJudge";
import { GuardianWatchdog } from "../guardian/guardianWatchdog";
import { SecurityGate } from "../security/securityGate";
import { retry } from "../utils/retry";
import { FailureTracker } from "./failureTracker";
import type { AccumulatedStep } from "./streamAccumulator";
import { ToolCallExecutor } from "./toolCallExecutor";
import { TurnExecutor } from "./turnExecutor";

const logger = getLogger("agent-loop");

// ============================================================================
// Types
// ============================================================================

export interface AgentLoopConfig {
  model: ModelClient;
  registry: ToolRegistry;
  checkpoints: CheckpointStore;
  config: RuntimeConfig;
  eventBus?: EventBus;
  approvals?: ApprovalBroker;
  decisionLog?: DecisionLog;
  /** Defaults to an evaluator backed by an LLM judge on `model` */
  evaluator?: GoalEvaluator;
  now?: () => number;
  idFactory?: () => string;
}

export interface RunOptions {
  prompt: string;
  sessionId?: string;
  goal?: Goal;
  isSubAgent?: boolean;
  signal?: AbortSignal;
}

export interface ResumeOptions {
  /** Replaces the goal stored with the session */
  goal?: Goal;
  signal?: AbortSignal;
}

export interface RunResult {
  session: Session;
  status: Exclude<SessionStatus, "running">;
  reason?: string;
  output: string;
  lastVerdict?: Verdict;
}

type AbortCause = "external" | "deadline";

/** Per-run mutable state; nothing here outlives one call to run/resume. */
interface RunState {
  session: Session;
  goal?: Goal;
  controller: AbortController;
  abortCause?: AbortCause;
  /** Session run time accumulated before this run started */
  elapsedBefore: number;
  startedAt: number;
  pendingHints: string[];
  failures: FailureTracker;
  consecutiveTurnFailures: number;
}

type TurnStep =
  | { kind: "continue" }
  | { kind: "finish"; status: Exclude<SessionStatus, "running">; reason?: string };

// ============================================================================
// Agent Loop
// ============================================================================

export class AgentLoop {
  private readonly model: ModelClient;
  private readonly registry: ToolRegistry;
  private readonly checkpoints: CheckpointStore;
  private readonly config: RuntimeConfig;
  private readonly eventBus: EventBus;
  private readonly approvals: ApprovalBroker;
  private readonly gate: SecurityGate;
  private readonly evaluator: GoalEvaluator;
  private readonly turns: TurnExecutor;
  private readonly tools: ToolCallExecutor;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  constructor(options: AgentLoopConfig) {
    this.model = options.model;
    this.registry = options.registry;
    this.checkpoints = options.checkpoints;
    this.config = options.config;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
    this.eventBus = options.eventBus ?? createEventBus();
    this.approvals =
      options.approvals ?? createApprovalBroker({ eventBus: this.eventBus, now: this.now });
    this.gate = new SecurityGate({
      registry: this.registry,
      subAgentOverlay: this.config.security.subAgentOverlay,
      decisionLog: options.decisionLog,
      now: this.now,
    });
    this.evaluator =
      options.evaluator ??
      new GoalEvaluator({
        judge: new LlmJudge({ model: this.model, config: this.config.judge }),
        confidenceFloor: this.config.judge.confidenceFloor,
      });
    this.turns = new TurnExecutor({
      model: this.model,
      registry: this.registry,
      loop: this.config.loop,
    });
    this.tools = new ToolCallExecutor({
      registry: this.registry,
      gate: this.gate,
      approvals: this.approvals,
      eventBus: this.eventBus,
      loop: this.config.loop,
      now: this.now,
    });
  }

  get events(): EventBus {
    return this.eventBus;
  }

  get approvalBroker(): ApprovalBroker {
    return this.approvals;
  }

  async run(options: RunOptions): Promise<RunResult> {
    const now = this.now();
    const session: Session = {
      id: options.sessionId ?? this.idFactory(),
      status: "running",
      messages: [{ role: "user", content: options.prompt }],
      turns: [],
      goal: options.goal,
      isSubAgent: options.isSubAgent ?? false,
      createdAt: now,
      updatedAt: now,
      elapsedMs: 0,
      usage: { inputTokens: 0, outputTokens: 0 },
    };

    this.eventBus.emit(
      "run:started",
      {
        sessionId: session.id,
        resumed: false,
        isSubAgent: session.isSubAgent,
        prompt: options.prompt,
      },
      { source: "agent-loop" }
    );
    return this.drive(session, options.goal, options.signal);
  }

  async resume(sessionId: string, options: ResumeOptions = {}): Promise<RunResult> {
    let session: Session;
    try {
      const record = await this.checkpoints.load(sessionId);
      if (!record) {
        return this.abandon(sessionId, `no checkpoint found for session "${sessionId}"`);
      }
      session = record.session;
    } catch (error) {
      if (error instanceof CorruptCheckpointError) {
        logger.error("Checkpoint is corrupt", error);
        return this.abandon(sessionId, `corrupt checkpoint: ${error.message}`);
      }
      throw error;
    }

    if (isTerminalStatus(session.status)) {
      return this.toResult(session);
    }

    this.eventBus.emit(
      "run:started",
      { sessionId: session.id, resumed: true, isSubAgent: session.isSubAgent },
      { source: "agent-loop" }
    );
    const goal = options.goal ?? session.goal;
    session.goal = goal;
    return this.drive(session, goal, options.signal);
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  private async drive(
    session: Session,
    goal: Goal | undefined,
    signal?: AbortSignal
  ): Promise<RunResult> {
    const loop = this.config.loop;
    const state: RunState = {
      session,
      goal,
      controller: new AbortController(),
      elapsedBefore: session.elapsedMs,
      startedAt: this.now(),
      pendingHints: [],
      failures: new FailureTracker(loop.reflexionFailureThreshold),
      consecutiveTurnFailures: 0,
    };

    const abort = (cause: AbortCause) => {
      if (!state.controller.signal.aborted) {
        state.abortCause = cause;
        state.controller.abort();
      }
    };
    const onExternalAbort = () => abort("external");
    if (signal?.aborted) {
      abort("external");
    } else {
      signal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    const remainingMs = loop.maxDurationSecs * 1000 - session.elapsedMs;
    const deadline = setTimeout(() => abort("deadline"), Math.max(0, remainingMs));
    deadline.unref?.();

    const hints = this.eventBus.on(
      "watchdog:hint",
      (event) => {
        state.pendingHints.push(event.payload.message);
      },
      { filter: (event) => event.payload.sessionId === session.id }
    );
    const watchdog = new GuardianWatchdog({
      sessionId: session.id,
      eventBus: this.eventBus,
      config: this.config.guardian,
    });
    watchdog.start();

    try {
      for (;;) {
        const step = await this.nextTurn(state);
        if (step.kind === "finish") {
          return await this.finish(state, step.status, step.reason);
        }
      }
    } finally {
      clearTimeout(deadline);
      signal?.removeEventListener("abort", onExternalAbort);
      hints.unsubscribe();
      watchdog.stop();
    }
  }

  private async nextTurn(state: RunState): Promise<TurnStep> {
    const { session } = state;
    const loop = this.config.loop;

    const cancelled = this.cancellation(state);
    if (cancelled) {
      return cancelled;
    }

    this.updateElapsed(state);
    if (session.turns.length >= loop.maxTurns) {
      return this.limitReached(`maximum turns (${loop.maxTurns}) reached`);
    }
    if (session.elapsedMs >= loop.maxDurationSecs * 1000) {
      return this.limitReached(`maximum duration (${loop.maxDurationSecs}s) exceeded`);
    }

    const turnIndex = session.turns.length;
    const startedAt = this.now();
    this.eventBus.emit(
      "turn:started",
      { sessionId: session.id, turnIndex },
      { source: "agent-loop" }
    );

    const hints = state.pendingHints.splice(0);
    for (const hint of hints) {
      session.messages.push({ role: "user", content: hint, advisory: true });
    }

    const signal = state.controller.signal;
    const model = await retry(() => this.turns.execute(session.messages, signal, state.goal), {
      maxAttempts: loop.retry.maxAttempts,
      initialDelayMs: loop.retry.initialDelayMs,
      maxDelayMs: loop.retry.maxDelayMs,
      signal,
      onRetry: (attempt, error, nextDelayMs) => {
        logger.warn("Model step failed, retrying", {
          sessionId: session.id,
          turnIndex,
          attempt,
          delayMs: Math.round(nextDelayMs),
          error: errorMessage(error),
        });
      },
    });

    if (!model.success) {
      const afterCancel = this.cancellation(state);
      if (afterCancel) {
        return afterCancel;
      }
      return this.failedTurn(state, turnIndex, startedAt, hints, {
        code: errorCode(model.error),
        message: errorMessage(model.error),
      });
    }

    state.consecutiveTurnFailures = 0;
    const step = model.result;
    this.recordUsage(state, turnIndex, step.usage);

    let decisions: SecurityDecision[] = [];
    let results: ToolResult[] = [];
    if (step.toolCalls.length > 0) {
      const batch = await this.tools.executeBatch(step.toolCalls, {
        sessionId: session.id,
        isSubAgent: session.isSubAgent,
        policy: this.config.security.policy,
        signal,
      });
      decisions = batch.decisions;
      results = batch.results;
    }

    this.appendConversation(session, step, results);
    const turn: Turn = {
      index: turnIndex,
      startedAt,
      completedAt: this.now(),
      modelOutput: step.text,
      toolCalls: step.toolCalls,
      decisions,
      results,
      hints,
      usage: step.usage,
    };
    session.turns.push(turn);
    this.updateElapsed(state);
    this.eventBus.emit("turn:completed", { sessionId: session.id, turn }, { source: "agent-loop" });

    for (const result of results) {
      const reflexion = state.failures.record(result);
      if (reflexion) {
        state.pendingHints.push(reflexion);
      }
    }

    await this.persist(state);

    const afterTools = this.cancellation(state);
    if (afterTools) {
      return afterTools;
    }

    return this.judgeTurn(state, turn, step);
  }

  private async judgeTurn(state: RunState, turn: Turn, step: AccumulatedStep): Promise<TurnStep> {
    const { session, goal } = state;
    const isFinal = step.toolCalls.length === 0;

    if (!goal) {
      return isFinal ? { kind: "finish", status: "completed" } : { kind: "continue" };
    }

    const verdict = await this.evaluator.evaluate(session, goal, {
      elapsedMs: session.elapsedMs,
      signal: state.controller.signal,
    });
    session.lastVerdict = verdict;
    session.turns[turn.index] = { ...turn, verdict };
    this.eventBus.emit(
      "goal:verdict",
      { sessionId: session.id, turnIndex: turn.index, verdict },
      { source: "goal-evaluator" }
    );

    switch (verdict.kind) {
      case "accept":
        return { kind: "finish", status: "completed", reason: "goal accepted" };
      case "escalate":
        return { kind: "finish", status: "failed", reason: verdict.reason };
      case "retry":
        session.messages.push({ role: "user", content: verdict.hint, advisory: true });
        return { kind: "continue" };
      case "continue":
        return { kind: "continue" };
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async failedTurn(
    state: RunState,
    turnIndex: number,
    startedAt: number,
    hints: string[],
    error: TurnError
  ): Promise<TurnStep> {
    const { session } = state;
    const turn: Turn = {
      index: turnIndex,
      startedAt,
      completedAt: this.now(),
      modelOutput: "",
      toolCalls: [],
      decisions: [],
      results: [],
      hints,
      usage: { inputTokens: 0, outputTokens: 0 },
      error,
    };
    session.turns.push(turn);
    this.updateElapsed(state);
    logger.warn("Turn failed", { sessionId: session.id, turnIndex, ...error });

    // A failed turn still spends time and turns against the goal's hard limits
    const escalation = state.goal
      ? this.evaluator.checkHardConstraints(session, state.goal, { elapsedMs: session.elapsedMs })
      : undefined;
    if (escalation) {
      session.lastVerdict = escalation;
      session.turns[turnIndex] = { ...turn, verdict: escalation };
    }

    this.eventBus.emit(
      "turn:completed",
      { sessionId: session.id, turn: session.turns[turnIndex] ?? turn },
      { source: "agent-loop" }
    );
    if (escalation) {
      this.eventBus.emit(
        "goal:verdict",
        { sessionId: session.id, turnIndex, verdict: escalation },
        { source: "goal-evaluator" }
      );
    }
    await this.persist(state);

    if (escalation?.kind === "escalate") {
      return { kind: "finish", status: "failed", reason: escalation.reason };
    }

    state.consecutiveTurnFailures++;
    if (state.consecutiveTurnFailures > this.config.loop.maxTurnFailures) {
      return {
        kind: "finish",
        status: "failed",
        reason: `${state.consecutiveTurnFailures} consecutive turns failed: ${error.message}`,
      };
    }
    return { kind: "continue" };
  }

  private appendConversation(session: Session, step: AccumulatedStep, results: ToolResult[]): void {
    const assistant: Message = { role: "assistant", content: step.text };
    if (step.toolCalls.length > 0) {
      assistant.toolCalls = step.toolCalls;
    }
    session.messages.push(assistant);

    for (const result of results) {
      session.messages.push({
        role: "tool",
        toolCallId: result.callId,
        toolName: result.toolName,
        content: renderToolResult(result),
      });
    }
  }

  private recordUsage(state: RunState, turnIndex: number, usage: TokenUsage): void {
    const { session } = state;
    session.usage = addUsage(session.usage, usage);
    this.eventBus.emit(
      "usage:updated",
      { sessionId: session.id, turnIndex, usage, total: session.usage },
      { source: "agent-loop" }
    );
  }

  private cancellation(state: RunState): TurnStep | undefined {
    if (!state.controller.signal.aborted) {
      return undefined;
    }
    if (state.abortCause === "deadline") {
      return this.limitReached(
        `maximum duration (${this.config.loop.maxDurationSecs}s) exceeded`
      );
    }
    return { kind: "finish", status: "cancelled", reason: "run cancelled" };
  }

  private limitReached(reason: string): TurnStep {
    return {
      kind: "finish",
      status: this.config.loop.onLimit === "complete" ? "completed" : "failed",
      reason,
    };
  }

  private updateElapsed(state: RunState): void {
    state.session.elapsedMs = state.elapsedBefore + (this.now() - state.startedAt);
    state.session.updatedAt = this.now();
  }

  /** Checkpoint failures are logged; the run carries on. */
  private async persist(state: RunState): Promise<void> {
    const { session } = state;
    try {
      const record = await this.checkpoints.save(session);
      this.eventBus.emit(
        "checkpoint:saved",
        { sessionId: session.id, turnIndex: record.turnIndex },
        { source: "checkpoint-store" }
      );
    } catch (error) {
      logger.error("Checkpoint save failed", error);
    }
  }

  private async finish(
    state: RunState,
    status: Exclude<SessionStatus, "running">,
    reason?: string
  ): Promise<RunResult> {
    const { session } = state;
    session.status = status;
    session.terminalReason = reason;
    this.updateElapsed(state);
    await this.persist(state);

    const result = this.toResult(session);
    logger.info("Run finished", {
      sessionId: session.id,
      status,
      reason,
      turns: session.turns.length,
    });

    if (status === "completed") {
      this.eventBus.emit(
        "run:completed",
        { sessionId: session.id, status, output: result.output, reason },
        { source: "agent-loop" }
      );
    } else {
      this.eventBus.emit(
        "run:failed",
        { sessionId: session.id, status, reason: reason ?? status, lastVerdict: session.lastVerdict },
        { source: "agent-loop" }
      );
    }
    return result;
  }

  /** A session that cannot be resumed. Nothing is written back. */
  private abandon(sessionId: string, reason: string): RunResult {
    const now = this.now();
    const session: Session = {
      id: sessionId,
      status: "failed",
      messages: [],
      turns: [],
      isSubAgent: false,
      createdAt: now,
      updatedAt: now,
      elapsedMs: 0,
      usage: { inputTokens: 0, outputTokens: 0 },
      terminalReason: reason,
    };
    this.eventBus.emit(
      "run:failed",
      { sessionId, status: "failed", reason },
      { source: "agent-loop" }
    );
    return this.toResult(session);
  }

  private toResult(session: Session): RunResult {
    const status = session.status === "running" ? "failed" : session.status;
    return {
      session,
      status,
      reason: session.terminalReason,
      output: latestOutput(session.turns),
      lastVerdict: session.lastVerdict,
    };
  }
}

/** The last non-empty model output of the session. */
export function latestOutput(turns: Turn[]): string {
  for (let i = turns.length - 1; i >= 0; i--) {
    const output = turns[i]?.modelOutput;
    if (output) {
      return output;
    }
  }
  return "";
}

export function renderToolResult(result: ToolResult): string {
  if (result.status === "success") {
    return result.output ?? "";
  }
  const error = result.error;
  const label = result.status === "policy_violation" ? "Denied" : "Error";
  return error ? `${label} [${error.code}]: ${error.message}` : label;
}

export function createAgentLoop(config: AgentLoopConfig): AgentLoop {
  return new AgentLoop(config);
}
