/**
 * Agent Runtime Domain Types
 *
 * Tool calls, security decisions, approvals, turns and sessions.
 */

import type { Goal, Verdict } from "./goals";
import type { SecurityTier } from "./tiers";

// ============================================================================
// Tool Calls
// ============================================================================

/** A request by the model to invoke a named capability. */
export interface ToolCall {
  id: string;
  name: string;
  /** Parsed arguments; undefined when the raw text was not valid JSON */
  arguments?: unknown;
  /** Raw argument text as streamed by the model */
  rawArguments?: string;
  /** Ids of calls in the same turn whose results this call consumes */
  dependsOn?: string[];
}

export type DecisionOutcome = "allow" | "deny" | "needs_approval";

/** The gate's verdict on a single tool call. Exactly one per call. */
export interface SecurityDecision {
  callId: string;
  toolName: string;
  outcome: DecisionOutcome;
  baseTier: SecurityTier;
  effectiveTier: SecurityTier;
  /** Label of the dangerous pattern that escalated the call */
  matchedPattern?: string;
  reason: string;
  isSubAgent: boolean;
  decidedAt: number;
}

// ============================================================================
// Approvals
// ============================================================================

export type ApprovalStatus = "pending" | "approved" | "denied" | "timed_out";

export type ApprovalResolution = "approve" | "deny";

export interface ApprovalRequest {
  id: string;
  sessionId: string;
  call: ToolCall;
  decision: SecurityDecision;
  /** Short human-readable description of what the call will do */
  summary: string;
  requestedAt: number;
  deadline: number;
  status: ApprovalStatus;
  resolvedAt?: number;
  reason?: string;
}

export interface ApprovalOutcome {
  requestId: string;
  status: Exclude<ApprovalStatus, "pending">;
  reason?: string;
}

// ============================================================================
// Tool Results
// ============================================================================

export type ToolResultStatus = "success" | "error" | "policy_violation";

export interface ToolResultError {
  code: string;
  message: string;
}

export interface ToolResult {
  callId: string;
  toolName: string;
  status: ToolResultStatus;
  output?: string;
  error?: ToolResultError;
  attempts: number;
  durationMs: number;
}

// ============================================================================
// Conversation
// ============================================================================

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type MessageRole = "system" | "user" | "assistant" | "tool";

export interface Message {
  role: MessageRole;
  content: string;
  /** Tool calls proposed by an assistant message */
  toolCalls?: ToolCall[];
  /** Call answered by a tool message */
  toolCallId?: string;
  toolName?: string;
  /** Injected guidance (watchdog hints, retry hints), not user intent */
  advisory?: boolean;
}

// ============================================================================
// Turns and Sessions
// ============================================================================

export interface TurnError {
  code: string;
  message: string;
}

/** One model step plus its tool calls. Immutable once appended. */
export interface Turn {
  index: number;
  startedAt: number;
  completedAt: number;
  modelOutput: string;
  toolCalls: ToolCall[];
  decisions: SecurityDecision[];
  results: ToolResult[];
  /** Watchdog hints injected into this turn's context */
  hints: string[];
  usage: TokenUsage;
  verdict?: Verdict;
  error?: TurnError;
}

export type SessionStatus = "running" | "completed" | "failed" | "cancelled";

export interface Session {
  id: string;
  status: SessionStatus;
  messages: Message[];
  turns: Turn[];
  goal?: Goal;
  isSubAgent: boolean;
  createdAt: number;
  updatedAt: number;
  /** Run time accumulated across every process that drove the session */
  elapsedMs: number;
  usage: TokenUsage;
  terminalReason?: string;
  lastVerdict?: Verdict;
}

export function isTerminalStatus(status: SessionStatus): boolean {
  return status !== "running";
}

export function totalTokens(usage: TokenUsage): number {
  return usage.inputTokens + usage.outputTokens;
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
  };
}

// ============================================================================
// Checkpoints
// ============================================================================

export const CHECKPOINT_VERSION = 1;

export interface CheckpointRecord {
  version: typeof CHECKPOINT_VERSION;
  sessionId: string;
  turnIndex: number;
  session: Session;
  timestamp: number;
}
