/**
 * Collaborator Contracts
 *
 * The runtime drives tools, a model and a store it does not implement.
 * These interfaces are the whole surface it relies on.
 */

import type { ZodType, ZodTypeDef } from "zod";

import type { SecurityTier } from "./tiers";
import type { DecisionOutcome, Message, SecurityDecision, TokenUsage } from "./types";

// ============================================================================
// Tools
// ============================================================================

export interface ToolInvocationContext {
  sessionId: string;
  callId: string;
  /** Fires on timeout or cancellation; sandboxed tools must kill their process */
  signal: AbortSignal;
  isSubAgent: boolean;
}

export type ToolConcurrency = "parallel" | "exclusive";

export interface ToolCapability<TArgs = unknown> {
  name: string;
  description: string;
  tier: SecurityTier;
  schema: ZodType<TArgs, ZodTypeDef, unknown>;
  /** Per-attempt timeout; the loop default applies when omitted */
  timeoutMs?: number;
  /** Attempts for transient failures, including the first */
  maxAttempts?: number;
  /** Exclusive tools never run alongside other calls of the same turn */
  concurrency?: ToolConcurrency;
  invoke(args: TArgs, context: ToolInvocationContext): Promise<string>;
}

export type ToolRegistryChange =
  | { type: "registered"; name: string }
  | { type: "unregistered"; name: string };

export interface ToolRegistry {
  get(name: string): ToolCapability | undefined;
  list(): ToolCapability[];
  declaredTier(name: string): SecurityTier | undefined;
  schema(name: string): ZodType<unknown, ZodTypeDef, unknown> | undefined;
  /** Returns an unsubscribe function */
  onChange(listener: (change: ToolRegistryChange) => void): () => void;
}

// ============================================================================
// Model
// ============================================================================

export interface ToolDescriptor {
  name: string;
  description: string;
  tier: SecurityTier;
}

export type ReasoningEffort = "low" | "medium" | "high";

export interface ModelRequest {
  messages: Message[];
  tools: ToolDescriptor[];
  options: {
    reasoningEffort: ReasoningEffort;
    maxTokens: number;
  };
}

export type ModelStopReason = "end_turn" | "tool_use" | "max_tokens" | "cancelled";

export type ModelDelta =
  | { type: "text"; text: string }
  | { type: "tool_call_start"; index: number; id: string; name: string; dependsOn?: string[] }
  | { type: "tool_call_delta"; index: number; argumentsDelta: string }
  | ({ type: "usage" } & TokenUsage)
  | { type: "end"; stopReason: ModelStopReason };

export interface ModelClient {
  /** Must stop yielding promptly once `signal` aborts */
  stream(request: ModelRequest, signal: AbortSignal): AsyncIterable<ModelDelta>;
}

// ============================================================================
// Persistence
// ============================================================================

/** Opaque durable key/value store; each write is crash-atomic. */
export interface CheckpointPersistence {
  save(sessionId: string, turnIndex: number, blob: string): Promise<void>;
  loadLatest(sessionId: string): Promise<string | undefined>;
  delete(sessionId: string): Promise<void>;
}

export interface DecisionLogEntry {
  sessionId: string;
  callId: string;
  toolName: string;
  outcome: DecisionOutcome;
  baseTier: SecurityTier;
  effectiveTier: SecurityTier;
  matchedPattern?: string;
  reason: string;
  isSubAgent: boolean;
  timestamp: number;
}

export interface DecisionLogFilter {
  sessionId?: string;
  toolName?: string;
  outcome?: DecisionOutcome;
  limit?: number;
}

export interface DecisionLog {
  record(entry: DecisionLogEntry): Promise<void>;
  list(filter?: DecisionLogFilter): Promise<DecisionLogEntry[]>;
}

export function toDecisionLogEntry(sessionId: string, decision: SecurityDecision): DecisionLogEntry {
  return {
    sessionId,
    callId: decision.callId,
    toolName: decision.toolName,
    outcome: decision.outcome,
    baseTier: decision.baseTier,
    effectiveTier: decision.effectiveTier,
    matchedPattern: decision.matchedPattern,
    reason: decision.reason,
    isSubAgent: decision.isSubAgent,
    timestamp: decision.decidedAt,
  };
}
