/**
 * Agent Event Map
 *
 * Everything the runtime publishes. Every payload carries the session id so
 * subscribers can scope themselves to one run.
 */

import type { Verdict } from "./goals";
import type {
  ApprovalRequest,
  SecurityDecision,
  SessionStatus,
  TokenUsage,
  ToolCall,
  ToolResult,
  Turn,
} from "./types";

export type WatchdogHintKind = "stall" | "doom_loop" | "budget_warning" | "budget_exceeded";

export interface AgentEventMap {
  "run:started": { sessionId: string; resumed: boolean; isSubAgent: boolean; prompt?: string };
  "turn:started": { sessionId: string; turnIndex: number };
  "turn:completed": { sessionId: string; turn: Turn };
  "tool:decided": { sessionId: string; call: ToolCall; decision: SecurityDecision };
  "tool:started": { sessionId: string; call: ToolCall; attempt: number };
  "tool:completed": { sessionId: string; call: ToolCall; result: ToolResult };
  "approval:requested": { sessionId: string; request: ApprovalRequest };
  "approval:resolved": { sessionId: string; request: ApprovalRequest };
  "usage:updated": {
    sessionId: string;
    turnIndex: number;
    usage: TokenUsage;
    total: TokenUsage;
  };
  "watchdog:hint": {
    sessionId: string;
    kind: WatchdogHintKind;
    message: string;
    toolName?: string;
  };
  "goal:verdict": { sessionId: string; turnIndex: number; verdict: Verdict };
  "checkpoint:saved": { sessionId: string; turnIndex: number };
  "run:completed": { sessionId: string; status: "completed"; output: string; reason?: string };
  "run:failed": {
    sessionId: string;
    status: Extract<SessionStatus, "failed" | "cancelled">;
    reason: string;
    lastVerdict?: Verdict;
  };
}

export type AgentEventType = keyof AgentEventMap;

export type AgentEventCategory = AgentEventType extends `${infer C}:${string}` ? C : never;
