/**
 * Runtime schemas for persisted session state.
 *
 * Checkpoints are read back from storage that the process does not control,
 * so every record is validated before it re-enters the loop.
 */

import { z } from "zod";

import { goalSchema, verdictSchema } from "./goals";
import { securityTierSchema } from "./tiers";
import { CHECKPOINT_VERSION, type CheckpointRecord, type Session } from "./types";

export const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.unknown(),
  rawArguments: z.string().optional(),
  dependsOn: z.array(z.string()).optional(),
});

export const securityDecisionSchema = z.object({
  callId: z.string(),
  toolName: z.string(),
  outcome: z.enum(["allow", "deny", "needs_approval"]),
  baseTier: securityTierSchema,
  effectiveTier: securityTierSchema,
  matchedPattern: z.string().optional(),
  reason: z.string(),
  isSubAgent: z.boolean(),
  decidedAt: z.number(),
});

const errorInfoSchema = z.object({ code: z.string(), message: z.string() });

export const toolResultSchema = z.object({
  callId: z.string(),
  toolName: z.string(),
  status: z.enum(["success", "error", "policy_violation"]),
  output: z.string().optional(),
  error: errorInfoSchema.optional(),
  attempts: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
});

export const tokenUsageSchema = z.object({
  inputTokens: z.number().nonnegative(),
  outputTokens: z.number().nonnegative(),
});

export const messageSchema = z.object({
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string(),
  toolCalls: z.array(toolCallSchema).optional(),
  toolCallId: z.string().optional(),
  toolName: z.string().optional(),
  advisory: z.boolean().optional(),
});

export const turnSchema = z.object({
  index: z.number().int().nonnegative(),
  startedAt: z.number(),
  completedAt: z.number(),
  modelOutput: z.string(),
  toolCalls: z.array(toolCallSchema),
  decisions: z.array(securityDecisionSchema),
  results: z.array(toolResultSchema),
  hints: z.array(z.string()),
  usage: tokenUsageSchema,
  verdict: verdictSchema.optional(),
  error: errorInfoSchema.optional(),
});

export const sessionSchema: z.ZodType<Session, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  status: z.enum(["running", "completed", "failed", "cancelled"]),
  messages: z.array(messageSchema),
  turns: z.array(turnSchema),
  goal: goalSchema.optional(),
  isSubAgent: z.boolean(),
  createdAt: z.number(),
  updatedAt: z.number(),
  elapsedMs: z.number().nonnegative(),
  usage: tokenUsageSchema,
  terminalReason: z.string().optional(),
  lastVerdict: verdictSchema.optional(),
});

export const checkpointRecordSchema: z.ZodType<CheckpointRecord, z.ZodTypeDef, unknown> =
  z.object({
    version: z.literal(CHECKPOINT_VERSION),
    sessionId: z.string().min(1),
    turnIndex: z.number().int(),
    session: sessionSchema,
    timestamp: z.number(),
  });
