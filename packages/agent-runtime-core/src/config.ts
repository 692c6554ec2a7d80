/**
 * Runtime Configuration
 *
 * zod schemas for the security policy, guardian, loop and judge settings.
 * Loading configuration files is left to the host; this module only
 * validates, applies defaults and layers environment overrides.
 */

import { z } from "zod";

import { ConfigError } from "./errors";
import { type Goal, goalSchema } from "./goals";
import { type SecurityTier, securityTierSchema } from "./tiers";

// ============================================================================
// Security Policy
// ============================================================================

export const dangerousPatternSchema = z.object({
  label: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().optional(),
});

export type DangerousPatternDefinition = z.infer<typeof dangerousPatternSchema>;

export interface SecurityPolicy {
  /** Highest tier that runs without a human */
  autoApproveUpTo: SecurityTier;
  /** Tiers strictly above this are denied outright */
  denyAbove: SecurityTier;
  approvalTimeoutSecs: number;
  /** Per-tool replacement of the declared base tier */
  toolOverrides: Record<string, SecurityTier>;
  /** Replaces the built-in dangerous pattern list when set */
  dangerousPatterns?: DangerousPatternDefinition[];
}

/** Restrictions layered over the parent policy for sub-agents. */
export interface SubAgentOverlay {
  autoApproveUpTo?: SecurityTier;
  denyAbove?: SecurityTier;
  approvalTimeoutSecs?: number;
  toolOverrides: Record<string, SecurityTier>;
  /** Added to the parent's patterns, never replacing them */
  dangerousPatterns: DangerousPatternDefinition[];
}

const toolOverridesSchema = z.record(z.string(), securityTierSchema);

export const securityPolicySchema = z
  .object({
    autoApproveUpTo: securityTierSchema.default("T1"),
    denyAbove: securityTierSchema.default("T3"),
    approvalTimeoutSecs: z.number().positive().default(60),
    toolOverrides: toolOverridesSchema.default({}),
    dangerousPatterns: z.array(dangerousPatternSchema).optional(),
  })
  .strict();

export const subAgentOverlaySchema = z
  .object({
    autoApproveUpTo: securityTierSchema.optional(),
    denyAbove: securityTierSchema.optional(),
    approvalTimeoutSecs: z.number().positive().optional(),
    toolOverrides: toolOverridesSchema.default({}),
    dangerousPatterns: z.array(dangerousPatternSchema).default([]),
  })
  .strict();

const securityConfigSchema = z
  .object({
    policy: securityPolicySchema.default({}),
    subAgentOverlay: subAgentOverlaySchema.default({ autoApproveUpTo: "T0" }),
  })
  .strict();

// ============================================================================
// Guardian
// ============================================================================

export const guardianConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    /** 0 disables stall detection */
    stallTimeoutSecs: z.number().nonnegative().default(120),
    /** 0 disables doom-loop detection */
    doomLoopThreshold: z.number().int().nonnegative().default(3),
    windowSize: z.number().int().positive().default(10),
    /** 0 means unlimited */
    budgetTokens: z.number().int().nonnegative().default(0),
    budgetWarnPct: z.number().min(1).max(100).default(80),
  })
  .strict();

export type GuardianConfig = z.infer<typeof guardianConfigSchema>;

// ============================================================================
// Loop
// ============================================================================

export const retryConfigSchema = z
  .object({
    maxAttempts: z.number().int().positive().default(3),
    initialDelayMs: z.number().nonnegative().default(1000),
    maxDelayMs: z.number().nonnegative().default(30_000),
  })
  .strict();

export type RetryConfig = z.infer<typeof retryConfigSchema>;

/**
 * Context window sent to the model. The oldest messages after the task
 * prompt are dropped until the estimate fits `budgetTokens`; the newest
 * `preserveCount` messages always stay. A zero budget sends everything.
 */
export const contextConfigSchema = z
  .object({
    budgetTokens: z.number().int().nonnegative().default(100_000),
    preserveCount: z.number().int().nonnegative().default(6),
  })
  .strict();

export type ContextConfig = z.infer<typeof contextConfigSchema>;

export const loopConfigSchema = z
  .object({
    maxTurns: z.number().int().positive().default(25),
    maxDurationSecs: z.number().positive().default(600),
    /** Session status when a turn or duration limit is reached */
    onLimit: z.enum(["fail", "complete"]).default("fail"),
    /** Consecutive failed turns tolerated before the session fails */
    maxTurnFailures: z.number().int().nonnegative().default(2),
    retry: retryConfigSchema.default({}),
    context: contextConfigSchema.default({}),
    defaultToolTimeoutSecs: z.number().positive().default(30),
    maxToolOutputChars: z.number().int().positive().default(16_000),
    parallelTools: z.boolean().default(true),
    reflexionFailureThreshold: z.number().int().nonnegative().default(3),
    reasoningEffort: z.enum(["low", "medium", "high"]).default("medium"),
    maxTokens: z.number().int().positive().default(4096),
    systemPrompt: z.string().optional(),
  })
  .strict();

export type LoopConfig = z.infer<typeof loopConfigSchema>;

// ============================================================================
// Judge
// ============================================================================

export const judgeConfigSchema = z
  .object({
    confidenceFloor: z.number().min(0).max(1).default(0.5),
    maxTokens: z.number().int().positive().default(1024),
  })
  .strict();

export type JudgeConfig = z.infer<typeof judgeConfigSchema>;

// ============================================================================
// Runtime
// ============================================================================

export const runtimeConfigSchema = z
  .object({
    security: securityConfigSchema.default({}),
    guardian: guardianConfigSchema.default({}),
    loop: loopConfigSchema.default({}),
    judge: judgeConfigSchema.default({}),
  })
  .strict();

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw configuration and fill in defaults.
 * @throws ConfigError listing every issue
 */
export function parseRuntimeConfig(input: unknown = {}): RuntimeConfig {
  const parsed = runtimeConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid runtime configuration: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export function parseSecurityPolicy(input: unknown = {}): SecurityPolicy {
  const parsed = securityPolicySchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid security policy: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export function parseGoal(input: unknown): Goal {
  const parsed = goalSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid goal: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

// ============================================================================
// Environment overrides
// ============================================================================

function readEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`Environment variable ${name} must be a number, got "${raw}"`, [
      `${name}: expected number`,
    ]);
  }
  return value;
}

/**
 * Parse configuration, then apply numeric overrides from the environment:
 * `AGENT_MAX_TURNS`, `AGENT_MAX_DURATION_SECS`, `AGENT_APPROVAL_TIMEOUT_SECS`
 * and `AGENT_BUDGET_TOKENS`. The result is validated again.
 */
export function resolveRuntimeConfig(
  input: unknown = {},
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig {
  const config = parseRuntimeConfig(input);

  const maxTurns = readEnvNumber(env, "AGENT_MAX_TURNS");
  const maxDurationSecs = readEnvNumber(env, "AGENT_MAX_DURATION_SECS");
  const approvalTimeoutSecs = readEnvNumber(env, "AGENT_APPROVAL_TIMEOUT_SECS");
  const budgetTokens = readEnvNumber(env, "AGENT_BUDGET_TOKENS");

  return parseRuntimeConfig({
    ...config,
    loop: {
      ...config.loop,
      ...(maxTurns !== undefined ? { maxTurns } : {}),
      ...(maxDurationSecs !== undefined ? { maxDurationSecs } : {}),
    },
    security: {
      ...config.security,
      policy: {
        ...config.security.policy,
        ...(approvalTimeoutSecs !== undefined ? { approvalTimeoutSecs } : {}),
      },
    },
    guardian: {
      ...config.guardian,
      ...(budgetTokens !== undefined ? { budgetTokens } : {}),
    },
  });
}
