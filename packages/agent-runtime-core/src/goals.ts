/**
 * Goals, criteria, constraints and verdicts.
 */

import { z } from "zod";

// ============================================================================
// Criteria
// ============================================================================

interface CriterionBase {
  id: string;
  weight: number;
  description?: string;
}

export interface OutputContainsCriterion extends CriterionBase {
  kind: "output_contains";
  pattern: string;
  caseSensitive: boolean;
}

export interface OutputEqualsCriterion extends CriterionBase {
  kind: "output_equals";
  expected: string;
}

/** Pure predicate registered with the evaluator under `name` */
export interface CustomCriterion extends CriterionBase {
  kind: "custom";
  name: string;
}

export interface LlmJudgeCriterion extends CriterionBase {
  kind: "llm_judge";
  prompt: string;
}

export type GoalCriterion =
  | OutputContainsCriterion
  | OutputEqualsCriterion
  | CustomCriterion
  | LlmJudgeCriterion;

export type CriterionKind = GoalCriterion["kind"];

// ============================================================================
// Constraints
// ============================================================================

export type ConstraintCategory = "time" | "cost" | "turns" | "safety" | "scope" | "quality";

export type ConstraintKind = "hard" | "soft";

/**
 * `time` limits are seconds of run time, `cost` limits are cumulative tokens,
 * `turns` limits are completed turns. Other categories are descriptive and
 * only reach the judge.
 */
export interface GoalConstraint {
  category: ConstraintCategory;
  kind: ConstraintKind;
  limit?: number;
  description: string;
}

export interface Goal {
  description: string;
  criteria: GoalCriterion[];
  constraints: GoalConstraint[];
  /** Weighted score at which the goal is met, 0..1 */
  acceptanceThreshold: number;
}

// ============================================================================
// Verdicts
// ============================================================================

export type Verdict =
  | { kind: "accept"; confidence: number }
  | { kind: "retry"; reason: string; hint: string; confidence?: number }
  | { kind: "escalate"; reason: string }
  | { kind: "continue"; reason?: string };

export type VerdictKind = Verdict["kind"];

// ============================================================================
// Schemas
// ============================================================================

export const DEFAULT_ACCEPTANCE_THRESHOLD = 0.9;

const criterionBase = {
  id: z.string().min(1),
  weight: z.number().nonnegative().default(1),
  description: z.string().optional(),
};

export const goalCriterionSchema = z.discriminatedUnion("kind", [
  z.object({
    ...criterionBase,
    kind: z.literal("output_contains"),
    pattern: z.string(),
    caseSensitive: z.boolean().default(false),
  }),
  z.object({ ...criterionBase, kind: z.literal("output_equals"), expected: z.string() }),
  z.object({ ...criterionBase, kind: z.literal("custom"), name: z.string().min(1) }),
  z.object({ ...criterionBase, kind: z.literal("llm_judge"), prompt: z.string() }),
]);

export const goalConstraintSchema = z.object({
  category: z.enum(["time", "cost", "turns", "safety", "scope", "quality"]),
  kind: z.enum(["hard", "soft"]),
  limit: z.number().nonnegative().optional(),
  description: z.string(),
});

export const goalSchema: z.ZodType<Goal, z.ZodTypeDef, unknown> = z.object({
  description: z.string(),
  criteria: z.array(goalCriterionSchema).default([]),
  constraints: z.array(goalConstraintSchema).default([]),
  acceptanceThreshold: z.number().min(0).max(1).default(DEFAULT_ACCEPTANCE_THRESHOLD),
});

export const verdictSchema: z.ZodType<Verdict, z.ZodTypeDef, unknown> = z.discriminatedUnion(
  "kind",
  [
    z.object({ kind: z.literal("accept"), confidence: z.number() }),
    z.object({
      kind: z.literal("retry"),
      reason: z.string(),
      hint: z.string(),
      confidence: z.number().optional(),
    }),
    z.object({ kind: z.literal("escalate"), reason: z.string() }),
    z.object({ kind: z.literal("continue"), reason: z.string().optional() }),
  ]
);
