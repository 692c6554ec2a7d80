/**
 * Goal Evaluator
 *
 * Produces one verdict per turn:
 * 1. Hard constraints (time, cost, turns) escalate unconditionally.
 * 2. Level 0 scores deterministic criteria against the latest output and
 *    accepts without a model call when the score meets the threshold.
 * 3. Level 1 asks the judge only when Level 0 is inconclusive and the goal
 *    has an `llm_judge` criterion.
 */

import {
  type GoalConstraint,
  type GoalCriterion,
  type Goal,
  type Session,
  totalTokens,
  type Verdict,
} from "@warden/agent-runtime-core";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";
import { DEFAULT_RETRY_HINT, type GoalJudge } from "./llmJudge";

const logger = getLogger("goal-evaluator");

/** Pure check over the latest output: a pass/fail or a 0..1 score. */
export type CustomPredicate = (output: string, session: Session) => boolean | number;

export interface GoalEvaluatorOptions {
  judge?: GoalJudge;
  predicates?: Record<string, CustomPredicate>;
  /** Level 1 accept/retry verdicts below this confidence become continue */
  confidenceFloor?: number;
}

export interface GoalEvaluationContext {
  /** Run time to check `time` constraints against. Defaults to `session.elapsedMs`. */
  elapsedMs?: number;
  signal?: AbortSignal;
}

export interface CriterionResult {
  id: string;
  kind: GoalCriterion["kind"];
  weight: number;
  /** False for judge criteria and unregistered custom predicates */
  evaluated: boolean;
  score: number;
  detail: string;
}

export interface ConstraintCheck {
  constraint: GoalConstraint;
  actual: number;
}

export interface GoalEvaluation {
  verdict: Verdict;
  level: 0 | 1;
  score: number;
  criteria: CriterionResult[];
  hardViolations: ConstraintCheck[];
  softViolations: ConstraintCheck[];
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export class GoalEvaluator {
  private readonly judge?: GoalJudge;
  private readonly predicates = new Map<string, CustomPredicate>();
  private readonly confidenceFloor: number;

  constructor(options: GoalEvaluatorOptions = {}) {
    this.judge = options.judge;
    this.confidenceFloor = options.confidenceFloor ?? 0.5;
    for (const [name, predicate] of Object.entries(options.predicates ?? {})) {
      this.predicates.set(name, predicate);
    }
  }

  registerPredicate(name: string, predicate: CustomPredicate): void {
    this.predicates.set(name, predicate);
  }

  async evaluate(
    session: Session,
    goal: Goal,
    context: GoalEvaluationContext = {}
  ): Promise<Verdict> {
    return (await this.assess(session, goal, context)).verdict;
  }

  async assess(
    session: Session,
    goal: Goal,
    context: GoalEvaluationContext = {}
  ): Promise<GoalEvaluation> {
    const lastTurn = session.turns.at(-1);
    const output = lastTurn?.modelOutput ?? "";
    const isFinal = lastTurn !== undefined && lastTurn.toolCalls.length === 0;

    const { hard, soft } = this.checkConstraints(session, goal, context);
    for (const check of soft) {
      logger.warn("Soft constraint exceeded", {
        sessionId: session.id,
        category: check.constraint.category,
        limit: check.constraint.limit,
        actual: check.actual,
      });
    }

    const criteria = goal.criteria.map((criterion) => this.scoreCriterion(criterion, output, session));
    const score = weightedScore(criteria);
    const base = { score, criteria, hardViolations: hard, softViolations: soft };

    const [firstHard] = hard;
    if (firstHard) {
      return { ...base, level: 0, verdict: escalation(firstHard) };
    }

    // An empty criteria list is only met by a final response
    const met = score >= goal.acceptanceThreshold && (criteria.length > 0 || isFinal);
    if (met) {
      return { ...base, level: 0, verdict: { kind: "accept", confidence: score } };
    }

    const needsJudge = goal.criteria.some((criterion) => criterion.kind === "llm_judge");
    if (needsJudge && this.judge) {
      const judged = await this.judge.judge(goal, session.messages, context.signal);
      return { ...base, level: 1, verdict: this.applyConfidenceFloor(judged) };
    }

    if (!isFinal) {
      return { ...base, level: 0, verdict: { kind: "continue" } };
    }

    const failed = criteria.filter((result) => result.score < 1).map((result) => result.detail);
    return {
      ...base,
      level: 0,
      verdict: {
        kind: "retry",
        reason: `Score ${percent(score)} < threshold ${percent(goal.acceptanceThreshold)}`,
        hint: failed.length > 0 ? `Unmet criteria: ${failed.join("; ")}` : DEFAULT_RETRY_HINT,
      },
    };
  }

  /**
   * Escalation for the first violated hard constraint, if any. Runs no
   * criteria, so it applies to turns that produced no output.
   */
  checkHardConstraints(
    session: Session,
    goal: Goal,
    context: GoalEvaluationContext = {}
  ): Verdict | undefined {
    const [firstHard] = this.checkConstraints(session, goal, context).hard;
    return firstHard ? escalation(firstHard) : undefined;
  }

  private applyConfidenceFloor(verdict: Verdict | undefined): Verdict {
    if (!verdict) {
      return { kind: "continue", reason: "judge gave no usable verdict" };
    }
    if (verdict.kind !== "accept" && verdict.kind !== "retry") {
      return verdict;
    }
    const confidence = verdict.confidence;
    if (confidence !== undefined && confidence < this.confidenceFloor) {
      return {
        kind: "continue",
        reason: `judge ${verdict.kind} confidence ${confidence} is below floor ${this.confidenceFloor}`,
      };
    }
    return verdict;
  }

  private checkConstraints(
    session: Session,
    goal: Goal,
    context: GoalEvaluationContext
  ): { hard: ConstraintCheck[]; soft: ConstraintCheck[] } {
    const hard: ConstraintCheck[] = [];
    const soft: ConstraintCheck[] = [];

    for (const constraint of goal.constraints) {
      if (constraint.limit === undefined) {
        continue;
      }
      const actual = measure(constraint, session, context);
      if (actual === undefined || actual <= constraint.limit) {
        continue;
      }
      (constraint.kind === "hard" ? hard : soft).push({ constraint, actual });
    }

    return { hard, soft };
  }

  private scoreCriterion(criterion: GoalCriterion, output: string, session: Session): CriterionResult {
    const base = { id: criterion.id, kind: criterion.kind, weight: criterion.weight };

    switch (criterion.kind) {
      case "output_contains": {
        const found = criterion.caseSensitive
          ? output.includes(criterion.pattern)
          : output.toLowerCase().includes(criterion.pattern.toLowerCase());
        return {
          ...base,
          evaluated: true,
          score: found ? 1 : 0,
          detail: `${criterion.id}: output does not contain "${criterion.pattern}"`,
        };
      }
      case "output_equals":
        return {
          ...base,
          evaluated: true,
          score: output.trim() === criterion.expected.trim() ? 1 : 0,
          detail: `${criterion.id}: output does not equal "${criterion.expected}"`,
        };
      case "custom":
        return { ...base, ...this.runPredicate(criterion.name, output, session) };
      case "llm_judge":
        return { ...base, evaluated: false, score: 0, detail: `${criterion.id}: needs the judge` };
    }
  }

  private runPredicate(
    name: string,
    output: string,
    session: Session
  ): Pick<CriterionResult, "evaluated" | "score" | "detail"> {
    const predicate = this.predicates.get(name);
    if (!predicate) {
      return { evaluated: false, score: 0, detail: `custom check "${name}" is not registered` };
    }

    try {
      const result = predicate(output, session);
      const score =
        typeof result === "boolean" ? (result ? 1 : 0) : Number.isFinite(result) ? clamp01(result) : 0;
      return { evaluated: true, score, detail: `custom check "${name}" failed` };
    } catch (error) {
      logger.warn("Custom predicate threw", { name, error: String(error) });
      return { evaluated: false, score: 0, detail: `custom check "${name}" threw` };
    }
  }
}

function escalation({ constraint, actual }: ConstraintCheck): Verdict {
  return {
    kind: "escalate",
    reason: `hard ${constraint.category} constraint violated: ${constraint.description} (${actual} > ${constraint.limit})`,
  };
}

function measure(
  constraint: GoalConstraint,
  session: Session,
  context: GoalEvaluationContext
): number | undefined {
  switch (constraint.category) {
    case "time":
      return (context.elapsedMs ?? session.elapsedMs) / 1000;
    case "cost":
      return totalTokens(session.usage);
    case "turns":
      return session.turns.length;
    default:
      return undefined;
  }
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Σ(score·weight) / Σ(weight) over every criterion, judge criteria included.
 * A goal without weighted criteria scores 1.
 */
export function weightedScore(results: CriterionResult[]): number {
  const totalWeight = results.reduce((sum, result) => sum + result.weight, 0);
  if (totalWeight === 0) {
    return 1;
  }
  const earned = results.reduce((sum, result) => sum + result.score * result.weight, 0);
  return earned / totalWeight;
}

export function createGoalEvaluator(options?: GoalEvaluatorOptions): GoalEvaluator {
  return new GoalEvaluator(options);
}
