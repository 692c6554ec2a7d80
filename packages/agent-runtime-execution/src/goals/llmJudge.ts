/**
 * LLM Judge
 *
 * Level 1 goal evaluation: asks the model to grade the conversation against
 * the goal, criteria and constraints and parses a JSON verdict.
 */

import type {
  Goal,
  GoalConstraint,
  JudgeConfig,
  Message,
  ModelClient,
  Verdict,
} from "@warden/agent-runtime-core";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";
import { z } from "zod";

const logger = getLogger("llm-judge");

export const DEFAULT_RETRY_HINT = "Try a different approach.";

/** Anything that can grade a conversation. `undefined` means no usable verdict. */
export interface GoalJudge {
  judge(goal: Goal, messages: Message[], signal?: AbortSignal): Promise<Verdict | undefined>;
}

const judgeReplySchema = z.object({
  verdict: z.enum(["accept", "retry", "escalate", "continue"]),
  confidence: z.number().min(0).max(1),
  reason: z.string().default(""),
  hint: z.string().optional(),
});

export type JudgeReply = z.infer<typeof judgeReplySchema>;

function describeConstraint(constraint: GoalConstraint): string {
  const limit = constraint.limit === undefined ? "" : ` <= ${constraint.limit}`;
  return `- [${constraint.kind} ${constraint.category}${limit}] ${constraint.description}`;
}

export function buildJudgePrompt(goal: Goal, messages: Message[]): string {
  const criteria = goal.criteria
    .map((criterion) => {
      const text =
        criterion.kind === "llm_judge" ? criterion.prompt : (criterion.description ?? criterion.id);
      return `- ${text} (weight: ${criterion.weight})`;
    })
    .join("\n");
  const constraints = goal.constraints.map(describeConstraint).join("\n");
  const conversation = messages
    .filter((message) => message.role !== "system")
    .map((message) => `[${message.role}] ${message.content}`)
    .join("\n");

  return [
    "You are a judge evaluating whether an AI agent achieved its goal.",
    "",
    `Goal: ${goal.description}`,
    "",
    "Success criteria:",
    criteria || "- (none)",
    "",
    "Constraints:",
    constraints || "- (none)",
    "",
    `Success threshold: ${Math.round(goal.acceptanceThreshold * 100)}%`,
    "",
    "Conversation:",
    conversation,
    "",
    "Evaluate the agent's output against the goal and criteria. Respond with ONLY valid JSON:",
    "{",
    '  "verdict": "accept" | "retry" | "escalate" | "continue",',
    '  "confidence": 0.0-1.0,',
    '  "reason": "brief explanation",',
    '  "hint": "actionable suggestion for retry (only if verdict is retry)"',
    "}",
  ].join("\n");
}

/**
 * Parse the judge's reply. Tolerates prose or code fences around the JSON
 * object; returns undefined when no valid verdict can be read.
 */
export function parseJudgeReply(text: string): Verdict | undefined {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }

  const parsed = judgeReplySchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }

  const reply = parsed.data;
  switch (reply.verdict) {
    case "accept":
      return { kind: "accept", confidence: reply.confidence };
    case "retry":
      return {
        kind: "retry",
        reason: reply.reason,
        hint: reply.hint?.trim() || DEFAULT_RETRY_HINT,
        confidence: reply.confidence,
      };
    case "escalate":
      return { kind: "escalate", reason: reply.reason || "judge escalated the run" };
    case "continue":
      return { kind: "continue", reason: reply.reason || undefined };
  }
}

export interface LlmJudgeOptions {
  model: ModelClient;
  config: JudgeConfig;
}

export class LlmJudge implements GoalJudge {
  private readonly model: ModelClient;
  private readonly config: JudgeConfig;

  constructor(options: LlmJudgeOptions) {
    this.model = options.model;
    this.config = options.config;
  }

  async judge(goal: Goal, messages: Message[], signal?: AbortSignal): Promise<Verdict | undefined> {
    const prompt = buildJudgePrompt(goal, messages);
    let reply = "";

    try {
      const stream = this.model.stream(
        {
          messages: [{ role: "user", content: prompt }],
          tools: [],
          options: { reasoningEffort: "low", maxTokens: this.config.maxTokens },
        },
        signal ?? new AbortController().signal
      );
      for await (const delta of stream) {
        if (delta.type === "text") {
          reply += delta.text;
        }
      }
    } catch (error) {
      logger.warn("Judge model call failed", { error: String(error) });
      return undefined;
    }

    const verdict = parseJudgeReply(reply);
    if (!verdict) {
      logger.warn("Judge reply could not be parsed", { preview: reply.slice(0, 200) });
    }
    return verdict;
  }
}

export function createLlmJudge(options: LlmJudgeOptions): LlmJudge {
  return new LlmJudge(options);
}
