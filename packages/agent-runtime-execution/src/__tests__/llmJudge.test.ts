import type { Goal, ModelClient, ModelDelta, ModelRequest } from "@warden/agent-runtime-core";
import { describe, expect, it } from "vitest";

import { buildJudgePrompt, LlmJudge, parseJudgeReply } from "../goals/llmJudge";

const goal: Goal = {
  description: "Summarize the incident",
  criteria: [
    { id: "cause", kind: "llm_judge", prompt: "Names the root cause", weight: 2 },
    {
      id: "short",
      kind: "output_contains",
      pattern: "summary",
      caseSensitive: false,
      weight: 1,
      description: "Has a summary heading",
    },
  ],
  constraints: [{ category: "turns", kind: "hard", limit: 5, description: "five turns at most" }],
  acceptanceThreshold: 0.8,
};

function replyingModel(chunks: string[], requests: ModelRequest[] = []): ModelClient {
  return {
    async *stream(request: ModelRequest): AsyncIterable<ModelDelta> {
      requests.push(request);
      for (const text of chunks) {
        yield { type: "text", text };
      }
      yield { type: "end", stopReason: "end_turn" };
    },
  };
}

describe("parseJudgeReply", () => {
  it("should read a fenced JSON reply", () => {
    const reply = [
      "Here is my verdict:",
      "```json",
      '{"verdict": "retry", "confidence": 0.7, "reason": "no root cause", "hint": "name the cause"}',
      "```",
    ].join("\n");

    expect(parseJudgeReply(reply)).toEqual({
      kind: "retry",
      reason: "no root cause",
      hint: "name the cause",
      confidence: 0.7,
    });
  });

  it("should give a retry without a hint the default hint", () => {
    expect(parseJudgeReply('{"verdict":"retry","confidence":0.8,"reason":"r","hint":"  "}')).toEqual(
      { kind: "retry", reason: "r", hint: "Try a different approach.", confidence: 0.8 }
    );
  });

  it("should map accept and escalate", () => {
    expect(parseJudgeReply('{"verdict":"accept","confidence":0.92}')).toEqual({
      kind: "accept",
      confidence: 0.92,
    });
    expect(parseJudgeReply('{"verdict":"escalate","confidence":1,"reason":"unsafe"}')).toEqual({
      kind: "escalate",
      reason: "unsafe",
    });
  });

  it.each([
    "no json at all",
    "{not json}",
    '{"verdict":"maybe","confidence":0.5}',
    '{"verdict":"accept","confidence":1.5}',
  ])("should reject %s", (reply) => {
    expect(parseJudgeReply(reply)).toBeUndefined();
  });
});

describe("buildJudgePrompt", () => {
  it("should list criteria and constraints and skip system messages", () => {
    const prompt = buildJudgePrompt(goal, [
      { role: "system", content: "hidden instructions" },
      { role: "user", content: "what broke?" },
      { role: "assistant", content: "the cache" },
    ]);

    expect(prompt).toContain("Goal: Summarize the incident");
    expect(prompt).toContain("- Names the root cause (weight: 2)");
    expect(prompt).toContain("- Has a summary heading (weight: 1)");
    expect(prompt).toContain("- [hard turns <= 5] five turns at most");
    expect(prompt).toContain("Success threshold: 80%");
    expect(prompt).toContain("[user] what broke?\n[assistant] the cache");
    expect(prompt).not.toContain("hidden instructions");
  });
});

describe("LlmJudge", () => {
  it("should stream the reply and parse it", async () => {
    const requests: ModelRequest[] = [];
    const judge = new LlmJudge({
      model: replyingModel(['{"verdict":"accept",', '"confidence":0.9}'], requests),
      config: { confidenceFloor: 0.5, maxTokens: 256 },
    });

    const verdict = await judge.judge(goal, [{ role: "user", content: "what broke?" }]);

    expect(verdict).toEqual({ kind: "accept", confidence: 0.9 });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.tools).toEqual([]);
    expect(requests[0]?.options).toEqual({ reasoningEffort: "low", maxTokens: 256 });
  });

  it("should return undefined when the model fails", async () => {
    const judge = new LlmJudge({
      model: {
        async *stream(): AsyncIterable<ModelDelta> {
          throw new Error("socket hang up");
        },
      },
      config: { confidenceFloor: 0.5, maxTokens: 256 },
    });

    await expect(judge.judge(goal, [])).resolves.toBeUndefined();
  });

  it("should return undefined for an unparseable reply", async () => {
    const judge = new LlmJudge({
      model: replyingModel(["I think it went well."]),
      config: { confidenceFloor: 0.5, maxTokens: 256 },
    });

    await expect(judge.judge(goal, [])).resolves.toBeUndefined();
  });
});
