/**
 * Stream Accumulator
 *
 * Folds model stream deltas into the text, tool calls, usage and stop reason
 * of one model step. Tool call arguments arrive as JSON fragments keyed by
 * the call's stream index.
 */

import type {
  ModelDelta,
  ModelStopReason,
  TokenUsage,
  ToolCall,
} from "@warden/agent-runtime-core";

export interface PendingToolCall {
  id: string;
  name: string;
  dependsOn?: string[];
  rawArguments: string;
}

export interface AccumulatedStep {
  text: string;
  toolCalls: ToolCall[];
  usage: TokenUsage;
  stopReason?: ModelStopReason;
}

export class StreamAccumulator {
  private text = "";
  private readonly pending = new Map<number, PendingToolCall>();
  private usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
  private stopReason?: ModelStopReason;

  push(delta: ModelDelta): void {
    switch (delta.type) {
      case "text":
        this.text += delta.text;
        break;
      case "tool_call_start":
        this.pending.set(delta.index, {
          id: delta.id,
          name: delta.name,
          dependsOn: delta.dependsOn,
          rawArguments: "",
        });
        break;
      case "tool_call_delta": {
        const call = this.pending.get(delta.index);
        // Fragments for an index that never started are dropped
        if (call) {
          call.rawArguments += delta.argumentsDelta;
        }
        break;
      }
      case "usage":
        // Providers report running totals; keep the largest seen
        this.usage = {
          inputTokens: Math.max(this.usage.inputTokens, delta.inputTokens),
          outputTokens: Math.max(this.usage.outputTokens, delta.outputTokens),
        };
        break;
      case "end":
        this.stopReason = delta.stopReason;
        break;
    }
  }

  result(): AccumulatedStep {
    const toolCalls = [...this.pending.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, call]) => finalizeToolCall(call));
    return { text: this.text, toolCalls, usage: this.usage, stopReason: this.stopReason };
  }
}

/**
 * Empty argument text means "no arguments". Text that is not valid JSON is
 * kept raw with `arguments` left undefined so the gate can refuse it.
 */
export function finalizeToolCall(call: PendingToolCall): ToolCall {
  const raw = call.rawArguments.trim();
  const base: ToolCall = { id: call.id, name: call.name, rawArguments: call.rawArguments };
  if (call.dependsOn && call.dependsOn.length > 0) {
    base.dependsOn = call.dependsOn;
  }
  if (raw === "") {
    return { ...base, arguments: {} };
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return { ...base, arguments: parsed };
  } catch {
    return base;
  }
}
