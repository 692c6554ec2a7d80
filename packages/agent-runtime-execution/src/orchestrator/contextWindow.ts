/**
 * Context Window
 *
 * Keeps the history sent to the model under a token budget by dropping the
 * oldest messages between the task prompt and the preserved tail.
 *
 * @module orchestrator/contextWindow
 */

import type { ContextConfig, Message } from "@warden/agent-runtime-core";

/** Framing cost charged to every message */
const MESSAGE_OVERHEAD_TOKENS = 4;

export interface PrunedContext {
  messages: Message[];
  /** Messages left out of the window */
  removed: number;
}

/** Rough estimate: ~4 chars per token */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export function estimateMessageTokens(message: Message): number {
  let text = message.content;
  for (const call of message.toolCalls ?? []) {
    text += call.name + (call.rawArguments ?? JSON.stringify(call.arguments ?? {}));
  }
  return estimateTokens(text) + MESSAGE_OVERHEAD_TOKENS;
}

/**
 * Drop the oldest messages until the estimate fits the budget or only the
 * preserved tail is left. A leading user message is the task prompt and is
 * never dropped. Tool results whose calls were dropped go with them.
 */
export function pruneContext(history: Message[], config: ContextConfig): PrunedContext {
  if (config.budgetTokens === 0) {
    return { messages: history, removed: 0 };
  }

  const pinned = history[0]?.role === "user" ? 1 : 0;
  const tokens = history.map(estimateMessageTokens);
  const lastRemovable = history.length - config.preserveCount;

  let total = tokens.reduce((sum, value) => sum + value, 0);
  let cut = pinned;
  while (total > config.budgetTokens && cut < lastRemovable) {
    total -= tokens[cut] ?? 0;
    cut++;
  }
  while (cut > pinned && history[cut]?.role === "tool") {
    cut++;
  }

  const removed = cut - pinned;
  if (removed === 0) {
    return { messages: history, removed: 0 };
  }
  return { messages: [...history.slice(0, pinned), ...history.slice(cut)], removed };
}
