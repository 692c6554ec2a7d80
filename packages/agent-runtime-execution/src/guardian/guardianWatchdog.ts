/**
 * Guardian Watchdog
 *
 * Watches one session's event stream and publishes advisory hints:
 * - stall: no session event for `stallTimeoutSecs`
 * - doom loop: the same tool + arguments repeated `doomLoopThreshold` times
 *   within the recent-call window
 * - budget: cumulative tokens crossing `budgetWarnPct`% of `budgetTokens`,
 *   and again when the budget is exceeded
 *
 * The watchdog owns its state outright and talks to the loop only through
 * `watchdog:hint` events. Hints never abort a call or touch the gate.
 */

import {
  type AgentEvent,
  type EventBus,
  isEventType,
  type Subscription,
} from "@warden/agent-runtime-control";
import {
  type GuardianConfig,
  type ToolCall,
  totalTokens,
  type WatchdogHintKind,
} from "@warden/agent-runtime-core";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";

const logger = getLogger("guardian");

const SIGNATURE_ARGS_CHARS = 200;

export interface GuardianWatchdogOptions {
  sessionId: string;
  eventBus: EventBus;
  config: GuardianConfig;
}

export interface WatchdogSnapshot {
  recentSignatures: string[];
  totalTokens: number;
  budgetWarned: boolean;
  budgetExceeded: boolean;
  running: boolean;
}

/** Tool name plus a stable rendering of the arguments. */
export function callSignature(call: Pick<ToolCall, "name" | "arguments" | "rawArguments">): string {
  const rendered =
    call.arguments === undefined ? (call.rawArguments ?? "") : stableStringify(call.arguments);
  return `${call.name}:${rendered.slice(0, SIGNATURE_ARGS_CHARS)}`;
}

export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

export class GuardianWatchdog {
  private readonly sessionId: string;
  private readonly eventBus: EventBus;
  private readonly config: GuardianConfig;

  private subscription?: Subscription;
  private stallTimer?: ReturnType<typeof setTimeout>;
  private recent: Array<{ signature: string; toolName: string }> = [];
  private tokens = 0;
  private budgetWarned = false;
  private budgetExceeded = false;

  constructor(options: GuardianWatchdogOptions) {
    this.sessionId = options.sessionId;
    this.eventBus = options.eventBus;
    this.config = options.config;
  }

  start(): void {
    if (this.subscription || !this.config.enabled) {
      return;
    }
    this.subscription = this.eventBus.onPattern("*", (event) => this.observe(event), {
      priority: "high",
      filter: (event) => event.payload.sessionId === this.sessionId,
    });
    this.armStallTimer();
    logger.debug("Guardian started", { sessionId: this.sessionId });
  }

  stop(): void {
    if (this.stallTimer) {
      clearTimeout(this.stallTimer);
      this.stallTimer = undefined;
    }
    if (this.subscription) {
      this.subscription.unsubscribe();
      this.subscription = undefined;
      logger.debug("Guardian stopped", { sessionId: this.sessionId });
    }
  }

  snapshot(): WatchdogSnapshot {
    return {
      recentSignatures: this.recent.map((entry) => entry.signature),
      totalTokens: this.tokens,
      budgetWarned: this.budgetWarned,
      budgetExceeded: this.budgetExceeded,
      running: this.subscription !== undefined,
    };
  }

  private observe(event: AgentEvent): void {
    // Own hints are not progress
    if (event.type === "watchdog:hint") {
      return;
    }

    if (event.type === "run:completed" || event.type === "run:failed") {
      this.stop();
      return;
    }

    this.armStallTimer();

    if (isEventType(event, "tool:decided")) {
      this.trackCall(event.payload.call);
    } else if (isEventType(event, "usage:updated")) {
      this.trackUsage(totalTokens(event.payload.total));
    }
  }

  private trackCall(call: ToolCall): void {
    const threshold = this.config.doomLoopThreshold;
    if (threshold <= 0) {
      return;
    }

    const signature = callSignature(call);
    this.recent.push({ signature, toolName: call.name });
    const windowSize = Math.max(this.config.windowSize, threshold);
    if (this.recent.length > windowSize) {
      this.recent.splice(0, this.recent.length - windowSize);
    }

    const count = this.recent.filter((entry) => entry.signature === signature).length;
    if (count >= threshold) {
      logger.warn("Doom loop detected", { sessionId: this.sessionId, tool: call.name, count });
      this.hint(
        "doom_loop",
        `[Guardian] You have called '${call.name}' ${count} times with identical input. ` +
          "This looks like a loop. Stop repeating this call and try a different approach or tool.",
        call.name
      );
      this.recent = [];
    }
  }

  private trackUsage(total: number): void {
    const budget = this.config.budgetTokens;
    this.tokens = total;
    if (budget <= 0 || this.budgetExceeded) {
      return;
    }

    if (!this.budgetWarned && total >= Math.floor((budget * this.config.budgetWarnPct) / 100)) {
      this.budgetWarned = true;
      const pct = Math.floor((total * 100) / budget);
      logger.warn("Token budget warning", { sessionId: this.sessionId, used: total, budget });
      this.hint(
        "budget_warning",
        `[Guardian] Token budget warning: ${total}/${budget} tokens used (${pct}%). ` +
          "Please wrap up your current task efficiently."
      );
    }

    if (total > budget) {
      this.budgetExceeded = true;
      logger.warn("Token budget exceeded", { sessionId: this.sessionId, used: total, budget });
      this.hint(
        "budget_exceeded",
        `[Guardian] Token budget exceeded: ${total}/${budget} tokens used. ` +
          "Summarize what you have so far and finish now."
      );
    }
  }

  private armStallTimer(): void {
    if (this.stallTimer) {
      clearTimeout(this.stallTimer);
      this.stallTimer = undefined;
    }
    const timeoutSecs = this.config.stallTimeoutSecs;
    if (timeoutSecs <= 0 || !this.subscription) {
      return;
    }
    this.stallTimer = setTimeout(() => {
      this.stallTimer = undefined;
      logger.warn("Stall detected", { sessionId: this.sessionId, seconds: timeoutSecs });
      this.hint(
        "stall",
        `[Guardian] No progress detected for ${timeoutSecs}s. ` +
          "If you are stuck, try a different approach or summarize what you have so far."
      );
      this.armStallTimer();
    }, timeoutSecs * 1000);
    this.stallTimer.unref?.();
  }

  private hint(kind: WatchdogHintKind, message: string, toolName?: string): void {
    this.eventBus.emit(
      "watchdog:hint",
      { sessionId: this.sessionId, kind, message, toolName },
      { source: "guardian" }
    );
  }
}
