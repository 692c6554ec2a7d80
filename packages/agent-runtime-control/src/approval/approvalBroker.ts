/**
 * Approval Broker
 *
 * Turns a `needs_approval` decision into an awaited answer with a deadline.
 * The broker owns every ApprovalRequest; external surfaces (REPL, chat
 * channels, a gateway) see requests on the event stream and answer through
 * `resolve`. A request leaves `pending` exactly once: the first resolver,
 * the timer or run cancellation wins and every later attempt is a no-op.
 */

import { randomUUID } from "node:crypto";

import type {
  ApprovalOutcome,
  ApprovalRequest,
  ApprovalResolution,
  ApprovalStatus,
  SecurityDecision,
  ToolCall,
} from "@warden/agent-runtime-core";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";

import type { EventBus } from "../events/eventBus";

const logger = getLogger("approval-broker");

export interface ApprovalBrokerConfig {
  eventBus: EventBus;
  /** Resolved requests kept for `get` lookups, oldest dropped first (default: 100) */
  historySize?: number;
  now?: () => number;
  idFactory?: () => string;
}

export interface RequestApprovalOptions {
  sessionId: string;
  timeoutMs: number;
  /** Human-readable description of the call; defaults to the tool name */
  summary?: string;
  /** Aborting denies the request with reason "run cancelled" */
  signal?: AbortSignal;
}

type TerminalStatus = Exclude<ApprovalStatus, "pending">;

interface Waiter {
  settle: (outcome: ApprovalOutcome) => void;
  timer: ReturnType<typeof setTimeout>;
  detach: () => void;
}

export class ApprovalBroker {
  /** Pending requests only; resolved ones move to `resolved` */
  private readonly records = new Map<string, ApprovalRequest>();
  private readonly resolved = new Map<string, ApprovalRequest>();
  private readonly waiters = new Map<string, Waiter>();
  private readonly eventBus: EventBus;
  private readonly historySize: number;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  constructor(config: ApprovalBrokerConfig) {
    this.eventBus = config.eventBus;
    this.historySize = config.historySize ?? 100;
    this.now = config.now ?? Date.now;
    this.idFactory = config.idFactory ?? randomUUID;
  }

  request(
    call: ToolCall,
    decision: SecurityDecision,
    options: RequestApprovalOptions
  ): Promise<ApprovalOutcome> {
    if (decision.outcome !== "needs_approval") {
      return Promise.reject(
        new Error(`Approval requested for call ${call.id} whose outcome is ${decision.outcome}`)
      );
    }

    const requestedAt = this.now();
    const request: ApprovalRequest = {
      id: this.idFactory(),
      sessionId: options.sessionId,
      call,
      decision,
      summary: options.summary ?? call.name,
      requestedAt,
      deadline: requestedAt + options.timeoutMs,
      status: "pending",
    };
    this.records.set(request.id, request);

    const outcome = new Promise<ApprovalOutcome>((settle) => {
      const timer = setTimeout(() => {
        this.transition(
          request.id,
          "timed_out",
          `approval timed out after ${Math.round(options.timeoutMs / 1000)}s`
        );
      }, options.timeoutMs);

      const signal = options.signal;
      const onAbort = () => this.transition(request.id, "denied", "run cancelled");
      signal?.addEventListener("abort", onAbort, { once: true });

      this.waiters.set(request.id, {
        settle,
        timer,
        detach: () => signal?.removeEventListener("abort", onAbort),
      });
    });

    logger.info("Approval requested", {
      requestId: request.id,
      sessionId: request.sessionId,
      tool: call.name,
      tier: decision.effectiveTier,
    });
    this.eventBus.emit("approval:requested", {
      sessionId: request.sessionId,
      request: { ...request },
    });

    if (options.signal?.aborted) {
      this.transition(request.id, "denied", "run cancelled");
    }

    return outcome;
  }

  /**
   * Answer a pending request. Returns false when the request is unknown or
   * already left `pending`; the recorded outcome is then unchanged.
   */
  resolve(requestId: string, resolution: ApprovalResolution, reason?: string): boolean {
    return this.transition(requestId, resolution === "approve" ? "approved" : "denied", reason);
  }

  get(requestId: string): ApprovalRequest | undefined {
    const record = this.records.get(requestId) ?? this.resolved.get(requestId);
    return record ? { ...record } : undefined;
  }

  pending(sessionId?: string): ApprovalRequest[] {
    const result: ApprovalRequest[] = [];
    for (const record of this.records.values()) {
      if (!sessionId || record.sessionId === sessionId) {
        result.push({ ...record });
      }
    }
    return result;
  }

  /**
   * Look up a pending request by a shortened id. Ambiguous prefixes match nothing.
   */
  findByPrefix(prefix: string): ApprovalRequest | undefined {
    if (!prefix) {
      return undefined;
    }
    const matches = this.pending().filter((record) => record.id.startsWith(prefix));
    return matches.length === 1 ? matches[0] : undefined;
  }

  /**
   * Deny everything still pending and forget resolved requests.
   */
  dispose(): void {
    for (const id of [...this.waiters.keys()]) {
      this.transition(id, "denied", "approval broker disposed");
    }
    this.records.clear();
    this.resolved.clear();
  }

  private transition(requestId: string, status: TerminalStatus, reason?: string): boolean {
    const record = this.records.get(requestId);
    const waiter = this.waiters.get(requestId);
    if (!record || !waiter || record.status !== "pending") {
      return false;
    }

    record.status = status;
    record.resolvedAt = this.now();
    record.reason = reason;
    this.records.delete(requestId);
    this.remember(record);
    this.waiters.delete(requestId);
    clearTimeout(waiter.timer);
    waiter.detach();

    logger.info("Approval resolved", { requestId, sessionId: record.sessionId, status, reason });
    this.eventBus.emit("approval:resolved", { sessionId: record.sessionId, request: { ...record } });

    waiter.settle({ requestId, status, reason });
    return true;
  }

  private remember(record: ApprovalRequest): void {
    this.resolved.set(record.id, record);
    if (this.resolved.size > this.historySize) {
      const oldest = this.resolved.keys().next();
      if (!oldest.done) {
        this.resolved.delete(oldest.value);
      }
    }
  }
}

export function createApprovalBroker(config: ApprovalBrokerConfig): ApprovalBroker {
  return new ApprovalBroker(config);
}
