/**
 * Event Bus
 *
 * Typed, prioritized event stream shared by the loop, the watchdog, the
 * approval broker and any external surface. Supports wildcard subscriptions,
 * per-subscription filters, bounded history and one-shot waits.
 *
 * Handlers run synchronously in priority order. A throwing or rejecting
 * handler is logged and never reaches the emitter.
 */

import type { AgentEventMap, AgentEventType } from "@warden/agent-runtime-core";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";

const logger = getLogger("event-bus");

// ============================================================================
// Types
// ============================================================================

/** Event priority levels */
export type EventPriority = "critical" | "high" | "normal" | "low";

/** Priority order for sorting (lower = higher priority) */
const PRIORITY_ORDER: Record<EventPriority, number> = {
  critical: 0,
  high: 1,
  normal: 2,
  low: 3,
};

/** Event metadata */
export interface EventMeta {
  /** Unique event ID */
  id: string;
  /** Timestamp when event was created */
  timestamp: number;
  /** Source of the event (component name, channel id, etc.) */
  source?: string;
  priority: EventPriority;
}

export interface AgentEvent<K extends AgentEventType = AgentEventType> {
  type: K;
  payload: AgentEventMap[K];
  meta: EventMeta;
}

/** `"tool:*"` style category wildcards, or `"*"` for everything */
export type WildcardPattern = "*" | `${string}:*`;

export type EventHandler<E extends AgentEvent = AgentEvent> = (event: E) => void | Promise<void>;

export interface SubscriptionOptions<E extends AgentEvent = AgentEvent> {
  /** Handler priority (affects execution order) */
  priority?: EventPriority;
  /** Only receive events once, then auto-unsubscribe */
  once?: boolean;
  /** Replay matching historical events on subscribe */
  replay?: boolean;
  filter?: (event: E) => boolean;
}

export interface Subscription {
  id: string;
  pattern: string;
  unsubscribe: () => void;
}

export interface EmitOptions {
  source?: string;
  priority?: EventPriority;
}

interface SubscriptionRecord {
  id: string;
  pattern: string;
  priority: EventPriority;
  once: boolean;
  accepts: (event: AgentEvent) => boolean;
  deliver: (event: AgentEvent) => void | Promise<void>;
}

export interface EventBusConfig {
  /** Maximum number of events kept for replay and history queries */
  maxHistorySize?: number;
  /** TTL for historical events in milliseconds */
  historyTtlMs?: number;
}

export interface EventBusStats {
  totalEmitted: number;
  totalHandled: number;
  handlerErrors: number;
  activeSubscriptions: number;
  historySize: number;
}

export function isEventType<K extends AgentEventType>(
  event: AgentEvent,
  type: K
): event is AgentEvent<K> {
  return event.type === type;
}

export function matchesPattern(eventType: string, pattern: string): boolean {
  if (pattern === "*") {
    return true;
  }

  if (pattern.endsWith(":*")) {
    const prefix = pattern.slice(0, -1); // Remove "*"
    return eventType.startsWith(prefix);
  }

  return eventType === pattern;
}

// ============================================================================
// Event Bus Implementation
// ============================================================================

export class EventBus {
  private readonly subscriptions = new Map<string, SubscriptionRecord[]>();
  private readonly history: AgentEvent[] = [];
  private readonly config: Required<EventBusConfig>;

  private subscriptionIdCounter = 0;
  private totalEmitted = 0;
  private totalHandled = 0;
  private handlerErrors = 0;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 1000,
      historyTtlMs: config.historyTtlMs ?? 5 * 60 * 1000,
    };
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  emit<K extends AgentEventType>(
    type: K,
    payload: AgentEventMap[K],
    options: EmitOptions = {}
  ): AgentEvent<K> {
    const event: AgentEvent<K> = {
      type,
      payload,
      meta: {
        id: this.generateEventId(),
        timestamp: Date.now(),
        source: options.source,
        priority: options.priority ?? "normal",
      },
    };
    this.processEvent(event);
    return event;
  }

  /**
   * Subscribe to one event type.
   */
  on<K extends AgentEventType>(
    type: K,
    handler: EventHandler<AgentEvent<K>>,
    options: SubscriptionOptions<AgentEvent<K>> = {}
  ): Subscription {
    const { filter } = options;
    return this.addRecord(
      type,
      (event) => isEventType(event, type) && (!filter || filter(event)),
      (event) => (isEventType(event, type) ? handler(event) : undefined),
      options
    );
  }

  /**
   * Subscribe to every event matching a wildcard:
   * - Category wildcard: "tool:*"
   * - Full wildcard: "*"
   */
  onPattern(
    pattern: WildcardPattern,
    handler: EventHandler,
    options: SubscriptionOptions = {}
  ): Subscription {
    const { filter } = options;
    return this.addRecord(
      pattern,
      (event) => matchesPattern(event.type, pattern) && (!filter || filter(event)),
      handler,
      options
    );
  }

  once<K extends AgentEventType>(
    type: K,
    handler: EventHandler<AgentEvent<K>>,
    options: Omit<SubscriptionOptions<AgentEvent<K>>, "once"> = {}
  ): Subscription {
    return this.on(type, handler, { ...options, once: true });
  }

  /**
   * Wait for the next matching event.
   */
  waitFor<K extends AgentEventType>(
    type: K,
    options: { timeoutMs?: number; filter?: (event: AgentEvent<K>) => boolean } = {}
  ): Promise<AgentEvent<K>> {
    return new Promise((resolve, reject) => {
      const timeoutMs = options.timeoutMs ?? 30_000;

      const timeout = setTimeout(() => {
        subscription.unsubscribe();
        reject(new Error(`Timeout waiting for event: ${type}`));
      }, timeoutMs);

      const subscription = this.once(
        type,
        (event) => {
          clearTimeout(timeout);
          resolve(event);
        },
        { filter: options.filter }
      );
    });
  }

  /**
   * Get event history, optionally narrowed to a type or wildcard.
   */
  getHistory(pattern?: string, limit?: number): AgentEvent[] {
    this.pruneHistory();

    let events = this.history;

    if (pattern) {
      events = events.filter((e) => matchesPattern(e.type, pattern));
    }

    if (limit) {
      events = events.slice(-limit);
    }

    return [...events];
  }

  getStats(): EventBusStats {
    let activeSubscriptions = 0;
    for (const subs of this.subscriptions.values()) {
      activeSubscriptions += subs.length;
    }

    return {
      totalEmitted: this.totalEmitted,
      totalHandled: this.totalHandled,
      handlerErrors: this.handlerErrors,
      activeSubscriptions,
      historySize: this.history.length,
    };
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private addRecord(
    pattern: string,
    accepts: (event: AgentEvent) => boolean,
    deliver: (event: AgentEvent) => void | Promise<void>,
    options: { priority?: EventPriority; once?: boolean; replay?: boolean }
  ): Subscription {
    const id = `sub_${++this.subscriptionIdCounter}`;
    const record: SubscriptionRecord = {
      id,
      pattern,
      priority: options.priority ?? "normal",
      once: options.once ?? false,
      accepts,
      deliver,
    };

    const existing = this.subscriptions.get(pattern) ?? [];
    existing.push(record);
    existing.sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);
    this.subscriptions.set(pattern, existing);

    if (options.replay) {
      this.replayEvents(record);
    }

    return {
      id,
      pattern,
      unsubscribe: () => this.unsubscribe(pattern, id),
    };
  }

  private processEvent(event: AgentEvent): void {
    this.totalEmitted++;

    this.history.push(event);
    if (this.history.length > this.config.maxHistorySize) {
      this.history.shift();
    }

    const handlers: SubscriptionRecord[] = [];
    for (const records of this.subscriptions.values()) {
      for (const record of records) {
        if (record.accepts(event)) {
          handlers.push(record);
        }
      }
    }
    handlers.sort((a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]);

    for (const record of handlers) {
      this.executeHandler(record, event);
    }
  }

  private executeHandler(record: SubscriptionRecord, event: AgentEvent): void {
    this.totalHandled++;

    if (record.once) {
      this.unsubscribe(record.pattern, record.id);
    }

    try {
      const result = record.deliver(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportHandlerError(record, event, error));
      }
    } catch (error) {
      this.reportHandlerError(record, event, error);
    }
  }

  private reportHandlerError(record: SubscriptionRecord, event: AgentEvent, error: unknown): void {
    this.handlerErrors++;
    logger.error(`Handler error for ${event.type}`, {
      err: error instanceof Error ? error.message : String(error),
      eventType: event.type,
      pattern: record.pattern,
    });
  }

  private replayEvents(record: SubscriptionRecord): void {
    this.pruneHistory();

    for (const event of this.history.filter(record.accepts)) {
      this.executeHandler(record, event);
      if (record.once) {
        return;
      }
    }
  }

  private pruneHistory(): void {
    const cutoff = Date.now() - this.config.historyTtlMs;
    while (this.history.length > 0 && this.history[0].meta.timestamp < cutoff) {
      this.history.shift();
    }
  }

  private unsubscribe(pattern: string, id: string): void {
    const records = this.subscriptions.get(pattern);
    if (!records) {
      return;
    }

    const index = records.findIndex((r) => r.id === id);
    if (index !== -1) {
      records.splice(index, 1);
      if (records.length === 0) {
        this.subscriptions.delete(pattern);
      }
    }
  }

  private generateEventId(): string {
    return `evt_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
  }
}

export function createEventBus(config?: EventBusConfig): EventBus {
  return new EventBus(config);
}
