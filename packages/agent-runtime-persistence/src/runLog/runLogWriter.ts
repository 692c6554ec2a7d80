/**
 * Run Log Writer
 *
 * Appends every event of one session to `<dir>/<sessionId>.jsonl` for audit.
 * Writes are queued so lines land in emission order.
 */

import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

import type { AgentEvent, EventBus, Subscription } from "@warden/agent-runtime-control";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";

const logger = getLogger("run-log");

export interface RunLogLine {
  timestamp: string;
  sessionId: string;
  type: string;
  payload: unknown;
}

export interface RunLogWriterConfig {
  directory: string;
  sessionId: string;
  eventBus: EventBus;
}

export class RunLogWriter {
  readonly filePath: string;
  private readonly directory: string;
  private readonly subscription: Subscription;
  private queue: Promise<void>;
  private failures = 0;

  constructor(config: RunLogWriterConfig) {
    this.directory = config.directory;
    this.filePath = path.join(config.directory, `${config.sessionId}.jsonl`);
    this.queue = mkdir(config.directory, { recursive: true }).then(
      () => undefined,
      (error: unknown) => this.reportFailure(error)
    );
    this.subscription = config.eventBus.onPattern("*", (event) => this.append(event), {
      priority: "low",
      filter: (event) => event.payload.sessionId === config.sessionId,
    });
  }

  /** Resolves once every queued line has been written. */
  flush(): Promise<void> {
    return this.queue;
  }

  /** Stops listening and waits for pending writes. */
  async close(): Promise<void> {
    this.subscription.unsubscribe();
    await this.flush();
  }

  get failedWrites(): number {
    return this.failures;
  }

  private append(event: AgentEvent): void {
    const line: RunLogLine = {
      timestamp: new Date(event.meta.timestamp).toISOString(),
      sessionId: event.payload.sessionId,
      type: event.type,
      payload: event.payload,
    };
    const serialized = `${JSON.stringify(line)}\n`;
    this.queue = this.queue.then(() =>
      appendFile(this.filePath, serialized, "utf8").catch((error: unknown) =>
        this.reportFailure(error)
      )
    );
  }

  private reportFailure(error: unknown): void {
    this.failures++;
    logger.warn("Run log write failed", {
      directory: this.directory,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
