/**
 * Failure Tracker
 *
 * Counts consecutive failures per tool across turns. When a tool reaches the
 * threshold the loop injects a reflexion hint and the count starts over.
 */

import type { ToolResult } from "@warden/agent-runtime-core";

export function reflexionHint(toolName: string, failures: number): string {
  return (
    `The tool \`${toolName}\` has failed ${failures} times in a row. ` +
    "Try a different approach or use a different tool to accomplish the task."
  );
}

export class FailureTracker {
  private readonly consecutive = new Map<string, number>();

  constructor(private readonly threshold: number) {}

  /**
   * Record one result. Returns a reflexion hint when the tool's consecutive
   * failures reach the threshold.
   */
  record(result: ToolResult): string | undefined {
    if (result.status === "success") {
      this.consecutive.delete(result.toolName);
      return undefined;
    }

    const failures = (this.consecutive.get(result.toolName) ?? 0) + 1;
    if (this.threshold > 0 && failures >= this.threshold) {
      this.consecutive.delete(result.toolName);
      return reflexionHint(result.toolName, failures);
    }
    this.consecutive.set(result.toolName, failures);
    return undefined;
  }

  failures(toolName: string): number {
    return this.consecutive.get(toolName) ?? 0;
  }

  reset(): void {
    this.consecutive.clear();
  }
}
