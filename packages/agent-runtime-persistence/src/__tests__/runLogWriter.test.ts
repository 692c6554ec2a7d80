import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { createEventBus } from "@warden/agent-runtime-control";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { type RunLogLine, RunLogWriter } from "../runLog/runLogWriter";

describe("RunLogWriter", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), "run-log-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("should append one JSON line per session event in order", async () => {
    const bus = createEventBus();
    const writer = new RunLogWriter({ directory, sessionId: "s-1", eventBus: bus });

    bus.emit("turn:started", { sessionId: "s-1", turnIndex: 0 });
    bus.emit("turn:started", { sessionId: "s-2", turnIndex: 0 });
    bus.emit("checkpoint:saved", { sessionId: "s-1", turnIndex: 0 });
    await writer.close();

    const content = await readFile(path.join(directory, "s-1.jsonl"), "utf8");
    const lines = content
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line) as RunLogLine);

    expect(lines.map((line) => line.type)).toEqual(["turn:started", "checkpoint:saved"]);
    expect(lines[0]).toEqual(
      expect.objectContaining({ sessionId: "s-1", payload: { sessionId: "s-1", turnIndex: 0 } })
    );
    expect(writer.failedWrites).toBe(0);
  });

  it("should stop writing after close", async () => {
    const bus = createEventBus();
    const writer = new RunLogWriter({ directory, sessionId: "s-1", eventBus: bus });

    bus.emit("turn:started", { sessionId: "s-1", turnIndex: 0 });
    await writer.close();
    bus.emit("turn:started", { sessionId: "s-1", turnIndex: 1 });
    await writer.flush();

    const content = await readFile(writer.filePath, "utf8");
    expect(content.trim().split("\n")).toHaveLength(1);
  });
});
