import type { CheckpointPersistence } from "@warden/agent-runtime-core";

interface StoredCheckpoint {
  turnIndex: number;
  blob: string;
}

export class InMemoryCheckpointPersistence implements CheckpointPersistence {
  private readonly checkpoints = new Map<string, StoredCheckpoint>();

  async save(sessionId: string, turnIndex: number, blob: string): Promise<void> {
    this.checkpoints.set(sessionId, { turnIndex, blob });
  }

  async loadLatest(sessionId: string): Promise<string | undefined> {
    return this.checkpoints.get(sessionId)?.blob;
  }

  async delete(sessionId: string): Promise<void> {
    this.checkpoints.delete(sessionId);
  }

  sessionIds(): string[] {
    return Array.from(this.checkpoints.keys());
  }
}
