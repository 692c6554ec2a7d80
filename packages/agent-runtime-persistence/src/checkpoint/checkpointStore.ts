/**
 * Checkpoint Store
 *
 * Serializes a session into a versioned record and reads it back. Records
 * that do not parse or fail validation surface as CorruptCheckpointError,
 * never as a silently missing session.
 */

import {
  CHECKPOINT_VERSION,
  type CheckpointPersistence,
  type CheckpointRecord,
  checkpointRecordSchema,
  CorruptCheckpointError,
  type Session,
} from "@warden/agent-runtime-core";
import { getLogger } from "@warden/agent-runtime-telemetry/logging";

const logger = getLogger("checkpoint-store");

export interface CheckpointStoreConfig {
  persistence: CheckpointPersistence;
  now?: () => number;
}

export class CheckpointStore {
  private readonly persistence: CheckpointPersistence;
  private readonly now: () => number;

  constructor(config: CheckpointStoreConfig) {
    this.persistence = config.persistence;
    this.now = config.now ?? Date.now;
  }

  /**
   * Persist the session as its current checkpoint, replacing any earlier one.
   */
  async save(session: Session): Promise<CheckpointRecord> {
    const record: CheckpointRecord = {
      version: CHECKPOINT_VERSION,
      sessionId: session.id,
      turnIndex: session.turns.length - 1,
      session,
      timestamp: this.now(),
    };
    await this.persistence.save(session.id, record.turnIndex, JSON.stringify(record));
    logger.debug("Checkpoint saved", { sessionId: session.id, turnIndex: record.turnIndex });
    return record;
  }

  /**
   * @throws CorruptCheckpointError when a stored checkpoint cannot be read back
   */
  async load(sessionId: string): Promise<CheckpointRecord | undefined> {
    const blob = await this.persistence.loadLatest(sessionId);
    if (blob === undefined) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(blob);
    } catch (error) {
      throw new CorruptCheckpointError(sessionId, "checkpoint is not valid JSON", { cause: error });
    }

    const parsed = checkpointRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first ? `${first.path.join(".") || "(root)"}: ${first.message}` : "unknown";
      throw new CorruptCheckpointError(sessionId, `checkpoint failed validation at ${where}`, {
        cause: parsed.error,
      });
    }

    if (parsed.data.sessionId !== sessionId || parsed.data.session.id !== sessionId) {
      throw new CorruptCheckpointError(
        sessionId,
        `checkpoint belongs to session ${parsed.data.session.id}`
      );
    }

    return parsed.data;
  }

  async delete(sessionId: string): Promise<void> {
    await this.persistence.delete(sessionId);
  }
}
