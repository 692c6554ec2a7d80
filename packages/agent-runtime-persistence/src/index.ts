/**
 * Agent Runtime Persistence
 *
 * Checkpoints, decision logs and JSONL run logs.
 */

export { CheckpointStore, type CheckpointStoreConfig } from "./checkpoint/checkpointStore";
export { InMemoryCheckpointPersistence } from "./checkpoint/inMemoryCheckpointPersistence";
export {
  SQLiteCheckpointPersistence,
  type SQLiteCheckpointPersistenceConfig,
} from "./checkpoint/sqliteCheckpointPersistence";
export {
  InMemoryDecisionLog,
  SQLiteDecisionLog,
  type SQLiteDecisionLogConfig,
} from "./decisions/decisionLog";
export { type RunLogLine, RunLogWriter, type RunLogWriterConfig } from "./runLog/runLogWriter";
