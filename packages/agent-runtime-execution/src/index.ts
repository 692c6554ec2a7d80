/**
 * Agent Runtime Execution
 *
 * The turn loop and everything that mediates a tool call: security gate,
 * scheduling, the guardian watchdog and goal evaluation.
 */

// Security
export { summarizeToolCall } from "./security/approvalSummary";
export {
  collectStringLeaves,
  compileDangerousPatterns,
  type DangerousPattern,
  DEFAULT_DANGEROUS_PATTERNS,
  findDangerousPattern,
  mergePatternDefinitions,
  type PatternMatch,
} from "./security/dangerousPatterns";
export { overlayPolicy, resolveToolTier } from "./security/policyOverlay";
export {
  applyThresholds,
  type DecisionContext,
  type GateEvaluation,
  SecurityGate,
  type SecurityGateConfig,
} from "./security/securityGate";

// Tools
export { defineTool, InMemoryToolRegistry } from "./tools/toolRegistry";

// Guardian
export {
  callSignature,
  GuardianWatchdog,
  type GuardianWatchdogOptions,
  stableStringify,
  type WatchdogSnapshot,
} from "./guardian/guardianWatchdog";

// Goals
export {
  type ConstraintCheck,
  createGoalEvaluator,
  type CriterionResult,
  type CustomPredicate,
  type GoalEvaluation,
  type GoalEvaluationContext,
  GoalEvaluator,
  type GoalEvaluatorOptions,
  weightedScore,
} from "./goals/goalEvaluator";
export {
  buildJudgePrompt,
  createLlmJudge,
  DEFAULT_RETRY_HINT,
  type GoalJudge,
  type JudgeReply,
  LlmJudge,
  type LlmJudgeOptions,
  parseJudgeReply,
} from "./goals/llmJudge";

// Orchestrator
export {
  AgentLoop,
  type AgentLoopConfig,
  createAgentLoop,
  latestOutput,
  renderToolResult,
  type ResumeOptions,
  type RunOptions,
  type RunResult,
} from "./orchestrator/agentLoop";
export {
  createDependencyAnalyzer,
  type DependencyAnalysis,
  type DependencyAnalysisOptions,
  DependencyAnalyzer,
  type ToolConcurrencyResolver,
} from "./orchestrator/dependencyAnalyzer";
export { FailureTracker, reflexionHint } from "./orchestrator/failureTracker";
export {
  type AccumulatedStep,
  finalizeToolCall,
  type PendingToolCall,
  StreamAccumulator,
} from "./orchestrator/streamAccumulator";
export {
  compactToolOutput,
  createToolCallExecutor,
  type ToolBatchContext,
  type ToolBatchOutcome,
  ToolCallExecutor,
  type ToolCallExecutorConfig,
  TRUNCATION_MARKER,
} from "./orchestrator/toolCallExecutor";
export {
  buildSystemPrompt,
  createTurnExecutor,
  DEFAULT_SYSTEM_PROMPT,
  TurnExecutor,
  type TurnExecutorConfig,
} from "./orchestrator/turnExecutor";

// Utils
export { naturalCompare } from "./utils/naturalCompare";
export { retry, type RetryOptions, type RetryResult, sleep } from "./utils/retry";
