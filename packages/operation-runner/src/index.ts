/**
 * @forgeloop/operation-runner
 *
 * Executes, verifies, retries and rolls back workspace operations within a
 * bounded session.
 */

export {
  countOutcomes,
  OperationBatchCoordinator,
  type BatchCoordinatorDeps,
  type BatchCounts,
  type BatchResult,
  type OperationBudget,
} from './batch-coordinator.js';
export {
  resolveSessionConfig,
  type EnvSource,
  type SessionConfig,
} from './config.js';
export { env, type Env } from './env.js';
export {
  diffFileStates,
  EnvironmentStateTracker,
  type RollbackPointRequest,
} from './environment-tracker.js';
export { condense, HistoryManager } from './history-manager.js';
export {
  assertTransition,
  OperationExecutor,
  type ExecuteOptions,
  type OperationExecutorDeps,
} from './operation-executor.js';
export { DEFAULT_MAX_ATTEMPTS, RetryStrategy } from './retry-strategy.js';
export { buildReview, type ReviewInput } from './review.js';
export {
  isWorkspaceActive,
  Session,
  type SessionEventListener,
  type SessionOptions,
} from './session.js';
export {
  describeRequest,
  isBatchRequest,
  runSession,
  SessionLoop,
  type PlanStep,
  type SessionPlan,
} from './session-loop.js';
