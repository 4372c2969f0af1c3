/**
 * @forgeloop/core
 *
 * Shared types, the operation profile table, and utilities.
 * This package has no runtime dependencies on any other forgeloop package.
 */

// Tools: primitive interface and result envelope
export type {
  CheckValue,
  InvokeContext,
  RollbackEntry,
  RollbackInfo,
  StrategyName,
  ToolContext,
  ToolHandler,
  ToolInvoker,
  ToolName,
  ToolOutput,
  ToolResult,
  VerificationGroups,
} from './tools.js';
export { TOOL_NAMES, isToolName } from './tools.js';

// Operation type profiles
export type {
  OperationCategory,
  OperationTypeProfile,
  Strictness,
} from './operation-types.js';
export {
  OPERATION_TYPES,
  TOOL_CATEGORIES,
  getOperationProfile,
} from './operation-types.js';

// Operations: lifecycle state machine and records
export type {
  AttemptRecord,
  BatchRequest,
  FailureKind,
  FinalState,
  HistoryEntry,
  OperationRecord,
  OperationRequest,
  OperationState,
  RecordWarning,
  StateChange,
  StateTransition,
} from './operation.js';
export { VALID_TRANSITIONS, isFinalState } from './operation.js';

// Environment
export type {
  EnvironmentState,
  FileStateEntry,
  RollbackFailure,
  RollbackOutcome,
  RollbackPoint,
  WorkspaceState,
} from './environment.js';

// Verification
export type {
  CheckCategory,
  CheckOutcome,
  VerificationReport,
  VerificationWarning,
} from './verification.js';
export { CHECK_CATEGORIES } from './verification.js';

// Events
export type {
  BatchCompletedPayload,
  BatchStartedPayload,
  EventEnvelope,
  OperationAttemptPayload,
  OperationCompletedPayload,
  OperationEvent,
  OperationEventInit,
  OperationEventPayloads,
  OperationEventType,
  OperationRolledBackPayload,
  OperationSkippedPayload,
  OperationStartedPayload,
  SessionCompletedPayload,
  SessionStartedPayload,
} from './events.js';

// Review
export type {
  ReviewOperationLine,
  ReviewStats,
  SessionReview,
  TerminationReason,
  VerificationStatus,
} from './review.js';

// Utilities
export { formatPermissions, generateId, hashContent, now } from './utils.js';
export type { LogLevel, Logger } from './logger.js';
export { createLogger, getLogLevel, setLogLevel } from './logger.js';
