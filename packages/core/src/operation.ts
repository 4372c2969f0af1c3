/**
 * @forgeloop/core — Operation types
 *
 * Operation lifecycle state machine, per-attempt records, and the condensed
 * history entry that outlives a session.
 */

import type { EnvironmentState, RollbackOutcome } from './environment.js';
import type { VerificationReport } from './verification.js';
import type { StrategyName, ToolName, ToolResult } from './tools.js';

// ---------------------------------------------------------------------------
// Operation state machine
// ---------------------------------------------------------------------------

/**
 * pending → pre_check → executing → verifying → (retry → executing)* →
 * succeeded | rolled_back | failed. Batches may skip a pending or
 * pre-checked operation.
 */
export type OperationState =
  | 'pending'
  | 'pre_check'
  | 'executing'
  | 'verifying'
  | 'retry'
  | 'succeeded'
  | 'failed'
  | 'rolled_back'
  | 'skipped';

export type FinalState = Extract<
  OperationState,
  'succeeded' | 'failed' | 'rolled_back' | 'skipped'
>;

/** Valid state transitions */
export const VALID_TRANSITIONS: Record<OperationState, OperationState[]> = {
  pending: ['pre_check', 'skipped'],
  pre_check: ['executing', 'failed', 'skipped'],
  executing: ['verifying', 'retry'],
  verifying: ['succeeded', 'retry'],
  retry: ['executing', 'failed', 'rolled_back'],
  succeeded: [],
  failed: [],
  rolled_back: [],
  skipped: [],
};

export function isFinalState(state: OperationState): state is FinalState {
  return VALID_TRANSITIONS[state].length === 0;
}

export type FailureKind =
  | 'dependency'
  | 'execution'
  | 'verification'
  | 'rollback'
  | 'limit';

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface OperationRequest {
  /** Assigned by the executor when omitted */
  operationId?: string;
  toolName: ToolName;
  args: Record<string, unknown>;
  /** Operation ids that must have succeeded earlier in this session */
  dependencies?: string[];
  /** Plan step text shown in the review */
  description?: string;
}

export interface BatchRequest {
  batchId?: string;
  description?: string;
  /** Operation ids that must have succeeded before any member starts */
  dependencies?: string[];
  operations: OperationRequest[];
  /** Revert the whole batch when a critical member does not succeed */
  atomic?: boolean;
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface StateChange {
  path: string;
  change: 'created' | 'modified' | 'deleted' | 'unchanged';
  beforeHash: string | null;
  afterHash: string | null;
}

export interface AttemptRecord {
  attemptNumber: number;
  strategy: StrategyName;
  result: ToolResult;
  /** Null when the primitive faulted before there was anything to verify */
  report: VerificationReport | null;
  timestamp: number;
  stateChanges: StateChange[];
}

export interface RecordWarning {
  message: string;
  userRelevant: boolean;
}

export interface StateTransition {
  from: OperationState;
  to: OperationState;
  at: number;
}

/** Full trace of one logical operation across all attempts. */
export interface OperationRecord {
  operationId: string;
  batchId: string | null;
  sessionId: string;
  startTime: number;
  endTime: number | null;
  toolName: ToolName;
  args: Record<string, unknown>;
  dependencies: string[];
  description: string | null;
  /** Workspace-relative target, when the path could be resolved */
  target: string | null;
  environmentState: EnvironmentState;
  state: OperationState;
  transitions: StateTransition[];
  attempts: AttemptRecord[];
  finalState: FinalState | null;
  failureKind: FailureKind | null;
  /** Why the operation did not succeed */
  error: string | null;
  /** Carried forward to the review even when the operation succeeded */
  warnings: RecordWarning[];
  rollback: RollbackOutcome | null;
  /** Target state at start against target state once sealed (after any rollback) */
  netChanges: StateChange[];
}

/** Durable, condensed record. Never mutated after creation. */
export interface HistoryEntry {
  operationId: string;
  sessionId: string;
  batchId: string | null;
  toolName: ToolName;
  summary: string;
  filesAffected: string[];
  success: boolean;
  finalState: FinalState;
  attemptCount: number;
  importantWarnings: string[];
  /** Net diff from operation start to end, not per attempt */
  stateChanges: StateChange[];
  createdAt: number;
}
