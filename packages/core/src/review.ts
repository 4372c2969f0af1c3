/**
 * @forgeloop/core — Session review types
 *
 * The end-of-session report. A pure projection over sealed operation
 * records; formatting belongs to whatever shell displays it.
 */

import type { RollbackOutcome, WorkspaceState } from './environment.js';
import type { FinalState } from './operation.js';
import type { CheckCategory } from './verification.js';
import type { ToolName } from './tools.js';

export type TerminationReason = 'completed' | 'operation_limit' | 'cancelled';

export type VerificationStatus =
  | 'passed'
  | 'passed_with_warnings'
  | 'failed'
  | 'not_run';

export interface ReviewOperationLine {
  operationId: string;
  batchId: string | null;
  toolName: ToolName;
  files: string[];
  status: FinalState;
  verification: VerificationStatus;
  attempts: number;
  summary: string;
}

export interface ReviewStats {
  total: number;
  succeeded: number;
  failed: number;
  rolledBack: number;
  skipped: number;
  successRate: number;
  byTool: Partial<Record<ToolName, number>>;
  /** failure kind / error code → occurrences */
  commonErrors: Record<string, number>;
}

export interface SessionReview {
  sessionId: string;
  goal: string;
  termination: {
    reason: TerminationReason;
    message: string;
  };
  plan: {
    steps: string[];
    requested: number;
    started: number;
    /** Plan steps never issued (session limit or cancellation) */
    notStarted: string[];
  };
  operations: ReviewOperationLine[];
  environmentChanges: {
    created: string[];
    modified: string[];
    deleted: string[];
  };
  verification: Record<CheckCategory, { passed: number; failed: number }>;
  warnings: string[];
  partialRollbacks: RollbackOutcome[];
  stats: ReviewStats;
  workspace: WorkspaceState;
  suggestions: string[];
}
