/**
 * @forgeloop/core — Environment state types
 *
 * Session-scoped view of the workspace. Never persisted across sessions.
 */

export interface FileStateEntry {
  /** Workspace-relative path */
  path: string;
  exists: boolean;
  isDirectory: boolean;
  size: number;
  /** SHA-256 of the bytes on disk (files only) */
  hash: string | null;
  /** Three-digit octal, e.g. "644" */
  permissions: string | null;
  lastVerifiedAt: number;
}

export interface WorkspaceState {
  root: string;
  rootValid: boolean;
  /** Bytes available to the current user, when the platform reports it */
  freeBytes: number | null;
  checkedAt: number;
}

export interface RollbackPoint {
  checkpointId: string;
  operationId: string | null;
  batchId: string | null;
  createdAt: number;
  /** file_states as they were when the point was pushed */
  fileStates: Record<string, FileStateEntry>;
  /** Position in the rollback journal where this point begins */
  journalIndex: number;
}

export interface EnvironmentState {
  workspaceState: WorkspaceState;
  fileStates: Record<string, FileStateEntry>;
  /** Operation ids in execution order */
  operationSequence: string[];
  rollbackPoints: RollbackPoint[];
}

export interface RollbackFailure {
  path: string;
  reason: string;
}

export interface RollbackOutcome {
  checkpointId: string;
  /** False when any path could not be restored (partial rollback) */
  success: boolean;
  restored: string[];
  failures: RollbackFailure[];
}
