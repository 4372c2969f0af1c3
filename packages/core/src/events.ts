/**
 * @forgeloop/core — Events
 *
 * Everything a session does is observable through a single event stream.
 */

import type { RollbackOutcome } from './environment.js';
import type { FinalState } from './operation.js';
import type { TerminationReason } from './review.js';
import type { StrategyName, ToolName } from './tools.js';

// ---------------------------------------------------------------------------
// Event payloads
// ---------------------------------------------------------------------------

export interface SessionStartedPayload {
  workspace: string;
  goal: string;
  maxOperations: number;
  maxAttempts: number;
}

export interface SessionCompletedPayload {
  reason: TerminationReason;
  operationsStarted: number;
}

export interface BatchStartedPayload {
  size: number;
  atomic: boolean;
}

export interface BatchCompletedPayload {
  succeeded: number;
  failed: number;
  rolledBack: number;
  skipped: number;
  truncated: boolean;
}

export interface OperationStartedPayload {
  toolName: ToolName;
  dependencies: string[];
}

export interface OperationAttemptPayload {
  toolName: ToolName;
  attemptNumber: number;
  strategy: StrategyName;
  success: boolean;
  durationMs: number;
}

export interface OperationCompletedPayload {
  toolName: ToolName;
  finalState: FinalState;
  attemptCount: number;
}

export interface OperationRolledBackPayload {
  toolName: ToolName;
  rollback: RollbackOutcome;
}

export interface OperationSkippedPayload {
  toolName: ToolName;
  reason: string;
}

// ---------------------------------------------------------------------------
// Event types
// ---------------------------------------------------------------------------

export interface OperationEventPayloads {
  // Session lifecycle
  'session.started': SessionStartedPayload;
  'session.completed': SessionCompletedPayload;
  // Batches
  'batch.started': BatchStartedPayload;
  'batch.completed': BatchCompletedPayload;
  // Operations
  'operation.started': OperationStartedPayload;
  'operation.attempt': OperationAttemptPayload;
  'operation.completed': OperationCompletedPayload;
  'operation.rolled_back': OperationRolledBackPayload;
  'operation.skipped': OperationSkippedPayload;
}

export type OperationEventType = keyof OperationEventPayloads;

// ---------------------------------------------------------------------------
// Event envelope
// ---------------------------------------------------------------------------

export interface EventEnvelope<K extends OperationEventType> {
  eventId: string;
  sessionId: string;
  operationId: string | null;
  batchId: string | null;
  /** Monotonically increasing within the session */
  seq: number;
  /** Unix timestamp in milliseconds */
  ts: number;
  type: K;
  payload: OperationEventPayloads[K];
}

/** Any session event, discriminated on `type`. */
export type OperationEvent = {
  [K in OperationEventType]: EventEnvelope<K>;
}[OperationEventType];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/** What an emitter supplies; the session fills in ids, seq and timestamp. */
export type OperationEventInit = DistributiveOmit<
  OperationEvent,
  'eventId' | 'sessionId' | 'seq' | 'ts'
>;
