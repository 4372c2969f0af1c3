/**
 * @forgeloop/operation-runner — History Manager
 *
 * Two logs: the transient, attempt-by-attempt record of every operation in
 * this session, and the durable condensed entry written when a record is
 * sealed.
 */

import {
  type AttemptRecord,
  createLogger,
  type HistoryEntry,
  isFinalState,
  now,
  type OperationRecord,
} from '@forgeloop/core';
import type { HistoryStore } from '@forgeloop/history-store';

const log = createLogger('HistoryManager');

export class HistoryManager {
  private records = new Map<string, OperationRecord>();

  constructor(
    private store: HistoryStore,
    readonly sessionId: string,
  ) {}

  // -------------------------------------------------------------------------
  // Transient log
  // -------------------------------------------------------------------------

  begin(record: OperationRecord): void {
    if (this.records.has(record.operationId)) {
      throw new Error(`Operation already recorded: ${record.operationId}`);
    }
    this.records.set(record.operationId, record);
  }

  get(operationId: string): OperationRecord | undefined {
    return this.records.get(operationId);
  }

  /** Records in the order their operations began. */
  list(): OperationRecord[] {
    return [...this.records.values()];
  }

  appendAttempt(operationId: string, attempt: AttemptRecord): void {
    const record = this.records.get(operationId);
    if (!record) throw new Error(`Operation not found: ${operationId}`);
    if (record.finalState) {
      throw new Error(`Operation ${operationId} is sealed`);
    }
    record.attempts.push(attempt);
  }

  // -------------------------------------------------------------------------
  // Durable log
  // -------------------------------------------------------------------------

  /**
   * Condense a sealed record into the durable log.
   * Throws when the record has no terminal state yet.
   */
  seal(record: OperationRecord): HistoryEntry {
    const entry = this.store.append(condense(record));
    log.debug(`Sealed ${record.operationId}: ${entry.summary}`);
    return entry;
  }

  entries(): HistoryEntry[] {
    return this.store.query({ sessionId: this.sessionId, order: 'asc' });
  }

  /** Drop the transient log at session teardown. */
  clear(): void {
    this.records.clear();
  }
}

// ---------------------------------------------------------------------------
// Condensation
// ---------------------------------------------------------------------------

export function condense(record: OperationRecord): HistoryEntry {
  const finalState = record.finalState;
  if (!finalState || !isFinalState(record.state)) {
    throw new Error(`Cannot condense unsealed operation ${record.operationId}`);
  }

  const files = new Set<string>();
  for (const attempt of record.attempts) {
    for (const path of attempt.result.affectedFiles) files.add(path);
  }

  return {
    operationId: record.operationId,
    sessionId: record.sessionId,
    batchId: record.batchId,
    toolName: record.toolName,
    summary: summarize(record),
    filesAffected: [...files],
    success: finalState === 'succeeded',
    finalState,
    attemptCount: record.attempts.length,
    importantWarnings: record.warnings
      .filter((w) => w.userRelevant)
      .map((w) => w.message),
    stateChanges: record.netChanges.map((c) => ({ ...c })),
    createdAt: record.endTime ?? now(),
  };
}

function summarize(record: OperationRecord): string {
  const target = record.target ?? '(unresolved path)';
  const attempts = record.attempts.length;
  const plural = attempts === 1 ? '' : 's';

  switch (record.finalState) {
    case 'succeeded': {
      const last = record.attempts.at(-1);
      return last ? last.result.result : `${record.toolName} ${target}`;
    }
    case 'skipped':
      return `Skipped ${record.toolName} ${target}: ${record.error ?? 'not attempted'}`;
    default:
      return `${record.toolName} ${target} ${record.finalState} after ${attempts} attempt${plural}: ${record.error ?? 'unknown error'}`;
  }
}
