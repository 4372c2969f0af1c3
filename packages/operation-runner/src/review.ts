/**
 * @forgeloop/operation-runner — Session review
 *
 * Pure projection over sealed operation records. Nothing here touches the
 * workspace or the history store.
 */

import { dirname } from 'node:path';
import {
  type CheckCategory,
  type OperationRecord,
  type ReviewOperationLine,
  type ReviewStats,
  type RollbackOutcome,
  type SessionReview,
  type TerminationReason,
  type ToolName,
  type VerificationStatus,
  type WorkspaceState,
} from '@forgeloop/core';

export interface ReviewInput {
  sessionId: string;
  goal: string;
  reason: TerminationReason;
  maxOperations: number;
  /** One line per planned operation, in plan order */
  steps: string[];
  notStarted: string[];
  records: readonly OperationRecord[];
  /** Reverts of atomic batches, alongside per-operation rollbacks */
  batchRollbacks?: readonly RollbackOutcome[];
  workspace: WorkspaceState;
}

export function buildReview(input: ReviewInput): SessionReview {
  const { records } = input;
  const started = records.filter(wasStarted).length;

  const partialRollbacks = [
    ...records.flatMap((r) => (r.rollback && !r.rollback.success ? [r.rollback] : [])),
    ...(input.batchRollbacks ?? []).filter((r) => !r.success),
  ];

  const environmentChanges = aggregateChanges(records);
  const stats = computeStats(records);

  return {
    sessionId: input.sessionId,
    goal: input.goal,
    termination: {
      reason: input.reason,
      message: terminationMessage(input, started),
    },
    plan: {
      steps: [...input.steps],
      requested: input.steps.length,
      started,
      notStarted: [...input.notStarted],
    },
    operations: records.map(toLine),
    environmentChanges,
    verification: aggregateChecks(records),
    warnings: records.flatMap((r) =>
      r.warnings.map((w) => `${r.target ?? r.toolName}: ${w.message}`),
    ),
    partialRollbacks,
    stats,
    workspace: { ...input.workspace },
    suggestions: suggest(input, stats, environmentChanges, partialRollbacks),
  };
}

// ---------------------------------------------------------------------------
// Per-operation lines
// ---------------------------------------------------------------------------

/** Skipped batch members never reach pre-check. */
function wasStarted(record: OperationRecord): boolean {
  return record.transitions[0]?.to === 'pre_check';
}

function toLine(record: OperationRecord): ReviewOperationLine {
  const files = new Set<string>();
  for (const attempt of record.attempts) {
    for (const path of attempt.result.affectedFiles) files.add(path);
  }
  if (files.size === 0 && record.target) files.add(record.target);

  const last = record.attempts.at(-1);
  return {
    operationId: record.operationId,
    batchId: record.batchId,
    toolName: record.toolName,
    files: [...files],
    status: record.finalState ?? 'failed',
    verification: verificationStatus(record),
    attempts: record.attempts.length,
    summary: last?.result.result ?? record.error ?? '',
  };
}

function verificationStatus(record: OperationRecord): VerificationStatus {
  const report = lastReport(record);
  if (!report) return 'not_run';
  if (!report.success) return 'failed';
  return report.warnings.length > 0 ? 'passed_with_warnings' : 'passed';
}

function lastReport(record: OperationRecord) {
  for (let i = record.attempts.length - 1; i >= 0; i--) {
    const report = record.attempts[i]?.report;
    if (report) return report;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

/**
 * Net effect per path across the whole session: a file created and later
 * deleted does not appear at all.
 */
function aggregateChanges(records: readonly OperationRecord[]): SessionReview['environmentChanges'] {
  const paths = new Map<string, { existedBefore: boolean; existsAfter: boolean }>();

  for (const record of records) {
    for (const change of record.netChanges) {
      if (change.change === 'unchanged') continue;
      const existsAfter = change.change !== 'deleted';
      const seen = paths.get(change.path);
      if (seen) {
        seen.existsAfter = existsAfter;
      } else {
        paths.set(change.path, {
          existedBefore: change.change !== 'created',
          existsAfter,
        });
      }
    }
  }

  const created: string[] = [];
  const modified: string[] = [];
  const deleted: string[] = [];
  for (const [path, { existedBefore, existsAfter }] of paths) {
    if (!existedBefore && existsAfter) created.push(path);
    else if (existedBefore && !existsAfter) deleted.push(path);
    else if (existedBefore && existsAfter) modified.push(path);
  }

  return { created: created.sort(), modified: modified.sort(), deleted: deleted.sort() };
}

function aggregateChecks(records: readonly OperationRecord[]): SessionReview['verification'] {
  const totals: Record<CheckCategory, { passed: number; failed: number }> = {
    critical: { passed: 0, failed: 0 },
    content: { passed: 0, failed: 0 },
    security: { passed: 0, failed: 0 },
    quality: { passed: 0, failed: 0 },
  };

  for (const record of records) {
    const report = lastReport(record);
    if (!report) continue;
    for (const check of report.checks) {
      if (check.passed) totals[check.category].passed++;
      else totals[check.category].failed++;
    }
  }
  return totals;
}

function computeStats(records: readonly OperationRecord[]): ReviewStats {
  const byTool: Partial<Record<ToolName, number>> = {};
  const commonErrors: Record<string, number> = {};
  let succeeded = 0;
  let failed = 0;
  let rolledBack = 0;
  let skipped = 0;

  for (const record of records) {
    byTool[record.toolName] = (byTool[record.toolName] ?? 0) + 1;

    switch (record.finalState) {
      case 'succeeded':
        succeeded++;
        break;
      case 'rolled_back':
        rolledBack++;
        break;
      case 'skipped':
        skipped++;
        break;
      default:
        failed++;
    }

    for (const attempt of record.attempts) {
      if (attempt.result.success) continue;
      const { code, failureKind } = attempt.result.diagnostics;
      const key =
        typeof code === 'string'
          ? code
          : typeof failureKind === 'string'
            ? failureKind
            : 'unknown';
      commonErrors[key] = (commonErrors[key] ?? 0) + 1;
    }
    if (record.attempts.length === 0 && record.failureKind) {
      commonErrors[record.failureKind] = (commonErrors[record.failureKind] ?? 0) + 1;
    }
  }

  const total = records.length;
  return {
    total,
    succeeded,
    failed,
    rolledBack,
    skipped,
    successRate: total === 0 ? 0 : succeeded / total,
    byTool,
    commonErrors,
  };
}

// ---------------------------------------------------------------------------
// Wording
// ---------------------------------------------------------------------------

function terminationMessage(input: ReviewInput, started: number): string {
  switch (input.reason) {
    case 'operation_limit':
      return `Stopped at the session limit of ${input.maxOperations} operations; ${input.notStarted.length} planned operations were not started`;
    case 'cancelled':
      return `Cancelled after ${started} operations; ${input.notStarted.length} planned operations were not started`;
    default:
      return `Completed ${started} of ${input.steps.length} planned operations`;
  }
}

function suggest(
  input: ReviewInput,
  stats: ReviewStats,
  changes: SessionReview['environmentChanges'],
  partialRollbacks: readonly RollbackOutcome[],
): string[] {
  const suggestions: string[] = [];

  const recurring = Object.entries(stats.commonErrors)
    .filter(([, count]) => count > 1)
    .sort((a, b) => b[1] - a[1]);
  for (const [kind, count] of recurring) {
    suggestions.push(`Investigate recurring ${kind} errors (${count} occurrences)`);
  }

  for (const record of input.records) {
    if (record.finalState === 'failed' || record.finalState === 'rolled_back') {
      const what = record.target ? `${record.toolName} ${record.target}` : record.toolName;
      suggestions.push(`Revisit ${what}: ${record.error ?? record.finalState}`);
    }
  }

  for (const rollback of partialRollbacks) {
    const paths = rollback.failures.map((f) => f.path).join(', ');
    suggestions.push(`Restore ${paths} by hand; rollback could not complete`);
  }

  const written = [...changes.created, ...changes.modified];
  if (written.length > 0) {
    const dirs = [...new Set(written.map((p) => dirname(p)))].sort();
    suggestions.push(`Review the files written in: ${dirs.join(', ')}`);
  }

  if (input.reason !== 'completed' && input.notStarted.length > 0) {
    suggestions.push(
      `Continue in a new session with the ${input.notStarted.length} operations not started`,
    );
  }

  return suggestions;
}
