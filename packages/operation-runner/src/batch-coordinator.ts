/**
 * @forgeloop/operation-runner — Operation Batch Coordinator
 *
 * Runs a group of related operations in order. Members whose in-batch
 * dependencies did not succeed are skipped, never attempted; independent
 * members still run.
 *
 * Members of an atomic batch are sealed only once the batch is decided, so
 * their durable entries reflect a revert.
 */

import {
  type BatchRequest,
  createLogger,
  generateId,
  getOperationProfile,
  type OperationEventInit,
  type OperationRecord,
  type OperationRequest,
  type RollbackOutcome,
} from '@forgeloop/core';
import type { EnvironmentStateTracker } from './environment-tracker.js';
import type { HistoryManager } from './history-manager.js';
import type { OperationExecutor } from './operation-executor.js';

const log = createLogger('BatchCoordinator');

/** Session-wide operation-start allowance, shared with the session loop. */
export interface OperationBudget {
  remaining(): number;
  consume(): void;
}

export interface BatchCounts {
  succeeded: number;
  failed: number;
  rolledBack: number;
  skipped: number;
}

export interface BatchResult {
  batchId: string;
  records: OperationRecord[];
  counts: BatchCounts;
  /** Stopped early because the session's operation limit was reached */
  truncated: boolean;
  /** Stopped early because the caller cancelled */
  cancelled: boolean;
  /** Outcome of reverting the batch checkpoint, for atomic batches */
  rollback: RollbackOutcome | null;
  /** Members never issued because of the operation limit or cancellation */
  notStarted: OperationRequest[];
}

export interface BatchCoordinatorDeps {
  executor: OperationExecutor;
  tracker: EnvironmentStateTracker;
  history: HistoryManager;
  emit: (event: OperationEventInit) => void;
}

export class OperationBatchCoordinator {
  constructor(private deps: BatchCoordinatorDeps) {}

  /**
   * Run every member in order. Cancellation is honored between members,
   * never during one.
   */
  async run(
    batch: BatchRequest,
    budget: OperationBudget,
    signal?: AbortSignal,
  ): Promise<BatchResult> {
    const { executor, history, tracker } = this.deps;
    const batchId = batch.batchId ?? generateId();
    const atomic = batch.atomic ?? false;

    // Ids assigned up front so members can name each other as dependencies
    const members = batch.operations.map((op) => ({
      ...op,
      operationId: op.operationId ?? generateId(),
    }));

    this.deps.emit({
      type: 'batch.started',
      operationId: null,
      batchId,
      payload: { size: members.length, atomic },
    });
    log.info(`Batch ${batchId}: ${members.length} operations${atomic ? ' (atomic)' : ''}`);

    const records: OperationRecord[] = [];
    const notStarted: OperationRequest[] = [];
    let truncated = false;
    let cancelled = false;
    let rollback: RollbackOutcome | null = null;

    const unmetBatchDeps = (batch.dependencies ?? []).filter(
      (id) => history.get(id)?.finalState !== 'succeeded',
    );

    if (unmetBatchDeps.length > 0) {
      const reason = `Batch dependencies not met: ${unmetBatchDeps.join(', ')}`;
      for (const member of members) {
        records.push(await executor.skip(member, { batchId, reason }));
      }
    } else {
      const { checkpointId, rejected } = atomic
        ? await this.checkpoint(batchId, members)
        : { checkpointId: null, rejected: new Map<string, string>() };

      const finalStates = new Map<string, OperationRecord['finalState']>();

      for (const [index, member] of members.entries()) {
        const blocked = (member.dependencies ?? []).filter((id) => {
          // Only in-batch dependencies are resolved here; the executor
          // pre-checks the rest against the session.
          if (!finalStates.has(id)) return false;
          return finalStates.get(id) !== 'succeeded';
        });

        if (blocked.length > 0) {
          const record = await executor.skip(member, {
            batchId,
            reason: `Dependency did not succeed: ${blocked.join(', ')}`,
          });
          finalStates.set(record.operationId, record.finalState);
          records.push(record);
          continue;
        }

        if (signal?.aborted) {
          cancelled = true;
          notStarted.push(...members.slice(index));
          log.warn(`Batch ${batchId} cancelled before ${member.operationId}`);
          break;
        }

        if (budget.remaining() <= 0) {
          truncated = true;
          notStarted.push(...members.slice(index));
          log.warn(`Batch ${batchId} truncated: operation limit reached`);
          break;
        }

        budget.consume();
        const rejection = rejected.get(member.operationId);
        const record = rejection
          ? await executor.reject(member, { batchId, reason: rejection })
          : await executor.execute(member, {
              batchId,
              inBatch: true,
              deferSeal: checkpointId !== null,
            });
        finalStates.set(record.operationId, record.finalState);
        records.push(record);
      }

      const criticalFailure = records.some(
        (r) =>
          getOperationProfile(r.toolName).critical &&
          (r.finalState === 'rolled_back' || r.finalState === 'failed'),
      );

      if (checkpointId) {
        if (criticalFailure) {
          rollback = await tracker.rollbackTo(checkpointId);
          log.warn(`Batch ${batchId} reverted after a critical member failed`);
        } else {
          await tracker.releaseRollbackPoint(checkpointId);
        }
      }

      for (const record of records) {
        if (executor.awaitingSeal(record.operationId)) {
          await executor.settle(record, { reverted: rollback !== null });
        }
      }
    }

    const counts = countOutcomes(records);
    this.deps.emit({
      type: 'batch.completed',
      operationId: null,
      batchId,
      payload: { ...counts, truncated },
    });

    return { batchId, records, counts, truncated, cancelled, rollback, notStarted };
  }

  /**
   * Back up every member's target under one batch checkpoint. A member
   * whose target cannot be read is rejected rather than aborting the batch;
   * when the checkpoint itself cannot be made, every member is.
   */
  private async checkpoint(
    batchId: string,
    members: ReadonlyArray<OperationRequest & { operationId: string }>,
  ): Promise<{ checkpointId: string | null; rejected: Map<string, string> }> {
    const { tracker } = this.deps;
    const rejected = new Map<string, string>();
    const paths: string[] = [];

    for (const member of members) {
      const path = this.targetOf(member);
      if (path === null) continue;
      try {
        await tracker.missingAncestors(path);
        await tracker.capture(path);
        paths.push(path);
      } catch (err) {
        rejected.set(member.operationId, `Cannot back up ${path}: ${errorMessage(err)}`);
      }
    }

    try {
      const checkpointId = await tracker.pushRollbackPoint({ batchId, paths });
      return { checkpointId, rejected };
    } catch (err) {
      const reason = `Batch rollback point could not be created: ${errorMessage(err)}`;
      log.error(`Batch ${batchId}: ${reason}`);
      for (const member of members) {
        if (!rejected.has(member.operationId)) rejected.set(member.operationId, reason);
      }
      return { checkpointId: null, rejected };
    }
  }

  /** Jailed target of a member, or null when its path is rejected. */
  private targetOf(member: OperationRequest): string | null {
    try {
      return this.deps.executor.resolveTarget(member);
    } catch (err) {
      log.debug(`No backup for ${member.toolName}: ${errorMessage(err)}`);
      return null;
    }
  }
}

export function countOutcomes(records: readonly OperationRecord[]): BatchCounts {
  const counts: BatchCounts = { succeeded: 0, failed: 0, rolledBack: 0, skipped: 0 };
  for (const record of records) {
    switch (record.finalState) {
      case 'succeeded':
        counts.succeeded++;
        break;
      case 'failed':
        counts.failed++;
        break;
      case 'rolled_back':
        counts.rolledBack++;
        break;
      case 'skipped':
        counts.skipped++;
        break;
    }
  }
  return counts;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
