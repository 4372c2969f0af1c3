/**
 * @forgeloop/operation-runner — Operation Executor
 *
 * Drives one requested operation end to end:
 * pre-check → execute → verify → (retry → execute)* → succeed, roll back or fail.
 *
 * A fault thrown by a tool primitive, or by reading the workspace around
 * it, becomes a failed attempt or a failed pre-check; it never escapes to
 * the caller.
 */

import {
  type AttemptRecord,
  createLogger,
  type FailureKind,
  type FileStateEntry,
  generateId,
  getOperationProfile,
  isFinalState,
  now,
  type OperationEventInit,
  type OperationRecord,
  type OperationRequest,
  type OperationState,
  type OperationTypeProfile,
  type RecordWarning,
  type RollbackInfo,
  type StateChange,
  type StrategyName,
  type ToolInvoker,
  type ToolResult,
  VALID_TRANSITIONS,
  type VerificationReport,
} from '@forgeloop/core';
import {
  expectationsFromArgs,
  type VerificationEngine,
} from '@forgeloop/verification';
import {
  diffFileStates,
  type EnvironmentStateTracker,
} from './environment-tracker.js';
import type { HistoryManager } from './history-manager.js';
import type { RetryStrategy } from './retry-strategy.js';

const log = createLogger('OperationExecutor');

export interface OperationExecutorDeps {
  sessionId: string;
  invoker: ToolInvoker;
  verifier: VerificationEngine;
  retry: RetryStrategy;
  tracker: EnvironmentStateTracker;
  history: HistoryManager;
  emit: (event: OperationEventInit) => void;
}

export interface ExecuteOptions {
  batchId?: string | null;
  /** Unmet dependencies skip a batch member instead of failing it */
  inBatch?: boolean;
  /**
   * Leave the durable entry unwritten until {@link OperationExecutor.settle},
   * for members of an atomic batch that may still be reverted.
   */
  deferSeal?: boolean;
}

/** Everything the attempt loop needs about the operation's target. */
interface TargetContext {
  path: string;
  before: FileStateEntry;
  /** Missing ancestors a write would create, outermost first, then the target */
  baseline: FileStateEntry[];
  profile: OperationTypeProfile;
  rollbackInfo: RollbackInfo | null;
}

// ---------------------------------------------------------------------------
// Operation Executor
// ---------------------------------------------------------------------------

export class OperationExecutor {
  /** Start-of-operation states of records whose seal was deferred */
  private unsealed = new Map<string, FileStateEntry[]>();

  constructor(private deps: OperationExecutorDeps) {}

  /**
   * Run one operation to a terminal state and seal its record. With
   * `deferSeal`, a record that got past pre-check waits for {@link settle}.
   */
  async execute(
    request: OperationRequest,
    options: ExecuteOptions = {},
  ): Promise<OperationRecord> {
    const { history, tracker } = this.deps;
    const deferSeal = options.deferSeal ?? false;
    const record = this.begin(request, options.batchId ?? null);

    // -- Pre-check ----------------------------------------------------------

    const unmet = record.dependencies.filter(
      (id) => history.get(id)?.finalState !== 'succeeded',
    );
    if (unmet.length > 0) {
      const message = `Unmet dependencies: ${unmet.join(', ')}`;
      this.transition(record, options.inBatch ? 'skipped' : 'failed');
      return this.finish(record, [], 'dependency', message);
    }

    let path: string;
    try {
      path = this.resolveTarget(request);
    } catch (err) {
      this.transition(record, 'failed');
      return this.finish(record, [], 'execution', errorMessage(err));
    }
    record.target = path;

    const profile = getOperationProfile(record.toolName);
    let checkpointId: string | null = null;
    let target: TargetContext;
    try {
      const ancestors = await tracker.missingAncestors(path);
      const before = await tracker.capture(path);
      if (profile.critical && profile.requiresBackup) {
        checkpointId = await tracker.pushRollbackPoint({
          operationId: record.operationId,
          batchId: record.batchId,
          paths: [path],
        });
      }
      target = {
        path,
        before,
        baseline: [...ancestors, before],
        profile,
        rollbackInfo: checkpointId ? tracker.getRollbackInfo(checkpointId) : null,
      };
    } catch (err) {
      if (checkpointId) await tracker.releaseRollbackPoint(checkpointId);
      this.transition(record, 'failed');
      return this.finish(record, [], 'execution', `Pre-check failed: ${errorMessage(err)}`);
    }

    // -- Attempt loop -------------------------------------------------------

    let strategy = this.deps.retry.nextStrategy(record.toolName, record.attempts);
    while (strategy) {
      this.transition(record, 'executing');
      const attempt = await this.attempt(record, strategy, target);
      history.appendAttempt(record.operationId, attempt);

      if (attempt.result.success) break;

      this.transition(record, 'retry');
      strategy = this.deps.retry.nextStrategy(record.toolName, record.attempts);
      if (strategy) {
        log.debug(
          `${record.toolName} ${path}: retrying with '${strategy}' after: ${attempt.result.result}`,
        );
      }
    }

    const last = record.attempts.at(-1);

    // -- Success ------------------------------------------------------------

    if (last?.result.success) {
      this.transition(record, 'succeeded');
      if (checkpointId) await tracker.releaseRollbackPoint(checkpointId);
      record.warnings = collectWarnings(record.attempts, last);
      return this.finish(record, target.baseline, null, null, deferSeal);
    }

    // -- Exhausted ----------------------------------------------------------

    const failureKind = attemptFailureKind(last);
    const error = last?.result.result ?? 'No strategy available';

    if (profile.critical && checkpointId) {
      this.transition(record, 'rolled_back');
      const outcome = await tracker.rollbackTo(checkpointId);
      record.rollback = outcome;

      this.deps.emit({
        type: 'operation.rolled_back',
        operationId: record.operationId,
        batchId: record.batchId,
        payload: { toolName: record.toolName, rollback: outcome },
      });

      if (!outcome.success) {
        const unrestored = outcome.failures
          .map((f) => `${f.path} (${f.reason})`)
          .join(', ');
        record.warnings.push({
          message: `Partial rollback: could not restore ${unrestored}`,
          userRelevant: true,
        });
        return this.finish(record, target.baseline, 'rollback', error, deferSeal);
      }
      return this.finish(record, target.baseline, failureKind, error, deferSeal);
    }

    this.transition(record, 'failed');
    if (checkpointId) await tracker.releaseRollbackPoint(checkpointId);
    return this.finish(record, target.baseline, failureKind, error, deferSeal);
  }

  /** Jailed, workspace-relative target of a request. Throws when rejected. */
  resolveTarget(request: OperationRequest): string {
    return this.deps.invoker.resolveTarget(request.toolName, request.args);
  }

  /**
   * Record a batch member that will never be attempted.
   */
  async skip(
    request: OperationRequest,
    options: { batchId?: string | null; reason: string },
  ): Promise<OperationRecord> {
    const record = this.createRecord(request, options.batchId ?? null);
    this.deps.history.begin(record);

    try {
      record.target = this.resolveTarget(request);
    } catch (err) {
      log.debug(`Skipped ${record.operationId} has no valid target: ${errorMessage(err)}`);
    }

    this.transition(record, 'skipped');
    return this.finish(record, [], 'dependency', options.reason);
  }

  /**
   * Record a batch member that fails its pre-check before the batch runs,
   * such as a target that cannot be backed up. Counts as started.
   */
  async reject(
    request: OperationRequest,
    options: { batchId?: string | null; reason: string },
  ): Promise<OperationRecord> {
    const record = this.begin(request, options.batchId ?? null);
    try {
      record.target = this.resolveTarget(request);
    } catch (err) {
      log.debug(`Rejected ${record.operationId} has no valid target: ${errorMessage(err)}`);
    }

    this.transition(record, 'failed');
    return this.finish(record, [], 'execution', options.reason);
  }

  awaitingSeal(operationId: string): boolean {
    return this.unsealed.has(operationId);
  }

  /**
   * Write the durable entry of a record executed with `deferSeal`, after
   * re-reading its net effect. A succeeded member whose batch was reverted
   * says so in a warning.
   */
  async settle(
    record: OperationRecord,
    options: { reverted: boolean },
  ): Promise<OperationRecord> {
    const baseline = this.unsealed.get(record.operationId);
    if (!baseline) {
      throw new Error(`Operation ${record.operationId} is not awaiting its seal`);
    }
    this.unsealed.delete(record.operationId);

    if (options.reverted && record.finalState === 'succeeded') {
      record.warnings.push({
        message: `Reverted with atomic batch ${record.batchId ?? ''} after a critical member failed`,
        userRelevant: true,
      });
    }
    await this.measureNetChanges(record, baseline);
    this.deps.history.seal(record);
    return record;
  }

  // -------------------------------------------------------------------------
  // Attempts
  // -------------------------------------------------------------------------

  private async attempt(
    record: OperationRecord,
    strategy: StrategyName,
    target: TargetContext,
  ): Promise<AttemptRecord> {
    const { invoker, tracker, verifier } = this.deps;
    const attemptNumber = record.attempts.length + 1;
    const startedAt = now();
    let before: FileStateEntry | null = null;

    const result: ToolResult = {
      success: false,
      result: '',
      verification: {},
      diagnostics: { strategy },
      dependencies: [...record.dependencies],
      affectedFiles: [],
      warnings: [],
      rollbackInfo: target.rollbackInfo,
    };
    let report: VerificationReport | null = null;

    try {
      before = await tracker.capture(target.path);
      const output = await invoker.invoke(record.toolName, record.args, {
        operationId: record.operationId,
        sessionId: record.sessionId,
        strategy,
      });
      result.success = true;
      result.result = output.summary;
      result.affectedFiles = [...new Set(output.affectedFiles)];
      if (output.data !== undefined) result.data = output.data;

      await tracker.record(record.operationId, result);

      this.transition(record, 'verifying');
      report = await verifier.verify(record.toolName, result, target.profile, {
        path: target.path,
        expected: expectationsFromArgs(record.toolName, record.args),
        preExisted: target.before.exists,
      });

      result.verification = report.groups;
      result.warnings = report.warnings.map((w) => w.message);
      if (!report.success) {
        result.success = false;
        result.result = `Verification failed: ${report.failures.join('; ')}`;
        result.diagnostics = {
          ...result.diagnostics,
          failureKind: 'verification',
          failures: report.failures,
        };
      }
    } catch (err) {
      const code = errorCode(err);
      result.success = false;
      result.result = errorMessage(err);
      result.diagnostics = {
        failureKind: 'execution',
        error: result.result,
        ...(code ? { code } : {}),
        strategy,
      };
    }

    const stateChanges = await this.attemptChanges(target.path, before);
    const durationMs = now() - startedAt;

    this.deps.emit({
      type: 'operation.attempt',
      operationId: record.operationId,
      batchId: record.batchId,
      payload: {
        toolName: record.toolName,
        attemptNumber,
        strategy,
        success: result.success,
        durationMs,
      },
    });
    log.debug(
      `${record.toolName} ${target.path} attempt ${attemptNumber} (${strategy}): ${result.success ? 'ok' : result.result}`,
    );

    return {
      attemptNumber,
      strategy,
      result,
      report,
      timestamp: startedAt,
      stateChanges,
    };
  }

  /** The target's change across one attempt; empty when it cannot be read. */
  private async attemptChanges(
    path: string,
    before: FileStateEntry | null,
  ): Promise<StateChange[]> {
    if (!before) return [];
    try {
      return [diffFileStates(before, await this.deps.tracker.capture(path))];
    } catch (err) {
      log.warn(`Could not re-read ${path} after the attempt: ${errorMessage(err)}`);
      return [];
    }
  }

  // -------------------------------------------------------------------------
  // Record lifecycle
  // -------------------------------------------------------------------------

  private begin(request: OperationRequest, batchId: string | null): OperationRecord {
    const record = this.createRecord(request, batchId);
    this.deps.history.begin(record);

    this.deps.emit({
      type: 'operation.started',
      operationId: record.operationId,
      batchId: record.batchId,
      payload: { toolName: record.toolName, dependencies: record.dependencies },
    });
    log.info(`Started ${record.toolName} (${record.operationId})`);

    this.transition(record, 'pre_check');
    return record;
  }

  private createRecord(
    request: OperationRequest,
    batchId: string | null,
  ): OperationRecord {
    return {
      operationId: request.operationId ?? generateId(),
      batchId,
      sessionId: this.deps.sessionId,
      startTime: now(),
      endTime: null,
      toolName: request.toolName,
      args: { ...request.args },
      dependencies: [...(request.dependencies ?? [])],
      description: request.description ?? null,
      target: null,
      environmentState: this.deps.tracker.snapshot(),
      state: 'pending',
      transitions: [],
      attempts: [],
      finalState: null,
      failureKind: null,
      error: null,
      warnings: [],
      rollback: null,
      netChanges: [],
    };
  }

  /**
   * Seal the record, write the condensed entry, and announce the outcome.
   * `baseline` holds the states taken at operation start, if any.
   */
  private async finish(
    record: OperationRecord,
    baseline: FileStateEntry[],
    failureKind: FailureKind | null,
    error: string | null,
    deferSeal = false,
  ): Promise<OperationRecord> {
    const finalState = record.finalState;
    if (!finalState) {
      throw new Error(`Operation ${record.operationId} finished in state ${record.state}`);
    }

    record.failureKind = failureKind;
    record.error = error;
    record.endTime = now();

    if (deferSeal) {
      this.unsealed.set(record.operationId, baseline);
    } else {
      await this.measureNetChanges(record, baseline);
      this.deps.history.seal(record);
    }

    if (finalState === 'skipped') {
      this.deps.emit({
        type: 'operation.skipped',
        operationId: record.operationId,
        batchId: record.batchId,
        payload: { toolName: record.toolName, reason: error ?? 'skipped' },
      });
    } else {
      this.deps.emit({
        type: 'operation.completed',
        operationId: record.operationId,
        batchId: record.batchId,
        payload: {
          toolName: record.toolName,
          finalState,
          attemptCount: record.attempts.length,
        },
      });
    }

    const detail = error ? `: ${error}` : '';
    if (finalState === 'succeeded' || finalState === 'skipped') {
      log.info(`${record.toolName} ${record.operationId} ${finalState}${detail}`);
    } else {
      log.warn(`${record.toolName} ${record.operationId} ${finalState}${detail}`);
    }
    return record;
  }

  /** Compare each baseline path with what is on disk now. */
  private async measureNetChanges(
    record: OperationRecord,
    baseline: readonly FileStateEntry[],
  ): Promise<void> {
    try {
      const changes: StateChange[] = [];
      for (const before of baseline) {
        changes.push(diffFileStates(before, await this.deps.tracker.capture(before.path)));
      }
      record.netChanges = changes;
    } catch (err) {
      record.warnings.push({
        message: `Final state of ${record.target ?? record.toolName} could not be read: ${errorMessage(err)}`,
        userRelevant: true,
      });
      log.warn(`Net changes of ${record.operationId} unknown:`, err);
    }
  }

  private transition(record: OperationRecord, to: OperationState): void {
    assertTransition(record, to);
    record.transitions.push({ from: record.state, to, at: now() });
    record.state = to;
    if (isFinalState(to)) record.finalState = to;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function assertTransition(record: OperationRecord, target: OperationState): void {
  const allowed = VALID_TRANSITIONS[record.state];
  if (!allowed.includes(target)) {
    throw new Error(
      `Invalid state transition: ${record.state} → ${target} (operation ${record.operationId})`,
    );
  }
}

function collectWarnings(
  attempts: readonly AttemptRecord[],
  last: AttemptRecord,
): RecordWarning[] {
  const warnings: RecordWarning[] = (last.report?.warnings ?? []).map((w) => ({
    message: w.message,
    userRelevant: w.userRelevant,
  }));

  const failedAttempts = attempts.length - 1;
  const first = attempts[0];
  if (failedAttempts > 0 && first) {
    warnings.push({
      message: `Recovered with '${last.strategy}' strategy after ${failedAttempts} failed attempt${failedAttempts === 1 ? '' : 's'}; initial failure: ${first.result.result}`,
      userRelevant: true,
    });
  }
  return warnings;
}

function attemptFailureKind(attempt: AttemptRecord | undefined): FailureKind {
  return attempt?.result.diagnostics.failureKind === 'verification'
    ? 'verification'
    : 'execution';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
