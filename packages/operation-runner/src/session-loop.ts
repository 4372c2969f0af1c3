/**
 * @forgeloop/operation-runner — Session Loop
 *
 * Issues a plan's steps one at a time within the session's operation
 * ceiling and closes with the review. Operations run strictly in sequence.
 */

import {
  type BatchRequest,
  createLogger,
  type OperationRequest,
  type RollbackOutcome,
  type SessionReview,
  type TerminationReason,
} from '@forgeloop/core';
import type { OperationBudget } from './batch-coordinator.js';
import { buildReview } from './review.js';
import { Session, type SessionOptions } from './session.js';

const log = createLogger('SessionLoop');

export type PlanStep = OperationRequest | BatchRequest;

export interface SessionPlan {
  goal: string;
  steps: PlanStep[];
}

export function isBatchRequest(step: PlanStep): step is BatchRequest {
  return 'operations' in step;
}

/** One review line for a planned operation. */
export function describeRequest(request: OperationRequest): string {
  if (request.description) return request.description;
  const path = request.args.path;
  return typeof path === 'string' ? `${request.toolName} ${path}` : request.toolName;
}

const planLines = (steps: readonly PlanStep[]): string[] =>
  steps.flatMap((step) =>
    isBatchRequest(step) ? step.operations.map(describeRequest) : [describeRequest(step)],
  );

// ---------------------------------------------------------------------------
// Session Loop
// ---------------------------------------------------------------------------

export class SessionLoop {
  constructor(private session: Session) {}

  /**
   * Run the plan. Cancellation through `signal` takes effect between
   * operations; an operation already running finishes first.
   */
  async run(plan: SessionPlan, signal?: AbortSignal): Promise<SessionReview> {
    const { session } = this;
    const { maxOperations, maxAttempts } = session.config;

    let started = 0;
    const budget: OperationBudget = {
      remaining: () => maxOperations - started,
      consume: () => {
        started++;
      },
    };

    const notStarted: string[] = [];
    const batchRollbacks: RollbackOutcome[] = [];
    let reason: TerminationReason = 'completed';

    session.emit({
      type: 'session.started',
      operationId: null,
      batchId: null,
      payload: {
        workspace: session.workspaceRoot,
        goal: plan.goal,
        maxOperations,
        maxAttempts,
      },
    });
    log.info(`Session ${session.sessionId}: ${plan.steps.length} steps, limit ${maxOperations}`);

    for (const [index, step] of plan.steps.entries()) {
      if (signal?.aborted) {
        reason = 'cancelled';
        notStarted.push(...planLines(plan.steps.slice(index)));
        break;
      }
      if (budget.remaining() <= 0) {
        reason = 'operation_limit';
        notStarted.push(...planLines(plan.steps.slice(index)));
        break;
      }

      try {
        if (isBatchRequest(step)) {
          const result = await session.batches.run(step, budget, signal);
          if (result.rollback) batchRollbacks.push(result.rollback);
          if (result.cancelled || result.truncated) {
            reason = result.cancelled ? 'cancelled' : 'operation_limit';
            notStarted.push(
              ...result.notStarted.map(describeRequest),
              ...planLines(plan.steps.slice(index + 1)),
            );
            break;
          }
        } else {
          budget.consume();
          await session.executor.execute(step);
        }
      } catch (err) {
        // Isolated to this step; the rest of the plan still runs
        log.error(`Step ${index + 1} aborted:`, err);
      }
    }

    if (reason === 'operation_limit') {
      log.warn(`Session limit of ${maxOperations} operations reached`);
    }

    const workspace = await session.tracker.refreshWorkspace();
    const review = buildReview({
      sessionId: session.sessionId,
      goal: plan.goal,
      reason,
      maxOperations,
      steps: planLines(plan.steps),
      notStarted,
      records: session.history.list(),
      batchRollbacks,
      workspace,
    });

    session.emit({
      type: 'session.completed',
      operationId: null,
      batchId: null,
      payload: { reason, operationsStarted: started },
    });
    log.info(`Session ${session.sessionId} ${reason}: ${review.termination.message}`);

    return review;
  }
}

/**
 * Open a session, run the plan, and close the session with the plan's
 * termination reason.
 */
export async function runSession(
  options: SessionOptions & { plan: SessionPlan; signal?: AbortSignal },
): Promise<SessionReview> {
  const { plan, signal, ...sessionOptions } = options;
  const session = await Session.open({ ...sessionOptions, goal: plan.goal });

  let termination: TerminationReason = 'cancelled';
  try {
    const review = await new SessionLoop(session).run(plan, signal);
    termination = review.termination.reason;
    return review;
  } finally {
    await session.close(termination);
  }
}
