/**
 * @forgeloop/observability — Event Tracer
 *
 * Bridges session events to OTel spans.
 * Covers: session lifecycle, batches, operations, attempts and rollbacks.
 */

import {
  context,
  trace,
  SpanKind,
  SpanStatusCode,
  type Span,
  type Tracer,
} from '@opentelemetry/api';
import type { OperationEvent } from '@forgeloop/core';

// ---------------------------------------------------------------------------
// Event Tracer
// ---------------------------------------------------------------------------

export class EventTracer {
  private tracer: Tracer;
  private activeSpans = new Map<string, Span>();

  /**
   * @param baseAttributes - set on every span this tracer starts
   */
  constructor(
    tracer?: Tracer,
    private baseAttributes: Record<string, string | number> = {},
  ) {
    this.tracer = tracer ?? trace.getTracer('forgeloop-events');
  }

  /**
   * Process a session event and create/close OTel spans as appropriate.
   * Operation spans nest under their batch (when any), batches under the session.
   */
  traceEvent(event: OperationEvent): void {
    switch (event.type) {
      case 'session.started':
        this.startSpan(`session:${event.sessionId}`, null, {
          'forgeloop.session_id': event.sessionId,
          'forgeloop.workspace': event.payload.workspace,
          'forgeloop.max_operations': event.payload.maxOperations,
        });
        break;

      case 'session.completed':
        this.endSpan(`session:${event.sessionId}`, {
          status: SpanStatusCode.OK,
          attributes: {
            'forgeloop.termination': event.payload.reason,
            'forgeloop.operations_started': event.payload.operationsStarted,
          },
        });
        break;

      case 'batch.started':
        if (!event.batchId) break;
        this.startSpan(`batch:${event.batchId}`, `session:${event.sessionId}`, {
          'forgeloop.batch_id': event.batchId,
          'forgeloop.batch_size': event.payload.size,
        });
        break;

      case 'batch.completed': {
        if (!event.batchId) break;
        const p = event.payload;
        this.endSpan(`batch:${event.batchId}`, {
          status:
            p.failed + p.rolledBack > 0 ? SpanStatusCode.ERROR : SpanStatusCode.OK,
          attributes: {
            'forgeloop.succeeded': p.succeeded,
            'forgeloop.failed': p.failed,
            'forgeloop.rolled_back': p.rolledBack,
            'forgeloop.skipped': p.skipped,
          },
        });
        break;
      }

      case 'operation.started':
        if (!event.operationId) break;
        this.startSpan(
          `operation:${event.operationId}`,
          event.batchId ? `batch:${event.batchId}` : `session:${event.sessionId}`,
          {
            'forgeloop.operation_id': event.operationId,
            'forgeloop.tool_name': event.payload.toolName,
          },
        );
        break;

      case 'operation.attempt': {
        const span = this.activeSpans.get(`operation:${event.operationId}`);
        span?.addEvent('attempt', {
          'forgeloop.attempt': event.payload.attemptNumber,
          'forgeloop.strategy': event.payload.strategy,
          'forgeloop.success': event.payload.success,
          'forgeloop.duration_ms': event.payload.durationMs,
        });
        break;
      }

      case 'operation.rolled_back': {
        const span = this.activeSpans.get(`operation:${event.operationId}`);
        span?.addEvent('rollback', {
          'forgeloop.checkpoint_id': event.payload.rollback.checkpointId,
          'forgeloop.rollback_complete': event.payload.rollback.success,
        });
        break;
      }

      case 'operation.completed':
        this.endSpan(`operation:${event.operationId}`, {
          status:
            event.payload.finalState === 'succeeded'
              ? SpanStatusCode.OK
              : SpanStatusCode.ERROR,
          attributes: {
            'forgeloop.final_state': event.payload.finalState,
            'forgeloop.attempt_count': event.payload.attemptCount,
          },
        });
        break;

      case 'operation.skipped': {
        // Skipped operations never start a span; note them on the parent
        const parent = this.activeSpans.get(
          event.batchId ? `batch:${event.batchId}` : `session:${event.sessionId}`,
        );
        parent?.addEvent('operation.skipped', {
          'forgeloop.operation_id': event.operationId ?? '',
          'forgeloop.reason': event.payload.reason,
        });
        break;
      }
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private startSpan(
    key: string,
    parentKey: string | null,
    attributes: Record<string, string | number>,
  ): void {
    const parent = parentKey ? this.activeSpans.get(parentKey) : undefined;
    const ctx = parent
      ? trace.setSpan(context.active(), parent)
      : context.active();
    const span = this.tracer.startSpan(
      key,
      { kind: SpanKind.INTERNAL, attributes: { ...this.baseAttributes, ...attributes } },
      ctx,
    );
    this.activeSpans.set(key, span);
  }

  private endSpan(
    key: string,
    opts?: {
      status?: SpanStatusCode;
      attributes?: Record<string, string | number>;
    },
  ): void {
    const span = this.activeSpans.get(key);
    if (!span) return;

    if (opts?.attributes) {
      for (const [k, v] of Object.entries(opts.attributes)) {
        span.setAttribute(k, v);
      }
    }

    if (opts?.status !== undefined) {
      span.setStatus({ code: opts.status });
    }

    span.end();
    this.activeSpans.delete(key);
  }

  /**
   * Get the count of active spans (for testing).
   */
  get activeSpanCount(): number {
    return this.activeSpans.size;
  }
}
