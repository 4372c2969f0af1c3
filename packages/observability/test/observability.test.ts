/**
 * @forgeloop/observability — Tests
 */

import type { OperationEvent, OperationEventInit } from '@forgeloop/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EventTracer } from '../src/event-tracer.js';
import { SessionTelemetry } from '../src/otel-setup.js';

// =========================================================================
// SessionTelemetry
// =========================================================================

describe('SessionTelemetry', () => {
  let telemetry: SessionTelemetry;

  afterEach(async () => {
    await telemetry.shutdown();
  });

  it('keeps spans in memory by default', () => {
    telemetry = new SessionTelemetry({ sessionId: 'sess1', workspaceRoot: '/tmp/ws' });
    expect(telemetry.finishedSpans()).toEqual([]);
  });

  it('stamps every span with the session and workspace', () => {
    telemetry = new SessionTelemetry({ sessionId: 'sess1', workspaceRoot: '/tmp/ws' });
    telemetry.tracer.traceEvent({
      type: 'operation.started',
      operationId: 'op1',
      batchId: null,
      eventId: 'e1',
      sessionId: 'sess1',
      seq: 1,
      ts: 1000,
      payload: { toolName: 'read_file', dependencies: [] },
    });
    telemetry.tracer.traceEvent({
      type: 'operation.completed',
      operationId: 'op1',
      batchId: null,
      eventId: 'e2',
      sessionId: 'sess1',
      seq: 2,
      ts: 1001,
      payload: { toolName: 'read_file', finalState: 'succeeded', attemptCount: 1 },
    });

    const [span] = telemetry.finishedSpans();
    expect(span?.name).toBe('operation:op1');
    expect(span?.attributes['forgeloop.session_id']).toBe('sess1');
    expect(span?.attributes['forgeloop.workspace']).toBe('/tmp/ws');
    expect(span?.attributes['forgeloop.tool_name']).toBe('read_file');
  });

  it('keeps nothing in memory when spans go to the console', async () => {
    telemetry = new SessionTelemetry({
      sessionId: 'sess1',
      workspaceRoot: '/tmp/ws',
      exporter: 'console',
    });
    expect(telemetry.finishedSpans()).toEqual([]);
    await telemetry.shutdown();
  });
});

// =========================================================================
// EventTracer
// =========================================================================

describe('EventTracer', () => {
  let seq = 0;
  const makeEvent = (init: OperationEventInit): OperationEvent => ({
    ...init,
    eventId: `e${++seq}`,
    sessionId: 'sess1',
    seq,
    ts: Date.now(),
  });

  const sessionStarted = makeEvent({
    type: 'session.started',
    operationId: null,
    batchId: null,
    payload: { workspace: '/tmp/ws', goal: 'g', maxOperations: 25, maxAttempts: 3 },
  });
  const sessionCompleted = makeEvent({
    type: 'session.completed',
    operationId: null,
    batchId: null,
    payload: { reason: 'completed', operationsStarted: 1 },
  });

  let telemetry: SessionTelemetry;

  beforeEach(() => {
    telemetry = new SessionTelemetry({ sessionId: 'sess1', workspaceRoot: '/tmp/ws' });
  });

  afterEach(async () => {
    await telemetry.shutdown();
  });

  it('creates spans for session lifecycle', () => {
    const eventTracer = telemetry.tracer;

    eventTracer.traceEvent(sessionStarted);
    expect(eventTracer.activeSpanCount).toBe(1);

    eventTracer.traceEvent(sessionCompleted);
    expect(eventTracer.activeSpanCount).toBe(0);
  });

  it('nests batch and operation spans under the session', () => {
    const eventTracer = telemetry.tracer;

    eventTracer.traceEvent(sessionStarted);
    eventTracer.traceEvent(
      makeEvent({
        type: 'batch.started',
        operationId: null,
        batchId: 'b1',
        payload: { size: 1, atomic: false },
      }),
    );
    eventTracer.traceEvent(
      makeEvent({
        type: 'operation.started',
        operationId: 'op1',
        batchId: 'b1',
        payload: { toolName: 'write_file', dependencies: [] },
      }),
    );
    expect(eventTracer.activeSpanCount).toBe(3);

    eventTracer.traceEvent(
      makeEvent({
        type: 'operation.attempt',
        operationId: 'op1',
        batchId: 'b1',
        payload: {
          toolName: 'write_file',
          attemptNumber: 1,
          strategy: 'default',
          success: true,
          durationMs: 3,
        },
      }),
    );
    eventTracer.traceEvent(
      makeEvent({
        type: 'operation.completed',
        operationId: 'op1',
        batchId: 'b1',
        payload: { toolName: 'write_file', finalState: 'succeeded', attemptCount: 1 },
      }),
    );
    eventTracer.traceEvent(
      makeEvent({
        type: 'batch.completed',
        operationId: null,
        batchId: 'b1',
        payload: { succeeded: 1, failed: 0, rolledBack: 0, skipped: 0, truncated: false },
      }),
    );
    eventTracer.traceEvent(sessionCompleted);
    expect(eventTracer.activeSpanCount).toBe(0);

    const spans = telemetry.finishedSpans();
    const byName = new Map(spans.map((s) => [s.name, s]));
    const session = byName.get('session:sess1');
    const batch = byName.get('batch:b1');
    const op = byName.get('operation:op1');

    expect(batch?.parentSpanId).toBe(session?.spanContext().spanId);
    expect(op?.parentSpanId).toBe(batch?.spanContext().spanId);
    expect(op?.events.map((e) => e.name)).toEqual(['attempt']);
    expect(op?.attributes['forgeloop.final_state']).toBe('succeeded');
  });

  it('ignores events for operations it never saw start', () => {
    const eventTracer = new EventTracer();
    eventTracer.traceEvent(
      makeEvent({
        type: 'operation.completed',
        operationId: 'ghost',
        batchId: null,
        payload: { toolName: 'read_file', finalState: 'failed', attemptCount: 2 },
      }),
    );
    expect(eventTracer.activeSpanCount).toBe(0);
  });
});
