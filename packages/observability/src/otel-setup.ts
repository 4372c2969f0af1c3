/**
 * @forgeloop/observability — Session telemetry
 *
 * One tracer provider per session, so sessions on different workspaces in
 * the same process never share span state. Every span the session's
 * {@link EventTracer} starts carries the session id and workspace root.
 */

import {
  BasicTracerProvider,
  ConsoleSpanExporter,
  InMemorySpanExporter,
  type ReadableSpan,
  SimpleSpanProcessor,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';
import { EventTracer } from './event-tracer.js';

/** Where a session's finished spans go. `off` means no telemetry at all. */
export type TraceExporterKind = 'off' | 'memory' | 'console';

export interface SessionTelemetryOptions {
  sessionId: string;
  workspaceRoot: string;
  /** Built-in exporter; `memory` when omitted */
  exporter?: Exclude<TraceExporterKind, 'off'>;
  /** Further exporters, e.g. an OTLP exporter the host configured */
  exporters?: SpanExporter[];
  serviceName?: string;
}

export class SessionTelemetry {
  readonly tracer: EventTracer;
  private provider: BasicTracerProvider;
  private memory: InMemorySpanExporter | null = null;
  private closed = false;

  constructor(options: SessionTelemetryOptions) {
    const exporters: SpanExporter[] = [...(options.exporters ?? [])];
    if ((options.exporter ?? 'memory') === 'console') {
      exporters.push(new ConsoleSpanExporter());
    } else {
      this.memory = new InMemorySpanExporter();
      exporters.push(this.memory);
    }

    this.provider = new BasicTracerProvider();
    for (const exporter of exporters) {
      this.provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    }

    // Tracer comes from this provider, not the global singleton, which can
    // only be registered once per process.
    this.tracer = new EventTracer(
      this.provider.getTracer(options.serviceName ?? 'forgeloop'),
      {
        'forgeloop.session_id': options.sessionId,
        'forgeloop.workspace': options.workspaceRoot,
      },
    );
  }

  /** Spans finished so far; empty unless spans are kept in memory. */
  finishedSpans(): ReadableSpan[] {
    return this.memory?.getFinishedSpans() ?? [];
  }

  /** Flush and stop the provider. Safe to call twice. */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.provider.shutdown();
  }
}
