/**
 * @forgeloop/observability
 */

export { EventTracer } from './event-tracer.js';
export {
  SessionTelemetry,
  type SessionTelemetryOptions,
  type TraceExporterKind,
} from './otel-setup.js';
