/**
 * @forgeloop/operation-runner — Session
 *
 * Owns everything one session mutates: the environment tracker, the
 * transient operation log, and the event stream. Components receive the
 * pieces they need from here; nothing is process-global except the
 * per-workspace lock.
 */

import { resolve } from 'node:path';
import {
  createLogger,
  generateId,
  now,
  type OperationEvent,
  type OperationEventInit,
  setLogLevel,
  type TerminationReason,
  type ToolInvoker,
} from '@forgeloop/core';
import { HistoryStore } from '@forgeloop/history-store';
import { type EventTracer, SessionTelemetry } from '@forgeloop/observability';
import { createToolKernel, PolicyEngine } from '@forgeloop/tool-kernel';
import { VerificationEngine } from '@forgeloop/verification';
import { OperationBatchCoordinator } from './batch-coordinator.js';
import { type EnvSource, resolveSessionConfig, type SessionConfig } from './config.js';
import { EnvironmentStateTracker } from './environment-tracker.js';
import { HistoryManager } from './history-manager.js';
import { OperationExecutor } from './operation-executor.js';
import { RetryStrategy } from './retry-strategy.js';

const log = createLogger('Session');

export type SessionEventListener = (event: OperationEvent) => void;

export interface SessionOptions {
  workspaceRoot: string;
  sessionId?: string;
  goal?: string;
  /** Highest-precedence configuration, above environment and forgeloop.yaml */
  overrides?: Partial<SessionConfig>;
  /** Environment values; defaults to the validated process environment */
  env?: EnvSource;
  /** Durable log to share across sessions. Opened from config when omitted. */
  store?: HistoryStore;
  /** Tool primitives. The built-in kernel when omitted. */
  invoker?: ToolInvoker;
  /** Receives every session event. Without one, `trace` config decides. */
  tracer?: EventTracer;
}

/** Workspaces with an open session. One session per workspace at a time. */
const activeWorkspaces = new Set<string>();

export function isWorkspaceActive(workspaceRoot: string): boolean {
  return activeWorkspaces.has(resolve(workspaceRoot));
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export class Session {
  private listeners = new Set<SessionEventListener>();
  private seq = 0;
  private closed = false;

  readonly executor: OperationExecutor;
  readonly batches: OperationBatchCoordinator;
  readonly history: HistoryManager;
  readonly retry: RetryStrategy;
  /** Telemetry the session created for itself, shut down on close */
  telemetry: SessionTelemetry | null = null;

  private constructor(
    readonly sessionId: string,
    readonly workspaceRoot: string,
    readonly goal: string,
    readonly config: SessionConfig,
    readonly policy: PolicyEngine,
    readonly tracker: EnvironmentStateTracker,
    readonly store: HistoryStore,
    private ownsStore: boolean,
    invoker: ToolInvoker,
  ) {
    const emit = (event: OperationEventInit) => {
      this.emit(event);
    };

    this.history = new HistoryManager(store, sessionId);
    this.retry = new RetryStrategy(config.maxAttempts);
    this.executor = new OperationExecutor({
      sessionId,
      invoker,
      verifier: new VerificationEngine({
        workspaceRoot,
        maxFileBytes: config.maxFileBytes,
      }),
      retry: this.retry,
      tracker,
      history: this.history,
      emit,
    });
    this.batches = new OperationBatchCoordinator({
      executor: this.executor,
      tracker,
      history: this.history,
      emit,
    });
  }

  /**
   * Open a session against a workspace. Throws when the workspace already
   * has an open session or its root is not a directory.
   */
  static async open(options: SessionOptions): Promise<Session> {
    const workspaceRoot = resolve(options.workspaceRoot);
    if (activeWorkspaces.has(workspaceRoot)) {
      throw new Error(`Workspace ${workspaceRoot} already has an active session`);
    }
    activeWorkspaces.add(workspaceRoot);

    try {
      const policy = new PolicyEngine(workspaceRoot);
      const config = resolveSessionConfig(policy, options.overrides, options.env);
      setLogLevel(config.logLevel);

      const tracker = await EnvironmentStateTracker.create(workspaceRoot);
      const { workspaceState } = tracker.snapshot();
      if (!workspaceState.rootValid) {
        await tracker.dispose();
        throw new Error(`Workspace root is not a directory: ${workspaceRoot}`);
      }

      const store = options.store ?? new HistoryStore(config.historyDbPath);
      const sessionId = options.sessionId ?? generateId();
      const goal = options.goal ?? '';
      store.startSession({ sessionId, workspaceRoot, goal });

      const session = new Session(
        sessionId,
        workspaceRoot,
        goal,
        config,
        policy,
        tracker,
        store,
        !options.store,
        options.invoker ?? createToolKernel(workspaceRoot, policy),
      );

      let { tracer } = options;
      if (!tracer && config.trace !== 'off') {
        session.telemetry = new SessionTelemetry({
          sessionId,
          workspaceRoot,
          exporter: config.trace,
        });
        tracer = session.telemetry.tracer;
      }
      if (tracer) {
        const eventTracer = tracer;
        session.onEvent((event) => eventTracer.traceEvent(event));
      }

      log.info(`Opened session ${sessionId} on ${workspaceRoot}`);
      return session;
    } catch (err) {
      activeWorkspaces.delete(workspaceRoot);
      throw err;
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // -------------------------------------------------------------------------
  // Event listeners
  // -------------------------------------------------------------------------

  onEvent(listener: SessionEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Stamp an event with session id, sequence and time, and fan it out. */
  emit(init: OperationEventInit): OperationEvent {
    const event: OperationEvent = {
      ...init,
      eventId: generateId(),
      sessionId: this.sessionId,
      seq: ++this.seq,
      ts: now(),
    };

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        // Listener faults never break the session
        log.error(`Listener failed on ${event.type}:`, err);
      }
    }
    return event;
  }

  // -------------------------------------------------------------------------
  // Teardown
  // -------------------------------------------------------------------------

  /**
   * End the session: record the termination, drop the transient log and
   * backups, and release the workspace. Safe to call twice.
   */
  async close(termination: TerminationReason): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      this.store.endSession(this.sessionId, termination);
    } finally {
      this.history.clear();
      this.listeners.clear();
      await this.tracker.dispose();
      await this.telemetry?.shutdown();
      if (this.ownsStore) this.store.close();
      activeWorkspaces.delete(this.workspaceRoot);
      log.info(`Closed session ${this.sessionId} (${termination})`);
    }
  }
}
