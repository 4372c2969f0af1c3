/**
 * @forgeloop/operation-runner — Session configuration
 *
 * defaults → forgeloop.yaml → environment → explicit overrides
 */

import type { LogLevel } from '@forgeloop/core';
import type { TraceExporterKind } from '@forgeloop/observability';
import type { PolicyEngine } from '@forgeloop/tool-kernel';
import { env } from './env.js';

export interface SessionConfig {
  /** Hard ceiling on operation starts per session */
  maxOperations: number;
  /** Attempts per operation, first try included */
  maxAttempts: number;
  maxFileBytes: number;
  historyDbPath: string;
  logLevel: LogLevel;
  /** Span export for sessions opened without a tracer of their own */
  trace: TraceExporterKind;
}

/** The environment values the resolver reads (validated by env-core). */
export interface EnvSource {
  readonly FORGELOOP_MAX_OPERATIONS?: number;
  readonly FORGELOOP_MAX_ATTEMPTS?: number;
  readonly FORGELOOP_HISTORY_DB?: string;
  readonly FORGELOOP_TRACE?: TraceExporterKind;
  readonly LOG_LEVEL: LogLevel;
}

export function resolveSessionConfig(
  policy: PolicyEngine,
  overrides: Partial<SessionConfig> = {},
  source: EnvSource = env,
): SessionConfig {
  const bounds = policy.getSessionBounds();

  const resolved: SessionConfig = {
    maxOperations:
      overrides.maxOperations ??
      source.FORGELOOP_MAX_OPERATIONS ??
      bounds.maxOperations,
    maxAttempts:
      overrides.maxAttempts ?? source.FORGELOOP_MAX_ATTEMPTS ?? bounds.maxAttempts,
    maxFileBytes: overrides.maxFileBytes ?? policy.getLimits().maxFileBytes,
    historyDbPath:
      overrides.historyDbPath ??
      source.FORGELOOP_HISTORY_DB ??
      policy.getHistoryConfig().dbPath,
    logLevel: overrides.logLevel ?? source.LOG_LEVEL,
    trace: overrides.trace ?? source.FORGELOOP_TRACE ?? 'off',
  };

  if (!Number.isInteger(resolved.maxOperations) || resolved.maxOperations < 1) {
    throw new Error(`maxOperations must be a positive integer, got ${resolved.maxOperations}`);
  }
  if (!Number.isInteger(resolved.maxAttempts) || resolved.maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer, got ${resolved.maxAttempts}`);
  }

  return resolved;
}
