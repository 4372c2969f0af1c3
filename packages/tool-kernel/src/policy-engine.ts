/**
 * @forgeloop/tool-kernel — Policy Engine
 *
 * Loads and applies the workspace's forgeloop.yaml configuration.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '@forgeloop/core';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const POLICY_FILENAME = 'forgeloop.yaml';

const log = createLogger('PolicyEngine');

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const policySchema = z.object({
  workspace: z
    .object({
      denyPatterns: z.array(z.string()).optional(),
    })
    .optional(),
  session: z
    .object({
      maxOperations: z.number().int().positive().optional(),
      maxAttempts: z.number().int().positive().optional(),
    })
    .optional(),
  execution: z
    .object({
      timeouts: z.record(z.number().positive()).optional(),
    })
    .optional(),
  limits: z
    .object({
      maxFileBytes: z.number().int().positive().optional(),
    })
    .optional(),
  history: z
    .object({
      dbPath: z.string().min(1).optional(),
    })
    .optional(),
});

export interface PolicyConfig {
  workspace: {
    denyPatterns: string[];
  };
  session: {
    maxOperations: number;
    maxAttempts: number;
  };
  execution: {
    /** Seconds, keyed by tool name */
    timeouts: Record<string, number>;
  };
  limits: {
    maxFileBytes: number;
  };
  history: {
    dbPath: string;
  };
}

// ---------------------------------------------------------------------------
// Default policy (when no forgeloop.yaml exists)
// ---------------------------------------------------------------------------

export const DEFAULT_POLICY: PolicyConfig = {
  workspace: {
    denyPatterns: ['**/.git/**'],
  },
  session: {
    maxOperations: 25,
    maxAttempts: 3,
  },
  execution: {
    timeouts: {},
  },
  limits: {
    maxFileBytes: 5 * 1024 * 1024,
  },
  history: {
    dbPath: ':memory:',
  },
};

const DEFAULT_TIMEOUT_SECONDS = 30;

// ---------------------------------------------------------------------------
// Policy Engine
// ---------------------------------------------------------------------------

export class PolicyEngine {
  private config: PolicyConfig;

  constructor(workspaceRoot?: string) {
    this.config = this.loadPolicy(workspaceRoot);
  }

  private loadPolicy(workspaceRoot?: string): PolicyConfig {
    if (!workspaceRoot) return clonePolicy(DEFAULT_POLICY);

    const policyPath = join(workspaceRoot, POLICY_FILENAME);
    if (!existsSync(policyPath)) return clonePolicy(DEFAULT_POLICY);

    let raw: unknown;
    try {
      raw = parseYaml(readFileSync(policyPath, 'utf-8'));
    } catch (err) {
      log.warn(`Ignoring unreadable ${POLICY_FILENAME}:`, err);
      return clonePolicy(DEFAULT_POLICY);
    }

    const parsed = policySchema.safeParse(raw ?? {});
    if (!parsed.success) {
      log.warn(
        `Ignoring invalid ${POLICY_FILENAME}: ${parsed.error.issues
          .map((i) => `${i.path.join('.')}: ${i.message}`)
          .join('; ')}`,
      );
      return clonePolicy(DEFAULT_POLICY);
    }

    const p = parsed.data;
    // Deep merge with defaults
    return {
      workspace: {
        denyPatterns:
          p.workspace?.denyPatterns ?? [...DEFAULT_POLICY.workspace.denyPatterns],
      },
      session: { ...DEFAULT_POLICY.session, ...p.session },
      execution: {
        timeouts: {
          ...DEFAULT_POLICY.execution.timeouts,
          ...p.execution?.timeouts,
        },
      },
      limits: { ...DEFAULT_POLICY.limits, ...p.limits },
      history: { ...DEFAULT_POLICY.history, ...p.history },
    };
  }

  /**
   * Get timeout in seconds for a tool.
   */
  getTimeout(toolName: string): number {
    return this.config.execution.timeouts[toolName] ?? DEFAULT_TIMEOUT_SECONDS;
  }

  /**
   * Get workspace deny patterns.
   */
  getDenyPatterns(): string[] {
    return this.config.workspace.denyPatterns;
  }

  getSessionBounds(): { maxOperations: number; maxAttempts: number } {
    return this.config.session;
  }

  getLimits(): { maxFileBytes: number } {
    return this.config.limits;
  }

  getHistoryConfig(): { dbPath: string } {
    return this.config.history;
  }

  /**
   * Get the full resolved config (for debugging).
   */
  getConfig(): PolicyConfig {
    return this.config;
  }
}

function clonePolicy(policy: PolicyConfig): PolicyConfig {
  return {
    workspace: { denyPatterns: [...policy.workspace.denyPatterns] },
    session: { ...policy.session },
    execution: { timeouts: { ...policy.execution.timeouts } },
    limits: { ...policy.limits },
    history: { ...policy.history },
  };
}
