/**
 * @forgeloop/verification — Verification Engine
 *
 * Runs the tool's check table against the real filesystem after a tool call
 * and folds the outcomes into a layered verdict. Any failed critical check
 * fails the report; every other failed check becomes a warning.
 */

import type { Stats } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  type CheckCategory,
  type CheckOutcome,
  createLogger,
  type OperationTypeProfile,
  type ToolName,
  type ToolResult,
  type VerificationGroups,
  type VerificationReport,
  type VerificationWarning,
} from '@forgeloop/core';
import { z } from 'zod';
import {
  CHECK_TABLES,
  type CheckSpec,
  type Expectations,
  type Probe,
} from './check-tables.js';

const log = createLogger('VerificationEngine');

const DEFAULT_MAX_FILE_BYTES = 5 * 1024 * 1024;

/** Categories that only run at `strict` strictness */
const STRICT_ONLY: ReadonlySet<CheckCategory> = new Set(['security', 'quality']);

export interface VerificationTarget {
  /** Workspace-relative path, already normalized by the kernel */
  path: string;
  expected: Expectations;
  /** Whether the path existed before the operation, when known */
  preExisted?: boolean | null;
}

export interface VerificationEngineOptions {
  workspaceRoot: string;
  maxFileBytes?: number;
}

// ---------------------------------------------------------------------------
// Expectations
// ---------------------------------------------------------------------------

const expectationArgs = z.object({
  content: z.string().optional(),
  data: z.unknown().optional(),
  schema: z.record(z.unknown()).optional(),
  expectedContents: z.array(z.string()).optional(),
});

/**
 * Pull the values a tool's content checks compare against out of its
 * invocation args.
 */
export function expectationsFromArgs(
  toolName: ToolName,
  args: Record<string, unknown>,
): Expectations {
  const parsed = expectationArgs.safeParse(args);
  if (!parsed.success) return {};
  const a = parsed.data;

  switch (toolName) {
    case 'write_file':
      return { content: a.content };
    case 'save_json':
      return { data: a.data, schema: a.schema };
    case 'load_json':
      return { schema: a.schema };
    case 'create_directory':
      return { expectedContents: a.expectedContents };
    default:
      return {};
  }
}

// ---------------------------------------------------------------------------
// Verification Engine
// ---------------------------------------------------------------------------

export class VerificationEngine {
  private readonly workspaceRoot: string;
  private readonly maxFileBytes: number;

  constructor(options: VerificationEngineOptions) {
    this.workspaceRoot = resolve(options.workspaceRoot);
    this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  }

  async verify(
    toolName: ToolName,
    result: ToolResult,
    profile: OperationTypeProfile,
    target: VerificationTarget,
  ): Promise<VerificationReport> {
    const probe = await this.probe(result, target);
    const table = CHECK_TABLES[toolName];

    const checks: CheckOutcome[] = [];
    for (const spec of table.checks) {
      if (profile.strictness === 'basic' && STRICT_ONLY.has(spec.category)) {
        continue;
      }
      if (spec.applies && !spec.applies(probe)) continue;
      checks.push(await runCheck(spec, probe));
    }

    const groups: VerificationGroups = {};
    for (const check of checks) {
      const group = table.layered ? `${check.category}_checks` : 'checks';
      groups[group] = { ...groups[group], [check.name]: check.value };
    }

    const failures: string[] = [];
    const warnings: VerificationWarning[] = [];
    for (const check of checks) {
      if (check.passed) continue;
      const message = check.message ?? `${check.name} failed`;
      if (check.category === 'critical') {
        failures.push(message);
      } else {
        warnings.push({
          check: check.name,
          category: check.category,
          message,
          userRelevant: check.category !== 'quality',
        });
      }
    }

    log.debug(
      `${toolName} ${target.path}: ${checks.length} checks, ${failures.length} critical failures, ${warnings.length} warnings`,
    );

    return {
      toolName,
      strictness: profile.strictness,
      success: failures.length === 0,
      groups,
      checks,
      failures,
      warnings,
    };
  }

  private async probe(
    result: ToolResult,
    target: VerificationTarget,
  ): Promise<Probe> {
    const absolutePath = resolve(this.workspaceRoot, target.path);
    const stats = await statOrNull(absolutePath);

    let bytes: Buffer | null = null;
    if (stats?.isFile() && stats.size <= this.maxFileBytes) {
      bytes = await readFile(absolutePath);
    }

    return {
      workspaceRoot: this.workspaceRoot,
      relativePath: target.path,
      absolutePath,
      stats,
      bytes,
      maxFileBytes: this.maxFileBytes,
      expected: target.expected,
      preExisted: target.preExisted ?? null,
      output: result.data,
    };
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

async function runCheck(spec: CheckSpec, probe: Probe): Promise<CheckOutcome> {
  try {
    const r = await spec.run(probe);
    const passed = r.passed ?? r.value !== false;
    return {
      name: spec.name,
      category: spec.category,
      value: r.value,
      passed,
      ...(passed ? {} : { message: r.message }),
    };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.warn(`Check ${spec.name} errored on ${probe.relativePath}: ${reason}`);
    return {
      name: spec.name,
      category: spec.category,
      value: null,
      passed: false,
      message: `${spec.name} could not run: ${reason}`,
    };
  }
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return null;
    }
    throw err;
  }
}
