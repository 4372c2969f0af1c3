/**
 * @forgeloop/core — Tool types
 *
 * Tool handler interface, invocation context, and the uniform ToolResult
 * envelope every tool call is wrapped into.
 */

import type { ZodType, ZodTypeDef } from 'zod';

// ---------------------------------------------------------------------------
// Tool names & strategies
// ---------------------------------------------------------------------------

export const TOOL_NAMES = [
  'write_file',
  'read_file',
  'create_directory',
  'delete_file',
  'save_json',
  'load_json',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(value);
}

/**
 * Named retry approaches. `default` is the plain first attempt; every other
 * name selects a variant code path inside the tool primitive.
 */
export type StrategyName =
  | 'default'
  | 'encoding'
  | 'temp_file'
  | 'backup_restore'
  | 'recursive'
  | 'parent_first'
  | 'force'
  | 'rename_then_delete';

// ---------------------------------------------------------------------------
// Tool result envelope
// ---------------------------------------------------------------------------

export type CheckValue = boolean | number | string | null;

/** check-group → check-name → value */
export type VerificationGroups = Record<string, Record<string, CheckValue>>;

/** Pre-operation state of one path, enough to copy it back. */
export interface RollbackEntry {
  /** Workspace-relative path */
  path: string;
  existedBefore: boolean;
  wasDirectory: boolean;
  /** SHA-256 of the prior bytes (files only) */
  hash: string | null;
  /** Content-addressed backup copy of the prior bytes (files only) */
  backupPath: string | null;
  /** Number of entries a prior directory held; their contents are not backed up */
  childCount: number;
}

export interface RollbackInfo {
  checkpointId: string;
  entries: RollbackEntry[];
}

/**
 * Outcome of one tool invocation attempt.
 * If `success` is false, `result` describes the failure cause.
 */
export interface ToolResult {
  success: boolean;
  /** Human-readable outcome or error text */
  result: string;
  verification: VerificationGroups;
  diagnostics: Record<string, unknown>;
  /** Operation ids that had to succeed before this one */
  dependencies: string[];
  /** Workspace-relative paths touched (deduplicated) */
  affectedFiles: string[];
  warnings: string[];
  /** Populated for critical operations that touch files */
  rollbackInfo: RollbackInfo | null;
  /** Structured payload returned by the primitive (file content, parsed JSON) */
  data?: unknown;
}

// ---------------------------------------------------------------------------
// Tool primitives
// ---------------------------------------------------------------------------

/** Raw outcome of a tool primitive, before the executor wraps it. */
export interface ToolOutput {
  /** Workspace-relative target path */
  path: string;
  summary: string;
  affectedFiles: string[];
  data?: unknown;
}

/** Context provided to every tool execution */
export interface ToolContext {
  /** Absolute path to the workspace root (jail boundary) */
  workspaceRoot: string;
  /** Operation this invocation belongs to */
  operationId: string;
  /** Session this invocation belongs to */
  sessionId: string;
  /** Variant the primitive should use for this attempt */
  strategy: StrategyName;
  /** Abort signal for timeout enforcement */
  signal: AbortSignal;
}

/**
 * Every tool registered with the kernel implements this interface.
 * The executor never calls a handler directly, only through a ToolInvoker.
 */
export interface ToolHandler<I = unknown, O extends ToolOutput = ToolOutput> {
  id: ToolName;
  /** Human-readable description for model tool selection */
  description: string;
  /** Zod schema for input validation */
  inputSchema: ZodType<I, ZodTypeDef, unknown>;
  category: 'read' | 'write';
  /** Strategies this handler implements besides `default` */
  strategies: readonly StrategyName[];
  /** The workspace-relative path the input targets */
  targetPath(input: I): string;
  execute(input: I, ctx: ToolContext): Promise<O>;
}

/** Per-call context the executor hands to the invoker. */
export interface InvokeContext {
  operationId: string;
  sessionId: string;
  strategy: StrategyName;
}

/**
 * The tool-primitive collaborator as the executor sees it.
 * Implementations may throw; the executor converts throws into failed results.
 */
export interface ToolInvoker {
  readonly workspaceRoot: string;
  invoke(
    toolName: ToolName,
    args: Record<string, unknown>,
    ctx: InvokeContext,
  ): Promise<ToolOutput>;
  /** Normalize and jail-check the path an invocation would touch. */
  resolveTarget(toolName: ToolName, args: Record<string, unknown>): string;
}
