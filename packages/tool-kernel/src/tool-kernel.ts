/**
 * @forgeloop/tool-kernel — Tool Kernel
 *
 * Tool registration, workspace jail enforcement, and strategy-aware
 * invocation of the file and JSON primitives.
 */

import { isAbsolute, relative, resolve, sep } from 'node:path';
import type {
  InvokeContext,
  StrategyName,
  ToolContext,
  ToolHandler,
  ToolInvoker,
  ToolName,
  ToolOutput,
} from '@forgeloop/core';
import { PolicyEngine } from './policy-engine.js';
import { createDirectoryTool } from './tools/create-directory.js';
import { deleteFileTool } from './tools/delete-file.js';
import { loadJsonTool } from './tools/load-json.js';
import { readFileTool } from './tools/read-file.js';
import { saveJsonTool } from './tools/save-json.js';
import { writeFileTool } from './tools/write-file.js';

// ---------------------------------------------------------------------------
// Registered tool (input type erased behind its own schema)
// ---------------------------------------------------------------------------

export interface RegisteredTool {
  id: ToolName;
  description: string;
  category: ToolHandler['category'];
  strategies: readonly StrategyName[];
  targetOf(args: Record<string, unknown>): string;
  run(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolOutput>;
}

function erase<I>(tool: ToolHandler<I>): RegisteredTool {
  return {
    id: tool.id,
    description: tool.description,
    category: tool.category,
    strategies: tool.strategies,
    targetOf: (args) => tool.targetPath(tool.inputSchema.parse(args)),
    run: (args, ctx) => tool.execute(tool.inputSchema.parse(args), ctx),
  };
}

// ---------------------------------------------------------------------------
// Tool Kernel
// ---------------------------------------------------------------------------

export class ToolKernel implements ToolInvoker {
  private tools = new Map<ToolName, RegisteredTool>();
  readonly policy: PolicyEngine;
  readonly workspaceRoot: string;

  constructor(workspaceRoot: string, policy?: PolicyEngine) {
    this.workspaceRoot = resolve(workspaceRoot);
    this.policy = policy ?? new PolicyEngine(this.workspaceRoot);
  }

  // -------------------------------------------------------------------------
  // Tool registration
  // -------------------------------------------------------------------------

  /**
   * Register a tool handler.
   */
  register<I>(tool: ToolHandler<I>): void {
    if (this.tools.has(tool.id)) {
      throw new Error(`Tool already registered: ${tool.id}`);
    }
    this.tools.set(tool.id, erase(tool));
  }

  /**
   * Get a registered tool.
   */
  getTool(toolName: ToolName): RegisteredTool | undefined {
    return this.tools.get(toolName);
  }

  /**
   * Get all registered tools.
   */
  getTools(): RegisteredTool[] {
    return Array.from(this.tools.values());
  }

  // -------------------------------------------------------------------------
  // Workspace jail
  // -------------------------------------------------------------------------

  /**
   * Validate that a path is within the workspace boundary.
   * Throws if the path escapes the jail. Returns the absolute path.
   */
  validatePath(targetPath: string): string {
    if (targetPath.includes('\0')) {
      throw new Error(`Path contains a NUL byte: ${JSON.stringify(targetPath)}`);
    }

    const resolved = resolve(this.workspaceRoot, targetPath);
    const rel = relative(this.workspaceRoot, resolved);

    if (rel === '') {
      throw new Error(`Path targets the workspace root itself: ${targetPath}`);
    }
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new Error(`Path escapes workspace jail: ${targetPath}`);
    }

    // Check deny patterns
    const posixRel = rel.split(sep).join('/');
    for (const pattern of this.policy.getDenyPatterns()) {
      if (matchesPattern(posixRel, pattern)) {
        throw new Error(
          `Path matches deny pattern "${pattern}": ${targetPath}`,
        );
      }
    }

    return resolved;
  }

  /**
   * Workspace-relative, forward-slash form of a jailed path.
   */
  toWorkspacePath(targetPath: string): string {
    return relative(this.workspaceRoot, this.validatePath(targetPath))
      .split(sep)
      .join('/');
  }

  resolveTarget(toolName: ToolName, args: Record<string, unknown>): string {
    return this.toWorkspacePath(this.getToolOrThrow(toolName).targetOf(args));
  }

  // -------------------------------------------------------------------------
  // Tool invocation
  // -------------------------------------------------------------------------

  /**
   * Execute a tool within the sandboxed context using the requested
   * strategy. Enforces the workspace jail and the per-tool timeout.
   */
  async invoke(
    toolName: ToolName,
    args: Record<string, unknown>,
    ctx: InvokeContext,
  ): Promise<ToolOutput> {
    const tool = this.getToolOrThrow(toolName);

    if (ctx.strategy !== 'default' && !tool.strategies.includes(ctx.strategy)) {
      throw new Error(
        `${toolName} does not implement the "${ctx.strategy}" strategy`,
      );
    }

    const path = this.toWorkspacePath(tool.targetOf(args));

    const timeoutMs = this.policy.getTimeout(toolName) * 1000;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    const toolCtx: ToolContext = {
      workspaceRoot: this.workspaceRoot,
      operationId: ctx.operationId,
      sessionId: ctx.sessionId,
      strategy: ctx.strategy,
      signal: controller.signal,
    };

    try {
      return await tool.run({ ...args, path }, toolCtx);
    } finally {
      clearTimeout(timer);
    }
  }

  private getToolOrThrow(toolName: ToolName): RegisteredTool {
    const tool = this.tools.get(toolName);
    if (!tool) {
      throw new Error(`Unknown tool: ${toolName}`);
    }
    return tool;
  }
}

/**
 * Kernel with every built-in primitive registered.
 */
export function createToolKernel(
  workspaceRoot: string,
  policy?: PolicyEngine,
): ToolKernel {
  const kernel = new ToolKernel(workspaceRoot, policy);
  kernel.register(writeFileTool);
  kernel.register(readFileTool);
  kernel.register(createDirectoryTool);
  kernel.register(deleteFileTool);
  kernel.register(saveJsonTool);
  kernel.register(loadJsonTool);
  return kernel;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

export function matchesPattern(path: string, pattern: string): boolean {
  // Simple glob matching (covers **/* patterns)
  const toRegex = (p: string) => {
    const r = p
      .replace(/[.+^${}()|[\]\\]/g, '\\$&')
      .replace(/\*\*/g, '{{GLOBSTAR}}')
      .replace(/\*/g, '[^/]*')
      .replace(/{{GLOBSTAR}}/g, '.*');
    return new RegExp(`^${r}$`);
  };

  if (toRegex(pattern).test(path)) return true;

  // Also try stripping a leading **/ so "**/.git/**" matches ".git/config"
  if (pattern.startsWith('**/')) {
    const stripped = pattern.slice(3);
    if (toRegex(stripped).test(path)) return true;
  }

  return false;
}
