/**
 * create_directory — Create a directory inside the workspace
 */

import { mkdir, stat } from 'node:fs/promises';
import { relative, resolve, sep } from 'node:path';
import type { ToolContext, ToolHandler, ToolOutput } from '@forgeloop/core';
import { z } from 'zod';

export const inputSchema = z.object({
  path: z.string().min(1).describe('Relative path of the directory to create'),
  expectedContents: z
    .array(z.string())
    .optional()
    .describe('Entry names the directory is expected to hold afterwards'),
});

type Input = z.infer<typeof inputSchema>;

const isErrnoCode = (err: unknown, code: string): boolean =>
  err instanceof Error && 'code' in err && err.code === code;

async function isDirectory(fullPath: string): Promise<boolean> {
  try {
    return (await stat(fullPath)).isDirectory();
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return false;
    throw err;
  }
}

/** Single-level mkdir; an existing directory counts as done. */
async function mkdirSingle(fullPath: string): Promise<void> {
  try {
    await mkdir(fullPath);
  } catch (err) {
    if (isErrnoCode(err, 'EEXIST') && (await isDirectory(fullPath))) return;
    throw err;
  }
}

/** Create each ancestor in turn so the failing segment is named. */
async function mkdirParentFirst(
  workspaceRoot: string,
  fullPath: string,
): Promise<void> {
  const segments = relative(workspaceRoot, fullPath).split(sep).filter(Boolean);
  let current = workspaceRoot;
  for (const segment of segments) {
    current = resolve(current, segment);
    try {
      await mkdirSingle(current);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(
        `Cannot create ${relative(workspaceRoot, current)}: ${reason}`,
        { cause: err },
      );
    }
  }
}

export const createDirectoryTool: ToolHandler<Input> = {
  id: 'create_directory',
  description:
    'Create a directory. Path is relative to workspace root.',
  inputSchema,
  category: 'write',
  strategies: ['default', 'recursive', 'parent_first'],

  targetPath: (input) => input.path,

  async execute(input: Input, ctx: ToolContext): Promise<ToolOutput> {
    const fullPath = resolve(ctx.workspaceRoot, input.path);

    switch (ctx.strategy) {
      case 'recursive':
        await mkdir(fullPath, { recursive: true });
        if (!(await isDirectory(fullPath))) {
          throw new Error(`${input.path} exists and is not a directory`);
        }
        break;
      case 'parent_first':
        await mkdirParentFirst(ctx.workspaceRoot, fullPath);
        break;
      default:
        await mkdirSingle(fullPath);
    }

    return {
      path: input.path,
      summary: `Created directory ${input.path}`,
      affectedFiles: [input.path],
    };
  },
};
