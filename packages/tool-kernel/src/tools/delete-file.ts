/**
 * delete_file — Remove a file or directory inside the workspace
 */

import { lstat, rm, unlink } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ToolContext, ToolHandler, ToolOutput } from '@forgeloop/core';
import { z } from 'zod';
import { moveAside } from './fs-helpers.js';

export const inputSchema = z.object({
  path: z.string().min(1).describe('Relative path of the file or directory to delete'),
});

type Input = z.infer<typeof inputSchema>;

async function lstatOrNull(fullPath: string) {
  try {
    return await lstat(fullPath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

export const deleteFileTool: ToolHandler<Input> = {
  id: 'delete_file',
  description:
    'Delete a file (or directory tree). Deleting a path that does not exist is not an error.',
  inputSchema,
  category: 'write',
  strategies: ['default', 'force', 'rename_then_delete'],

  targetPath: (input) => input.path,

  async execute(input: Input, ctx: ToolContext): Promise<ToolOutput> {
    const fullPath = resolve(ctx.workspaceRoot, input.path);
    const stats = await lstatOrNull(fullPath);

    if (!stats) {
      return {
        path: input.path,
        summary: `${input.path} already does not exist`,
        affectedFiles: [input.path],
      };
    }

    switch (ctx.strategy) {
      case 'force':
        await rm(fullPath, { recursive: true, force: true, maxRetries: 3 });
        break;
      case 'rename_then_delete': {
        const trash = await moveAside(fullPath);
        await rm(trash, { recursive: true, force: true });
        break;
      }
      default:
        if (stats.isDirectory()) {
          await rm(fullPath, { recursive: true });
        } else {
          await unlink(fullPath);
        }
    }

    return {
      path: input.path,
      summary: `Deleted ${input.path}`,
      affectedFiles: [input.path],
    };
  },
};
