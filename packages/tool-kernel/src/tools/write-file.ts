/**
 * write_file — Create or overwrite a text file inside the workspace
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ToolContext, ToolHandler, ToolOutput } from '@forgeloop/core';
import { z } from 'zod';
import {
  writeEncoded,
  writeText,
  writeViaTempFile,
  writeWithBackup,
} from './fs-helpers.js';

export const inputSchema = z.object({
  path: z.string().min(1).describe('Relative path to the file to write'),
  content: z.string().describe('Full file content'),
});

type Input = z.infer<typeof inputSchema>;

export const writeFileTool: ToolHandler<Input> = {
  id: 'write_file',
  description:
    'Write the full content of a text file, creating parent directories as needed. Path is relative to workspace root.',
  inputSchema,
  category: 'write',
  strategies: ['default', 'encoding', 'temp_file', 'backup_restore'],

  targetPath: (input) => input.path,

  async execute(input: Input, ctx: ToolContext): Promise<ToolOutput> {
    const fullPath = resolve(ctx.workspaceRoot, input.path);

    switch (ctx.strategy) {
      case 'encoding':
        await writeEncoded(fullPath, input.content);
        break;
      case 'temp_file':
        await writeViaTempFile(fullPath, input.content);
        break;
      case 'backup_restore':
        await writeWithBackup(fullPath, input.content, existsSync(fullPath));
        break;
      default:
        await writeText(fullPath, input.content, ctx.signal);
    }

    const bytes = Buffer.byteLength(input.content, 'utf-8');
    return {
      path: input.path,
      summary: `Wrote ${bytes} bytes to ${input.path}`,
      affectedFiles: [input.path],
    };
  },
};
