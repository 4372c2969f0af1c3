/**
 * read_file — Read file contents within workspace jail
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ToolContext, ToolHandler, ToolOutput } from '@forgeloop/core';
import { hashContent } from '@forgeloop/core';
import { z } from 'zod';
import { decodeLenient, type TextEncodingName } from './decode.js';

export const inputSchema = z.object({
  path: z.string().min(1).describe('Relative path to the file within the workspace'),
  startLine: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe('Start line (1-indexed, inclusive)'),
  endLine: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe('End line (1-indexed, inclusive)'),
});

type Input = z.infer<typeof inputSchema>;

export interface ReadFileData {
  content: string;
  totalLines: number;
  encoding: TextEncodingName;
  /** SHA-256 of the whole file as read */
  hash: string;
  range?: { start: number; end: number };
}

export const readFileTool: ToolHandler<Input> = {
  id: 'read_file',
  description:
    'Read the contents of a file. Supports an optional line range. Path is relative to workspace root.',
  inputSchema,
  category: 'read',
  strategies: ['default', 'encoding'],

  targetPath: (input) => input.path,

  async execute(input: Input, ctx: ToolContext): Promise<ToolOutput> {
    const fullPath = resolve(ctx.workspaceRoot, input.path);

    const bytes = await readFile(fullPath, { signal: ctx.signal });

    let content: string;
    let encoding: TextEncodingName = 'utf-8';
    if (ctx.strategy === 'encoding') {
      const decoded = decodeLenient(bytes);
      content = decoded.text;
      encoding = decoded.encoding;
    } else {
      content = bytes.toString('utf-8');
    }

    const lines = content.split('\n');
    const data: ReadFileData = {
      content,
      totalLines: lines.length,
      encoding,
      hash: hashContent(bytes),
    };

    if (input.startLine !== undefined || input.endLine !== undefined) {
      const start = Math.max(1, input.startLine ?? 1);
      const end = Math.min(lines.length, input.endLine ?? lines.length);
      data.content = lines.slice(start - 1, end).join('\n');
      data.range = { start, end };
    }

    return {
      path: input.path,
      summary: `Read ${data.totalLines} lines from ${input.path}`,
      affectedFiles: [input.path],
      data,
    };
  },
};
