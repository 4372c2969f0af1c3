/**
 * load_json — Read and parse a JSON file from the workspace
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ToolContext, ToolHandler, ToolOutput } from '@forgeloop/core';
import { z } from 'zod';
import { decodeLenient } from './decode.js';

export const inputSchema = z.object({
  path: z.string().min(1).describe('Relative path of the JSON file'),
  schema: z
    .record(z.unknown())
    .optional()
    .describe('JSON Schema the loaded value is expected to satisfy'),
});

type Input = z.infer<typeof inputSchema>;

const BOM = '\uFEFF';

export const loadJsonTool: ToolHandler<Input> = {
  id: 'load_json',
  description: 'Load and parse a JSON file. Path is relative to workspace root.',
  inputSchema,
  category: 'read',
  strategies: ['default', 'encoding'],

  targetPath: (input) => input.path,

  async execute(input: Input, ctx: ToolContext): Promise<ToolOutput> {
    const fullPath = resolve(ctx.workspaceRoot, input.path);

    let text: string;
    if (ctx.strategy === 'encoding') {
      // Tolerates a leading byte-order mark and bytes that are not UTF-8
      text = decodeLenient(await readFile(fullPath, { signal: ctx.signal })).text;
      if (text.startsWith(BOM)) text = text.slice(BOM.length);
    } else {
      text = await readFile(fullPath, { encoding: 'utf-8', signal: ctx.signal });
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Invalid JSON in ${input.path}: ${reason}`, {
        cause: err,
      });
    }

    return {
      path: input.path,
      summary: `Loaded JSON from ${input.path}`,
      affectedFiles: [input.path],
      data,
    };
  },
};
