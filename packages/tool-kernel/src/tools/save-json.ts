/**
 * save_json — Serialize data as pretty-printed JSON into a workspace file
 */

import { resolve } from 'node:path';
import type { ToolContext, ToolHandler, ToolOutput } from '@forgeloop/core';
import { z } from 'zod';
import { writeEncoded, writeText, writeViaTempFile } from './fs-helpers.js';

export const inputSchema = z.object({
  path: z.string().min(1).describe('Relative path of the JSON file'),
  data: z.unknown().describe('Value to serialize'),
  schema: z
    .record(z.unknown())
    .optional()
    .describe('JSON Schema the saved value must satisfy'),
});

type Input = z.infer<typeof inputSchema>;

export const saveJsonTool: ToolHandler<Input> = {
  id: 'save_json',
  description:
    'Save a value as JSON (2-space indented). Optionally checked against a JSON Schema after writing.',
  inputSchema,
  category: 'write',
  strategies: ['default', 'encoding', 'temp_file'],

  targetPath: (input) => input.path,

  async execute(input: Input, ctx: ToolContext): Promise<ToolOutput> {
    if (input.data === undefined) {
      throw new Error('save_json requires a data value');
    }
    const fullPath = resolve(ctx.workspaceRoot, input.path);
    const text = `${JSON.stringify(input.data, null, 2)}\n`;

    switch (ctx.strategy) {
      case 'encoding':
        await writeEncoded(fullPath, text);
        break;
      case 'temp_file':
        await writeViaTempFile(fullPath, text);
        break;
      default:
        await writeText(fullPath, text, ctx.signal);
    }

    return {
      path: input.path,
      summary: `Saved JSON to ${input.path}`,
      affectedFiles: [input.path],
    };
  },
};
