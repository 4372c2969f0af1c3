/**
 * @forgeloop/tool-kernel — Tool block parser
 *
 * Turns the plain-text tool blocks a model emits into operation requests:
 *
 *   %%tool write_file
 *   %%path src/index.ts
 *   %%content
 *   ...exact file body...
 *   %%end
 *
 * Blocks without a body close with a bare `%%end`.
 */

import { isToolName, type OperationRequest, type ToolName } from '@forgeloop/core';

export interface ToolBlockError {
  /** 1-based line of the `%%tool` marker */
  line: number;
  message: string;
}

export interface ParsedToolBlocks {
  requests: OperationRequest[];
  errors: ToolBlockError[];
}

const TOOL_RE = /^%%tool\s+(\S+)\s*$/;
const PATH_RE = /^%%path\s+(.+?)\s*$/;
const CONTENT_MARK = '%%content';
const END_MARK = '%%end';

export function parseToolBlocks(text: string): ParsedToolBlocks {
  const lines = text.split(/\r?\n/);
  const requests: OperationRequest[] = [];
  const errors: ToolBlockError[] = [];

  let i = 0;
  while (i < lines.length) {
    const toolMatch = TOOL_RE.exec(lines[i]?.trim() ?? '');
    if (!toolMatch) {
      i++;
      continue;
    }

    const startLine = i + 1;
    const rawName = toolMatch[1] ?? '';
    i++;

    const pathMatch = PATH_RE.exec(lines[i]?.trim() ?? '');
    if (!pathMatch) {
      errors.push({ line: startLine, message: `Missing %%path after %%tool ${rawName}` });
      continue;
    }
    const path = pathMatch[1] ?? '';
    i++;

    let content: string | undefined;
    const marker = lines[i]?.trim();
    if (marker === END_MARK) {
      i++;
    } else if (marker === CONTENT_MARK) {
      i++;
      const body: string[] = [];
      let closed = false;
      while (i < lines.length) {
        const line = lines[i] ?? '';
        i++;
        if (line.trim() === END_MARK) {
          closed = true;
          break;
        }
        body.push(line);
      }
      if (!closed) {
        errors.push({ line: startLine, message: `Unterminated %%content for ${rawName} ${path}` });
        break;
      }
      content = body.join('\n');
    } else {
      errors.push({ line: startLine, message: `Expected %%content or %%end for ${rawName} ${path}` });
      continue;
    }

    if (!isToolName(rawName)) {
      errors.push({ line: startLine, message: `Unknown tool "${rawName}"` });
      continue;
    }

    const args = buildArgs(rawName, path, content);
    if ('error' in args) {
      errors.push({ line: startLine, message: args.error });
      continue;
    }

    requests.push({
      toolName: rawName,
      args: args.value,
      description: `${rawName} ${path}`,
    });
  }

  return { requests, errors };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

type ArgsResult = { value: Record<string, unknown> } | { error: string };

function buildArgs(
  toolName: ToolName,
  path: string,
  content: string | undefined,
): ArgsResult {
  switch (toolName) {
    case 'write_file':
      return { value: { path, content: content ?? '' } };
    case 'save_json': {
      if (content === undefined) {
        return { error: `save_json ${path} has no %%content` };
      }
      try {
        return { value: { path, data: JSON.parse(content) } };
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return { error: `save_json ${path} content is not valid JSON: ${reason}` };
      }
    }
    default:
      return { value: { path } };
  }
}
