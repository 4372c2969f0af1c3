/**
 * Quality probes for code-producing writes: syntax, formatting, lint.
 * A `null` result means the probe does not apply to the file type.
 */

import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';

const BRACKET_LANGUAGES = new Set([
  '.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs',
  '.java', '.c', '.h', '.cpp', '.hpp', '.cs', '.go', '.rs', '.swift',
  '.kt', '.css', '.scss', '.php',
]);

const SCRIPT_LANGUAGES = new Set(['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs']);

const PAIRS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

export interface ProbeResult {
  value: boolean | null;
  message?: string;
}

// ---------------------------------------------------------------------------
// syntax_valid
// ---------------------------------------------------------------------------

export function checkSyntax(path: string, text: string): ProbeResult {
  const ext = extname(path).toLowerCase();

  if (ext === '.json') {
    try {
      JSON.parse(text);
      return { value: true };
    } catch (err) {
      return { value: false, message: `Invalid JSON: ${errorText(err)}` };
    }
  }

  if (ext === '.yaml' || ext === '.yml') {
    try {
      parseYaml(text);
      return { value: true };
    } catch (err) {
      return { value: false, message: `Invalid YAML: ${errorText(err)}` };
    }
  }

  if (BRACKET_LANGUAGES.has(ext)) {
    const problem = findUnbalancedBracket(text);
    return problem ? { value: false, message: problem } : { value: true };
  }

  return { value: null };
}

/**
 * Bracket matcher that skips string literals and comments.
 * Returns a description of the first problem, or null.
 */
function findUnbalancedBracket(text: string): string | null {
  const stack: { ch: string; line: number }[] = [];
  let line = 1;
  let i = 0;

  while (i < text.length) {
    const ch = text[i] ?? '';
    const next = text[i + 1];

    if (ch === '\n') {
      line++;
      i++;
      continue;
    }

    // Comments
    if (ch === '/' && next === '/') {
      while (i < text.length && text[i] !== '\n') i++;
      continue;
    }
    if (ch === '/' && next === '*') {
      i += 2;
      while (i < text.length && !(text[i] === '*' && text[i + 1] === '/')) {
        if (text[i] === '\n') line++;
        i++;
      }
      i += 2;
      continue;
    }

    // Strings
    if (ch === '"' || ch === "'" || ch === '`') {
      i++;
      while (i < text.length && text[i] !== ch) {
        if (text[i] === '\\') i++;
        else if (text[i] === '\n') {
          if (ch !== '`') break;
          line++;
        }
        i++;
      }
      i++;
      continue;
    }

    if (ch === '(' || ch === '[' || ch === '{') {
      stack.push({ ch, line });
    } else if (ch in PAIRS) {
      const open = stack.pop();
      if (!open || open.ch !== PAIRS[ch]) {
        return `Unexpected "${ch}" on line ${line}`;
      }
    }
    i++;
  }

  const unclosed = stack.pop();
  return unclosed ? `Unclosed "${unclosed.ch}" from line ${unclosed.line}` : null;
}

// ---------------------------------------------------------------------------
// format_valid
// ---------------------------------------------------------------------------

export function checkFormat(text: string): ProbeResult {
  const crlf = (text.match(/\r\n/g) ?? []).length;
  const lf = (text.match(/\n/g) ?? []).length;
  if (crlf > 0 && crlf !== lf) {
    return { value: false, message: 'Mixed line endings' };
  }

  const lines = text.split(/\r?\n/);
  const trailing = lines.findIndex((l) => /[ \t]+$/.test(l));
  if (trailing !== -1) {
    return { value: false, message: `Trailing whitespace on line ${trailing + 1}` };
  }

  return { value: true };
}

// ---------------------------------------------------------------------------
// lint_passed
// ---------------------------------------------------------------------------

const CONFLICT_MARKER = /^(<{7}|>{7})( |$)|^={7}$/m;
const DEBUGGER_STATEMENT = /^\s*debugger;?\s*$/m;

export function checkLint(path: string, text: string): ProbeResult {
  if (CONFLICT_MARKER.test(text)) {
    return { value: false, message: 'Merge conflict markers present' };
  }
  if (SCRIPT_LANGUAGES.has(extname(path).toLowerCase()) && DEBUGGER_STATEMENT.test(text)) {
    return { value: false, message: 'debugger statement present' };
  }
  return { value: true };
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
