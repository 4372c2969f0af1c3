/**
 * @forgeloop/verification — Check tables
 *
 * The fixed, per-tool list of post-condition checks. Every check reads the
 * target through a prepared {@link Probe}; none of them writes.
 */

import { constants, type Stats } from 'node:fs';
import { access, readdir, realpath } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join, relative } from 'node:path';
import { isDeepStrictEqual } from 'node:util';
import {
  type CheckCategory,
  type CheckValue,
  formatPermissions,
  hashContent,
  type ToolName,
} from '@forgeloop/core';
import { z } from 'zod';
import { jsonTypeOf, validateAgainstSchema } from './json-schema.js';
import { checkFormat, checkLint, checkSyntax } from './quality.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What the caller asked for, used by content checks. */
export interface Expectations {
  content?: string;
  data?: unknown;
  schema?: Record<string, unknown>;
  expectedContents?: string[];
}

/** Read-only view of the target after the tool ran. */
export interface Probe {
  workspaceRoot: string;
  relativePath: string;
  absolutePath: string;
  /** null when nothing exists at the path */
  stats: Stats | null;
  /** File bytes; null for directories, missing paths, or files over the limit */
  bytes: Buffer | null;
  maxFileBytes: number;
  expected: Expectations;
  /** Whether the path existed before the operation, when known */
  preExisted: boolean | null;
  /** Structured payload the primitive returned */
  output: unknown;
}

export interface CheckResult {
  value: CheckValue;
  /** Defaults to `value !== false` */
  passed?: boolean;
  message?: string;
}

export interface CheckSpec {
  name: string;
  category: CheckCategory;
  /** When present and false, the check is left out of the report */
  applies?: (p: Probe) => boolean;
  run: (p: Probe) => CheckResult | Promise<CheckResult>;
}

export interface CheckTable {
  /** Group checks by category (`critical_checks`, ...) instead of one flat group */
  layered: boolean;
  checks: CheckSpec[];
}

// ---------------------------------------------------------------------------
// Probe helpers
// ---------------------------------------------------------------------------

const isErrnoCode = (err: unknown, code: string): boolean =>
  err instanceof Error && 'code' in err && err.code === code;

const utf8 = new TextDecoder('utf-8', { fatal: true });
const BOM = '\uFEFF';

function isContained(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

async function canAccess(path: string, mode: number): Promise<boolean> {
  try {
    await access(path, mode);
    return true;
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT') || isErrnoCode(err, 'EACCES') || isErrnoCode(err, 'EPERM') || isErrnoCode(err, 'EROFS')) {
      return false;
    }
    throw err;
  }
}

/** realpath of the nearest existing ancestor, with the missing tail re-appended. */
async function resolveReal(path: string): Promise<string> {
  const tail: string[] = [];
  let current = path;
  for (;;) {
    try {
      return join(await realpath(current), ...[...tail].reverse());
    } catch (err) {
      const parent = dirname(current);
      if (!isErrnoCode(err, 'ENOENT') || parent === current) throw err;
      tail.push(basename(current));
      current = parent;
    }
  }
}

function decodeUtf8(bytes: Buffer): string | null {
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}

type ParsedJson = { ok: true; value: unknown } | { ok: false; error: string };

function parseJsonBytes(bytes: Buffer | null): ParsedJson {
  if (!bytes) return { ok: false, error: 'No readable file content' };
  let text = bytes.toString('utf-8');
  if (text.startsWith(BOM)) text = text.slice(BOM.length);
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

const readDataSchema = z.object({
  hash: z.string(),
  encoding: z.string(),
});

// ---------------------------------------------------------------------------
// Shared checks
// ---------------------------------------------------------------------------

const exists: CheckSpec = {
  name: 'exists',
  category: 'critical',
  run: (p) => ({
    value: p.stats !== null,
    message: `${p.relativePath} does not exist`,
  }),
};

const pathValid: CheckSpec = {
  name: 'path_valid',
  category: 'critical',
  run: (p) => ({
    value: isContained(p.workspaceRoot, p.absolutePath),
    message: `${p.relativePath} is outside the workspace`,
  }),
};

const accessible = (
  name: string,
  category: CheckCategory,
  mode: number,
): CheckSpec => ({
  name,
  category,
  run: async (p) => ({
    value: await canAccess(p.absolutePath, mode),
    message: `${p.relativePath} is not ${mode === constants.W_OK ? 'writable' : 'readable'}`,
  }),
});

const permissions: CheckSpec = {
  name: 'permissions',
  category: 'security',
  run: (p) => {
    if (!p.stats) return { value: null, passed: false, message: 'No permissions to inspect' };
    const ownerBits = p.stats.isDirectory() ? 0o700 : 0o600;
    const mode = formatPermissions(p.stats.mode);
    return {
      value: mode,
      passed: (p.stats.mode & ownerBits) === ownerBits,
      message: `Owner lacks ${p.stats.isDirectory() ? 'rwx' : 'rw'} access (mode ${mode})`,
    };
  },
};

const fileSize = (matchExpected: boolean): CheckSpec => ({
  name: 'size',
  category: 'content',
  run: (p) => {
    if (!p.stats) return { value: null, passed: false, message: 'No file to measure' };
    const size = p.stats.size;
    if (size > p.maxFileBytes) {
      return { value: size, passed: false, message: `${size} bytes exceeds the ${p.maxFileBytes} byte limit` };
    }
    if (matchExpected && p.expected.content !== undefined) {
      const expected = Buffer.byteLength(p.expected.content, 'utf-8');
      return { value: size, passed: size === expected, message: `Expected ${expected} bytes, found ${size}` };
    }
    return { value: size };
  },
});

const schemaValid: CheckSpec = {
  name: 'schema_valid',
  category: 'content',
  run: (p) => {
    const schema = p.expected.schema;
    if (!schema) return { value: null };
    const parsed = parseJsonBytes(p.bytes);
    if (!parsed.ok) return { value: false, message: `Cannot validate schema: ${parsed.error}` };
    const result = validateAgainstSchema(parsed.value, schema);
    return { value: result.valid, message: result.error };
  },
};

const jsonValid: CheckSpec = {
  name: 'json_valid',
  category: 'critical',
  run: (p) => {
    const parsed = parseJsonBytes(p.bytes);
    return parsed.ok ? { value: true } : { value: false, message: `Invalid JSON: ${parsed.error}` };
  },
};

// ---------------------------------------------------------------------------
// Per-tool tables
// ---------------------------------------------------------------------------

const writeFileChecks: CheckTable = {
  layered: true,
  checks: [
    exists,
    accessible('writable', 'critical', constants.W_OK),
    pathValid,

    fileSize(true),
    {
      name: 'content_hash',
      category: 'content',
      run: (p) => {
        if (!p.bytes) return { value: null, passed: false, message: 'No file content to hash' };
        const actual = hashContent(p.bytes);
        if (p.expected.content === undefined) return { value: actual };
        return {
          value: actual,
          passed: actual === hashContent(p.expected.content),
          message: 'Written content differs from the requested content',
        };
      },
    },
    {
      name: 'encoding_valid',
      category: 'content',
      run: (p) => ({
        value: p.bytes ? decodeUtf8(p.bytes) !== null : null,
        passed: p.bytes !== null && decodeUtf8(p.bytes) !== null,
        message: 'File is not valid UTF-8',
      }),
    },

    permissions,
    {
      name: 'owner_valid',
      category: 'security',
      run: (p) => {
        if (!p.stats) return { value: null, passed: false, message: 'No owner to inspect' };
        const uid = typeof process.getuid === 'function' ? process.getuid() : null;
        return {
          value: uid === null || p.stats.uid === uid,
          message: `Owned by uid ${p.stats.uid}, expected ${uid}`,
        };
      },
    },
    {
      name: 'in_workspace',
      category: 'security',
      run: async (p) => ({
        value: isContained(
          await resolveReal(p.workspaceRoot),
          await resolveReal(p.absolutePath),
        ),
        message: `${p.relativePath} resolves outside the workspace`,
      }),
    },

    {
      name: 'syntax_valid',
      category: 'quality',
      run: (p) => (p.bytes ? checkSyntax(p.relativePath, p.bytes.toString('utf-8')) : { value: null }),
    },
    {
      name: 'format_valid',
      category: 'quality',
      run: (p) => (p.bytes ? checkFormat(p.bytes.toString('utf-8')) : { value: null }),
    },
    {
      name: 'lint_passed',
      category: 'quality',
      run: (p) => (p.bytes ? checkLint(p.relativePath, p.bytes.toString('utf-8')) : { value: null }),
    },
  ],
};

const readFileChecks: CheckTable = {
  layered: false,
  checks: [
    exists,
    accessible('is_readable', 'critical', constants.R_OK),
    fileSize(false),
    {
      name: 'encoding',
      category: 'content',
      run: (p) => {
        if (!p.bytes) return { value: null };
        const detected = decodeUtf8(p.bytes) !== null ? 'utf-8' : 'latin1';
        const reported = readDataSchema.safeParse(p.output);
        const used = reported.success ? reported.data.encoding : 'utf-8';
        return {
          value: detected,
          passed: detected === used,
          message: `File is ${detected} but was decoded as ${used}`,
        };
      },
    },
    {
      name: 'content_valid',
      category: 'content',
      run: (p) => {
        const reported = readDataSchema.safeParse(p.output);
        if (!p.bytes || !reported.success) {
          return { value: false, message: 'No content to compare' };
        }
        return {
          value: reported.data.hash === hashContent(p.bytes),
          message: 'Content read differs from the file on disk',
        };
      },
    },
  ],
};

const createDirectoryChecks: CheckTable = {
  layered: false,
  checks: [
    exists,
    {
      name: 'is_directory',
      category: 'critical',
      run: (p) => ({
        value: p.stats?.isDirectory() ?? false,
        message: `${p.relativePath} is not a directory`,
      }),
    },
    accessible('is_writable', 'critical', constants.W_OK),
    permissions,
    pathValid,
    {
      name: 'contents_match',
      category: 'content',
      applies: (p) => p.expected.expectedContents !== undefined,
      run: async (p) => {
        const expected = p.expected.expectedContents ?? [];
        const actual = p.stats?.isDirectory() ? await readdir(p.absolutePath) : [];
        const missing = expected.filter((name) => !actual.includes(name));
        return {
          value: missing.length === 0,
          message: `Missing expected entries: ${missing.join(', ')}`,
        };
      },
    },
  ],
};

const deleteFileChecks: CheckTable = {
  layered: false,
  checks: [
    {
      name: 'existed',
      category: 'content',
      run: (p) => ({
        value: p.preExisted,
        passed: p.preExisted !== false,
        message: 'File did not exist prior to deletion.',
      }),
    },
    {
      name: 'deleted',
      category: 'critical',
      run: (p) => ({
        value: p.stats === null,
        message: `${p.relativePath} still exists`,
      }),
    },
    {
      name: 'path_clear',
      category: 'critical',
      run: async (p) => {
        const parent = dirname(p.absolutePath);
        let siblings: string[];
        try {
          siblings = await readdir(parent);
        } catch (err) {
          if (isErrnoCode(err, 'ENOENT')) return { value: true };
          throw err;
        }
        const prefix = `.${basename(p.absolutePath)}.`;
        const leftovers = siblings.filter(
          (name) => name.startsWith(prefix) && name.endsWith('.trash'),
        );
        return {
          value: leftovers.length === 0,
          message: `Leftover entries: ${leftovers.join(', ')}`,
        };
      },
    },
    {
      name: 'parent_writable',
      category: 'security',
      run: async (p) => ({
        value: await canAccess(dirname(p.absolutePath), constants.W_OK),
        message: `Parent of ${p.relativePath} is not writable`,
      }),
    },
  ],
};

const saveJsonChecks: CheckTable = {
  layered: false,
  checks: [
    exists,
    jsonValid,
    schemaValid,
    fileSize(false),
    accessible('is_readable', 'critical', constants.R_OK),
    {
      name: 'data_matches',
      category: 'content',
      applies: (p) => p.expected.data !== undefined,
      run: (p) => {
        const parsed = parseJsonBytes(p.bytes);
        if (!parsed.ok) return { value: false, message: 'Saved file could not be re-read' };
        // Compare against the JSON form of the request (undefined members drop out).
        const requested: unknown = JSON.parse(JSON.stringify(p.expected.data));
        return {
          value: isDeepStrictEqual(parsed.value, requested),
          message: 'Saved JSON differs from the requested data',
        };
      },
    },
  ],
};

const loadJsonChecks: CheckTable = {
  layered: false,
  checks: [
    exists,
    jsonValid,
    schemaValid,
    {
      name: 'data_type',
      category: 'content',
      run: (p) => {
        if (p.output === undefined) return { value: null };
        const actual = jsonTypeOf(p.output);
        const declared = p.expected.schema?.type;
        if (typeof declared !== 'string') return { value: actual };
        const passed = actual === declared || (declared === 'number' && actual === 'integer');
        return { value: actual, passed, message: `Expected ${declared}, loaded ${actual}` };
      },
    },
    {
      name: 'parse_success',
      category: 'critical',
      run: (p) => ({
        value: p.output !== undefined,
        message: 'Loader returned no data',
      }),
    },
  ],
};

export const CHECK_TABLES: Readonly<Record<ToolName, CheckTable>> = Object.freeze({
  write_file: writeFileChecks,
  read_file: readFileChecks,
  create_directory: createDirectoryChecks,
  delete_file: deleteFileChecks,
  save_json: saveJsonChecks,
  load_json: loadJsonChecks,
});
