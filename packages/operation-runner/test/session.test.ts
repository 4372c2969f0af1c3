/**
 * @forgeloop/operation-runner — Session scenarios
 */

import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  symlinkSync,
  writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import {
  hashContent,
  type InvokeContext,
  type OperationEvent,
  type StrategyName,
  type ToolInvoker,
  type ToolName,
  type ToolOutput,
} from '@forgeloop/core';
import { HistoryStore } from '@forgeloop/history-store';
import { createToolKernel, type ToolKernel } from '@forgeloop/tool-kernel';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { OperationBudget } from '../src/batch-coordinator.js';
import { isWorkspaceActive, Session } from '../src/session.js';
import { runSession, SessionLoop } from '../src/session-loop.js';

let testDir: string;
let store: HistoryStore;

const quietEnv = { LOG_LEVEL: 'fatal' } as const;

const unlimited: OperationBudget = {
  remaining: () => 100,
  consume: () => {},
};

/**
 * Delegates to the real kernel, except that chosen strategies fail the way
 * a read-only target would.
 */
class ScriptedInvoker implements ToolInvoker {
  readonly strategies: StrategyName[] = [];

  constructor(
    private kernel: ToolKernel,
    private failOn: ReadonlySet<StrategyName>,
  ) {}

  get workspaceRoot(): string {
    return this.kernel.workspaceRoot;
  }

  resolveTarget(toolName: ToolName, args: Record<string, unknown>): string {
    return this.kernel.resolveTarget(toolName, args);
  }

  async invoke(
    toolName: ToolName,
    args: Record<string, unknown>,
    ctx: InvokeContext,
  ): Promise<ToolOutput> {
    this.strategies.push(ctx.strategy);
    if (this.failOn.has(ctx.strategy)) {
      const err = new Error(`EACCES: permission denied, open '${String(args.path)}'`);
      throw Object.assign(err, { code: 'EACCES' });
    }
    return this.kernel.invoke(toolName, args, ctx);
  }
}

/** Reports success without touching the filesystem. */
class LyingInvoker implements ToolInvoker {
  constructor(private kernel: ToolKernel) {}

  get workspaceRoot(): string {
    return this.kernel.workspaceRoot;
  }

  resolveTarget(toolName: ToolName, args: Record<string, unknown>): string {
    return this.kernel.resolveTarget(toolName, args);
  }

  async invoke(
    _toolName: ToolName,
    args: Record<string, unknown>,
  ): Promise<ToolOutput> {
    const path = String(args.path);
    return { path, summary: `Wrote ${path}`, affectedFiles: [path] };
  }
}

/** Creates the target's parent directories, then fails the write. */
class HalfWriteInvoker implements ToolInvoker {
  constructor(private kernel: ToolKernel) {}

  get workspaceRoot(): string {
    return this.kernel.workspaceRoot;
  }

  resolveTarget(toolName: ToolName, args: Record<string, unknown>): string {
    return this.kernel.resolveTarget(toolName, args);
  }

  async invoke(
    _toolName: ToolName,
    args: Record<string, unknown>,
  ): Promise<ToolOutput> {
    const path = String(args.path);
    mkdirSync(dirname(join(this.workspaceRoot, path)), { recursive: true });
    throw Object.assign(new Error(`EIO: i/o error, write '${path}'`), { code: 'EIO' });
  }
}

/** Removes a directory along with its contents, then reports a failure. */
class WipingInvoker implements ToolInvoker {
  constructor(private kernel: ToolKernel) {}

  get workspaceRoot(): string {
    return this.kernel.workspaceRoot;
  }

  resolveTarget(toolName: ToolName, args: Record<string, unknown>): string {
    return this.kernel.resolveTarget(toolName, args);
  }

  async invoke(
    _toolName: ToolName,
    args: Record<string, unknown>,
  ): Promise<ToolOutput> {
    const path = String(args.path);
    rmSync(join(this.workspaceRoot, path), { recursive: true, force: true });
    throw Object.assign(new Error(`EIO: i/o error, rmdir '${path}'`), { code: 'EIO' });
  }
}

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'forgeloop-session-'));
  store = new HistoryStore(':memory:');
});

afterEach(() => {
  store.close();
  if (existsSync(testDir)) {
    rmSync(testDir, { recursive: true, force: true });
  }
});

// =========================================================================
// OperationExecutor
// =========================================================================

describe('OperationExecutor', () => {
  let session: Session;

  const open = async (invoker?: ToolInvoker) => {
    session = await Session.open({
      workspaceRoot: testDir,
      sessionId: 'sess-exec',
      store,
      env: quietEnv,
      invoker,
    });
    return session;
  };

  afterEach(async () => {
    await session.close('completed');
  });

  it('writes a new file in one verified attempt', async () => {
    await open();
    const record = await session.executor.execute({
      toolName: 'write_file',
      args: { path: 'notes.txt', content: 'hello' },
    });

    expect(record.finalState).toBe('succeeded');
    expect(record.attempts).toHaveLength(1);
    expect(record.transitions.map((t) => t.to)).toEqual([
      'pre_check',
      'executing',
      'verifying',
      'succeeded',
    ]);

    const groups = record.attempts[0]?.report?.groups;
    expect(groups?.critical_checks?.exists).toBe(true);
    expect(groups?.content_checks?.size).toBe(5);
    expect(groups?.security_checks?.in_workspace).toBe(true);

    expect(record.warnings).toEqual([]);
    expect(record.netChanges).toEqual([
      { path: 'notes.txt', change: 'created', beforeHash: null, afterHash: hashContent('hello') },
    ]);
    expect(readFileSync(join(testDir, 'notes.txt'), 'utf-8')).toBe('hello');

    const entry = store.getByOperationId(record.operationId);
    expect(entry?.attemptCount).toBe(1);
    expect(entry?.success).toBe(true);
  });

  it('recovers from a read-only target with a different strategy each time', async () => {
    const invoker = new ScriptedInvoker(
      createToolKernel(testDir),
      new Set<StrategyName>(['default', 'encoding']),
    );
    await open(invoker);

    const record = await session.executor.execute({
      toolName: 'write_file',
      args: { path: 'notes.txt', content: 'hello' },
    });

    expect(record.finalState).toBe('succeeded');
    expect(invoker.strategies).toEqual(['default', 'encoding', 'temp_file']);
    expect(record.attempts[0]?.result.diagnostics).toEqual({
      failureKind: 'execution',
      error: "EACCES: permission denied, open 'notes.txt'",
      code: 'EACCES',
      strategy: 'default',
    });

    const warning =
      "Recovered with 'temp_file' strategy after 2 failed attempts; initial failure: EACCES: permission denied, open 'notes.txt'";
    expect(record.warnings).toEqual([{ message: warning, userRelevant: true }]);

    const entry = store.getByOperationId(record.operationId);
    expect(entry?.attemptCount).toBe(3);
    expect(entry?.importantWarnings).toEqual([warning]);
    expect(readFileSync(join(testDir, 'notes.txt'), 'utf-8')).toBe('hello');
  });

  it('rolls back a critical operation whose effect never verifies', async () => {
    await open(new LyingInvoker(createToolKernel(testDir)));

    const record = await session.executor.execute({
      toolName: 'write_file',
      args: { path: 'ghost.txt', content: 'boo' },
    });

    expect(record.finalState).toBe('rolled_back');
    expect(record.failureKind).toBe('verification');
    expect(record.attempts.map((a) => a.strategy)).toEqual([
      'default',
      'encoding',
      'temp_file',
    ]);
    expect(record.error).toBe(
      'Verification failed: ghost.txt does not exist; ghost.txt is not writable',
    );
    expect(record.rollback?.success).toBe(true);
    expect(store.getByOperationId(record.operationId)?.attemptCount).toBe(3);
  });

  it('treats deleting a missing file as success with a warning', async () => {
    await open();
    const record = await session.executor.execute({
      toolName: 'delete_file',
      args: { path: 'ghost.txt' },
    });

    expect(record.finalState).toBe('succeeded');
    expect(record.attempts[0]?.report?.groups.checks).toMatchObject({
      existed: false,
      deleted: true,
    });
    expect(record.warnings).toEqual([
      { message: 'File did not exist prior to deletion.', userRelevant: true },
    ]);
  });

  it('fails a non-critical read without rollback', async () => {
    await open();
    const record = await session.executor.execute({
      toolName: 'read_file',
      args: { path: 'missing.txt' },
    });

    expect(record.finalState).toBe('failed');
    expect(record.failureKind).toBe('execution');
    expect(record.attempts.map((a) => a.strategy)).toEqual(['default', 'encoding']);
    expect(record.rollback).toBeNull();
  });

  it('fails fast on an unmet dependency without invoking the tool', async () => {
    await open();
    const record = await session.executor.execute({
      toolName: 'read_file',
      args: { path: 'notes.txt' },
      dependencies: ['never-ran'],
    });

    expect(record.finalState).toBe('failed');
    expect(record.failureKind).toBe('dependency');
    expect(record.error).toBe('Unmet dependencies: never-ran');
    expect(record.attempts).toEqual([]);
  });

  it('rejects paths outside the workspace', async () => {
    await open();
    const record = await session.executor.execute({
      toolName: 'write_file',
      args: { path: '../escape.txt', content: 'x' },
    });

    expect(record.finalState).toBe('failed');
    expect(record.error).toBe('Path escapes workspace jail: ../escape.txt');
    expect(record.attempts).toEqual([]);
  });

  it('rolls back a write whose file name is too long for the filesystem', async () => {
    await open();
    const path = `sub/${'a'.repeat(300)}`;
    const record = await session.executor.execute({
      toolName: 'write_file',
      args: { path, content: 'x' },
    });

    expect(record.finalState).toBe('rolled_back');
    expect(record.failureKind).toBe('execution');
    expect(record.attempts).toHaveLength(3);
    expect(record.attempts[0]?.result.diagnostics.code).toBe('ENAMETOOLONG');
    expect(record.rollback?.success).toBe(true);
    expect(record.rollback?.restored).toEqual([path, 'sub']);
    expect(existsSync(join(testDir, 'sub'))).toBe(false);
    expect(store.getByOperationId(record.operationId)?.finalState).toBe('rolled_back');
  });

  it('fails the pre-check when the target cannot be read', async () => {
    await open();
    symlinkSync('loop', join(testDir, 'loop'));

    const record = await session.executor.execute({
      toolName: 'write_file',
      args: { path: 'loop/x.txt', content: 'x' },
    });

    expect(record.finalState).toBe('failed');
    expect(record.failureKind).toBe('execution');
    expect(record.error).toMatch(/^Pre-check failed: ELOOP/);
    expect(record.attempts).toEqual([]);
    expect(session.tracker.snapshot().rollbackPoints).toEqual([]);
    expect(store.getByOperationId(record.operationId)?.success).toBe(false);
  });

  it('lists the directories a write created among its net changes', async () => {
    await open();
    const record = await session.executor.execute({
      toolName: 'write_file',
      args: { path: 'deep/nested/f.txt', content: 'x' },
    });

    expect(record.finalState).toBe('succeeded');
    expect(record.netChanges.map((c) => [c.path, c.change])).toEqual([
      ['deep', 'created'],
      ['deep/nested', 'created'],
      ['deep/nested/f.txt', 'created'],
    ]);
  });

  it('removes the directories a failed write created', async () => {
    await open(new HalfWriteInvoker(createToolKernel(testDir)));
    const record = await session.executor.execute({
      toolName: 'write_file',
      args: { path: 'deep/nested/f.txt', content: 'x' },
    });

    expect(record.finalState).toBe('rolled_back');
    expect(record.attempts).toHaveLength(3);
    expect(record.rollback).toMatchObject({
      success: true,
      restored: ['deep/nested/f.txt', 'deep/nested', 'deep'],
      failures: [],
    });
    expect(existsSync(join(testDir, 'deep'))).toBe(false);
    expect(record.netChanges.map((c) => [c.path, c.change])).toEqual([
      ['deep', 'unchanged'],
      ['deep/nested', 'unchanged'],
      ['deep/nested/f.txt', 'unchanged'],
    ]);
  });

  it('runs after a dependency that succeeded', async () => {
    await open();
    const dir = await session.executor.execute({
      operationId: 'mkdir-src',
      toolName: 'create_directory',
      args: { path: 'src' },
    });
    const file = await session.executor.execute({
      toolName: 'save_json',
      args: { path: 'src/config.json', data: { name: 'demo' } },
      dependencies: [dir.operationId],
    });

    expect(file.finalState).toBe('succeeded');
    expect(JSON.parse(readFileSync(join(testDir, 'src/config.json'), 'utf-8'))).toEqual({
      name: 'demo',
    });
  });

  it('emits attempt events between start and completion', async () => {
    await open();
    const events: OperationEvent[] = [];
    session.onEvent((e) => events.push(e));

    await session.executor.execute({
      toolName: 'write_file',
      args: { path: 'notes.txt', content: 'hello' },
    });

    expect(events.map((e) => e.type)).toEqual([
      'operation.started',
      'operation.attempt',
      'operation.completed',
    ]);
    expect(events.map((e) => e.seq)).toEqual([1, 2, 3]);
    expect(events.every((e) => e.sessionId === 'sess-exec')).toBe(true);
  });

  it('keeps running when a listener throws', async () => {
    await open();
    session.onEvent(() => {
      throw new Error('listener boom');
    });

    const record = await session.executor.execute({
      toolName: 'write_file',
      args: { path: 'notes.txt', content: 'hello' },
    });
    expect(record.finalState).toBe('succeeded');
  });
});

// =========================================================================
// OperationBatchCoordinator
// =========================================================================

describe('OperationBatchCoordinator', () => {
  let session: Session;

  beforeEach(async () => {
    session = await Session.open({
      workspaceRoot: testDir,
      sessionId: 'sess-batch',
      store,
      env: quietEnv,
    });
  });

  afterEach(async () => {
    await session.close('completed');
  });

  it('skips members that depend on a rolled-back directory', async () => {
    // A plain file where the directory should go defeats every mkdir strategy
    writeFileSync(join(testDir, 'out'), 'blocker');
    const events: OperationEvent[] = [];
    session.onEvent((e) => events.push(e));

    const result = await session.batches.run(
      {
        batchId: 'b1',
        operations: [
          { operationId: 'mkdir-out', toolName: 'create_directory', args: { path: 'out' } },
          {
            operationId: 'write-a',
            toolName: 'write_file',
            args: { path: 'out/a.txt', content: 'a' },
            dependencies: ['mkdir-out'],
          },
        ],
      },
      unlimited,
    );

    const [mkdir, write] = result.records;
    expect(mkdir?.finalState).toBe('rolled_back');
    expect(mkdir?.attempts.map((a) => a.strategy)).toEqual([
      'default',
      'recursive',
      'parent_first',
    ]);
    expect(mkdir?.rollback?.success).toBe(true);

    expect(write?.finalState).toBe('skipped');
    expect(write?.attempts).toEqual([]);
    expect(write?.error).toBe('Dependency did not succeed: mkdir-out');

    expect(result.counts).toEqual({ succeeded: 0, failed: 0, rolledBack: 1, skipped: 1 });
    expect(readFileSync(join(testDir, 'out'), 'utf-8')).toBe('blocker');

    expect(events.map((e) => e.type)).toEqual([
      'batch.started',
      'operation.started',
      'operation.attempt',
      'operation.attempt',
      'operation.attempt',
      'operation.rolled_back',
      'operation.completed',
      'operation.skipped',
      'batch.completed',
    ]);
  });

  it('still runs independent members after a failure', async () => {
    writeFileSync(join(testDir, 'out'), 'blocker');

    const result = await session.batches.run(
      {
        operations: [
          { toolName: 'create_directory', args: { path: 'out' } },
          { toolName: 'write_file', args: { path: 'other.txt', content: 'x' } },
        ],
      },
      unlimited,
    );

    expect(result.records.map((r) => r.finalState)).toEqual(['rolled_back', 'succeeded']);
    expect(existsSync(join(testDir, 'other.txt'))).toBe(true);
  });

  it('reverts an atomic batch when a critical member fails', async () => {
    writeFileSync(join(testDir, 'out'), 'blocker');

    const result = await session.batches.run(
      {
        atomic: true,
        operations: [
          { toolName: 'write_file', args: { path: 'keep.txt', content: 'x' } },
          { toolName: 'create_directory', args: { path: 'out' } },
        ],
      },
      unlimited,
    );

    expect(result.records.map((r) => r.finalState)).toEqual(['succeeded', 'rolled_back']);
    expect(result.rollback?.success).toBe(true);
    expect(existsSync(join(testDir, 'keep.txt'))).toBe(false);
    expect(readFileSync(join(testDir, 'out'), 'utf-8')).toBe('blocker');

    // The reverted member's own record and durable entry show the revert
    const [keep] = result.records;
    const reverted = `Reverted with atomic batch ${result.batchId} after a critical member failed`;
    expect(keep?.netChanges).toEqual([
      { path: 'keep.txt', change: 'unchanged', beforeHash: null, afterHash: null },
    ]);
    expect(keep?.warnings).toContainEqual({ message: reverted, userRelevant: true });

    const entry = store.getByOperationId(keep?.operationId ?? '');
    expect(entry?.stateChanges.map((c) => c.change)).toEqual(['unchanged']);
    expect(entry?.importantWarnings).toContain(reverted);
  });

  it('rejects a member whose target cannot be backed up and runs the rest', async () => {
    symlinkSync('loop', join(testDir, 'loop'));

    const result = await session.batches.run(
      {
        atomic: true,
        operations: [
          { toolName: 'write_file', args: { path: 'first.txt', content: '1' } },
          { toolName: 'write_file', args: { path: 'loop/x.txt', content: '2' } },
          { toolName: 'write_file', args: { path: 'third.txt', content: '3' } },
        ],
      },
      unlimited,
    );

    expect(result.records.map((r) => r.finalState)).toEqual([
      'succeeded',
      'failed',
      'succeeded',
    ]);
    expect(result.records[1]?.attempts).toEqual([]);
    expect(result.records[1]?.error).toMatch(/^Cannot back up loop\/x\.txt: ELOOP/);

    // A failed critical member reverts the atomic batch
    expect(result.rollback?.success).toBe(true);
    expect(existsSync(join(testDir, 'first.txt'))).toBe(false);
    expect(existsSync(join(testDir, 'third.txt'))).toBe(false);
    expect(store.query({ sessionId: 'sess-batch' })).toHaveLength(3);
  });

  it('keeps going past a member whose file name is too long', async () => {
    const result = await session.batches.run(
      {
        operations: [
          { toolName: 'write_file', args: { path: 'first.txt', content: '1' } },
          { toolName: 'write_file', args: { path: 'b'.repeat(300), content: '2' } },
          { toolName: 'write_file', args: { path: 'third.txt', content: '3' } },
        ],
      },
      unlimited,
    );

    expect(result.records.map((r) => r.finalState)).toEqual([
      'succeeded',
      'rolled_back',
      'succeeded',
    ]);
    expect(readFileSync(join(testDir, 'third.txt'), 'utf-8')).toBe('3');
    expect(store.query({ sessionId: 'sess-batch' })).toHaveLength(3);
  });

  it('skips every member when batch dependencies are unmet', async () => {
    const result = await session.batches.run(
      {
        dependencies: ['never-ran'],
        operations: [
          { toolName: 'write_file', args: { path: 'a.txt', content: 'a' } },
          { toolName: 'write_file', args: { path: 'b.txt', content: 'b' } },
        ],
      },
      unlimited,
    );

    expect(result.counts.skipped).toBe(2);
    expect(result.records[0]?.error).toBe('Batch dependencies not met: never-ran');
    expect(existsSync(join(testDir, 'a.txt'))).toBe(false);
  });

  it('stops issuing members when the budget runs out', async () => {
    let left = 1;
    const budget: OperationBudget = {
      remaining: () => left,
      consume: () => {
        left--;
      },
    };

    const result = await session.batches.run(
      {
        operations: [
          { toolName: 'write_file', args: { path: 'a.txt', content: 'a' } },
          { toolName: 'write_file', args: { path: 'b.txt', content: 'b' } },
        ],
      },
      budget,
    );

    expect(result.truncated).toBe(true);
    expect(result.records).toHaveLength(1);
    expect(result.notStarted.map((r) => r.args.path)).toEqual(['b.txt']);
    expect(existsSync(join(testDir, 'b.txt'))).toBe(false);
  });
});

// =========================================================================
// Session & SessionLoop
// =========================================================================

describe('Session', () => {
  it('allows one open session per workspace', async () => {
    const session = await Session.open({ workspaceRoot: testDir, store, env: quietEnv });
    try {
      expect(isWorkspaceActive(testDir)).toBe(true);
      await expect(
        Session.open({ workspaceRoot: testDir, store, env: quietEnv }),
      ).rejects.toThrow('already has an active session');
    } finally {
      await session.close('completed');
    }
    expect(isWorkspaceActive(testDir)).toBe(false);
  });

  it('refuses a workspace root that is not a directory', async () => {
    const missing = join(testDir, 'nowhere');
    await expect(
      Session.open({ workspaceRoot: missing, store, env: quietEnv }),
    ).rejects.toThrow(`Workspace root is not a directory: ${missing}`);
    expect(isWorkspaceActive(missing)).toBe(false);
  });

  it('traces its own events when span export is configured', async () => {
    const session = await Session.open({
      workspaceRoot: testDir,
      store,
      env: quietEnv,
      overrides: { trace: 'memory' },
    });
    try {
      const record = await session.executor.execute({
        toolName: 'write_file',
        args: { path: 'a.txt', content: 'a' },
      });
      const spans = session.telemetry?.finishedSpans() ?? [];
      expect(spans.map((s) => s.name)).toEqual([`operation:${record.operationId}`]);
      expect(spans[0]?.attributes['forgeloop.workspace']).toBe(testDir);
    } finally {
      await session.close('completed');
    }
  });

  it('records the termination in the durable log', async () => {
    const session = await Session.open({
      workspaceRoot: testDir,
      sessionId: 'sess-close',
      goal: 'nothing',
      store,
      env: quietEnv,
    });
    await session.close('cancelled');
    await session.close('completed');

    expect(session.isClosed).toBe(true);
    expect(store.getSession('sess-close')?.termination).toBe('cancelled');
  });
});

describe('SessionLoop', () => {
  it('never starts more operations than the session limit', async () => {
    const session = await Session.open({
      workspaceRoot: testDir,
      store,
      env: quietEnv,
      overrides: { maxOperations: 2 },
    });
    const events: OperationEvent[] = [];
    session.onEvent((e) => events.push(e));

    try {
      const review = await new SessionLoop(session).run({
        goal: 'write three files',
        steps: [
          { toolName: 'write_file', args: { path: 'a.txt', content: 'a' } },
          { toolName: 'write_file', args: { path: 'b.txt', content: 'b' } },
          { toolName: 'write_file', args: { path: 'c.txt', content: 'c' } },
        ],
      });

      expect(review.termination.reason).toBe('operation_limit');
      expect(review.plan).toEqual({
        steps: ['write_file a.txt', 'write_file b.txt', 'write_file c.txt'],
        requested: 3,
        started: 2,
        notStarted: ['write_file c.txt'],
      });
      expect(existsSync(join(testDir, 'c.txt'))).toBe(false);
      expect(events.filter((e) => e.type === 'operation.started')).toHaveLength(2);
      expect(review.suggestions).toContain(
        'Continue in a new session with the 1 operations not started',
      );
    } finally {
      await session.close('operation_limit');
    }
  });

  it('stops between operations when cancelled', async () => {
    const session = await Session.open({ workspaceRoot: testDir, store, env: quietEnv });
    const controller = new AbortController();
    controller.abort();

    try {
      const review = await new SessionLoop(session).run(
        {
          goal: 'write',
          steps: [{ toolName: 'write_file', args: { path: 'a.txt', content: 'a' } }],
        },
        controller.signal,
      );
      expect(review.termination.reason).toBe('cancelled');
      expect(review.plan.started).toBe(0);
      expect(existsSync(join(testDir, 'a.txt'))).toBe(false);
    } finally {
      await session.close('cancelled');
    }
  });

  it('surfaces a rollback that could not restore everything', async () => {
    mkdirSync(join(testDir, 'd'));
    writeFileSync(join(testDir, 'd', 'x.txt'), 'x');
    const session = await Session.open({
      workspaceRoot: testDir,
      sessionId: 'sess-partial',
      store,
      env: quietEnv,
      invoker: new WipingInvoker(createToolKernel(testDir)),
    });

    try {
      const review = await new SessionLoop(session).run({
        goal: 'clean up',
        steps: [{ toolName: 'delete_file', args: { path: 'd' } }],
      });

      const reason = 'directory contents not restored (1 entries before, 0 now)';
      const warning = `Partial rollback: could not restore d (${reason})`;
      const [record] = session.history.list();
      expect(record?.finalState).toBe('rolled_back');
      expect(record?.failureKind).toBe('rollback');
      expect(record?.warnings).toEqual([{ message: warning, userRelevant: true }]);

      expect(review.partialRollbacks.map((r) => r.failures)).toEqual([
        [{ path: 'd', reason }],
      ]);
      expect(review.suggestions).toEqual([
        'Investigate recurring EIO errors (3 occurrences)',
        "Revisit delete_file d: EIO: i/o error, rmdir 'd'",
        'Restore d by hand; rollback could not complete',
      ]);
      expect(store.getByOperationId(record?.operationId ?? '')?.importantWarnings).toEqual([
        warning,
      ]);
    } finally {
      await session.close('completed');
    }
  });

  it('runs a plan end to end and reviews it', async () => {
    const review = await runSession({
      workspaceRoot: testDir,
      sessionId: 'sess-run',
      store,
      env: quietEnv,
      plan: {
        goal: 'scaffold a package',
        steps: [
          {
            operations: [
              { operationId: 'mkdir', toolName: 'create_directory', args: { path: 'src' } },
              {
                toolName: 'write_file',
                args: { path: 'src/index.ts', content: 'export const x = 1;\n' },
                dependencies: ['mkdir'],
              },
            ],
          },
          {
            toolName: 'save_json',
            args: { path: 'config.json', data: { name: 'demo' } },
            description: 'Save package config',
          },
        ],
      },
    });

    expect(review.goal).toBe('scaffold a package');
    expect(review.termination.reason).toBe('completed');
    expect(review.plan.steps).toEqual([
      'create_directory src',
      'write_file src/index.ts',
      'Save package config',
    ]);
    expect(review.stats.total).toBe(3);
    expect(review.stats.succeeded).toBe(3);
    expect(review.stats.successRate).toBe(1);
    expect(review.environmentChanges).toEqual({
      created: ['config.json', 'src', 'src/index.ts'],
      modified: [],
      deleted: [],
    });
    expect(review.suggestions).toEqual(['Review the files written in: ., src']);

    expect(isWorkspaceActive(testDir)).toBe(false);
    expect(store.getSession('sess-run')?.termination).toBe('completed');
    expect(store.query({ sessionId: 'sess-run' })).toHaveLength(3);
  });
});
