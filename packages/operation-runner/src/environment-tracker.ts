/**
 * @forgeloop/operation-runner — Environment State Tracker
 *
 * The session's view of the workspace. File states are always re-read from
 * disk, never taken from a tool's own report. Rollback points are backed by
 * a journal of content-addressed copies of the bytes each critical operation
 * was about to touch, so restoring is a copy-back with no replay.
 */

import type { Stats } from 'node:fs';
import {
  copyFile,
  lstat,
  mkdir,
  mkdtemp,
  readdir,
  readFile,
  rm,
  rmdir,
  stat,
  statfs,
  writeFile,
} from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import {
  createLogger,
  type EnvironmentState,
  type FileStateEntry,
  formatPermissions,
  generateId,
  hashContent,
  now,
  type RollbackEntry,
  type RollbackFailure,
  type RollbackInfo,
  type RollbackOutcome,
  type StateChange,
  type ToolResult,
  type WorkspaceState,
} from '@forgeloop/core';

const log = createLogger('EnvironmentStateTracker');

interface JournalEntry {
  checkpointId: string;
  entry: RollbackEntry;
}

export interface RollbackPointRequest {
  operationId?: string | null;
  batchId?: string | null;
  /** Workspace-relative paths to back up before anything touches them */
  paths: string[];
}

// ---------------------------------------------------------------------------
// Environment State Tracker
// ---------------------------------------------------------------------------

export class EnvironmentStateTracker {
  private state: EnvironmentState;
  private journal: JournalEntry[] = [];

  private constructor(
    readonly workspaceRoot: string,
    private readonly backupDir: string,
    workspaceState: WorkspaceState,
  ) {
    this.state = {
      workspaceState,
      fileStates: {},
      operationSequence: [],
      rollbackPoints: [],
    };
  }

  /**
   * Initialize against the workspace root. Backups live in a private
   * directory outside the workspace until {@link dispose}.
   */
  static async create(
    workspaceRoot: string,
    options: { backupDir?: string } = {},
  ): Promise<EnvironmentStateTracker> {
    const root = resolve(workspaceRoot);
    const backupDir =
      options.backupDir ?? (await mkdtemp(join(tmpdir(), 'forgeloop-backup-')));
    await mkdir(backupDir, { recursive: true });
    return new EnvironmentStateTracker(root, backupDir, await inspectWorkspace(root));
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /** Deep copy of the current state; callers cannot mutate the tracker. */
  snapshot(): EnvironmentState {
    return structuredClone(this.state);
  }

  fileState(path: string): FileStateEntry | undefined {
    return this.state.fileStates[path];
  }

  async refreshWorkspace(): Promise<WorkspaceState> {
    this.state.workspaceState = await inspectWorkspace(this.workspaceRoot);
    return { ...this.state.workspaceState };
  }

  /** Re-read one path from disk and store the result. */
  async capture(path: string): Promise<FileStateEntry> {
    const fullPath = resolve(this.workspaceRoot, path);
    const stats = await lstatOrNull(fullPath);

    let hash: string | null = null;
    if (stats?.isFile()) {
      hash = hashContent(await readFile(fullPath));
    }

    const entry: FileStateEntry = {
      path,
      exists: stats !== null,
      isDirectory: stats?.isDirectory() ?? false,
      size: stats?.size ?? 0,
      hash,
      permissions: stats ? formatPermissions(stats.mode) : null,
      lastVerifiedAt: now(),
    };
    this.state.fileStates[path] = entry;
    return { ...entry };
  }

  /**
   * Ancestors of `path` that do not exist yet, outermost first. A write
   * into them would create these directories on the way.
   */
  async missingAncestors(path: string): Promise<FileStateEntry[]> {
    const missing: string[] = [];
    for (let dir = dirname(path); dir !== '.' && dir !== dirname(dir); dir = dirname(dir)) {
      if (await lstatOrNull(resolve(this.workspaceRoot, dir))) break;
      missing.unshift(dir);
    }

    const entries: FileStateEntry[] = [];
    for (const dir of missing) entries.push(await this.capture(dir));
    return entries;
  }

  /**
   * Fold an operation's outcome into the state. Only paths the result
   * lists as affected are re-read.
   */
  async record(operationId: string, result: ToolResult): Promise<EnvironmentState> {
    for (const path of new Set(result.affectedFiles)) {
      await this.capture(path);
    }
    if (!this.state.operationSequence.includes(operationId)) {
      this.state.operationSequence.push(operationId);
    }
    return this.snapshot();
  }

  // -------------------------------------------------------------------------
  // Rollback points
  // -------------------------------------------------------------------------

  /**
   * Back up the given paths and record a point to return to. Missing
   * ancestor directories are journaled too, so a rollback removes what a
   * write created on the way. Returns the checkpoint id.
   *
   * Nothing is recorded when a path cannot be backed up; the error is
   * rethrown.
   */
  async pushRollbackPoint(request: RollbackPointRequest): Promise<string> {
    const checkpointId = generateId();
    const journalIndex = this.journal.length;
    const journaled = new Set<string>();

    try {
      for (const path of request.paths) {
        const ancestors = await this.missingAncestors(path);
        for (const dir of [...ancestors.map((a) => a.path), path]) {
          if (journaled.has(dir)) continue;
          journaled.add(dir);
          this.journal.push({ checkpointId, entry: await this.backup(dir) });
        }
      }
    } catch (err) {
      this.journal.length = journalIndex;
      throw err;
    }

    this.state.rollbackPoints.push({
      checkpointId,
      operationId: request.operationId ?? null,
      batchId: request.batchId ?? null,
      createdAt: now(),
      fileStates: structuredClone(this.state.fileStates),
      journalIndex,
    });

    log.debug(`Pushed rollback point ${checkpointId} (${request.paths.length} paths)`);
    return checkpointId;
  }

  getRollbackInfo(checkpointId: string): RollbackInfo {
    this.getPointOrThrow(checkpointId);
    return {
      checkpointId,
      entries: this.journal
        .filter((j) => j.checkpointId === checkpointId)
        .map((j) => ({ ...j.entry })),
    };
  }

  /**
   * Discard a point once its operation succeeded. Backups are kept while an
   * earlier point may still need them.
   */
  async releaseRollbackPoint(checkpointId: string): Promise<void> {
    const points = this.state.rollbackPoints;
    const index = points.findIndex((p) => p.checkpointId === checkpointId);
    if (index === -1) return;
    points.splice(index, 1);

    if (points.length === 0) {
      this.journal = [];
      await this.clearBackups();
    }
  }

  /**
   * Restore every path journaled since the checkpoint, newest first.
   * Single attempt: paths that cannot be restored are reported as a
   * partial rollback. The point and any later ones are removed either way.
   */
  async rollbackTo(checkpointId: string): Promise<RollbackOutcome> {
    const point = this.getPointOrThrow(checkpointId);
    const entries = this.journal.slice(point.journalIndex).reverse();

    const restored: string[] = [];
    const failures: RollbackFailure[] = [];

    for (const { entry } of entries) {
      try {
        const problem = await this.restore(entry);
        await this.capture(entry.path);
        if (problem) {
          failures.push({ path: entry.path, reason: problem });
        } else {
          restored.push(entry.path);
        }
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        failures.push({ path: entry.path, reason });
      }
    }

    this.journal.length = point.journalIndex;
    const pointIndex = this.state.rollbackPoints.indexOf(point);
    this.state.rollbackPoints.splice(pointIndex);
    if (this.state.rollbackPoints.length === 0) {
      await this.clearBackups();
    }

    const outcome: RollbackOutcome = {
      checkpointId,
      success: failures.length === 0,
      restored: [...new Set(restored)],
      failures,
    };

    if (outcome.success) {
      log.info(`Rolled back to ${checkpointId} (${outcome.restored.length} paths)`);
    } else {
      log.warn(
        `Partial rollback to ${checkpointId}: ${failures
          .map((f) => `${f.path} (${f.reason})`)
          .join(', ')}`,
      );
    }
    return outcome;
  }

  /** Remove the backup directory. The tracker is unusable afterwards. */
  async dispose(): Promise<void> {
    this.journal = [];
    this.state.rollbackPoints = [];
    await rm(this.backupDir, { recursive: true, force: true });
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  private getPointOrThrow(checkpointId: string) {
    const point = this.state.rollbackPoints.find(
      (p) => p.checkpointId === checkpointId,
    );
    if (!point) throw new Error(`Rollback point not found: ${checkpointId}`);
    return point;
  }

  private async backup(path: string): Promise<RollbackEntry> {
    const fullPath = resolve(this.workspaceRoot, path);
    const stats = await lstatOrNull(fullPath);
    await this.capture(path);

    if (!stats) {
      return {
        path,
        existedBefore: false,
        wasDirectory: false,
        hash: null,
        backupPath: null,
        childCount: 0,
      };
    }

    if (stats.isDirectory()) {
      return {
        path,
        existedBefore: true,
        wasDirectory: true,
        hash: null,
        backupPath: null,
        childCount: (await readdir(fullPath)).length,
      };
    }

    const bytes = await readFile(fullPath);
    const hash = hashContent(bytes);
    const backupPath = join(this.backupDir, hash);
    // Content-addressed: identical bytes share one copy
    await writeFile(backupPath, bytes, { flag: 'w' });

    return {
      path,
      existedBefore: true,
      wasDirectory: false,
      hash,
      backupPath,
      childCount: 0,
    };
  }

  /** Returns a reason when the entry could not be restored. */
  private async restore(entry: RollbackEntry): Promise<string | null> {
    const fullPath = resolve(this.workspaceRoot, entry.path);
    const current = await lstatOrNull(fullPath);

    if (!entry.existedBefore) {
      if (!current) return null;
      if (current.isDirectory()) {
        await rmdir(fullPath);
      } else {
        await rm(fullPath, { force: true });
      }
      return null;
    }

    if (entry.wasDirectory) {
      if (current && !current.isDirectory()) {
        await rm(fullPath, { force: true });
      }
      await mkdir(fullPath, { recursive: true });
      const count = (await readdir(fullPath)).length;
      if (count < entry.childCount) {
        return `directory contents not restored (${entry.childCount} entries before, ${count} now)`;
      }
      return null;
    }

    if (!entry.backupPath || !(await statOrNull(entry.backupPath))) {
      return 'backup missing';
    }
    if (current?.isDirectory()) {
      return 'path is now a directory';
    }

    await mkdir(dirname(fullPath), { recursive: true });
    await copyFile(entry.backupPath, fullPath);

    const restoredHash = hashContent(await readFile(fullPath));
    if (restoredHash !== entry.hash) {
      return 'restored content does not match the backup hash';
    }
    return null;
  }

  private async clearBackups(): Promise<void> {
    await rm(this.backupDir, { recursive: true, force: true });
    await mkdir(this.backupDir, { recursive: true });
  }
}

// ---------------------------------------------------------------------------
// State diffs
// ---------------------------------------------------------------------------

export function diffFileStates(
  before: FileStateEntry,
  after: FileStateEntry,
): StateChange {
  let change: StateChange['change'];
  if (!before.exists && after.exists) change = 'created';
  else if (before.exists && !after.exists) change = 'deleted';
  else if (
    before.exists &&
    (before.hash !== after.hash || before.isDirectory !== after.isDirectory)
  ) {
    change = 'modified';
  } else change = 'unchanged';

  return {
    path: after.path,
    change,
    beforeHash: before.hash,
    afterHash: after.hash,
  };
}

// ---------------------------------------------------------------------------
// Filesystem helpers
// ---------------------------------------------------------------------------

// A name longer than the filesystem allows cannot exist either
const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG']);

const isMissing = (err: unknown): boolean =>
  err instanceof Error &&
  'code' in err &&
  typeof err.code === 'string' &&
  MISSING_CODES.has(err.code);

async function lstatOrNull(path: string): Promise<Stats | null> {
  try {
    return await lstat(path);
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

async function inspectWorkspace(root: string): Promise<WorkspaceState> {
  const stats = await statOrNull(root);
  const rootValid = stats?.isDirectory() ?? false;

  let freeBytes: number | null = null;
  if (rootValid) {
    const fs = await statfs(root);
    freeBytes = fs.bavail * fs.bsize;
  }

  return { root, rootValid, freeBytes, checkedAt: now() };
}
