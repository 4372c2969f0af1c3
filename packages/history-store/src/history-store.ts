/**
 * @forgeloop/history-store
 *
 * Durable, insert-only SQLite log of condensed operation history.
 * Outlives any single session; entries are never updated once written.
 */

import Database from 'better-sqlite3';
import {
  type HistoryEntry,
  isToolName,
  now,
  type TerminationReason,
} from '@forgeloop/core';
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Query interfaces
// ---------------------------------------------------------------------------

export interface HistoryQuery {
  sessionId?: string;
  toolName?: HistoryEntry['toolName'];
  success?: boolean;
  limit?: number;
  order?: 'asc' | 'desc';
}

export interface SessionRecord {
  sessionId: string;
  workspaceRoot: string;
  goal: string | null;
  startedAt: number;
  endedAt: number | null;
  termination: TerminationReason | null;
}

// ---------------------------------------------------------------------------
// Column schemas
// ---------------------------------------------------------------------------

const finalStateSchema = z.enum(['succeeded', 'failed', 'rolled_back', 'skipped']);

const terminationSchema = z.enum(['completed', 'operation_limit', 'cancelled']);

const stringListSchema = z.array(z.string());

const stateChangesSchema = z.array(
  z.object({
    path: z.string(),
    change: z.enum(['created', 'modified', 'deleted', 'unchanged']),
    beforeHash: z.string().nullable(),
    afterHash: z.string().nullable(),
  }),
);

// ---------------------------------------------------------------------------
// HistoryStore
// ---------------------------------------------------------------------------

export class HistoryStore {
  private db: Database.Database;
  private appendStmt!: Database.Statement;

  constructor(dbPath = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.initialize();
  }

  // -------------------------------------------------------------------------
  // Schema
  // -------------------------------------------------------------------------

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id     TEXT PRIMARY KEY,
        workspace_root TEXT NOT NULL,
        goal           TEXT,
        started_at     INTEGER NOT NULL,
        ended_at       INTEGER,
        termination    TEXT
      );

      CREATE TABLE IF NOT EXISTS history_entries (
        seq                INTEGER PRIMARY KEY AUTOINCREMENT,
        operation_id       TEXT NOT NULL UNIQUE,
        session_id         TEXT NOT NULL,
        batch_id           TEXT,
        tool_name          TEXT NOT NULL,
        summary            TEXT NOT NULL,
        files_affected     TEXT NOT NULL,
        success            INTEGER NOT NULL,
        final_state        TEXT NOT NULL,
        attempt_count      INTEGER NOT NULL,
        important_warnings TEXT NOT NULL,
        state_changes      TEXT NOT NULL,
        created_at         INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_history_session_seq
        ON history_entries (session_id, seq);

      CREATE INDEX IF NOT EXISTS idx_history_tool_success
        ON history_entries (tool_name, success);
    `);

    this.appendStmt = this.db.prepare(`
      INSERT INTO history_entries (
        operation_id, session_id, batch_id, tool_name, summary, files_affected,
        success, final_state, attempt_count, important_warnings, state_changes,
        created_at
      ) VALUES (
        $operationId, $sessionId, $batchId, $toolName, $summary, $filesAffected,
        $success, $finalState, $attemptCount, $importantWarnings, $stateChanges,
        $createdAt
      )
    `);
  }

  // -------------------------------------------------------------------------
  // Sessions
  // -------------------------------------------------------------------------

  startSession(session: {
    sessionId: string;
    workspaceRoot: string;
    goal?: string | null;
  }): SessionRecord {
    const record: SessionRecord = {
      sessionId: session.sessionId,
      workspaceRoot: session.workspaceRoot,
      goal: session.goal ?? null,
      startedAt: now(),
      endedAt: null,
      termination: null,
    };

    this.db
      .prepare(
        `INSERT INTO sessions (session_id, workspace_root, goal, started_at)
         VALUES ($sessionId, $workspaceRoot, $goal, $startedAt)`,
      )
      .run({
        sessionId: record.sessionId,
        workspaceRoot: record.workspaceRoot,
        goal: record.goal,
        startedAt: record.startedAt,
      });

    return record;
  }

  endSession(sessionId: string, termination: TerminationReason): void {
    this.db
      .prepare(
        `UPDATE sessions SET ended_at = $endedAt, termination = $termination
         WHERE session_id = $sessionId AND ended_at IS NULL`,
      )
      .run({ sessionId, termination, endedAt: now() });
  }

  getSession(sessionId: string): SessionRecord | null {
    const row = this.db
      .prepare('SELECT * FROM sessions WHERE session_id = $sessionId')
      .get({ sessionId }) as SessionRow | undefined;

    if (!row) return null;

    return {
      sessionId: row.session_id,
      workspaceRoot: row.workspace_root,
      goal: row.goal,
      startedAt: row.started_at,
      endedAt: row.ended_at,
      termination:
        row.termination === null ? null : terminationSchema.parse(row.termination),
    };
  }

  /**
   * List all session IDs, most recently started first.
   */
  listSessionIds(): string[] {
    const rows = this.db
      .prepare('SELECT session_id FROM sessions ORDER BY started_at DESC, rowid DESC')
      .all() as Array<{ session_id: string }>;

    return rows.map((r) => r.session_id);
  }

  // -------------------------------------------------------------------------
  // Entries: append
  // -------------------------------------------------------------------------

  /**
   * Append a condensed entry. Each operation id is written at most once.
   */
  append(entry: HistoryEntry): HistoryEntry {
    this.appendStmt.run({
      operationId: entry.operationId,
      sessionId: entry.sessionId,
      batchId: entry.batchId,
      toolName: entry.toolName,
      summary: entry.summary,
      filesAffected: JSON.stringify(entry.filesAffected),
      success: entry.success ? 1 : 0,
      finalState: entry.finalState,
      attemptCount: entry.attemptCount,
      importantWarnings: JSON.stringify(entry.importantWarnings),
      stateChanges: JSON.stringify(entry.stateChanges),
      createdAt: entry.createdAt,
    });
    return entry;
  }

  // -------------------------------------------------------------------------
  // Entries: query
  // -------------------------------------------------------------------------

  /**
   * Query entries with flexible filtering.
   */
  query(q: HistoryQuery = {}): HistoryEntry[] {
    const conditions: string[] = [];
    const params: Record<string, string | number> = {};

    if (q.sessionId) {
      conditions.push('session_id = $sessionId');
      params.sessionId = q.sessionId;
    }
    if (q.toolName) {
      conditions.push('tool_name = $toolName');
      params.toolName = q.toolName;
    }
    if (q.success !== undefined) {
      conditions.push('success = $success');
      params.success = q.success ? 1 : 0;
    }

    const where =
      conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const order = q.order === 'desc' ? 'DESC' : 'ASC';
    const limit = q.limit ? 'LIMIT $limit' : '';
    if (q.limit) params.limit = q.limit;

    const sql = `SELECT * FROM history_entries ${where} ORDER BY seq ${order} ${limit}`;
    const rows = this.db.prepare(sql).all(params) as HistoryRow[];

    return rows.map(rowToEntry);
  }

  getByOperationId(operationId: string): HistoryEntry | null {
    const row = this.db
      .prepare('SELECT * FROM history_entries WHERE operation_id = $operationId')
      .get({ operationId }) as HistoryRow | undefined;
    return row ? rowToEntry(row) : null;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

interface SessionRow {
  session_id: string;
  workspace_root: string;
  goal: string | null;
  started_at: number;
  ended_at: number | null;
  termination: string | null;
}

interface HistoryRow {
  seq: number;
  operation_id: string;
  session_id: string;
  batch_id: string | null;
  tool_name: string;
  summary: string;
  files_affected: string;
  success: number;
  final_state: string;
  attempt_count: number;
  important_warnings: string;
  state_changes: string;
  created_at: number;
}

function rowToEntry(row: HistoryRow): HistoryEntry {
  if (!isToolName(row.tool_name)) {
    throw new Error(`Unknown tool in history row ${row.operation_id}: ${row.tool_name}`);
  }
  return {
    operationId: row.operation_id,
    sessionId: row.session_id,
    batchId: row.batch_id,
    toolName: row.tool_name,
    summary: row.summary,
    filesAffected: stringListSchema.parse(JSON.parse(row.files_affected)),
    success: row.success === 1,
    finalState: finalStateSchema.parse(row.final_state),
    attemptCount: row.attempt_count,
    importantWarnings: stringListSchema.parse(JSON.parse(row.important_warnings)),
    stateChanges: stateChangesSchema.parse(JSON.parse(row.state_changes)),
    createdAt: row.created_at,
  };
}
