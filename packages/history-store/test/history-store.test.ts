/**
 * @forgeloop/history-store — Tests
 */

import type { HistoryEntry } from '@forgeloop/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HistoryStore } from '../src/history-store.js';

function entry(overrides: Partial<HistoryEntry> & { operationId: string }): HistoryEntry {
  return {
    sessionId: 'sess-1',
    batchId: null,
    toolName: 'write_file',
    summary: 'Wrote 5 bytes to notes.txt',
    filesAffected: ['notes.txt'],
    success: true,
    finalState: 'succeeded',
    attemptCount: 1,
    importantWarnings: [],
    stateChanges: [
      { path: 'notes.txt', change: 'created', beforeHash: null, afterHash: 'abc' },
    ],
    createdAt: 1000,
    ...overrides,
  };
}

describe('HistoryStore', () => {
  let store: HistoryStore;

  beforeEach(() => {
    store = new HistoryStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  // -----------------------------------------------------------------------
  // Append
  // -----------------------------------------------------------------------

  describe('append', () => {
    it('round-trips every field', () => {
      const written = entry({
        operationId: 'op-1',
        batchId: 'batch-1',
        importantWarnings: ['File did not exist prior to deletion.'],
      });
      store.append(written);
      expect(store.getByOperationId('op-1')).toEqual(written);
    });

    it('refuses to write an operation twice', () => {
      store.append(entry({ operationId: 'op-1' }));
      expect(() => store.append(entry({ operationId: 'op-1' }))).toThrow();
    });

    it('returns null for unknown operations', () => {
      expect(store.getByOperationId('missing')).toBeNull();
    });
  });

  // -----------------------------------------------------------------------
  // Query
  // -----------------------------------------------------------------------

  describe('query', () => {
    beforeEach(() => {
      store.append(entry({ operationId: 'op-1' }));
      store.append(
        entry({
          operationId: 'op-2',
          toolName: 'create_directory',
          success: false,
          finalState: 'rolled_back',
          attemptCount: 3,
        }),
      );
      store.append(entry({ operationId: 'op-3', sessionId: 'sess-2', toolName: 'read_file' }));
    });

    it('queries by sessionId in append order', () => {
      const entries = store.query({ sessionId: 'sess-1' });
      expect(entries.map((e) => e.operationId)).toEqual(['op-1', 'op-2']);
    });

    it('filters by tool and outcome', () => {
      expect(store.query({ toolName: 'read_file' }).map((e) => e.operationId)).toEqual([
        'op-3',
      ]);
      const failures = store.query({ success: false });
      expect(failures).toHaveLength(1);
      expect(failures[0]?.finalState).toBe('rolled_back');
      expect(failures[0]?.attemptCount).toBe(3);
    });

    it('supports limit and desc order', () => {
      const entries = store.query({ order: 'desc', limit: 2 });
      expect(entries.map((e) => e.operationId)).toEqual(['op-3', 'op-2']);
    });

    it('returns empty array for no matches', () => {
      expect(store.query({ sessionId: 'nonexistent' })).toHaveLength(0);
    });
  });

  // -----------------------------------------------------------------------
  // Sessions
  // -----------------------------------------------------------------------

  describe('sessions', () => {
    it('records start and end of a session', () => {
      const started = store.startSession({
        sessionId: 'sess-1',
        workspaceRoot: '/tmp/ws',
        goal: 'scaffold project',
      });
      expect(started.endedAt).toBeNull();

      store.endSession('sess-1', 'operation_limit');
      const session = store.getSession('sess-1');
      expect(session?.goal).toBe('scaffold project');
      expect(session?.termination).toBe('operation_limit');
      expect(session?.endedAt).toBeGreaterThanOrEqual(started.startedAt);
    });

    it('lists the most recently started session first', () => {
      store.startSession({ sessionId: 'a', workspaceRoot: '/tmp/ws' });
      store.startSession({ sessionId: 'b', workspaceRoot: '/tmp/ws' });
      expect(store.listSessionIds()).toEqual(['b', 'a']);
    });

    it('returns null for an unknown session', () => {
      expect(store.getSession('nope')).toBeNull();
    });
  });
});
