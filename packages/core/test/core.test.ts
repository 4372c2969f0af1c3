/**
 * @forgeloop/core — Tests
 */

import { describe, expect, it } from 'vitest';
import {
  OPERATION_TYPES,
  TOOL_CATEGORIES,
  TOOL_NAMES,
  VALID_TRANSITIONS,
  formatPermissions,
  generateId,
  getOperationProfile,
  hashContent,
  isFinalState,
  isToolName,
  now,
} from '../src/index.js';

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

describe('generateId', () => {
  it('returns unique values on successive calls', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateId()));
    expect(ids.size).toBe(100);
  });
});

describe('now', () => {
  it('returns a value close to Date.now()', () => {
    const before = Date.now();
    const ts = now();
    const after = Date.now();
    expect(ts).toBeGreaterThanOrEqual(before);
    expect(ts).toBeLessThanOrEqual(after);
  });
});

describe('hashContent', () => {
  it('hashes text and its UTF-8 bytes identically', () => {
    expect(hashContent('hello')).toBe(
      hashContent(new TextEncoder().encode('hello')),
    );
  });

  it('produces the sha256 hex digest', () => {
    expect(hashContent('hello')).toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824',
    );
  });
});

describe('formatPermissions', () => {
  it('renders the permission bits as three octal digits', () => {
    expect(formatPermissions(0o100644)).toBe('644');
    expect(formatPermissions(0o040755)).toBe('755');
    expect(formatPermissions(0o000007)).toBe('007');
  });
});

// ---------------------------------------------------------------------------
// Operation type profiles
// ---------------------------------------------------------------------------

describe('OPERATION_TYPES', () => {
  it('maps every tool to a profile', () => {
    for (const tool of TOOL_NAMES) {
      expect(OPERATION_TYPES[TOOL_CATEGORIES[tool]]).toBeDefined();
    }
  });

  it('starts every strategy list with the plain attempt', () => {
    for (const profile of Object.values(OPERATION_TYPES)) {
      expect(profile.strategies[0]).toBe('default');
    }
  });

  it('is frozen', () => {
    expect(Object.isFrozen(OPERATION_TYPES)).toBe(true);
    expect(Object.isFrozen(OPERATION_TYPES.file_creation)).toBe(true);
    expect(Object.isFrozen(OPERATION_TYPES.file_creation.strategies)).toBe(
      true,
    );
  });

  it('marks writes critical and reads non-critical', () => {
    expect(getOperationProfile('write_file').critical).toBe(true);
    expect(getOperationProfile('delete_file').critical).toBe(true);
    expect(getOperationProfile('read_file').critical).toBe(false);
    expect(getOperationProfile('load_json').critical).toBe(false);
  });

  it('uses basic strictness for read-only tools', () => {
    expect(getOperationProfile('read_file').strictness).toBe('basic');
    expect(getOperationProfile('write_file').strictness).toBe('strict');
  });
});

describe('isToolName', () => {
  it('accepts known tools only', () => {
    expect(isToolName('save_json')).toBe(true);
    expect(isToolName('process.run')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// VALID_TRANSITIONS
// ---------------------------------------------------------------------------

describe('VALID_TRANSITIONS', () => {
  it('allows pending → pre_check and pending → skipped', () => {
    expect(VALID_TRANSITIONS.pending).toEqual(['pre_check', 'skipped']);
  });

  it('allows a retry to re-enter executing', () => {
    expect(VALID_TRANSITIONS.retry).toContain('executing');
  });

  it('does not allow executing to jump straight to succeeded', () => {
    expect(VALID_TRANSITIONS.executing).not.toContain('succeeded');
  });

  it('has no transitions out of terminal states', () => {
    for (const state of [
      'succeeded',
      'failed',
      'rolled_back',
      'skipped',
    ] as const) {
      expect(VALID_TRANSITIONS[state]).toEqual([]);
      expect(isFinalState(state)).toBe(true);
    }
    expect(isFinalState('verifying')).toBe(false);
  });
});
