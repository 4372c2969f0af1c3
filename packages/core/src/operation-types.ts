/**
 * @forgeloop/core — Operation type profiles
 *
 * The single policy table consulted by the verification engine, the retry
 * strategy, and the executor. Frozen at load time; nothing mutates it.
 */

import type { StrategyName, ToolName } from './tools.js';

export type OperationCategory =
  | 'file_creation'
  | 'file_read'
  | 'directory_ops'
  | 'file_deletion'
  | 'json_write'
  | 'json_read';

export type Strictness = 'strict' | 'basic';

export interface OperationTypeProfile {
  readonly category: OperationCategory;
  /** Exhausted retries roll back instead of failing */
  readonly critical: boolean;
  /** Back up the target before the first attempt */
  readonly requiresBackup: boolean;
  /** Ordered retry approaches; the first is the initial attempt */
  readonly strategies: readonly StrategyName[];
  readonly strictness: Strictness;
}

function profile(p: OperationTypeProfile): OperationTypeProfile {
  return Object.freeze({ ...p, strategies: Object.freeze([...p.strategies]) });
}

export const OPERATION_TYPES: Readonly<
  Record<OperationCategory, OperationTypeProfile>
> = Object.freeze({
  file_creation: profile({
    category: 'file_creation',
    critical: true,
    requiresBackup: true,
    strategies: ['default', 'encoding', 'temp_file', 'backup_restore'],
    strictness: 'strict',
  }),
  file_read: profile({
    category: 'file_read',
    critical: false,
    requiresBackup: false,
    strategies: ['default', 'encoding'],
    strictness: 'basic',
  }),
  directory_ops: profile({
    category: 'directory_ops',
    critical: true,
    requiresBackup: true,
    strategies: ['default', 'recursive', 'parent_first'],
    strictness: 'strict',
  }),
  file_deletion: profile({
    category: 'file_deletion',
    critical: true,
    requiresBackup: true,
    strategies: ['default', 'force', 'rename_then_delete'],
    strictness: 'strict',
  }),
  json_write: profile({
    category: 'json_write',
    critical: true,
    requiresBackup: true,
    strategies: ['default', 'encoding', 'temp_file'],
    strictness: 'strict',
  }),
  json_read: profile({
    category: 'json_read',
    critical: false,
    requiresBackup: false,
    strategies: ['default', 'encoding'],
    strictness: 'basic',
  }),
});

export const TOOL_CATEGORIES: Readonly<Record<ToolName, OperationCategory>> =
  Object.freeze({
    write_file: 'file_creation',
    read_file: 'file_read',
    create_directory: 'directory_ops',
    delete_file: 'file_deletion',
    save_json: 'json_write',
    load_json: 'json_read',
  });

export function getOperationProfile(toolName: ToolName): OperationTypeProfile {
  return OPERATION_TYPES[TOOL_CATEGORIES[toolName]];
}
