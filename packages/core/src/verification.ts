/**
 * @forgeloop/core — Verification report types
 */

import type { Strictness } from './operation-types.js';
import type { CheckValue, ToolName, VerificationGroups } from './tools.js';

export type CheckCategory = 'critical' | 'content' | 'security' | 'quality';

export const CHECK_CATEGORIES: readonly CheckCategory[] = [
  'critical',
  'content',
  'security',
  'quality',
];

export interface CheckOutcome {
  name: string;
  category: CheckCategory;
  value: CheckValue;
  passed: boolean;
  /** Why the check did not pass */
  message?: string;
}

export interface VerificationWarning {
  check: string;
  category: CheckCategory;
  message: string;
  /** Surfaced in the durable history, not just the session log */
  userRelevant: boolean;
}

export interface VerificationReport {
  toolName: ToolName;
  strictness: Strictness;
  /** False iff any critical check failed */
  success: boolean;
  /** Tool-specific report shape (layered for write_file, flat otherwise) */
  groups: VerificationGroups;
  checks: CheckOutcome[];
  /** Messages of failed critical checks */
  failures: string[];
  /** Failed non-critical checks */
  warnings: VerificationWarning[];
}
