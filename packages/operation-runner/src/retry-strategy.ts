/**
 * @forgeloop/operation-runner — Retry Strategy
 *
 * Picks the next untried approach from the tool's profile. Never repeats a
 * strategy within one operation, and never exceeds the attempt ceiling.
 */

import {
  type AttemptRecord,
  getOperationProfile,
  type StrategyName,
  type ToolName,
} from '@forgeloop/core';

export const DEFAULT_MAX_ATTEMPTS = 3;

export class RetryStrategy {
  readonly maxAttempts: number;

  constructor(maxAttempts = DEFAULT_MAX_ATTEMPTS) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    this.maxAttempts = maxAttempts;
  }

  /**
   * Strategy for the next attempt, or null when the operation must stop:
   * an attempt already succeeded, the ceiling is reached, or every
   * strategy in the tool's list has been tried.
   */
  nextStrategy(
    toolName: ToolName,
    previousAttempts: readonly AttemptRecord[],
  ): StrategyName | null {
    if (previousAttempts.some((a) => a.result.success)) return null;
    if (previousAttempts.length >= this.maxAttempts) return null;

    const tried = new Set(previousAttempts.map((a) => a.strategy));
    const { strategies } = getOperationProfile(toolName);
    return strategies.find((s) => !tried.has(s)) ?? null;
  }

  /** Upper bound on attempts for a tool: the smaller of the list and the ceiling. */
  attemptLimit(toolName: ToolName): number {
    return Math.min(getOperationProfile(toolName).strategies.length, this.maxAttempts);
  }
}
