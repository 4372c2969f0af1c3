/**
 * @forgeloop/core — Utilities
 *
 * Shared utility functions used across packages.
 */

import { createHash, randomUUID } from 'node:crypto';

/**
 * Generate a unique identifier.
 * Uses crypto.randomUUID for simplicity in v1.
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Current timestamp in milliseconds.
 */
export function now(): number {
  return Date.now();
}

/**
 * SHA-256 of the given bytes or UTF-8 text, hex encoded.
 * Every content hash in the system (file states, backups, verification)
 * goes through here so they stay comparable.
 */
export function hashContent(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/** Render a file mode as the three-digit octal permission string ("644"). */
export function formatPermissions(mode: number): string {
  return (mode & 0o777).toString(8).padStart(3, '0');
}
