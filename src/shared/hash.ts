/**
 * SHA-256 hash utility
 */

import { createHash } from 'node:crypto';

/** Compute SHA-256 hex hash of a string */
export function hashString(content: string): string {
  return createHash('sha256').update(content, 'utf-8').digest('hex');
}

/** Short stable hash so paths and target names stay out of log files */
export function hashForLogging(value: string): string {
  return hashString(value).slice(0, 8);
}
