import { randomBytes } from 'node:crypto';
import { BRANCH_PREFIX, createLogger } from '@agent-exec/core';

const log = createLogger('BranchNames');

/** `impl-` plus six hex characters. Collisions surface as a git error on create. */
export function randomBranchName(): string {
  try {
    return `${BRANCH_PREFIX}${randomBytes(3).toString('hex')}`;
  } catch (error) {
    log.warn(`Random bytes unavailable, using a time-based name: ${String(error)}`);
    return `${BRANCH_PREFIX}${Date.now() % 1_000_000}`;
  }
}

/** Shorten `text` to `max` characters, marking the cut with `...` */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max - 3)}...`;
}
