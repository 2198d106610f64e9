import { homedir } from 'node:os';
import * as path from 'node:path';

/**
 * Expand a leading `~` and resolve to an absolute path
 */
export function normalizePath(input: string): string {
  const trimmed = input.trim();
  if (trimmed === '~') {
    return homedir();
  }
  if (trimmed.startsWith('~/') || trimmed.startsWith(`~${path.sep}`)) {
    return path.resolve(homedir(), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}
