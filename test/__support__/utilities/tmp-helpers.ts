/**
 * Temporary directory helpers for filesystem-backed tests
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import tmp, { type DirResult } from 'tmp';

export function createTestTempDir(prefix = 'kube-preflight-test-'): DirResult {
  return tmp.dirSync({ prefix, unsafeCleanup: true });
}

/**
 * Write a tree of files below `root`; keys are relative paths
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}
