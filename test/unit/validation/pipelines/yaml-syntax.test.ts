import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'node:path';
import type { DirResult } from 'tmp';
import { findTabLines, lintYaml, lintYamlContent } from '@/validation/pipelines/yaml-syntax';
import { failureKind } from '@/validation/classifier';
import { createFakeRunner } from '../../../__support__/utilities/fake-runner';
import { createTestContext } from '../../../__support__/utilities/test-context';
import { createTestTempDir, writeTree } from '../../../__support__/utilities/tmp-helpers';

describe('findTabLines', () => {
  it('reports 1-based lines containing tabs', () => {
    expect(findTabLines('a: 1\n\tb: 2\nc: "x\ty"\n')).toEqual(['line 2: tab character', 'line 3: tab character']);
  });
});

describe('lintYamlContent', () => {
  it('passes well-formed multi-document content', () => {
    expect(lintYamlContent('kind: A\n---\nkind: B\n', 'ok.yaml')).toEqual({
      stage: 'YAML syntax',
      status: 'PASS',
      message: '2 documents',
    });
  });

  it('fails on duplicate keys with the document index', () => {
    const outcome = lintYamlContent('kind: A\n---\nname: x\nname: y\n', 'dup.yaml');

    expect(outcome.status).toBe('FAIL');
    expect(outcome.errorKind).toBe('ParseError');
    expect(outcome.message).toMatch(/^Document 1: YAML parse error at line 4, column 1: duplicated mapping key/);
  });
});

describe('lintYaml', () => {
  let tempDir: DirResult;

  beforeEach(async () => {
    tempDir = createTestTempDir();
    await writeTree(tempDir.name, {
      'good.yaml': 'kind: ConfigMap\n',
      'tabs.yml': 'kind: ConfigMap\ndata:\n  key: "a\tb"\n',
      'notes.txt': 'ignored',
    });
  });

  afterEach(() => {
    tempDir.removeCallback();
  });

  it('lints every YAML file without touching the runner', async () => {
    const runner = createFakeRunner();
    const ctx = createTestContext({ runner });

    const result = await lintYaml(tempDir.name, ctx);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(runner.calls).toHaveLength(0);
    expect(result.value.context).toBeNull();
    expect(result.value.entries).toEqual([
      {
        subject: { type: 'artifact', path: path.join(tempDir.name, 'good.yaml') },
        stages: [{ stage: 'YAML syntax', status: 'PASS', message: '1 document' }],
        status: 'PASS',
      },
      {
        subject: { type: 'artifact', path: path.join(tempDir.name, 'tabs.yml') },
        stages: [
          { stage: 'YAML syntax', status: 'PASS', message: '1 document', warnings: ['line 3: tab character'] },
        ],
        status: 'PASS',
      },
    ]);
    expect(result.value.ok).toBe(true);
  });

  it('fails with NotFound for a missing path', async () => {
    const result = await lintYaml(path.join(tempDir.name, 'missing.yaml'), createTestContext());

    expect(failureKind(result)).toBe('NotFound');
  });
});
