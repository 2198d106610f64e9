import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'node:path';
import type { DirResult } from 'tmp';
import { resolveOverlayDirectory, validateOverlay } from '@/validation/pipelines/overlay';
import { renderReport } from '@/validation/aggregator';
import { failureKind } from '@/validation/classifier';
import { createFakeRunner } from '../../../__support__/utilities/fake-runner';
import { createTestContext } from '../../../__support__/utilities/test-context';
import { createTestTempDir, writeTree } from '../../../__support__/utilities/tmp-helpers';

const rendered = [
  'apiVersion: v1',
  'kind: Service',
  'metadata:',
  '  name: api',
  '---',
  'apiVersion: apps/v1',
  'kind: Deployment',
  'metadata:',
  '  name: api',
  '',
].join('\n');

describe('resolveOverlayDirectory', () => {
  let tempDir: DirResult;

  beforeEach(async () => {
    tempDir = createTestTempDir();
    await writeTree(tempDir.name, {
      'overlays/prod/kustomization.yaml': 'resources:\n  - ../../base\n',
      'base/deployment.yaml': 'kind: Deployment\n',
    });
  });

  afterEach(() => {
    tempDir.removeCallback();
  });

  it('accepts the overlay directory or its kustomization file', async () => {
    const overlay = path.join(tempDir.name, 'overlays/prod');

    expect(await resolveOverlayDirectory(overlay)).toEqual({ ok: true, value: overlay });
    expect(await resolveOverlayDirectory(path.join(overlay, 'kustomization.yaml'))).toEqual({
      ok: true,
      value: overlay,
    });
  });

  it('rejects directories without a kustomization', async () => {
    const result = await resolveOverlayDirectory(path.join(tempDir.name, 'base'));

    expect(failureKind(result)).toBe('NotFound');
  });
});

describe('validateOverlay', () => {
  let tempDir: DirResult;
  let overlay: string;

  beforeEach(async () => {
    tempDir = createTestTempDir();
    overlay = path.join(tempDir.name, 'overlays/staging');
    await writeTree(tempDir.name, { 'overlays/staging/kustomization.yaml': 'resources: []\n' });
  });

  afterEach(() => {
    tempDir.removeCallback();
  });

  it('builds the overlay and dry-runs each rendered resource', async () => {
    const runner = createFakeRunner((invocation) =>
      invocation.args.includes('kustomize') ? { stdout: rendered } : undefined,
    );
    const ctx = createTestContext({ runner, selected: 'staging' });

    const result = await validateOverlay(overlay, ctx);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(runner.commandLines()[0]).toBe(`kubectl --context staging kustomize ${overlay}`);
    expect(runner.calls).toHaveLength(5);
    expect(result.value.preStages).toEqual([{ stage: 'Kustomize build', status: 'PASS', message: '2 resources' }]);
    expect(result.value.entries.map((entry) => entry.subject)).toEqual([
      { type: 'document', source: `${overlay} (kustomize build)`, index: 0, label: 'Service/api' },
      { type: 'document', source: `${overlay} (kustomize build)`, index: 1, label: 'Deployment/api' },
    ]);
    expect(result.value.summary).toBe('Summary: 2 passed, 0 failed, 0 errored');
  });

  it('reports a failed build as one artifact error and skips the dry-runs', async () => {
    const runner = createFakeRunner(() => ({ exitCode: 1, stderr: 'Error: accumulating resources: missing.yaml' }));
    const ctx = createTestContext({ runner, selected: 'staging' });

    const result = await validateOverlay(overlay, ctx);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(runner.calls).toHaveLength(1);
    expect(result.value.entries).toEqual([
      {
        subject: { type: 'artifact', path: overlay },
        stages: [
          {
            stage: 'Kustomize build',
            status: 'ERROR',
            message: 'Error: accumulating resources: missing.yaml',
            errorKind: 'PreStageFailure',
          },
        ],
        status: 'ERROR',
      },
    ]);
    expect(renderReport(result.value).split('\n').slice(-3)).toEqual([
      'Summary: 0 passed, 0 failed, 1 errored',
      '',
      'DO NOT COMMIT - Fix errors first!',
    ]);
  });

  it('prefixes the cause when kubectl is missing', async () => {
    const runner = createFakeRunner(() => ({ exitCode: 127, stderr: 'spawn kubectl ENOENT' }));
    const ctx = createTestContext({ runner, selected: 'staging' });

    const result = await validateOverlay(overlay, ctx);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.entries[0]?.stages[0]?.message).toBe(
      'NotFound: kubectl not found or could not be started: spawn kubectl ENOENT',
    );
  });

  it('refuses to run without a selected context', async () => {
    const runner = createFakeRunner();

    const result = await validateOverlay(overlay, createTestContext({ runner }));

    expect(failureKind(result)).toBe('Unselected');
    expect(runner.calls).toHaveLength(0);
  });
});
