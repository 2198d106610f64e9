import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'node:path';
import type { DirResult } from 'tmp';
import {
  discoverManifests,
  documentLabel,
  findManifestFiles,
  splitManifestStream,
} from '@/validation/discovery';
import { failureKind } from '@/validation/classifier';
import type { DiscoveredItem } from '@/validation/types';
import { createTestTempDir, writeTree } from '../../__support__/utilities/tmp-helpers';

function summarize(items: DiscoveredItem[]): string[] {
  return items.map((item) =>
    item.type === 'document' ? `${item.index}:${item.label ?? '-'}` : `${item.index}:error`,
  );
}

describe('splitManifestStream', () => {
  it('splits on document markers and labels each document', () => {
    const text = [
      'apiVersion: v1',
      'kind: ConfigMap',
      'metadata:',
      '  name: settings',
      '---',
      'apiVersion: apps/v1',
      'kind: Deployment',
      'metadata:',
      '  name: web',
    ].join('\n');

    const items = splitManifestStream(text, 'app.yaml');

    expect(summarize(items)).toEqual(['0:ConfigMap/settings', '1:Deployment/web']);
    expect(items[0]).toEqual({
      type: 'document',
      source: 'app.yaml',
      index: 0,
      raw: 'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: settings',
      label: 'ConfigMap/settings',
    });
  });

  it('skips empty and comment-only documents without consuming an index', () => {
    const text = ['---', '# just a comment', '---', '', '---', 'kind: Namespace', '...', '---', 'kind: Secret'].join('\n');

    expect(summarize(splitManifestStream(text, 'mixed.yaml'))).toEqual(['0:Namespace', '1:Secret']);
  });

  it('keeps content written on the marker line', () => {
    const items = splitManifestStream('--- {kind: Service, metadata: {name: api}}', 'inline.yaml');

    expect(summarize(items)).toEqual(['0:Service/api']);
  });

  it('reports parse errors with their line in the source and continues', () => {
    const text = ['kind: ConfigMap', 'data: {}', '---', 'kind: Secret', 'kind: Secret', '---', 'kind: Namespace'].join('\n');

    const items = splitManifestStream(text, 'broken.yaml');

    expect(summarize(items)).toEqual(['0:ConfigMap', '1:error', '2:Namespace']);
    const error = items[1];
    expect(error?.type).toBe('error');
    if (error?.type !== 'error') return;
    expect(error.kind).toBe('ParseError');
    expect(error.message).toMatch(/^YAML parse error at line 5, column 1: duplicated mapping key/);
  });

  it('returns nothing for an empty stream', () => {
    expect(splitManifestStream('', 'empty.yaml')).toEqual([]);
    expect(splitManifestStream('\n# nothing here\n', 'empty.yaml')).toEqual([]);
  });
});

describe('documentLabel', () => {
  it('combines kind and name when both are present', () => {
    expect(documentLabel({ kind: 'Service', metadata: { name: 'api' } })).toBe('Service/api');
    expect(documentLabel({ kind: 'Service' })).toBe('Service');
    expect(documentLabel({ metadata: { name: 'api' } })).toBeUndefined();
    expect(documentLabel('plain scalar')).toBeUndefined();
  });
});

describe('manifest files on disk', () => {
  let tempDir: DirResult;

  beforeEach(async () => {
    tempDir = createTestTempDir();
    await writeTree(tempDir.name, {
      'b.yaml': 'kind: ConfigMap\n',
      'a.yml': 'kind: Secret\n',
      'nested/c.yaml': 'kind: Service\n---\nkind: Ingress\n',
      'README.md': '# docs',
      '.hidden/d.yaml': 'kind: Pod\n',
      'node_modules/e.yaml': 'kind: Pod\n',
    });
  });

  afterEach(() => {
    tempDir.removeCallback();
  });

  it('finds YAML files sorted by relative path and skips hidden and vendored directories', async () => {
    const files = await findManifestFiles(tempDir.name);

    expect(files).toEqual([
      path.join(tempDir.name, 'a.yml'),
      path.join(tempDir.name, 'b.yaml'),
      path.join(tempDir.name, 'nested/c.yaml'),
    ]);
  });

  it('discovers documents across a directory in file order', async () => {
    const result = await discoverManifests(tempDir.name);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map((item) => `${path.basename(item.source)}[${item.index}]`)).toEqual([
      'a.yml[0]',
      'b.yaml[0]',
      'c.yaml[0]',
      'c.yaml[1]',
    ]);
  });

  it('reads a single file directly', async () => {
    const result = await discoverManifests(path.join(tempDir.name, 'nested/c.yaml'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(summarize(result.value)).toEqual(['0:Service', '1:Ingress']);
  });

  it('fails with NotFound for a missing path', async () => {
    const missing = path.join(tempDir.name, 'does-not-exist');
    const result = await discoverManifests(missing);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe(`Path not found: ${missing}`);
    expect(failureKind(result)).toBe('NotFound');
  });

  it('returns no documents for a directory without manifests', async () => {
    const empty = createTestTempDir();
    try {
      const result = await discoverManifests(empty.name);
      expect(result).toEqual({ ok: true, value: [] });
    } finally {
      empty.removeCallback();
    }
  });
});
