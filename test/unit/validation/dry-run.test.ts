import { describe, it, expect } from '@jest/globals';
import { dryRunDocument, dryRunItems, extractWarnings } from '@/validation/dry-run';
import type { ManifestDocument } from '@/validation/types';
import { createFakeRunner, hasArgs } from '../../__support__/utilities/fake-runner';
import { createTestContext } from '../../__support__/utilities/test-context';

const configMap: ManifestDocument = {
  type: 'document',
  source: 'app.yaml',
  index: 0,
  raw: 'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: settings',
  label: 'ConfigMap/settings',
};

describe('extractWarnings', () => {
  it('keeps Warning lines and deprecation notices', () => {
    const output = [
      'configmap/settings created (server dry run)',
      'Warning: policy/v1beta1 PodSecurityPolicy is deprecated in v1.21+',
      'extensions/v1beta1 Ingress is deprecated',
    ].join('\n');

    expect(extractWarnings(output)).toEqual([
      'policy/v1beta1 PodSecurityPolicy is deprecated in v1.21+',
      'extensions/v1beta1 Ingress is deprecated',
    ]);
  });
});

describe('dryRunDocument', () => {
  it('runs client then server dry-run with the document on stdin', async () => {
    const runner = createFakeRunner();
    const ctx = createTestContext({ runner, selected: 'staging' });

    const stages = await dryRunDocument(configMap, ctx);

    expect(stages.map((stage) => `${stage.stage}: ${stage.status}`)).toEqual([
      'Client dry-run: PASS',
      'Server dry-run: PASS',
    ]);
    expect(runner.commandLines()).toEqual([
      'kubectl --context staging apply --dry-run=client -f -',
      'kubectl --context staging apply --dry-run=server -f -',
    ]);
    expect(runner.calls.map((call) => call.input)).toEqual([configMap.raw, configMap.raw]);
    expect(runner.calls[0]?.timeoutMs).toBe(60000);
  });

  it('skips the server dry-run when the client dry-run fails', async () => {
    const runner = createFakeRunner(() => ({ exitCode: 1, stderr: 'error: unknown field "dataa"' }));
    const ctx = createTestContext({ runner, selected: 'staging' });

    const stages = await dryRunDocument(configMap, ctx);

    expect(stages).toEqual([
      {
        stage: 'Client dry-run',
        status: 'FAIL',
        message: 'error: unknown field "dataa"',
        errorKind: 'ToolFailure',
      },
      { stage: 'Server dry-run', status: 'SKIPPED', message: 'Skipped: client dry-run did not pass' },
    ]);
    expect(runner.calls).toHaveLength(1);
  });

  it('attaches server warnings to a passing stage', async () => {
    const runner = createFakeRunner((invocation) =>
      hasArgs(invocation, '--dry-run=server')
        ? { stdout: 'configmap/settings created (server dry run)', stderr: 'Warning: field is deprecated' }
        : undefined,
    );
    const ctx = createTestContext({ runner, selected: 'staging' });

    const [, server] = await dryRunDocument(configMap, ctx);

    expect(server).toEqual({
      stage: 'Server dry-run',
      status: 'PASS',
      message: '',
      warnings: ['field is deprecated'],
    });
  });

  it('reports Unselected without starting a process', async () => {
    const runner = createFakeRunner();
    const ctx = createTestContext({ runner });

    const [client, server] = await dryRunDocument(configMap, ctx);

    expect(client?.status).toBe('ERROR');
    expect(client?.errorKind).toBe('Unselected');
    expect(server?.status).toBe('SKIPPED');
    expect(runner.calls).toHaveLength(0);
  });
});

describe('dryRunItems', () => {
  it('turns parse errors into a single Parse stage and keeps going after a timeout', async () => {
    const runner = createFakeRunner((invocation) =>
      invocation.input?.includes('name: slow') ? { timedOut: true, durationMs: 60000 } : undefined,
    );
    const ctx = createTestContext({ runner, selected: 'staging' });

    const entries = await dryRunItems(
      [
        { type: 'document', source: 'app.yaml', index: 0, raw: 'kind: Job\nmetadata:\n  name: slow', label: 'Job/slow' },
        { type: 'error', source: 'app.yaml', index: 1, kind: 'ParseError', message: 'YAML parse error at line 7, column 3: bad' },
        configMap,
      ],
      ctx,
    );

    expect(entries.map((entry) => entry.stages.map((stage) => `${stage.stage}: ${stage.status}`))).toEqual([
      ['Client dry-run: ERROR', 'Server dry-run: SKIPPED'],
      ['Parse: ERROR'],
      ['Client dry-run: PASS', 'Server dry-run: PASS'],
    ]);
    expect(entries[0]?.stages[0]?.errorKind).toBe('Timeout');
    expect(entries[1]?.subject).toEqual({ type: 'document', source: 'app.yaml', index: 1 });
    expect(entries[2]?.subject).toEqual({ type: 'document', source: 'app.yaml', index: 0, label: 'ConfigMap/settings' });
  });
});
