import { describe, it, expect } from '@jest/globals';
import { createMCPServer, formatOutput, OUTPUTFORMAT } from '@/mcp/mcp-server';
import { CHAINHINTSMODE } from '@/app/orchestrator-types';
import { buildReport, renderReport } from '@/validation/aggregator';
import { ALL_TOOLS } from '@/tools';
import { Success } from '@/types';
import { silentLogger } from '../../__support__/utilities/test-context';

const report = buildReport({
  pipeline: 'yaml-syntax',
  title: 'YAML Syntax Validation',
  context: null,
  target: { label: 'Path', value: '/work/deploy' },
  entries: [
    {
      subject: { type: 'artifact', path: '/work/deploy/app.yaml' },
      stages: [{ stage: 'YAML syntax', status: 'PASS', message: '1 document' }],
    },
  ],
});

describe('formatOutput', () => {
  const selection = { selected: 'staging', previous: null, summary: 'Selected context staging.' };

  it('renders json with two-space indentation', () => {
    expect(formatOutput({ a: 1 }, OUTPUTFORMAT.JSON)).toBe('{\n  "a": 1\n}');
  });

  it('renders only the summary as text', () => {
    expect(formatOutput(selection, OUTPUTFORMAT.TEXT)).toBe('Selected context staging.');
    expect(formatOutput('plain', OUTPUTFORMAT.TEXT)).toBe('plain');
  });

  it('collapses everything but the summary in markdown', () => {
    expect(formatOutput(selection, OUTPUTFORMAT.MARKDOWN)).toBe(
      [
        'Selected context staging.',
        '',
        '<details>',
        '<summary>View detailed output</summary>',
        '',
        '```json',
        '{',
        '  "selected": "staging",',
        '  "previous": null',
        '}',
        '```',
        '</details>',
      ].join('\n'),
    );
  });

  it('renders validation reports as the text report with next steps', () => {
    const output = formatOutput({ ...report, nextSteps: 'Run validate-schema next.' }, OUTPUTFORMAT.NATURAL_LANGUAGE);

    expect(output).toBe(`${renderReport(report)}\n\nNext Steps: Run validate-schema next.`);
  });

  it('omits next steps when chain hints are disabled', () => {
    const output = formatOutput(
      { ...report, nextSteps: 'Run validate-schema next.' },
      OUTPUTFORMAT.NATURAL_LANGUAGE,
      CHAINHINTSMODE.DISABLED,
    );

    expect(output).toBe(renderReport(report));
  });

  it('dispatches context results to their narratives', () => {
    expect(formatOutput(selection, OUTPUTFORMAT.NATURAL_LANGUAGE)).toBe(
      'Context selected: staging\nCluster validations now run against this context. kubeconfig was not modified.',
    );
  });

  it('falls back to the summary for other results', () => {
    expect(formatOutput({ summary: 'done', extra: true }, OUTPUTFORMAT.NATURAL_LANGUAGE)).toBe('done');
  });
});

describe('createMCPServer', () => {
  it('registers every tool without starting a transport', () => {
    const server = createMCPServer([...ALL_TOOLS], { logger: silentLogger() }, async () => Success({}));

    expect(server.getTools().map((tool) => tool.name)).toEqual(ALL_TOOLS.map((tool) => tool.name));
  });

  it('stops as a no-op before it was started', async () => {
    const server = createMCPServer([], { logger: silentLogger() }, async () => Success({}));

    await expect(server.stop()).resolves.toBeUndefined();
  });
});
