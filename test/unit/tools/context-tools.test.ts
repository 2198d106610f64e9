import { describe, it, expect } from '@jest/globals';
import listContextsTool, { summarizeContexts } from '@/tools/list-contexts/tool';
import selectContextTool from '@/tools/select-context/tool';
import { failureKind } from '@/validation/classifier';
import { createFakeRunner, type FakeRunner } from '../../__support__/utilities/fake-runner';
import { createTestContext } from '../../__support__/utilities/test-context';

function kubeconfigRunner(contexts: string[], current?: string): FakeRunner {
  return createFakeRunner((invocation) => {
    if (invocation.args.includes('get-contexts')) {
      return { stdout: contexts.map((name) => `${name}\n`).join('') };
    }
    return current ? { stdout: `${current}\n` } : { exitCode: 1, stderr: 'error: current-context is not set' };
  });
}

describe('summarizeContexts', () => {
  it('mentions the selection or how to make one', () => {
    expect(summarizeContexts({ contexts: ['a', 'b'], cliCurrent: 'a', selected: null })).toBe(
      'Found 2 contexts (kubeconfig current-context: a). No context selected; call select-context before cluster validations.',
    );
    expect(summarizeContexts({ contexts: ['a'], cliCurrent: null, selected: 'a' })).toBe('Found 1 context. Selected: a.');
  });
});

describe('list-contexts tool', () => {
  it('lists contexts with the kubeconfig and server selections', async () => {
    const ctx = createTestContext({ runner: kubeconfigRunner(['staging', 'production'], 'staging'), selected: 'production' });

    const result = await listContextsTool.handler({}, ctx);

    expect(result).toEqual({
      ok: true,
      value: {
        contexts: ['staging', 'production'],
        cliCurrent: 'staging',
        selected: 'production',
        summary: 'Found 2 contexts (kubeconfig current-context: staging). Selected: production.',
      },
    });
  });
});

describe('select-context tool', () => {
  it('selects a listed context and reports the switch', async () => {
    const ctx = createTestContext({ runner: kubeconfigRunner(['staging', 'production']) });

    const first = await selectContextTool.handler({ context: 'staging' }, ctx);
    expect(first).toEqual({
      ok: true,
      value: { selected: 'staging', previous: null, summary: 'Selected context staging.' },
    });

    const second = await selectContextTool.handler({ context: 'production' }, ctx);
    expect(second).toEqual({
      ok: true,
      value: { selected: 'production', previous: 'staging', summary: 'Switched context from staging to production.' },
    });
    expect(ctx.contexts.current()).toEqual({ selected: true, name: 'production' });
  });

  it('rejects a name kubeconfig does not know and keeps the selection', async () => {
    const ctx = createTestContext({ runner: kubeconfigRunner(['staging', 'production']), selected: 'staging' });

    const result = await selectContextTool.handler({ context: 'prod' }, ctx);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBe("Context 'prod' not found. Available contexts: staging, production");
    expect(failureKind(result)).toBe('NotFound');
    expect(ctx.contexts.current()).toEqual({ selected: true, name: 'staging' });
  });

  it('never runs kubectl config use-context', async () => {
    const runner = kubeconfigRunner(['staging']);
    const ctx = createTestContext({ runner });

    await selectContextTool.handler({ context: 'staging' }, ctx);

    expect(runner.commandLines().some((line) => line.includes('use-context'))).toBe(false);
  });

  it('trims the requested name during parsing', () => {
    expect(selectContextTool.parse({ context: '  staging ' })).toEqual({ context: 'staging' });
    expect(() => selectContextTool.parse({ context: '' })).toThrow();
  });
});
