import type { CliCommand } from './types';

export type DryRunMode = 'client' | 'server';

/**
 * Argument builders for the kubectl operations the validators use.
 * Every cluster-facing command pins the context explicitly with
 * `--context` rather than relying on the kubeconfig's current-context.
 */
export interface KubectlCli {
  readonly program: string;
  /** Context names from kubeconfig, one per line */
  listContexts(): CliCommand;
  /** The kubeconfig's own current-context */
  currentContext(): CliCommand;
  /** Apply a document read from stdin without persisting it */
  dryRunApply(context: string, mode: DryRunMode): CliCommand;
  /** Build a kustomize overlay directory into a multi-document stream */
  kustomize(context: string, directory: string): CliCommand;
  clientVersion(): CliCommand;
}

export function createKubectlCli(program = 'kubectl'): KubectlCli {
  return {
    program,
    listContexts: () => ({ program, args: ['config', 'get-contexts', '-o', 'name'] }),
    currentContext: () => ({ program, args: ['config', 'current-context'] }),
    dryRunApply: (context, mode) => ({
      program,
      args: ['--context', context, 'apply', `--dry-run=${mode}`, '-f', '-'],
    }),
    kustomize: (context, directory) => ({
      program,
      args: ['--context', context, 'kustomize', directory],
    }),
    clientVersion: () => ({ program, args: ['version', '--client'] }),
  };
}

export const kubectl = createKubectlCli();
