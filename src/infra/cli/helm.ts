import type { CliCommand } from './types';

export interface HelmLintOptions {
  kubeContext: string;
  valuesFile?: string;
}

export interface HelmTemplateOptions extends HelmLintOptions {
  namespace?: string;
}

/**
 * Argument builders for helm. Both lint and template are given the selected
 * context via `--kube-context` so capability lookups hit the right cluster.
 */
export interface HelmCli {
  readonly program: string;
  lint(chartPath: string, options: HelmLintOptions): CliCommand;
  template(releaseName: string, chartPath: string, options: HelmTemplateOptions): CliCommand;
  version(): CliCommand;
}

function valuesArgs(valuesFile: string | undefined): string[] {
  return valuesFile ? ['-f', valuesFile] : [];
}

export function createHelmCli(program = 'helm'): HelmCli {
  return {
    program,
    lint: (chartPath, options) => ({
      program,
      args: [
        'lint',
        chartPath,
        ...valuesArgs(options.valuesFile),
        '--kube-context',
        options.kubeContext,
      ],
    }),
    template: (releaseName, chartPath, options) => ({
      program,
      args: [
        'template',
        releaseName,
        chartPath,
        ...valuesArgs(options.valuesFile),
        ...(options.namespace ? ['--namespace', options.namespace] : []),
        '--kube-context',
        options.kubeContext,
      ],
    }),
    version: () => ({ program, args: ['version', '--short'] }),
  };
}

export const helm = createHelmCli();
