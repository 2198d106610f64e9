import type { CliCommand } from './types';

export interface KubeconformOptions {
  kubernetesVersion: string;
  strict: boolean;
  /** Extra schema locations; the default catalogue is always searched too */
  schemaLocations: readonly string[];
}

/**
 * Argument builders for kubeconform. Documents are always read from stdin,
 * one run per document, and results come back as JSON.
 */
export interface KubeconformCli {
  readonly program: string;
  validate(options: KubeconformOptions): CliCommand;
  version(): CliCommand;
}

export function createKubeconformCli(program = 'kubeconform'): KubeconformCli {
  return {
    program,
    validate: (options) => {
      const args = ['-output', 'json', '-summary=false', '-ignore-missing-schemas'];
      if (options.strict) {
        args.push('-strict');
      }
      args.push('-kubernetes-version', options.kubernetesVersion);
      if (options.schemaLocations.length > 0) {
        args.push('-schema-location', 'default');
        for (const location of options.schemaLocations) {
          args.push('-schema-location', location);
        }
      }
      args.push('-');
      return { program, args };
    },
    version: () => ({ program, args: ['-v'] }),
  };
}

export const kubeconform = createKubeconformCli();
