/**
 * Toolchain health checks
 *
 * Probes each external CLI the validators depend on with a version call.
 * A missing tool only disables the operations that need it, so checks
 * report availability instead of failing.
 */

import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '@/config/constants';
import type { ToolRunner } from '@/infra/process/runner';
import type { CliCommand } from '@/infra/cli/types';
import { kubectl } from '@/infra/cli/kubectl';
import { helm } from '@/infra/cli/helm';
import { flux } from '@/infra/cli/flux';
import { kubeconform } from '@/infra/cli/kubeconform';
import { classifyInvocation, describeInvocationFailure } from '@/validation/classifier';

export interface DependencyStatus {
  available: boolean;
  version?: string;
  error?: string;
}

export type ToolchainStatus = Record<'kubectl' | 'helm' | 'flux' | 'kubeconform', DependencyStatus>;

async function probe(runner: ToolRunner, command: CliCommand, logger: Logger): Promise<DependencyStatus> {
  const result = await runner.run({ ...command, timeoutMs: DEFAULT_TIMEOUTS.versionCheck * 1000 });
  if (classifyInvocation(result) !== null) {
    const error = describeInvocationFailure(result);
    logger.debug({ program: command.program, error }, 'Tool unavailable');
    return { available: false, error };
  }
  const version = (result.stdout.trim() || result.stderr.trim()).split(/\r?\n/)[0];
  return version ? { available: true, version } : { available: true };
}

export async function checkToolchain(runner: ToolRunner, logger: Logger): Promise<ToolchainStatus> {
  const [kubectlStatus, helmStatus, fluxStatus, kubeconformStatus] = await Promise.all([
    probe(runner, kubectl.clientVersion(), logger),
    probe(runner, helm.version(), logger),
    probe(runner, flux.version(), logger),
    probe(runner, kubeconform.version(), logger),
  ]);
  return {
    kubectl: kubectlStatus,
    helm: helmStatus,
    flux: fluxStatus,
    kubeconform: kubeconformStatus,
  };
}
