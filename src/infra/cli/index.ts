export type { CliCommand } from './types';
export { kubectl, createKubectlCli, type KubectlCli, type DryRunMode } from './kubectl';
export { helm, createHelmCli, type HelmCli } from './helm';
export { kubeconform, createKubeconformCli, type KubeconformCli } from './kubeconform';
export { flux, createFluxCli, type FluxCli } from './flux';
