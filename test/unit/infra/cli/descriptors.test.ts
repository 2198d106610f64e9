import { describe, it, expect } from '@jest/globals';
import { createKubectlCli, kubectl } from '@/infra/cli/kubectl';
import { helm } from '@/infra/cli/helm';
import { kubeconform } from '@/infra/cli/kubeconform';
import { flux } from '@/infra/cli/flux';

describe('kubectl descriptor', () => {
  it('pins the context on dry-run applies', () => {
    expect(kubectl.dryRunApply('staging', 'client')).toEqual({
      program: 'kubectl',
      args: ['--context', 'staging', 'apply', '--dry-run=client', '-f', '-'],
    });
    expect(kubectl.dryRunApply('staging', 'server').args).toEqual([
      '--context',
      'staging',
      'apply',
      '--dry-run=server',
      '-f',
      '-',
    ]);
  });

  it('builds overlays with kubectl kustomize', () => {
    expect(kubectl.kustomize('prod', '/repo/overlays/prod').args).toEqual([
      '--context',
      'prod',
      'kustomize',
      '/repo/overlays/prod',
    ]);
  });

  it('reads contexts without changing kubeconfig', () => {
    expect(kubectl.listContexts().args).toEqual(['config', 'get-contexts', '-o', 'name']);
    expect(kubectl.currentContext().args).toEqual(['config', 'current-context']);
  });

  it('accepts a custom program path', () => {
    expect(createKubectlCli('/opt/bin/kubectl').clientVersion()).toEqual({
      program: '/opt/bin/kubectl',
      args: ['version', '--client'],
    });
  });
});

describe('helm descriptor', () => {
  it('lints with an optional values file and the kube context', () => {
    expect(helm.lint('/charts/web', { kubeContext: 'staging' }).args).toEqual([
      'lint',
      '/charts/web',
      '--kube-context',
      'staging',
    ]);
    expect(helm.lint('/charts/web', { kubeContext: 'staging', valuesFile: '/charts/web/prod.yaml' }).args).toEqual([
      'lint',
      '/charts/web',
      '-f',
      '/charts/web/prod.yaml',
      '--kube-context',
      'staging',
    ]);
  });

  it('renders with release name, values and namespace', () => {
    expect(
      helm.template('web', '/charts/web', {
        kubeContext: 'staging',
        valuesFile: '/values.yaml',
        namespace: 'apps',
      }).args,
    ).toEqual([
      'template',
      'web',
      '/charts/web',
      '-f',
      '/values.yaml',
      '--namespace',
      'apps',
      '--kube-context',
      'staging',
    ]);
  });
});

describe('kubeconform descriptor', () => {
  it('reads one document from stdin with JSON output', () => {
    expect(kubeconform.validate({ kubernetesVersion: 'master', strict: false, schemaLocations: [] }).args).toEqual([
      '-output',
      'json',
      '-summary=false',
      '-ignore-missing-schemas',
      '-kubernetes-version',
      'master',
      '-',
    ]);
  });

  it('keeps the default schema catalogue when extra locations are given', () => {
    expect(
      kubeconform.validate({
        kubernetesVersion: '1.29.0',
        strict: true,
        schemaLocations: ['https://schemas.example.test/{{.ResourceKind}}.json'],
      }).args,
    ).toEqual([
      '-output',
      'json',
      '-summary=false',
      '-ignore-missing-schemas',
      '-strict',
      '-kubernetes-version',
      '1.29.0',
      '-schema-location',
      'default',
      '-schema-location',
      'https://schemas.example.test/{{.ResourceKind}}.json',
      '-',
    ]);
  });
});

describe('flux descriptor', () => {
  it('targets the context for check and get', () => {
    expect(flux.check('staging').args).toEqual(['--context', 'staging', 'check']);
    expect(flux.getAll('staging').args).toEqual(['--context', 'staging', 'get', 'all', '-A']);
  });
});
