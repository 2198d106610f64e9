import { describe, it, expect } from '@jest/globals';
import { defaultConfig, loadConfig } from '@/config/index';

describe('loadConfig', () => {
  it('applies defaults in milliseconds', () => {
    expect(defaultConfig()).toEqual({
      logLevel: 'info',
      timeouts: { kubectl: 60000, helm: 60000, flux: 60000, kubeconform: 120000 },
      killGracePeriodMs: 5000,
      schemaLocations: [],
      outputFormat: 'natural-language',
    });
  });

  it('reads overrides from the environment', () => {
    const result = loadConfig({
      LOG_LEVEL: 'debug',
      KUBE_PREFLIGHT_KUBECTL_TIMEOUT: '30',
      KUBE_PREFLIGHT_KILL_GRACE: '0.5',
      KUBE_PREFLIGHT_SCHEMA_LOCATIONS: ' /schemas/crds , ,https://schemas.example.test/{{.ResourceKind}}.json',
      KUBE_PREFLIGHT_OUTPUT_FORMAT: 'json',
      UNRELATED: 'ignored',
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.logLevel).toBe('debug');
    expect(result.value.timeouts.kubectl).toBe(30000);
    expect(result.value.timeouts.helm).toBe(60000);
    expect(result.value.killGracePeriodMs).toBe(500);
    expect(result.value.schemaLocations).toEqual(['/schemas/crds', 'https://schemas.example.test/{{.ResourceKind}}.json']);
    expect(result.value.outputFormat).toBe('json');
  });

  it('rejects malformed values', () => {
    const result = loadConfig({ KUBE_PREFLIGHT_HELM_TIMEOUT: 'soon', LOG_LEVEL: 'loud' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toContain('Invalid configuration:');
    expect(result.error).toContain('KUBE_PREFLIGHT_HELM_TIMEOUT');
    expect(result.error).toContain('LOG_LEVEL');
  });

  it('rejects non-positive timeouts', () => {
    expect(loadConfig({ KUBE_PREFLIGHT_FLUX_TIMEOUT: '0' }).ok).toBe(false);
  });
});
