/**
 * Application Constants and Defaults
 *
 * Consolidated configuration values for the entire application.
 */

/**
 * Default timeout values in seconds, overridable through the environment
 */
export const DEFAULT_TIMEOUTS = {
  /** kubectl calls (dry-run, kustomize, config queries): 60 seconds. */
  kubectl: 60,
  /** helm lint / template: 60 seconds. */
  helm: 60,
  /** flux check / get: 60 seconds. */
  flux: 60,
  /** kubeconform may download schemas on first use: 2 minutes. */
  kubeconform: 120,
  /** Wait between SIGTERM and SIGKILL for a timed-out process. */
  killGrace: 5,
  /** Tool availability probes run by the health check. */
  versionCheck: 15,
} as const;

/**
 * Exit code reported when a program cannot be located or started
 */
export const NOT_FOUND_EXIT_CODE = 127;

/**
 * Validation limits
 */
export const LIMITS = {
  /** Maximum captured output per stream: 10MB */
  MAX_OUTPUT_BUFFER: 10 * 1024 * 1024,
  /** Characters of stderr kept in a stage message */
  MAX_MESSAGE_CHARS: 4000,
} as const;

/**
 * Recognized manifest file extensions
 */
export const MANIFEST_EXTENSIONS = ['.yaml', '.yml'] as const;

/**
 * Directory names never descended into during discovery
 */
export const IGNORED_DIRECTORIES = ['node_modules', '.git'] as const;

export const KUSTOMIZATION_FILENAMES = [
  'kustomization.yaml',
  'kustomization.yml',
  'Kustomization',
] as const;

export const CHART_FILENAMES = ['Chart.yaml', 'chart.yaml'] as const;

export const HELM = {
  /** Release name used by helm template when none is given */
  DEFAULT_RELEASE_NAME: 'release-name',
} as const;

export const KUBECONFORM = {
  /** Schema catalogue version used when no Kubernetes version is given */
  DEFAULT_KUBERNETES_VERSION: 'master',
} as const;

/**
 * Report rendering
 */
export const REPORT = {
  RULE: '='.repeat(50),
  ADVISORY_FAILED: 'DO NOT COMMIT - Fix errors first!',
  ADVISORY_PASSED: 'All validations passed. Safe to commit.',
  NO_DOCUMENTS: 'No documents found to validate.',
} as const;

/**
 * Environment variable names
 */
export const ENV_VARS = {
  LOG_LEVEL: 'LOG_LEVEL',
  KUBECTL_TIMEOUT: 'KUBE_PREFLIGHT_KUBECTL_TIMEOUT',
  HELM_TIMEOUT: 'KUBE_PREFLIGHT_HELM_TIMEOUT',
  FLUX_TIMEOUT: 'KUBE_PREFLIGHT_FLUX_TIMEOUT',
  KUBECONFORM_TIMEOUT: 'KUBE_PREFLIGHT_KUBECONFORM_TIMEOUT',
  KILL_GRACE: 'KUBE_PREFLIGHT_KILL_GRACE',
  SCHEMA_LOCATIONS: 'KUBE_PREFLIGHT_SCHEMA_LOCATIONS',
  OUTPUT_FORMAT: 'KUBE_PREFLIGHT_OUTPUT_FORMAT',
} as const;
