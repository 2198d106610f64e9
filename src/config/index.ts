/**
 * Runtime configuration loaded from the environment
 */

import { z } from 'zod';
import { DEFAULT_TIMEOUTS, ENV_VARS } from './constants';
import { Failure, Success, type Result } from '@/types';

const seconds = (fallback: number): z.ZodDefault<z.ZodNumber> =>
  z.coerce.number().positive().default(fallback);

const envSchema = z.object({
  [ENV_VARS.LOG_LEVEL]: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  [ENV_VARS.KUBECTL_TIMEOUT]: seconds(DEFAULT_TIMEOUTS.kubectl),
  [ENV_VARS.HELM_TIMEOUT]: seconds(DEFAULT_TIMEOUTS.helm),
  [ENV_VARS.FLUX_TIMEOUT]: seconds(DEFAULT_TIMEOUTS.flux),
  [ENV_VARS.KUBECONFORM_TIMEOUT]: seconds(DEFAULT_TIMEOUTS.kubeconform),
  [ENV_VARS.KILL_GRACE]: seconds(DEFAULT_TIMEOUTS.killGrace),
  [ENV_VARS.SCHEMA_LOCATIONS]: z.string().optional(),
  [ENV_VARS.OUTPUT_FORMAT]: z
    .enum(['json', 'text', 'markdown', 'natural-language'])
    .default('natural-language'),
});

/**
 * Per-tool subprocess timeouts in milliseconds
 */
export interface TimeoutConfig {
  kubectl: number;
  helm: number;
  flux: number;
  kubeconform: number;
}

export interface AppConfig {
  logLevel: string;
  timeouts: TimeoutConfig;
  /** Grace window between SIGTERM and SIGKILL, in milliseconds */
  killGracePeriodMs: number;
  /** Extra `-schema-location` values passed to kubeconform */
  schemaLocations: string[];
  outputFormat: 'json' | 'text' | 'markdown' | 'natural-language';
}

const toMs = (value: number): number => Math.round(value * 1000);

/**
 * Validate and load configuration from environment variables.
 * Unknown variables are ignored; malformed known ones fail.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    return Failure(`Invalid configuration: ${issues}`, {
      message: 'Environment configuration is invalid',
      hint: 'Timeouts are numbers of seconds; the log level must be a pino level',
      resolution: `Fix or unset the listed variables: ${issues}`,
    });
  }

  const vars = parsed.data;
  const schemaLocations = (vars[ENV_VARS.SCHEMA_LOCATIONS] ?? '')
    .split(',')
    .map((location) => location.trim())
    .filter((location) => location.length > 0);

  return Success({
    logLevel: vars[ENV_VARS.LOG_LEVEL],
    timeouts: {
      kubectl: toMs(vars[ENV_VARS.KUBECTL_TIMEOUT]),
      helm: toMs(vars[ENV_VARS.HELM_TIMEOUT]),
      flux: toMs(vars[ENV_VARS.FLUX_TIMEOUT]),
      kubeconform: toMs(vars[ENV_VARS.KUBECONFORM_TIMEOUT]),
    },
    killGracePeriodMs: toMs(vars[ENV_VARS.KILL_GRACE]),
    schemaLocations,
    outputFormat: vars[ENV_VARS.OUTPUT_FORMAT],
  });
}

/**
 * Defaults with no environment influence; used by tests and embedders
 */
export function defaultConfig(): AppConfig {
  const result = loadConfig({});
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.value;
}
