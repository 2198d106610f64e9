/**
 * Error Classifier
 *
 * Closed taxonomy for everything that can go wrong during a validation run,
 * and the single mapping from external tool outcomes onto it. Pipelines never
 * inspect exit codes themselves.
 */

import { Failure, type ErrorGuidance, type Result } from '@/types';
import { LIMITS, NOT_FOUND_EXIT_CODE } from '@/config/constants';
import type { ToolInvocationResult } from '@/infra/process/runner';
import type { StageOutcome } from './types';

export const ERROR_KINDS = [
  'NotFound',
  'Unselected',
  'ParseError',
  'ToolFailure',
  'Timeout',
  'PreStageFailure',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

const GUIDANCE: Record<ErrorKind, Required<Pick<ErrorGuidance, 'hint' | 'resolution'>>> = {
  NotFound: {
    hint: 'A path, chart, overlay, context or executable does not exist',
    resolution: 'Check the path or name, and that kubectl, helm, flux and kubeconform are on PATH',
  },
  Unselected: {
    hint: 'Cluster-facing validation needs an explicitly selected context',
    resolution: 'Call list-contexts, then select-context with one of the listed names',
  },
  ParseError: {
    hint: 'The YAML could not be parsed',
    resolution: 'Fix the syntax at the reported line and column',
  },
  ToolFailure: {
    hint: 'The external tool rejected the input',
    resolution: 'Read the tool output in the message and fix the manifest, chart or overlay',
  },
  Timeout: {
    hint: 'The external tool did not finish within its time limit',
    resolution: 'Check cluster reachability, or raise the matching KUBE_PREFLIGHT_*_TIMEOUT',
  },
  PreStageFailure: {
    hint: 'Rendering or building the artifact failed before any dry-run',
    resolution: 'Fix the render error (helm lint/template or kustomize build) and retry',
  },
};

export function isErrorKind(value: unknown): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

/**
 * Map a finished invocation onto the taxonomy; null means success.
 * A timeout wins over whatever exit code the killed process produced.
 */
export function classifyInvocation(result: ToolInvocationResult): ErrorKind | null {
  if (result.timedOut) return 'Timeout';
  if (result.exitCode === 0) return null;
  if (result.exitCode === NOT_FOUND_EXIT_CODE) return 'NotFound';
  return 'ToolFailure';
}

export function truncateMessage(message: string): string {
  if (message.length <= LIMITS.MAX_MESSAGE_CHARS) {
    return message;
  }
  return `${message.slice(0, LIMITS.MAX_MESSAGE_CHARS)}\n... (truncated)`;
}

/**
 * Human-readable reason an invocation did not succeed
 */
export function describeInvocationFailure(result: ToolInvocationResult): string {
  switch (classifyInvocation(result)) {
    case 'Timeout':
      return `${result.program} timed out after ${Math.round(result.durationMs / 1000)}s: ${result.command}`;
    case 'NotFound': {
      const reason = result.stderr.trim();
      return reason
        ? `${result.program} not found or could not be started: ${reason}`
        : `${result.program} not found or could not be started`;
    }
    default: {
      const output = result.stderr.trim() || result.stdout.trim();
      return truncateMessage(output || `${result.command} exited with code ${result.exitCode}`);
    }
  }
}

/**
 * Stage outcome for one invocation: exit 0 is PASS, a rejected input is
 * FAIL, and a tool that never produced a verdict is ERROR.
 */
export function stageFromInvocation(
  stage: string,
  result: ToolInvocationResult,
  warnings: string[] = [],
): StageOutcome {
  const kind = classifyInvocation(result);
  const outcome: StageOutcome =
    kind === null
      ? { stage, status: 'PASS', message: '' }
      : {
          stage,
          status: kind === 'ToolFailure' ? 'FAIL' : 'ERROR',
          message: describeInvocationFailure(result),
          errorKind: kind,
        };
  if (warnings.length > 0) {
    outcome.warnings = warnings;
  }
  return outcome;
}

export function errorStage(stage: string, kind: ErrorKind, message: string): StageOutcome {
  return { stage, status: 'ERROR', message, errorKind: kind };
}

export function skippedStage(stage: string, message: string): StageOutcome {
  return { stage, status: 'SKIPPED', message };
}

/**
 * Failure carrying kind-specific guidance and `details.kind`
 */
export function classifiedFailure(
  kind: ErrorKind,
  message: string,
  details: Record<string, unknown> = {},
): Result<never> {
  return Failure(message, {
    message,
    hint: GUIDANCE[kind].hint,
    resolution: GUIDANCE[kind].resolution,
    details: { ...details, kind },
  });
}

/**
 * Recover the error kind recorded on a classified Failure
 */
export function failureKind(result: Result<unknown>): ErrorKind | undefined {
  if (result.ok) return undefined;
  const kind = result.guidance?.details?.kind;
  return isErrorKind(kind) ? kind : undefined;
}
