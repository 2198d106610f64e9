/**
 * Helpers shared by the render-then-validate pipelines
 */

import type { ToolInvocationResult } from '@/infra/process/runner';
import { classifyInvocation, describeInvocationFailure, errorStage } from '../classifier';
import type { EntryInput } from '../aggregator';
import type { DiscoveredItem, StageOutcome } from '../types';

/**
 * The single artifact entry a report carries when rendering or building
 * failed: one ERROR stage and no dry-run stages.
 */
export function preStageFailureEntry(
  artifactPath: string,
  stage: string,
  result: ToolInvocationResult,
): EntryInput {
  const kind = classifyInvocation(result);
  const cause = kind === 'Timeout' || kind === 'NotFound' ? `${kind}: ` : '';
  return {
    subject: { type: 'artifact', path: artifactPath },
    stages: [errorStage(stage, 'PreStageFailure', `${cause}${describeInvocationFailure(result)}`)],
  };
}

export function renderedStage(stage: string, items: readonly DiscoveredItem[], warnings: string[] = []): StageOutcome {
  const count = items.filter((item) => item.type === 'document').length;
  const outcome: StageOutcome = {
    stage,
    status: 'PASS',
    message: `${count} ${count === 1 ? 'resource' : 'resources'}`,
  };
  if (warnings.length > 0) {
    outcome.warnings = warnings;
  }
  return outcome;
}
