/**
 * Check Reconciler Tool
 *
 * Runs `flux check` against the selected context and reports whether the
 * Flux controllers and their prerequisites are healthy.
 */

import { Success, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { setupToolContext } from '@/lib/tool-helpers';
import { checkReconciler, type ReconcilerHealth } from '@/validation/pipelines/reconciler';
import { checkReconcilerSchema, type CheckReconcilerParams } from './schema';

export interface CheckReconcilerResult extends ReconcilerHealth {
  summary: string;
}

async function handleCheckReconciler(
  _input: CheckReconcilerParams,
  ctx: ToolContext,
): Promise<Result<CheckReconcilerResult>> {
  const { timer } = setupToolContext(ctx, 'check-reconciler');
  const result = await checkReconciler(ctx);
  if (!result.ok) {
    timer.error(result.error);
    return result;
  }

  const health = result.value;
  timer.end({ healthy: health.healthy });
  return Success({
    ...health,
    summary: health.healthy
      ? `Flux is healthy on ${health.context}.`
      : `Flux check ${health.outcome.status} on ${health.context}: ${health.outcome.message}`,
  });
}

export default tool({
  name: 'check-reconciler',
  description: 'Run flux check against the selected context and report controller health',
  category: 'reconciler',
  version: '1.0.0',
  schema: checkReconcilerSchema,
  requiresContext: true,
  chainHints: {
    success: 'Run reconciler-status to see the readiness of each Flux resource.',
    failure: 'Inspect the flux check output above; controllers or CRDs may be missing.',
  },
  handler: handleCheckReconciler,
});
