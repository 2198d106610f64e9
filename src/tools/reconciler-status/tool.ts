/**
 * Reconciler Status Tool
 *
 * Reports readiness of every Flux resource in every namespace of the
 * selected context.
 */

import type { Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { setupToolContext } from '@/lib/tool-helpers';
import { reconcilerStatus } from '@/validation/pipelines/reconciler';
import type { ValidationReport } from '@/validation/types';
import { reconcilerStatusSchema, type ReconcilerStatusParams } from './schema';

async function handleReconcilerStatus(
  _input: ReconcilerStatusParams,
  ctx: ToolContext,
): Promise<Result<ValidationReport>> {
  const { timer } = setupToolContext(ctx, 'reconciler-status');
  const result = await reconcilerStatus(ctx);
  if (result.ok) {
    timer.end({ resources: result.value.entries.length, ok: result.value.ok });
  } else {
    timer.error(result.error);
  }
  return result;
}

export default tool({
  name: 'reconciler-status',
  description: 'List Flux resources in all namespaces of the selected context with their readiness',
  category: 'reconciler',
  version: '1.0.0',
  schema: reconcilerStatusSchema,
  requiresContext: true,
  chainHints: {
    success: 'All listed Flux resources were reported; check any that are not ready.',
    failure: 'Run check-reconciler to verify the Flux installation.',
  },
  handler: handleReconcilerStatus,
});
