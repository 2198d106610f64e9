/**
 * Select Context Tool
 *
 * Selects the cluster context used by every later cluster-facing validation.
 * The name is checked against kubeconfig first; kubeconfig itself is left
 * untouched (no `kubectl config use-context`).
 */

import { Success, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { setupToolContext } from '@/lib/tool-helpers';
import { selectionName } from '@/session/context-store';
import { classifiedFailure } from '@/validation/classifier';
import { selectContextSchema, type SelectContextParams } from './schema';

export interface SelectContextResult {
  selected: string;
  /** Selection this call replaced */
  previous: string | null;
  summary: string;
}

async function handleSelectContext(
  input: SelectContextParams,
  ctx: ToolContext,
): Promise<Result<SelectContextResult>> {
  const { logger, timer } = setupToolContext(ctx, 'select-context');
  const { context } = input;

  const available = await ctx.contexts.listAvailable();
  if (!available.ok) {
    timer.error(available.error);
    return available;
  }

  const { contexts } = available.value;
  if (!contexts.includes(context)) {
    logger.warn({ context, available: contexts }, 'Rejected unknown context');
    const listing = contexts.length > 0 ? contexts.join(', ') : '(none)';
    return classifiedFailure('NotFound', `Context '${context}' not found. Available contexts: ${listing}`, {
      context,
      available: contexts,
    });
  }

  const previous = selectionName(ctx.contexts.select(context));
  timer.end({ context, previous });

  return Success({
    selected: context,
    previous,
    summary: previous && previous !== context
      ? `Switched context from ${previous} to ${context}.`
      : `Selected context ${context}.`,
  });
}

export default tool({
  name: 'select-context',
  description:
    'Select the kubeconfig context that cluster validations run against. Must be called before validate-manifest, validate-overlay, validate-chart, check-reconciler or reconciler-status',
  category: 'context',
  version: '1.0.0',
  schema: selectContextSchema,
  requiresContext: false,
  chainHints: {
    success: 'Validate artifacts with validate-manifest, validate-overlay or validate-chart.',
    failure: 'Call list-contexts and pick one of the listed names.',
  },
  handler: handleSelectContext,
});
