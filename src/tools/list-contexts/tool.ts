/**
 * List Contexts Tool
 *
 * Lists the kubeconfig contexts available for selection, together with
 * kubeconfig's own current-context and the context this server has selected.
 * Reads kubeconfig through kubectl; never changes it.
 */

import { Success, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { setupToolContext } from '@/lib/tool-helpers';
import { selectionName } from '@/session/context-store';
import { listContextsSchema, type ListContextsParams } from './schema';

export interface ListContextsResult {
  contexts: string[];
  /** kubeconfig's current-context; informational only */
  cliCurrent: string | null;
  /** Context validations run against; null until select-context is called */
  selected: string | null;
  summary: string;
}

export function summarizeContexts(result: Omit<ListContextsResult, 'summary'>): string {
  const count = `Found ${result.contexts.length} ${result.contexts.length === 1 ? 'context' : 'contexts'}`;
  const current = result.cliCurrent ? ` (kubeconfig current-context: ${result.cliCurrent})` : '';
  const selected = result.selected
    ? `Selected: ${result.selected}.`
    : 'No context selected; call select-context before cluster validations.';
  return `${count}${current}. ${selected}`;
}

async function handleListContexts(
  _input: ListContextsParams,
  ctx: ToolContext,
): Promise<Result<ListContextsResult>> {
  const { timer } = setupToolContext(ctx, 'list-contexts');

  const available = await ctx.contexts.listAvailable();
  if (!available.ok) {
    timer.error(available.error);
    return available;
  }

  const base = {
    contexts: available.value.contexts,
    cliCurrent: available.value.cliCurrent,
    selected: selectionName(ctx.contexts.current()),
  };
  timer.end({ contexts: base.contexts.length });
  return Success({ ...base, summary: summarizeContexts(base) });
}

export default tool({
  name: 'list-contexts',
  description:
    'List kubeconfig contexts available for validation, the kubeconfig current-context, and the context currently selected on this server',
  category: 'context',
  version: '1.0.0',
  schema: listContextsSchema,
  requiresContext: false,
  chainHints: {
    success: 'Call select-context with the context that the manifests should be validated against.',
    failure: 'Make sure kubectl is installed and a kubeconfig is present.',
  },
  handler: handleListContexts,
});
