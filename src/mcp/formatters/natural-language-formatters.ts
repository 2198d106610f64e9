/**
 * Natural Language Formatters
 * Tool-specific narrative formatters for human-friendly output
 *
 * @module mcp/formatters/natural-language-formatters
 *
 * @description
 * Validation reports are rendered in the fixed text layout produced by the
 * aggregator, so the agent and a human reading the transcript see the same
 * verdict lines. Context tools get short narratives of their own.
 */

import { CHAINHINTSMODE, type ChainHintsMode } from '@/app/orchestrator-types';
import { renderReport } from '@/validation/aggregator';
import type { ValidationReport } from '@/validation/types';
import type { ListContextsResult } from '@/tools/list-contexts/tool';
import type { SelectContextResult } from '@/tools/select-context/tool';
import type { CheckReconcilerResult } from '@/tools/check-reconciler/tool';

/**
 * Fields the orchestrator may add to any object result
 */
interface WithNextSteps {
  nextSteps?: string;
}

function appendNextSteps(parts: string[], result: WithNextSteps, chainHintsMode: ChainHintsMode): void {
  if (chainHintsMode === CHAINHINTSMODE.ENABLED && result.nextSteps) {
    parts.push('', `Next Steps: ${result.nextSteps}`);
  }
}

/**
 * Format a validation report: the full text report, then next steps
 */
export function formatValidationReportNarrative(
  report: ValidationReport & WithNextSteps,
  chainHintsMode: ChainHintsMode = CHAINHINTSMODE.ENABLED,
): string {
  const parts = [renderReport(report)];
  appendNextSteps(parts, report, chainHintsMode);
  return parts.join('\n');
}

/**
 * Format list-contexts result as natural language narrative
 */
export function formatListContextsNarrative(
  result: ListContextsResult & WithNextSteps,
  chainHintsMode: ChainHintsMode = CHAINHINTSMODE.ENABLED,
): string {
  const parts: string[] = ['Available contexts:'];

  if (result.contexts.length === 0) {
    parts.push('  (none found in kubeconfig)');
  }
  for (const name of result.contexts) {
    const markers = [
      name === result.selected ? 'selected' : undefined,
      name === result.cliCurrent ? 'kubeconfig current-context' : undefined,
    ].filter((marker): marker is string => marker !== undefined);
    parts.push(markers.length > 0 ? `  - ${name} (${markers.join(', ')})` : `  - ${name}`);
  }

  parts.push('', `Selected context: ${result.selected ?? '(none)'}`);
  appendNextSteps(parts, result, chainHintsMode);
  return parts.join('\n');
}

/**
 * Format select-context result as natural language narrative
 */
export function formatSelectContextNarrative(
  result: SelectContextResult & WithNextSteps,
  chainHintsMode: ChainHintsMode = CHAINHINTSMODE.ENABLED,
): string {
  const parts = [`Context selected: ${result.selected}`];
  if (result.previous !== null && result.previous !== result.selected) {
    parts.push(`Previous context: ${result.previous}`);
  }
  parts.push('Cluster validations now run against this context. kubeconfig was not modified.');
  appendNextSteps(parts, result, chainHintsMode);
  return parts.join('\n');
}

/**
 * Format check-reconciler result as natural language narrative
 */
export function formatCheckReconcilerNarrative(
  result: CheckReconcilerResult & WithNextSteps,
  chainHintsMode: ChainHintsMode = CHAINHINTSMODE.ENABLED,
): string {
  const parts = [
    `Flux Check: ${result.healthy ? 'HEALTHY' : 'UNHEALTHY'}`,
    `Context: ${result.context}`,
  ];
  if (!result.healthy && result.outcome.errorKind) {
    parts.push(`Status: ${result.outcome.status} (${result.outcome.errorKind})`);
  }
  if (result.output) {
    parts.push('', result.output);
  }
  appendNextSteps(parts, result, chainHintsMode);
  return parts.join('\n');
}
