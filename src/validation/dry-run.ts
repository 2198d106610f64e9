/**
 * Dry-run tail shared by the manifest, overlay and chart pipelines.
 *
 * Each document goes through a client dry-run and, only when that passes,
 * a server dry-run. Documents are processed one at a time in discovery
 * order, and every invocation reads the selected context when it starts.
 */

import type { ToolContext } from '@/core/context';
import { kubectl, type DryRunMode } from '@/infra/cli/kubectl';
import { ERROR_MESSAGES } from '@/lib/errors';
import { errorStage, skippedStage, stageFromInvocation } from './classifier';
import type { EntryInput } from './aggregator';
import type { DiscoveredItem, ManifestDocument, StageOutcome } from './types';

export const STAGES = {
  CLIENT_DRY_RUN: 'Client dry-run',
  SERVER_DRY_RUN: 'Server dry-run',
  PARSE: 'Parse',
} as const;

export const SERVER_SKIPPED_MESSAGE = 'Skipped: client dry-run did not pass';

const STAGE_BY_MODE: Record<DryRunMode, string> = {
  client: STAGES.CLIENT_DRY_RUN,
  server: STAGES.SERVER_DRY_RUN,
};

/**
 * Deprecation notices and `Warning:` lines the API server attaches to an
 * otherwise successful apply
 */
export function extractWarnings(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => /^warning:/i.test(line) || /\bdeprecated\b/i.test(line))
    .map((line) => line.replace(/^warning:\s*/i, ''));
}

async function runDryRun(
  document: ManifestDocument,
  mode: DryRunMode,
  context: ToolContext,
): Promise<StageOutcome> {
  const stage = STAGE_BY_MODE[mode];
  const selection = context.contexts.current();
  if (!selection.selected) {
    return errorStage(stage, 'Unselected', ERROR_MESSAGES.NO_CONTEXT_SELECTED);
  }

  const result = await context.runner.run({
    ...kubectl.dryRunApply(selection.name, mode),
    input: document.raw,
    timeoutMs: context.config.timeouts.kubectl,
  });
  const warnings = mode === 'server' ? extractWarnings(`${result.stdout}\n${result.stderr}`) : [];
  return stageFromInvocation(stage, result, warnings);
}

/**
 * Client then server dry-run for one document
 */
export async function dryRunDocument(
  document: ManifestDocument,
  context: ToolContext,
): Promise<StageOutcome[]> {
  const client = await runDryRun(document, 'client', context);
  if (client.status !== 'PASS') {
    return [client, skippedStage(STAGES.SERVER_DRY_RUN, SERVER_SKIPPED_MESSAGE)];
  }
  const server = await runDryRun(document, 'server', context);
  return [client, server];
}

/**
 * Report entries for discovered items: parse errors become a single ERROR
 * stage, documents go through the dry-run tail.
 */
export async function dryRunItems(
  items: readonly DiscoveredItem[],
  context: ToolContext,
): Promise<EntryInput[]> {
  const entries: EntryInput[] = [];

  for (const item of items) {
    if (item.type === 'error') {
      entries.push({
        subject: { type: 'document', source: item.source, index: item.index },
        stages: [errorStage(STAGES.PARSE, item.kind, item.message)],
      });
      continue;
    }

    context.logger.debug(
      { source: item.source, index: item.index, label: item.label },
      'Dry-running document',
    );
    entries.push({
      subject: documentSubject(item),
      stages: await dryRunDocument(item, context),
    });
  }

  return entries;
}

export function documentSubject(document: ManifestDocument): EntryInput['subject'] {
  return document.label
    ? { type: 'document', source: document.source, index: document.index, label: document.label }
    : { type: 'document', source: document.source, index: document.index };
}
