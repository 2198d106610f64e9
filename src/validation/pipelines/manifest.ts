/**
 * Raw manifest pipeline: discover documents under a path and dry-run each
 * against the selected context.
 */

import { Success, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { requireContext } from '@/session/context-store';
import { discoverManifests } from '../discovery';
import { dryRunItems } from '../dry-run';
import { buildReport } from '../aggregator';
import type { ValidationReport } from '../types';

export const MANIFEST_REPORT_TITLE = 'Manifest Dry-Run Validation';

export async function validateManifests(
  target: string,
  context: ToolContext,
): Promise<Result<ValidationReport>> {
  const selected = requireContext(context.contexts);
  if (!selected.ok) return selected;

  const discovered = await discoverManifests(target);
  if (!discovered.ok) return discovered;

  context.logger.info(
    { path: target, items: discovered.value.length, context: selected.value },
    'Validating manifests',
  );

  const entries = await dryRunItems(discovered.value, context);

  return Success(
    buildReport({
      pipeline: 'raw-manifest',
      title: MANIFEST_REPORT_TITLE,
      context: selected.value,
      target: { label: 'Path', value: target },
      entries,
    }),
  );
}
