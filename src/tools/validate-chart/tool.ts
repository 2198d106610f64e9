/**
 * Validate Chart Tool
 *
 * Lints a Helm chart, renders it with `helm template` and dry-runs every
 * rendered resource against the selected cluster.
 */

import type { Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { normalizePath } from '@/lib/path-utils';
import { setupToolContext } from '@/lib/tool-helpers';
import { validateChart } from '@/validation/pipelines/chart';
import type { ValidationReport } from '@/validation/types';
import { validateChartSchema, type ValidateChartParams } from './schema';

async function handleValidateChart(
  input: ValidateChartParams,
  ctx: ToolContext,
): Promise<Result<ValidationReport>> {
  const { timer } = setupToolContext(ctx, 'validate-chart');
  const result = await validateChart(
    {
      chartPath: normalizePath(input.chartPath),
      valuesFile: input.valuesFile ? normalizePath(input.valuesFile) : undefined,
      namespace: input.namespace,
      releaseName: input.releaseName,
    },
    ctx,
  );
  if (result.ok) {
    timer.end({ entries: result.value.entries.length, ok: result.value.ok });
  } else {
    timer.error(result.error);
  }
  return result;
}

export default tool({
  name: 'validate-chart',
  description:
    'Validate a Helm chart: helm lint, helm template, then client and server dry-runs of every rendered resource against the selected context',
  category: 'cluster',
  version: '1.0.0',
  schema: validateChartSchema,
  requiresContext: true,
  chainHints: {
    success: 'The chart renders and validates. It is safe to commit.',
    failure: 'Fix the chart templates or values and run validate-chart again.',
  },
  handler: handleValidateChart,
});
