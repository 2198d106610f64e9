/**
 * Validate Overlay Tool
 *
 * Builds a kustomize overlay and dry-runs every rendered resource against
 * the selected cluster.
 */

import type { Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { normalizePath } from '@/lib/path-utils';
import { setupToolContext } from '@/lib/tool-helpers';
import { validateOverlay } from '@/validation/pipelines/overlay';
import type { ValidationReport } from '@/validation/types';
import { validateOverlaySchema, type ValidateOverlayParams } from './schema';

async function handleValidateOverlay(
  input: ValidateOverlayParams,
  ctx: ToolContext,
): Promise<Result<ValidationReport>> {
  const { timer } = setupToolContext(ctx, 'validate-overlay');
  const result = await validateOverlay(normalizePath(input.path), ctx);
  if (result.ok) {
    timer.end({ entries: result.value.entries.length, ok: result.value.ok });
  } else {
    timer.error(result.error);
  }
  return result;
}

export default tool({
  name: 'validate-overlay',
  description:
    'Build a Kustomize overlay with kubectl kustomize and validate every rendered resource with client and server dry-runs',
  category: 'cluster',
  version: '1.0.0',
  schema: validateOverlaySchema,
  requiresContext: true,
  chainHints: {
    success: 'The overlay renders and validates. It is safe to commit.',
    failure: 'Fix the kustomization or the failing resources and run validate-overlay again.',
  },
  handler: handleValidateOverlay,
});
