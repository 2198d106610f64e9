/**
 * Validate Schema Tool
 *
 * Offline schema validation with kubeconform. Works without a cluster or a
 * selected context.
 */

import type { Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { normalizePath } from '@/lib/path-utils';
import { setupToolContext } from '@/lib/tool-helpers';
import { validateSchemas } from '@/validation/pipelines/schema';
import type { ValidationReport } from '@/validation/types';
import { validateSchemaSchema, type ValidateSchemaParams } from './schema';

async function handleValidateSchema(
  input: ValidateSchemaParams,
  ctx: ToolContext,
): Promise<Result<ValidationReport>> {
  const { timer } = setupToolContext(ctx, 'validate-schema');
  const result = await validateSchemas(
    {
      path: normalizePath(input.path),
      kubernetesVersion: input.kubernetesVersion,
      strict: input.strict,
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
  name: 'validate-schema',
  description:
    'Validate manifests against Kubernetes JSON schemas with kubeconform. Runs offline and needs no selected context',
  category: 'offline',
  version: '1.0.0',
  schema: validateSchemaSchema,
  requiresContext: false,
  chainHints: {
    success: 'Schemas are valid. Select a context and run validate-manifest for a server-side check.',
    failure: 'Fix the fields reported by kubeconform and run validate-schema again.',
  },
  handler: handleValidateSchema,
});
