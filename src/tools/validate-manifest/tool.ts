/**
 * Validate Manifest Tool
 *
 * Dry-runs every YAML document under a path against the selected cluster:
 * client-side first, then server-side for documents that pass.
 */

import type { Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { normalizePath } from '@/lib/path-utils';
import { setupToolContext } from '@/lib/tool-helpers';
import { validateManifests } from '@/validation/pipelines/manifest';
import type { ValidationReport } from '@/validation/types';
import { validateManifestSchema, type ValidateManifestParams } from './schema';

async function handleValidateManifest(
  input: ValidateManifestParams,
  ctx: ToolContext,
): Promise<Result<ValidationReport>> {
  const { timer } = setupToolContext(ctx, 'validate-manifest');
  const result = await validateManifests(normalizePath(input.path), ctx);
  if (result.ok) {
    timer.end({ passed: result.value.passed, failed: result.value.failed, errored: result.value.errored });
  } else {
    timer.error(result.error);
  }
  return result;
}

export default tool({
  name: 'validate-manifest',
  description:
    'Validate Kubernetes manifests (a YAML file or a directory) with client and server dry-runs against the selected context',
  category: 'cluster',
  version: '1.0.0',
  schema: validateManifestSchema,
  requiresContext: true,
  chainHints: {
    success: 'Manifests are safe to commit. Run reconciler-status after they are applied.',
    failure: 'Fix the reported documents and run validate-manifest again.',
  },
  handler: handleValidateManifest,
});
