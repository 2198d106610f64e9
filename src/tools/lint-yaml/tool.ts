/**
 * Lint YAML Tool
 *
 * Local syntax check: parse errors, duplicate keys and tab characters.
 */

import type { Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { tool } from '@/types/tool';
import { normalizePath } from '@/lib/path-utils';
import { setupToolContext } from '@/lib/tool-helpers';
import { lintYaml } from '@/validation/pipelines/yaml-syntax';
import type { ValidationReport } from '@/validation/types';
import { lintYamlSchema, type LintYamlParams } from './schema';

async function handleLintYaml(input: LintYamlParams, ctx: ToolContext): Promise<Result<ValidationReport>> {
  const { timer } = setupToolContext(ctx, 'lint-yaml');
  const result = await lintYaml(normalizePath(input.path), ctx);
  if (result.ok) {
    timer.end({ files: result.value.entries.length, ok: result.value.ok });
  } else {
    timer.error(result.error);
  }
  return result;
}

export default tool({
  name: 'lint-yaml',
  description: 'Check YAML files for syntax errors, duplicate keys and tab characters without contacting a cluster',
  category: 'offline',
  version: '1.0.0',
  schema: lintYamlSchema,
  requiresContext: false,
  chainHints: {
    success: 'YAML is well formed. Run validate-schema or validate-manifest next.',
    failure: 'Fix the reported syntax errors and run lint-yaml again.',
  },
  handler: handleLintYaml,
});
