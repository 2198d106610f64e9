/**
 * Offline schema pipeline: each document is checked against the Kubernetes
 * JSON schemas with kubeconform. Needs no cluster and no selected context.
 */

import { z } from 'zod';
import { Success, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { KUBECONFORM } from '@/config/constants';
import { kubeconform } from '@/infra/cli/kubeconform';
import type { ToolInvocationResult } from '@/infra/process/runner';
import { errorStage, stageFromInvocation } from '../classifier';
import { discoverManifests } from '../discovery';
import { documentSubject, STAGES } from '../dry-run';
import { buildReport, type EntryInput } from '../aggregator';
import type { ManifestDocument, StageOutcome, ValidationReport } from '../types';

export const SCHEMA_REPORT_TITLE = 'Kubeconform Schema Validation';
export const SCHEMA_STAGE = 'Schema validation';

export interface SchemaValidationOptions {
  path: string;
  kubernetesVersion?: string;
  strict?: boolean;
}

const kubeconformResourceSchema = z.object({
  filename: z.string().default(''),
  kind: z.string().default(''),
  name: z.string().default(''),
  version: z.string().default(''),
  status: z.string(),
  msg: z.string().default(''),
});

export type KubeconformResource = z.infer<typeof kubeconformResourceSchema>;

const kubeconformOutputSchema = z.object({
  resources: z.array(kubeconformResourceSchema),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse kubeconform's JSON output: either one `{ "resources": [...] }`
 * object or one resource object per line
 */
export function parseKubeconformOutput(stdout: string): KubeconformResource[] {
  const trimmed = stdout.trim();
  if (!trimmed) return [];

  const wrapped = kubeconformOutputSchema.safeParse(parseJson(trimmed));
  if (wrapped.success) {
    return wrapped.data.resources;
  }

  const resources: KubeconformResource[] = [];
  for (const line of trimmed.split(/\r?\n/)) {
    const resource = kubeconformResourceSchema.safeParse(parseJson(line.trim()));
    if (resource.success) {
      resources.push(resource.data);
    }
  }
  return resources;
}

const SEVERITY: Record<StageOutcome['status'], number> = {
  PASS: 0,
  SKIPPED: 1,
  ERROR: 2,
  FAIL: 3,
};

function describeResource(resource: KubeconformResource): string {
  return [resource.kind, resource.name].filter(Boolean).join('/') || 'resource';
}

export function stageFromResource(resource: KubeconformResource): StageOutcome {
  switch (resource.status) {
    case 'statusValid':
      return { stage: SCHEMA_STAGE, status: 'PASS', message: '' };
    case 'statusInvalid':
      return {
        stage: SCHEMA_STAGE,
        status: 'FAIL',
        message: resource.msg || `${describeResource(resource)} does not match its schema`,
        errorKind: 'ToolFailure',
      };
    case 'statusSkipped':
      return {
        stage: SCHEMA_STAGE,
        status: 'SKIPPED',
        message: resource.msg || `No schema available for ${describeResource(resource)}`,
      };
    default:
      return errorStage(SCHEMA_STAGE, 'ToolFailure', resource.msg || `kubeconform reported ${resource.status}`);
  }
}

/**
 * One schema stage per document. kubeconform lists only problem resources
 * unless asked to be verbose, so a clean exit with no output is a pass.
 */
export function schemaStage(result: ToolInvocationResult): StageOutcome {
  const resources = parseKubeconformOutput(result.stdout);
  if (resources.length === 0) {
    return stageFromInvocation(SCHEMA_STAGE, result);
  }

  // Worst outcome wins when one document yields several resources
  return resources
    .map(stageFromResource)
    .reduce((worst, stage) => (SEVERITY[stage.status] > SEVERITY[worst.status] ? stage : worst));
}

async function checkDocument(
  document: ManifestDocument,
  options: Required<Omit<SchemaValidationOptions, 'path'>>,
  context: ToolContext,
): Promise<StageOutcome> {
  const result = await context.runner.run({
    ...kubeconform.validate({
      kubernetesVersion: options.kubernetesVersion,
      strict: options.strict,
      schemaLocations: context.config.schemaLocations,
    }),
    input: document.raw,
    timeoutMs: context.config.timeouts.kubeconform,
  });
  return schemaStage(result);
}

export async function validateSchemas(
  options: SchemaValidationOptions,
  context: ToolContext,
): Promise<Result<ValidationReport>> {
  const discovered = await discoverManifests(options.path);
  if (!discovered.ok) return discovered;

  const settings = {
    kubernetesVersion: options.kubernetesVersion ?? KUBECONFORM.DEFAULT_KUBERNETES_VERSION,
    strict: options.strict ?? false,
  };
  context.logger.info({ path: options.path, ...settings }, 'Validating manifest schemas');

  const entries: EntryInput[] = [];
  for (const item of discovered.value) {
    if (item.type === 'error') {
      entries.push({
        subject: { type: 'document', source: item.source, index: item.index },
        stages: [errorStage(STAGES.PARSE, item.kind, item.message)],
      });
      continue;
    }
    entries.push({
      subject: documentSubject(item),
      stages: [await checkDocument(item, settings, context)],
    });
  }

  return Success(
    buildReport({
      pipeline: 'schema-only',
      title: SCHEMA_REPORT_TITLE,
      context: null,
      target: { label: 'Path', value: options.path },
      parameters: [
        { label: 'Kubernetes version', value: settings.kubernetesVersion },
        { label: 'Strict', value: settings.strict ? 'yes' : 'no' },
      ],
      entries,
    }),
  );
}
