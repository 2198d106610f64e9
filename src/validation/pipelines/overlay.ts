/**
 * Kustomize overlay pipeline: build the overlay, then dry-run every
 * rendered resource.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { Success, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { KUSTOMIZATION_FILENAMES } from '@/config/constants';
import { kubectl } from '@/infra/cli/kubectl';
import { requireContext } from '@/session/context-store';
import { classifiedFailure, classifyInvocation } from '../classifier';
import { splitManifestStream } from '../discovery';
import { dryRunItems } from '../dry-run';
import { buildReport } from '../aggregator';
import type { ValidationReport } from '../types';
import { preStageFailureEntry, renderedStage } from './shared';

export const OVERLAY_REPORT_TITLE = 'Kustomize Dry-Run Validation';
export const KUSTOMIZE_BUILD_STAGE = 'Kustomize build';

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Directory holding the kustomization; accepts the directory itself or the
 * kustomization file
 */
export async function resolveOverlayDirectory(target: string): Promise<Result<string>> {
  const resolved = path.resolve(target);

  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(resolved)).isDirectory();
  } catch {
    return classifiedFailure('NotFound', `Path not found: ${resolved}`, { path: resolved });
  }

  if (!isDirectory) {
    const name = path.basename(resolved);
    if (KUSTOMIZATION_FILENAMES.some((candidate) => candidate === name)) {
      return Success(path.dirname(resolved));
    }
    return classifiedFailure('NotFound', `Not a kustomization file: ${resolved}`, { path: resolved });
  }

  for (const name of KUSTOMIZATION_FILENAMES) {
    if (await exists(path.join(resolved, name))) {
      return Success(resolved);
    }
  }
  return classifiedFailure(
    'NotFound',
    `No kustomization found in ${resolved} (expected one of ${KUSTOMIZATION_FILENAMES.join(', ')})`,
    { path: resolved },
  );
}

export async function validateOverlay(
  target: string,
  context: ToolContext,
): Promise<Result<ValidationReport>> {
  const selected = requireContext(context.contexts);
  if (!selected.ok) return selected;

  const directory = await resolveOverlayDirectory(target);
  if (!directory.ok) return directory;

  const report = {
    pipeline: 'overlay' as const,
    title: OVERLAY_REPORT_TITLE,
    context: selected.value,
    target: { label: 'Path', value: directory.value },
  };

  const build = await context.runner.run({
    ...kubectl.kustomize(selected.value, directory.value),
    timeoutMs: context.config.timeouts.kubectl,
  });

  if (classifyInvocation(build) !== null) {
    context.logger.warn({ overlay: directory.value, exitCode: build.exitCode }, 'Kustomize build failed');
    return Success(
      buildReport({
        ...report,
        entries: [preStageFailureEntry(directory.value, KUSTOMIZE_BUILD_STAGE, build)],
      }),
    );
  }

  const items = splitManifestStream(build.stdout, `${directory.value} (kustomize build)`);
  context.logger.info({ overlay: directory.value, items: items.length }, 'Kustomize build rendered');

  return Success(
    buildReport({
      ...report,
      preStages: [renderedStage(KUSTOMIZE_BUILD_STAGE, items)],
      entries: await dryRunItems(items, context),
    }),
  );
}
