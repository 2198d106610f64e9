/**
 * Helm chart pipeline: lint, render with `helm template`, then dry-run
 * every rendered resource.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { Success, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { CHART_FILENAMES, HELM } from '@/config/constants';
import { helm } from '@/infra/cli/helm';
import { requireContext } from '@/session/context-store';
import { classifiedFailure, classifyInvocation } from '../classifier';
import { splitManifestStream } from '../discovery';
import { dryRunItems } from '../dry-run';
import { buildReport, type ReportInput } from '../aggregator';
import type { ReportField, StageOutcome, ValidationReport } from '../types';
import { preStageFailureEntry, renderedStage } from './shared';

export const CHART_REPORT_TITLE = 'Helm Chart Dry-Run Validation';
export const HELM_LINT_STAGE = 'Helm lint';
export const HELM_TEMPLATE_STAGE = 'Helm template';

export interface ChartValidationOptions {
  chartPath: string;
  valuesFile?: string;
  namespace?: string;
  releaseName?: string;
}

async function isFile(file: string): Promise<boolean> {
  try {
    return (await fs.stat(file)).isFile();
  } catch {
    return false;
  }
}

/**
 * Chart directory for a path naming either the directory or its Chart.yaml
 */
export async function resolveChartDirectory(target: string): Promise<Result<string>> {
  const resolved = path.resolve(target);
  const directory = CHART_FILENAMES.some((name) => name === path.basename(resolved))
    ? path.dirname(resolved)
    : resolved;

  for (const name of CHART_FILENAMES) {
    if (await isFile(path.join(directory, name))) {
      return Success(directory);
    }
  }
  return classifiedFailure('NotFound', `No Chart.yaml found in ${directory}`, { path: directory });
}

/**
 * `[WARNING]` lines helm lint prints for a chart that still passes
 */
export function extractLintWarnings(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith('[WARNING]'))
    .map((line) => line.replace(/^\[WARNING\]\s*/, ''));
}

export async function validateChart(
  options: ChartValidationOptions,
  context: ToolContext,
): Promise<Result<ValidationReport>> {
  const selected = requireContext(context.contexts);
  if (!selected.ok) return selected;

  const chart = await resolveChartDirectory(options.chartPath);
  if (!chart.ok) return chart;

  let valuesFile: string | undefined;
  if (options.valuesFile) {
    valuesFile = path.resolve(options.valuesFile);
    if (!(await isFile(valuesFile))) {
      return classifiedFailure('NotFound', `Values file not found: ${valuesFile}`, { path: valuesFile });
    }
  }

  const releaseName = options.releaseName ?? HELM.DEFAULT_RELEASE_NAME;
  const parameters: ReportField[] = [{ label: 'Release', value: releaseName }];
  if (valuesFile) parameters.push({ label: 'Values', value: valuesFile });
  if (options.namespace) parameters.push({ label: 'Namespace', value: options.namespace });

  const report: Omit<ReportInput, 'entries'> = {
    pipeline: 'chart',
    title: CHART_REPORT_TITLE,
    context: selected.value,
    target: { label: 'Chart', value: chart.value },
    parameters,
  };
  const timeoutMs = context.config.timeouts.helm;

  const lint = await context.runner.run({
    ...helm.lint(chart.value, { valuesFile, kubeContext: selected.value }),
    timeoutMs,
  });
  if (classifyInvocation(lint) !== null) {
    context.logger.warn({ chart: chart.value, exitCode: lint.exitCode }, 'Helm lint failed');
    return Success(
      buildReport({ ...report, entries: [preStageFailureEntry(chart.value, HELM_LINT_STAGE, lint)] }),
    );
  }
  const lintStage: StageOutcome = { stage: HELM_LINT_STAGE, status: 'PASS', message: '' };
  const lintWarnings = extractLintWarnings(lint.stdout);
  if (lintWarnings.length > 0) {
    lintStage.warnings = lintWarnings;
  }

  const template = await context.runner.run({
    ...helm.template(releaseName, chart.value, {
      valuesFile,
      namespace: options.namespace,
      kubeContext: selected.value,
    }),
    timeoutMs,
  });
  if (classifyInvocation(template) !== null) {
    context.logger.warn({ chart: chart.value, exitCode: template.exitCode }, 'Helm template failed');
    return Success(
      buildReport({
        ...report,
        preStages: [lintStage],
        entries: [preStageFailureEntry(chart.value, HELM_TEMPLATE_STAGE, template)],
      }),
    );
  }

  const items = splitManifestStream(template.stdout, `${chart.value} (helm template)`);
  context.logger.info({ chart: chart.value, items: items.length }, 'Helm chart rendered');

  return Success(
    buildReport({
      ...report,
      preStages: [lintStage, renderedStage(HELM_TEMPLATE_STAGE, items)],
      entries: await dryRunItems(items, context),
    }),
  );
}
