/**
 * Result Aggregator
 *
 * Folds per-stage outcomes into entry verdicts and report totals, and
 * renders the fixed-layout text report. Rendering is a pure function of the
 * report: the same input always produces the same text.
 */

import { REPORT } from '@/config/constants';
import type {
  EntryStatus,
  PipelineKind,
  ReportEntry,
  ReportField,
  ReportSubject,
  StageOutcome,
  ValidationReport,
} from './types';

export interface EntryInput {
  subject: ReportSubject;
  stages: StageOutcome[];
}

export interface ReportInput {
  pipeline: PipelineKind;
  title: string;
  context: string | null;
  target: ReportField;
  parameters?: ReportField[];
  preStages?: StageOutcome[];
  entries: EntryInput[];
}

/**
 * FAIL dominates ERROR, which dominates PASS. SKIPPED stages do not count.
 */
export function entryStatus(stages: readonly StageOutcome[]): EntryStatus {
  if (stages.some((stage) => stage.status === 'FAIL')) return 'FAIL';
  if (stages.some((stage) => stage.status === 'ERROR')) return 'ERROR';
  return 'PASS';
}

export function formatSummary(passed: number, failed: number, errored: number): string {
  return `Summary: ${passed} passed, ${failed} failed, ${errored} errored`;
}

export function buildReport(input: ReportInput): ValidationReport {
  const entries: ReportEntry[] = input.entries.map((entry) => ({
    subject: entry.subject,
    stages: entry.stages,
    status: entryStatus(entry.stages),
  }));

  const passed = entries.filter((entry) => entry.status === 'PASS').length;
  const failed = entries.filter((entry) => entry.status === 'FAIL').length;
  const errored = entries.filter((entry) => entry.status === 'ERROR').length;

  return {
    pipeline: input.pipeline,
    title: input.title,
    context: input.context,
    target: input.target,
    parameters: input.parameters ?? [],
    preStages: input.preStages ?? [],
    entries,
    passed,
    failed,
    errored,
    ok: failed === 0 && errored === 0,
    summary: formatSummary(passed, failed, errored),
  };
}

export function describeSubject(subject: ReportSubject): string {
  switch (subject.type) {
    case 'document': {
      const identity = `Document: ${subject.source} [${subject.index}]`;
      return subject.label ? `${identity} (${subject.label})` : identity;
    }
    case 'artifact':
      return `Artifact: ${subject.path}`;
    case 'resource':
      return `Resource: ${subject.namespace}/${subject.name}`;
  }
}

export function formatStageLine(stage: StageOutcome): string {
  let line = `${stage.stage}: ${stage.status}`;
  if (stage.status === 'PASS' && stage.message) {
    line += ` (${stage.message})`;
  }
  if (stage.errorKind && stage.status === 'ERROR') {
    line += ` (${stage.errorKind})`;
  }
  if (stage.warnings && stage.warnings.length > 0) {
    line += ' (with warnings)';
  }
  return line;
}

function stageDetailLines(stage: StageOutcome, indent: string): string[] {
  const lines: string[] = [];
  if (stage.status !== 'PASS' && stage.message) {
    const label = stage.status === 'SKIPPED' ? 'Note' : 'Error';
    const [first = '', ...rest] = stage.message.split(/\r?\n/);
    lines.push(`${indent}${label}: ${first}`);
    for (const line of rest) {
      lines.push(`${indent}  ${line}`);
    }
  }
  for (const warning of stage.warnings ?? []) {
    lines.push(`${indent}Warning: ${warning}`);
  }
  return lines;
}

/**
 * Render the text report.
 *
 * @example
 * ```text
 * Manifest Dry-Run Validation
 * Context: staging
 * Path: /work/deploy
 * ==================================================
 *
 * Document: /work/deploy/redis.yaml [0] (Deployment/redis)
 *   Client dry-run: PASS
 *   Server dry-run: PASS
 *
 * ==================================================
 * Summary: 1 passed, 0 failed, 0 errored
 *
 * All validations passed. Safe to commit.
 * ```
 */
export function renderReport(report: ValidationReport): string {
  const lines: string[] = [
    report.title,
    `Context: ${report.context ?? '(none)'}`,
    `${report.target.label}: ${report.target.value}`,
  ];
  for (const parameter of report.parameters) {
    lines.push(`${parameter.label}: ${parameter.value}`);
  }
  lines.push(REPORT.RULE);

  for (const stage of report.preStages) {
    lines.push(formatStageLine(stage), ...stageDetailLines(stage, '  '));
  }

  if (report.entries.length === 0) {
    lines.push('', REPORT.NO_DOCUMENTS);
  }

  for (const entry of report.entries) {
    lines.push('', describeSubject(entry.subject));
    for (const stage of entry.stages) {
      lines.push(`  ${formatStageLine(stage)}`, ...stageDetailLines(stage, '    '));
    }
  }

  lines.push(
    '',
    REPORT.RULE,
    report.summary,
    '',
    report.ok ? REPORT.ADVISORY_PASSED : REPORT.ADVISORY_FAILED,
  );

  return lines.join('\n');
}
