/**
 * Flux reconciler pipelines: controller health (`flux check`) and per
 * resource readiness (`flux get all -A`).
 */

import { Success, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { flux } from '@/infra/cli/flux';
import { requireContext } from '@/session/context-store';
import { classifyInvocation, describeInvocationFailure, errorStage, stageFromInvocation } from '../classifier';
import { buildReport, type EntryInput } from '../aggregator';
import type { StageOutcome, ValidationReport } from '../types';

export const RECONCILER_STATUS_TITLE = 'Flux Reconciliation Status';
export const FLUX_CHECK_STAGE = 'Flux check';
export const FLUX_GET_STAGE = 'Flux get';
export const READY_STAGE = 'Ready';

export interface ReconcilerHealth {
  context: string;
  healthy: boolean;
  outcome: StageOutcome;
  /** Combined flux check output */
  output: string;
}

export interface FluxResourceRow {
  namespace: string;
  /** `kind/name` as flux prints it */
  name: string;
  revision: string;
  suspended: string;
  ready: string;
  message: string;
}

export async function checkReconciler(context: ToolContext): Promise<Result<ReconcilerHealth>> {
  const selected = requireContext(context.contexts);
  if (!selected.ok) return selected;

  const result = await context.runner.run({
    ...flux.check(selected.value),
    timeoutMs: context.config.timeouts.flux,
  });
  const outcome = stageFromInvocation(FLUX_CHECK_STAGE, result);
  context.logger.info({ context: selected.value, status: outcome.status }, 'Flux check finished');

  return Success({
    context: selected.value,
    healthy: outcome.status === 'PASS',
    outcome,
    // flux check reports on stderr
    output: [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n'),
  });
}

function splitColumns(line: string): string[] {
  const trimmed = line.trim();
  const cells = trimmed.includes('\t') ? trimmed.split('\t') : trimmed.split(/ {2,}/);
  return cells.map((cell) => cell.trim());
}

/**
 * Parse the tables `flux get all -A` prints, one per resource kind, each
 * introduced by a header line starting with NAMESPACE. Lines outside a
 * table (progress or "no objects found" notices) are ignored.
 */
export function parseFluxTables(output: string): FluxResourceRow[] {
  const rows: FluxResourceRow[] = [];
  let header: string[] | null = null;

  for (const line of output.split(/\r?\n/)) {
    if (line.trim() === '') {
      header = null;
      continue;
    }
    const cells = splitColumns(line);
    if (cells[0] === 'NAMESPACE') {
      header = cells.map((cell) => cell.toUpperCase());
      continue;
    }
    if (!header) continue;

    const columns = header;
    const cell = (column: string): string => {
      const index = columns.indexOf(column);
      if (index < 0) return '';
      // MESSAGE is last and may itself contain separators
      if (column === 'MESSAGE') return cells.slice(index).join(' ').trim();
      return cells[index] ?? '';
    };

    rows.push({
      namespace: cell('NAMESPACE'),
      name: cell('NAME'),
      revision: cell('REVISION'),
      suspended: cell('SUSPENDED'),
      ready: cell('READY'),
      message: cell('MESSAGE'),
    });
  }

  return rows;
}

export function stageFromRow(row: FluxResourceRow): StageOutcome {
  const note = row.suspended.toLowerCase() === 'true' ? '[suspended] ' : '';
  switch (row.ready.toLowerCase()) {
    case 'true':
      return { stage: READY_STAGE, status: 'PASS', message: note.trim() };
    case 'false':
      return {
        stage: READY_STAGE,
        status: 'FAIL',
        message: `${note}${row.message || 'not ready'}`,
        errorKind: 'ToolFailure',
      };
    default:
      return errorStage(
        READY_STAGE,
        'ToolFailure',
        `${note}readiness unknown (${row.ready || 'no READY column'})${row.message ? `: ${row.message}` : ''}`,
      );
  }
}

export async function reconcilerStatus(context: ToolContext): Promise<Result<ValidationReport>> {
  const selected = requireContext(context.contexts);
  if (!selected.ok) return selected;

  const command = flux.getAll(selected.value);
  const result = await context.runner.run({ ...command, timeoutMs: context.config.timeouts.flux });
  const rows = parseFluxTables(result.stdout);
  const kind = classifyInvocation(result);

  const entries = rows.map((row): EntryInput => ({
    subject: { type: 'resource', namespace: row.namespace, name: row.name },
    stages: [stageFromRow(row)],
  }));

  // A non-zero exit can still print the tables it could read
  if (kind !== null) {
    context.logger.warn(
      { context: selected.value, exitCode: result.exitCode, rows: rows.length },
      'flux get failed',
    );
    entries.push({
      subject: { type: 'artifact', path: `${command.program} ${command.args.join(' ')}` },
      stages: [errorStage(FLUX_GET_STAGE, kind, describeInvocationFailure(result))],
    });
  }

  return Success(
    buildReport({
      pipeline: 'reconciler-status',
      title: RECONCILER_STATUS_TITLE,
      context: selected.value,
      target: { label: 'Scope', value: 'all namespaces' },
      entries,
    }),
  );
}
