/**
 * Local YAML lint: parses every file without contacting a cluster and
 * reports syntax errors, duplicate keys and stray tab characters.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { Success, type Result } from '@/types';
import type { ToolContext } from '@/core/context';
import { extractErrorMessage } from '@/lib/errors';
import { classifiedFailure } from '../classifier';
import { findManifestFiles, splitManifestStream } from '../discovery';
import { buildReport, type EntryInput } from '../aggregator';
import type { StageOutcome, ValidationReport } from '../types';

export const YAML_LINT_TITLE = 'YAML Syntax Validation';
export const YAML_SYNTAX_STAGE = 'YAML syntax';

/**
 * Lines containing a tab; YAML forbids tabs in indentation and they are
 * easy to miss elsewhere
 */
export function findTabLines(content: string): string[] {
  const warnings: string[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    if (line.includes('\t')) {
      warnings.push(`line ${index + 1}: tab character`);
    }
  });
  return warnings;
}

export function lintYamlContent(content: string, source: string): StageOutcome {
  const items = splitManifestStream(content, source);
  const errors = items.flatMap((item) => (item.type === 'error' ? [`Document ${item.index}: ${item.message}`] : []));
  const warnings = findTabLines(content);

  const outcome: StageOutcome =
    errors.length > 0
      ? { stage: YAML_SYNTAX_STAGE, status: 'FAIL', message: errors.join('\n'), errorKind: 'ParseError' }
      : {
          stage: YAML_SYNTAX_STAGE,
          status: 'PASS',
          message: `${items.length} ${items.length === 1 ? 'document' : 'documents'}`,
        };
  if (warnings.length > 0) {
    outcome.warnings = warnings;
  }
  return outcome;
}

async function lintFile(file: string): Promise<EntryInput> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf8');
  } catch (error) {
    return {
      subject: { type: 'artifact', path: file },
      stages: [
        {
          stage: YAML_SYNTAX_STAGE,
          status: 'ERROR',
          message: `Cannot read file: ${extractErrorMessage(error)}`,
          errorKind: 'NotFound',
        },
      ],
    };
  }
  return { subject: { type: 'artifact', path: file }, stages: [lintYamlContent(content, file)] };
}

export async function lintYaml(target: string, context: ToolContext): Promise<Result<ValidationReport>> {
  const resolved = path.resolve(target);

  let files: string[];
  try {
    const stats = await fs.stat(resolved);
    files = stats.isDirectory() ? await findManifestFiles(resolved) : [resolved];
  } catch (error) {
    return classifiedFailure('NotFound', `Path not found: ${resolved}`, {
      path: resolved,
      error: extractErrorMessage(error),
    });
  }

  context.logger.info({ path: resolved, files: files.length }, 'Linting YAML');

  const entries: EntryInput[] = [];
  for (const file of files) {
    entries.push(await lintFile(file));
  }

  return Success(
    buildReport({
      pipeline: 'yaml-syntax',
      title: YAML_LINT_TITLE,
      context: null,
      target: { label: 'Path', value: target },
      entries,
    }),
  );
}
