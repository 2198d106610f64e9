/**
 * Manifest Discovery
 *
 * Turns a path into the ordered list of YAML documents to validate. Files
 * are split on document markers and each document is parsed once so that
 * malformed YAML is reported with its position instead of being sent to a
 * cluster.
 */

import { promises as fs, type Dirent, type Stats } from 'node:fs';
import * as path from 'node:path';
import { load, YAMLException } from 'js-yaml';
import { Success, type Result } from '@/types';
import { extractErrorMessage } from '@/lib/errors';
import { IGNORED_DIRECTORIES, MANIFEST_EXTENSIONS } from '@/config/constants';
import { classifiedFailure } from './classifier';
import type { DiscoveredItem, DiscoveryError, ManifestDocument } from './types';

interface RawChunk {
  text: string;
  /** 0-based line of the chunk's first line within its source */
  startLine: number;
}

const DOCUMENT_START = /^---(?:[ \t]+(.*))?$/;
const DOCUMENT_END = /^\.\.\.[ \t]*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlankOrComment(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('%');
}

/**
 * Split on `---` / `...` marker lines. Content written on the marker line
 * itself (`--- {a: 1}`) stays with the document it opens.
 */
function splitChunks(text: string): RawChunk[] {
  const lines = text.split(/\r?\n/);
  const chunks: RawChunk[] = [];
  let current: string[] = [];
  let startLine = 0;

  const flush = (nextStart: number): void => {
    if (current.some((line) => !isBlankOrComment(line))) {
      chunks.push({ text: current.join('\n'), startLine });
    }
    current = [];
    startLine = nextStart;
  };

  lines.forEach((line, lineNumber) => {
    const start = DOCUMENT_START.exec(line);
    if (start) {
      flush(lineNumber);
      const inline = start[1];
      // Keep the marker line's position so error lines stay aligned
      current.push(inline && !inline.trimStart().startsWith('#') ? inline : '');
      return;
    }
    if (DOCUMENT_END.test(line)) {
      flush(lineNumber + 1);
      return;
    }
    current.push(line);
  });
  flush(lines.length);

  return chunks;
}

/**
 * `Kind/name`, just `Kind`, or undefined for documents that declare neither
 */
export function documentLabel(parsed: unknown): string | undefined {
  if (!isRecord(parsed)) return undefined;
  const kind = typeof parsed.kind === 'string' ? parsed.kind : undefined;
  const metadata = parsed.metadata;
  const name = isRecord(metadata) && typeof metadata.name === 'string' ? metadata.name : undefined;
  if (kind && name) return `${kind}/${name}`;
  return kind;
}

function describeParseError(error: unknown, startLine: number): string {
  if (error instanceof YAMLException) {
    const { mark } = error;
    const position = mark
      ? ` at line ${startLine + mark.line + 1}, column ${mark.column + 1}`
      : '';
    return `YAML parse error${position}: ${error.reason}`;
  }
  return `YAML parse error: ${extractErrorMessage(error)}`;
}

/**
 * Split a multi-document YAML text (a file, or rendered `helm template` /
 * kustomize output) into documents and parse errors, in order.
 * Documents that are empty, comment-only or parse to null are skipped and
 * do not consume an index.
 */
export function splitManifestStream(text: string, source: string): DiscoveredItem[] {
  const items: DiscoveredItem[] = [];

  for (const chunk of splitChunks(text)) {
    const index = items.length;
    let parsed: unknown;
    try {
      parsed = load(chunk.text, { filename: source });
    } catch (error) {
      const placeholder: DiscoveryError = {
        type: 'error',
        source,
        index,
        kind: 'ParseError',
        message: describeParseError(error, chunk.startLine),
      };
      items.push(placeholder);
      continue;
    }

    if (parsed === null || parsed === undefined) {
      continue;
    }

    const document: ManifestDocument = { type: 'document', source, index, raw: chunk.text };
    const label = documentLabel(parsed);
    if (label) {
      document.label = label;
    }
    items.push(document);
  }

  return items;
}

function isManifestFile(name: string): boolean {
  const extension = path.extname(name).toLowerCase();
  return MANIFEST_EXTENSIONS.some((candidate) => candidate === extension);
}

function isIgnoredDirectory(name: string): boolean {
  return name.startsWith('.') || IGNORED_DIRECTORIES.some((ignored) => ignored === name);
}

/**
 * Every `.yaml`/`.yml` file below `root`, ordered by path relative to it
 */
export async function findManifestFiles(root: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (relativeDir: string): Promise<void> => {
    const entries: Dirent[] = await fs.readdir(path.join(root, relativeDir), {
      withFileTypes: true,
    });
    for (const entry of entries) {
      const relativePath = relativeDir ? path.join(relativeDir, entry.name) : entry.name;
      if (entry.isDirectory()) {
        if (!isIgnoredDirectory(entry.name)) {
          await walk(relativePath);
        }
      } else if (entry.isFile() && isManifestFile(entry.name)) {
        found.push(relativePath);
      }
    }
  };

  await walk('');

  return found
    .map((relativePath) => relativePath.split(path.sep).join('/'))
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((relativePath) => path.join(root, relativePath));
}

async function readSource(file: string): Promise<DiscoveredItem[]> {
  try {
    const content = await fs.readFile(file, 'utf8');
    return splitManifestStream(content, file);
  } catch (error) {
    return [
      {
        type: 'error',
        source: file,
        index: 0,
        kind: 'ParseError',
        message: `Cannot read file: ${extractErrorMessage(error)}`,
      },
    ];
  }
}

/**
 * Resolve a file or directory into the documents it contains.
 *
 * A missing path is a `NotFound` failure; a malformed document is not; it
 * becomes a `ParseError` placeholder and discovery carries on.
 */
export async function discoverManifests(target: string): Promise<Result<DiscoveredItem[]>> {
  const resolved = path.resolve(target);

  let stats: Stats;
  try {
    stats = await fs.stat(resolved);
  } catch (error) {
    return classifiedFailure('NotFound', `Path not found: ${resolved}`, {
      path: resolved,
      error: extractErrorMessage(error),
    });
  }

  if (!stats.isDirectory()) {
    return Success(await readSource(resolved));
  }

  const files = await findManifestFiles(resolved);
  const items: DiscoveredItem[] = [];
  for (const file of files) {
    items.push(...(await readSource(file)));
  }
  return Success(items);
}
