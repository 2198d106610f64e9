/**
 * Shared validation data model
 */

import type { ErrorKind } from './classifier';

export type StageStatus = 'PASS' | 'FAIL' | 'SKIPPED' | 'ERROR';

export type EntryStatus = 'PASS' | 'FAIL' | 'ERROR';

export interface StageOutcome {
  /** Stage display name, e.g. "Client dry-run" */
  stage: string;
  status: StageStatus;
  /** Empty for a clean PASS */
  message: string;
  /** Set on every FAIL and ERROR stage */
  errorKind?: ErrorKind;
  warnings?: string[];
}

/**
 * One document of a manifest file or of a rendered stream
 */
export interface ManifestDocument {
  type: 'document';
  /** File path, or a description of the rendered stream it came from */
  source: string;
  /** 0-based position among the non-empty documents of its source */
  index: number;
  raw: string;
  /** `Kind/name` when the document declares them */
  label?: string;
}

/**
 * Placeholder for a document that could not be read or parsed
 */
export interface DiscoveryError {
  type: 'error';
  source: string;
  index: number;
  kind: 'ParseError';
  message: string;
}

export type DiscoveredItem = ManifestDocument | DiscoveryError;

export type ReportSubject =
  | { type: 'document'; source: string; index: number; label?: string }
  | { type: 'artifact'; path: string }
  | { type: 'resource'; namespace: string; name: string };

export interface ReportEntry {
  subject: ReportSubject;
  stages: StageOutcome[];
  status: EntryStatus;
}

export type PipelineKind =
  | 'raw-manifest'
  | 'overlay'
  | 'chart'
  | 'schema-only'
  | 'reconciler-status'
  | 'yaml-syntax';

export interface ReportField {
  label: string;
  value: string;
}

export interface ValidationReport {
  pipeline: PipelineKind;
  title: string;
  /** Context the run was performed against; null for offline pipelines */
  context: string | null;
  target: ReportField;
  parameters: ReportField[];
  /** Render/build/lint steps that ran before the per-document stages */
  preStages: StageOutcome[];
  entries: ReportEntry[];
  passed: number;
  failed: number;
  errored: number;
  /** True when nothing failed or errored */
  ok: boolean;
  /** `Summary: p passed, f failed, e errored` */
  summary: string;
}
