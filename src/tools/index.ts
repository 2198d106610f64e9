import checkReconcilerTool from './check-reconciler/tool';
import lintYamlTool from './lint-yaml/tool';
import listContextsTool from './list-contexts/tool';
import reconcilerStatusTool from './reconciler-status/tool';
import selectContextTool from './select-context/tool';
import validateChartTool from './validate-chart/tool';
import validateManifestTool from './validate-manifest/tool';
import validateOverlayTool from './validate-overlay/tool';
import validateSchemaTool from './validate-schema/tool';
import type { Tool } from '@/types/tool';

const TOOL_NAME = {
  LIST_CONTEXTS: 'list-contexts',
  SELECT_CONTEXT: 'select-context',
  VALIDATE_MANIFEST: 'validate-manifest',
  VALIDATE_OVERLAY: 'validate-overlay',
  VALIDATE_CHART: 'validate-chart',
  VALIDATE_SCHEMA: 'validate-schema',
  CHECK_RECONCILER: 'check-reconciler',
  RECONCILER_STATUS: 'reconciler-status',
  LINT_YAML: 'lint-yaml',
} as const;

export type ToolName = (typeof TOOL_NAME)[keyof typeof TOOL_NAME];

export const ALL_TOOLS: readonly Tool[] = [
  // Context management
  listContextsTool,
  selectContextTool,

  // Cluster dry-run validation
  validateManifestTool,
  validateOverlayTool,
  validateChartTool,

  // Offline checks
  validateSchemaTool,
  lintYamlTool,

  // Flux reconciler
  checkReconcilerTool,
  reconcilerStatusTool,
];

export {
  TOOL_NAME,
  checkReconcilerTool,
  lintYamlTool,
  listContextsTool,
  reconcilerStatusTool,
  selectContextTool,
  validateChartTool,
  validateManifestTool,
  validateOverlayTool,
  validateSchemaTool,
};
