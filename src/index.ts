/**
 * Public API for kube-preflight
 *
 * The MCP server is the main surface; everything below is also usable
 * programmatically, e.g. from a pre-commit hook.
 */

/**
 * Creates an application runtime with every tool registered.
 *
 * @example
 * ```typescript
 * import { createApp } from 'kube-preflight';
 *
 * const app = createApp();
 * await app.execute('select-context', { context: 'staging' });
 * const result = await app.execute('validate-manifest', { path: './deploy' });
 * if (result.ok && !result.value.ok) {
 *   console.error(renderReport(result.value));
 * }
 * ```
 *
 * @public
 */
export { createApp, APP_NAME } from './app/index';

export type { TransportConfig } from './app/index';

/**
 * Runtime types
 *
 * - `AppRuntime`: tool execution, MCP binding and health checks
 * - `ToolInputMap` / `ToolResultMap`: per-tool parameter and result types
 *
 * @public
 */
export type {
  AppRuntime,
  AppRuntimeConfig,
  ToolInputMap,
  ToolResultMap,
  ExecutionMetadata,
} from './types/runtime';

export type { Result, ErrorGuidance, Tool, ToolContext } from './types/index';
export { Success, Failure } from './types/core';

export { ALL_TOOLS, TOOL_NAME, type ToolName } from './tools/index';

export { loadConfig, defaultConfig, type AppConfig, type TimeoutConfig } from './config/index';

/**
 * Subprocess adapter. Supply your own `ToolRunner` to `createApp` to
 * intercept or replay external tool calls.
 *
 * @public
 */
export {
  createProcessRunner,
  formatCommand,
  type ToolRunner,
  type ToolInvocation,
  type ToolInvocationResult,
  type ProcessRunnerOptions,
} from './infra/process/runner';

export {
  createContextStore,
  requireContext,
  UNSELECTED,
  type ContextSelection,
  type ContextStore,
  type AvailableContexts,
} from './session/context-store';

/**
 * Validation pipelines and report rendering
 *
 * @public
 */
export {
  validateManifests,
  validateOverlay,
  validateChart,
  validateSchemas,
  checkReconciler,
  reconcilerStatus,
  lintYaml,
} from './validation/pipelines/index';
export { renderReport, formatSummary } from './validation/aggregator';
export { ERROR_KINDS, type ErrorKind } from './validation/classifier';
export type {
  ValidationReport,
  ReportEntry,
  StageOutcome,
  StageStatus,
  PipelineKind,
} from './validation/types';

export { createMCPServer, OUTPUTFORMAT, type MCPServer, type OutputFormat } from './mcp/mcp-server';
