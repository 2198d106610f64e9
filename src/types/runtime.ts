/**
 * AppRuntime Types - Precise Typing for Application Runtime
 *
 * Provides strongly typed interfaces for the application runtime,
 * enabling type-safe tool execution and dependency injection hooks.
 */

import type { Logger } from 'pino';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Result } from './core';
import type { Tool } from './tool';
import type { TransportConfig } from '@/app';
import type { MCPServer, OutputFormat } from '@/mcp/mcp-server';
import type { ToolName } from '@/tools';
import type { ChainHintsMode } from '@/app/orchestrator-types';
import type { AppConfig } from '@/config/index';
import type { ContextSelection, ContextStore } from '@/session/context-store';
import type { ToolRunner } from '@/infra/process/runner';
import type { ToolchainStatus } from '@/infra/health/checks';
import type { ValidationReport } from '@/validation/types';
import type { ListContextsParams } from '@/tools/list-contexts/schema';
import type { SelectContextParams } from '@/tools/select-context/schema';
import type { ValidateManifestParams } from '@/tools/validate-manifest/schema';
import type { ValidateOverlayParams } from '@/tools/validate-overlay/schema';
import type { CheckReconcilerParams } from '@/tools/check-reconciler/schema';
import type { ReconcilerStatusParams } from '@/tools/reconciler-status/schema';
import type { LintYamlParams } from '@/tools/lint-yaml/schema';
import type { ListContextsResult } from '@/tools/list-contexts/tool';
import type { SelectContextResult } from '@/tools/select-context/tool';
import type { CheckReconcilerResult } from '@/tools/check-reconciler/tool';
import type { z } from 'zod';
import type { validateChartSchema } from '@/tools/validate-chart/schema';
import type { validateSchemaSchema } from '@/tools/validate-schema/schema';

/**
 * Input types accepted by each tool (defaults may be omitted)
 */
export interface ToolInputMap {
  'list-contexts': ListContextsParams;
  'select-context': SelectContextParams;
  'validate-manifest': ValidateManifestParams;
  'validate-overlay': ValidateOverlayParams;
  'validate-chart': z.input<typeof validateChartSchema>;
  'validate-schema': z.input<typeof validateSchemaSchema>;
  'check-reconciler': CheckReconcilerParams;
  'reconciler-status': ReconcilerStatusParams;
  'lint-yaml': LintYamlParams;
}

/**
 * Result types produced by each tool. With chain hints enabled, object
 * results also carry a `nextSteps` string.
 */
export interface ToolResultMap {
  'list-contexts': ListContextsResult;
  'select-context': SelectContextResult;
  'validate-manifest': ValidationReport;
  'validate-overlay': ValidationReport;
  'validate-chart': ValidationReport;
  'validate-schema': ValidationReport;
  'check-reconciler': CheckReconcilerResult;
  'reconciler-status': ValidationReport;
  'lint-yaml': ValidationReport;
}

/**
 * Tool execution context metadata
 */
export interface ExecutionMetadata {
  /** Transport type (stdio, programmatic) */
  transport?: string;

  /** Request ID for tracing */
  requestId?: string;

  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Strongly typed AppRuntime interface with dependency injection support
 */
export interface AppRuntime {
  /**
   * Configuration values the runtime was created with
   */
  config: {
    chainHintsMode: ChainHintsMode;
    outputFormat: OutputFormat;
  };

  /**
   * Execute a tool with type-safe parameters and results
   */
  execute<T extends ToolName>(
    toolName: T,
    params: ToolInputMap[T],
    metadata?: ExecutionMetadata,
  ): Promise<Result<ToolResultMap[T]>>;

  /**
   * List all available tools with their metadata
   */
  listTools(): Array<{
    name: ToolName;
    description: string;
    version?: string;
    category?: string;
    requiresContext: boolean;
  }>;

  /**
   * Cluster context currently selected on this runtime
   */
  selectedContext(): ContextSelection;

  /**
   * Start MCP server with specified transport
   */
  startServer(transport: TransportConfig): Promise<MCPServer>;

  /**
   * Bind to existing MCP server instance
   */
  bindToMCP(server: McpServer, transportLabel?: string): void;

  /**
   * Perform health check
   */
  healthCheck(): Promise<{
    status: 'healthy' | 'unhealthy';
    tools: number;
    message: string;
    dependencies: ToolchainStatus;
  }>;

  /**
   * Stop the runtime and clean up resources
   */
  stop(): Promise<void>;
}

/**
 * Runtime factory configuration
 */
export interface AppRuntimeConfig {
  /** Logger instance for runtime operations (set at creation time, not reconfigurable) */
  logger?: Logger;

  /** Timeouts, schema locations and output format; defaults to loadConfig() */
  appConfig?: AppConfig;

  /** External tool runner; defaults to the child-process runner */
  runner?: ToolRunner;

  /** Context store; defaults to a fresh, unselected store */
  contexts?: ContextStore;

  /** Custom tools to register */
  tools?: readonly Tool[];

  /** Enable hints that suggest other tools to call next in tool responses */
  chainHintsMode?: ChainHintsMode;

  /** Output format for tool responses; overrides appConfig.outputFormat */
  outputFormat?: OutputFormat;
}

/**
 * Factory function signature for creating AppRuntime instances
 */
export type CreateAppRuntime = (config?: AppRuntimeConfig) => AppRuntime;
