/**
 * Core Tool Context
 *
 * Provides the ToolContext interface and factory function with zero MCP
 * dependencies. Every tool handler and every validation pipeline receives
 * one of these; nothing reads the selected cluster context, the process
 * runner or the configuration from module scope.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '@/config/index';
import type { ContextStore } from '@/session/context-store';
import type { ToolRunner } from '@/infra/process/runner';

/**
 * Core tool execution context.
 *
 * IMPORTANT: This interface has no MCP-specific types or dependencies.
 */
export interface ToolContext {
  /**
   * Logger for debugging and error tracking.
   * Use this for structured logging instead of console.log.
   */
  logger: Logger;

  /** Process-wide cluster context selection, shared by all requests */
  contexts: ContextStore;

  /** External tool adapter; the only way pipelines start a process */
  runner: ToolRunner;

  /** Timeouts and tool options */
  config: AppConfig;
}

/**
 * Long-lived services a ToolContext is built from
 */
export interface ContextServices {
  contexts: ContextStore;
  runner: ToolRunner;
  config: AppConfig;
}

/**
 * Create a ToolContext for tool execution.
 *
 * @example
 * ```typescript
 * const ctx = createToolContext(logger, { contexts, runner, config });
 * const result = await validateManifestTool.handler({ path: './deploy' }, ctx);
 * ```
 */
export function createToolContext(logger: Logger, services: ContextServices): ToolContext {
  return {
    logger,
    contexts: services.contexts,
    runner: services.runner,
    config: services.config,
  };
}
