/**
 * Application Entry Point - AppRuntime Implementation
 * Provides type-safe runtime with dependency injection support
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { createLogger } from '@/lib/logger';
import { ALL_TOOLS, type ToolName } from '@/tools';
import type { Tool } from '@/types/tool';
import {
  createMCPServer,
  OUTPUTFORMAT,
  registerToolsWithServer,
  type MCPServer,
} from '@/mcp/mcp-server';
import { defaultConfig } from '@/config/index';
import { createProcessRunner } from '@/infra/process/runner';
import { checkToolchain } from '@/infra/health/checks';
import { createContextStore, selectionName } from '@/session/context-store';
import type { ContextServices } from '@/core/context';
import { createOrchestrator } from './orchestrator';
import { CHAINHINTSMODE, type ExecuteRequest } from './orchestrator-types';
import type { Result } from '@/types';
import type {
  AppRuntime,
  AppRuntimeConfig,
  ToolInputMap,
  ToolResultMap,
  ExecutionMetadata,
} from '@/types/runtime';

/**
 * Transport configuration for MCP server
 */
export interface TransportConfig {
  transport: 'stdio';
}

export const APP_NAME = 'kube-preflight';

/**
 * Create the preflight application with AppRuntime interface
 */
export function createApp(config: AppRuntimeConfig = {}): AppRuntime {
  const logger = config.logger || createLogger({ name: APP_NAME });
  const appConfig = config.appConfig ?? defaultConfig();

  const runner =
    config.runner ?? createProcessRunner(logger, { killGracePeriodMs: appConfig.killGracePeriodMs });
  const contexts =
    config.contexts ?? createContextStore({ runner, logger, timeoutMs: appConfig.timeouts.kubectl });
  const services: ContextServices = { contexts, runner, config: appConfig };

  const tools: readonly Tool[] = config.tools || ALL_TOOLS;
  const toolsMap = new Map<string, Tool>();
  for (const tool of tools) {
    toolsMap.set(tool.name, tool);
  }
  const toolList = Array.from(toolsMap.values());

  const chainHintsMode = config.chainHintsMode || CHAINHINTSMODE.ENABLED;
  const outputFormat = config.outputFormat || appConfig.outputFormat || OUTPUTFORMAT.NATURAL_LANGUAGE;

  const orchestrator = createOrchestrator({
    registry: toolsMap,
    services,
    logger,
    config: { chainHintsMode },
  });

  let activeMcpServer: MCPServer | null = null;

  const orchestratedExecute = (request: ExecuteRequest): Promise<Result<unknown>> => {
    logger.debug({ toolName: request.toolName }, 'Executing tool');
    return orchestrator.execute(request);
  };

  const status = (): Record<string, unknown> => ({
    selectedContext: selectionName(contexts.current()),
  });

  return {
    /**
     * Configuration values from createApp
     */
    config: {
      chainHintsMode,
      outputFormat,
    },

    /**
     * Execute a tool with type-safe parameters and results
     */
    execute: async <T extends ToolName>(
      toolName: T,
      params: ToolInputMap[T],
      metadata?: ExecutionMetadata,
    ): Promise<Result<ToolResultMap[T]>> =>
      orchestratedExecute({
        toolName,
        params,
        metadata: {
          loggerContext: {
            transport: metadata?.transport || 'programmatic',
            requestId: metadata?.requestId,
            ...metadata,
          },
        },
      }) as Promise<Result<ToolResultMap[T]>>,

    /**
     * Start MCP server with the specified transport
     */
    startServer: async (transport: TransportConfig) => {
      if (activeMcpServer) {
        throw new Error('MCP server is already running');
      }

      const mcpServer = createMCPServer(
        toolList,
        {
          logger,
          transport: transport.transport,
          name: APP_NAME,
          version: '1.0.0',
          outputFormat,
          chainHintsMode,
          status,
        },
        orchestratedExecute,
      );

      await mcpServer.start();
      activeMcpServer = mcpServer;
      return mcpServer;
    },

    /**
     * Bind to existing MCP server
     */
    bindToMCP: (server: McpServer, transportLabel = 'external') => {
      registerToolsWithServer({
        outputFormat,
        chainHintsMode,
        server,
        tools: toolList,
        logger,
        transport: transportLabel,
        execute: orchestratedExecute,
      });
    },

    /**
     * List all available tools with their metadata
     */
    listTools: () =>
      toolList.map((t) => ({
        name: t.name,
        description: t.description,
        requiresContext: t.requiresContext,
        ...(t.version && { version: t.version }),
        ...(t.category && { category: t.category }),
      })),

    selectedContext: () => contexts.current(),

    /**
     * Perform health check
     */
    healthCheck: async () => {
      const toolCount = toolsMap.size;
      const dependencies = await checkToolchain(runner, logger);

      const missing = Object.entries(dependencies)
        .filter(([, dependency]) => !dependency.available)
        .map(([name]) => name);
      const status: 'healthy' | 'unhealthy' = missing.length > 0 ? 'unhealthy' : 'healthy';

      return {
        status,
        tools: toolCount,
        message:
          missing.length > 0
            ? `${toolCount} tools loaded, but ${missing.join(', ')} unavailable`
            : `${toolCount} tools loaded`,
        dependencies,
      };
    },

    /**
     * Stop the server if running
     */
    stop: async () => {
      if (activeMcpServer) {
        await activeMcpServer.stop();
        activeMcpServer = null;
      }
    },
  };
}
