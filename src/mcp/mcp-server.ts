/**
 * MCP Server
 *
 * Exposes every tool over stdio. Calls go through the orchestrator; this
 * layer only strips `_meta`, renders the result in the configured output
 * format and turns failures into MCP errors carrying their guidance.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  McpError,
  ErrorCode,
  type ServerRequest,
  type ServerNotification,
} from '@modelcontextprotocol/sdk/types.js';
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import { extractErrorMessage } from '@/lib/errors';
import { createLogger, type Logger } from '@/lib/logger';
import type { Tool } from '@/types/tool';
import {
  type ExecuteRequest,
  type ExecuteMetadata,
  type ChainHintsMode,
  CHAINHINTSMODE,
} from '@/app/orchestrator-types';
import type { Result, ErrorGuidance } from '@/types';
import type { ValidationReport } from '@/validation/types';
import type { ListContextsResult } from '@/tools/list-contexts/tool';
import type { SelectContextResult } from '@/tools/select-context/tool';
import type { CheckReconcilerResult } from '@/tools/check-reconciler/tool';
import {
  formatValidationReportNarrative,
  formatListContextsNarrative,
  formatSelectContextNarrative,
  formatCheckReconcilerNarrative,
} from '@/mcp/formatters/natural-language-formatters';

const STATUS_URI = 'preflight://status';

export interface ServerOptions {
  logger?: Logger;
  transport?: 'stdio';
  name?: string;
  version?: string;
  outputFormat?: OutputFormat;
  chainHintsMode?: ChainHintsMode;
  /** Extra fields for the status resource, read on every request */
  status?: () => Record<string, unknown>;
}

export interface MCPServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  getServer(): Server;
  getTools(): Array<{ name: string; description: string }>;
}

/**
 * How tool results are rendered into the MCP text content
 *
 * @property JSON - the result object, pretty-printed
 * @property TEXT - the `summary` field alone
 * @property MARKDOWN - summary plus the rest folded into a details block
 * @property NATURAL_LANGUAGE - text report or per-tool narrative
 */
export const OUTPUTFORMAT = {
  MARKDOWN: 'markdown',
  JSON: 'json',
  TEXT: 'text',
  NATURAL_LANGUAGE: 'natural-language',
} as const;
export type OutputFormat = (typeof OUTPUTFORMAT)[keyof typeof OUTPUTFORMAT];

type ToolExecutor = (request: ExecuteRequest) => Promise<Result<unknown>>;

export interface RegisterOptions<TTool extends Tool = Tool> {
  outputFormat: OutputFormat;
  chainHintsMode?: ChainHintsMode;
  server: McpServer;
  tools: readonly TTool[];
  logger: Logger;
  transport: string;
  execute: ToolExecutor;
}

type HandlerExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Error text sent back to the agent: message, hint, resolution and the
 * failure chain hint, separated by blank lines
 */
function describeFailure(error: string, guidance?: ErrorGuidance): string {
  if (!guidance) {
    return error || 'Tool execution failed';
  }

  const sections = [error];
  if (guidance.hint) sections.push(`Hint: ${guidance.hint}`);
  sections.push(`Resolution: ${guidance.resolution || 'Check the server log for details'}`);

  const nextSteps = guidance.details?.nextSteps;
  if (typeof nextSteps === 'string') sections.push(`Next Steps: ${nextSteps}`);

  return sections.join('\n\n');
}

export function createMCPServer<TTool extends Tool>(
  tools: Array<TTool>,
  options: ServerOptions = {},
  execute: ToolExecutor,
): MCPServer {
  const logger = options.logger || createLogger({ name: 'mcp-server' });
  const identity = {
    name: options.name || 'kube-preflight',
    version: options.version || '1.0.0',
  };
  const transport = options.transport ?? 'stdio';

  const server = new McpServer(identity);
  let stdio: StdioServerTransport | null = null;

  registerToolsWithServer({
    outputFormat: options.outputFormat ?? OUTPUTFORMAT.NATURAL_LANGUAGE,
    chainHintsMode: options.chainHintsMode ?? CHAINHINTSMODE.ENABLED,
    server,
    tools,
    logger,
    transport,
    execute,
  });

  server.resource(
    'status',
    STATUS_URI,
    {
      title: 'Preflight Status',
      description: 'Server state and the currently selected cluster context',
    },
    async () => ({
      contents: [
        {
          uri: STATUS_URI,
          mimeType: 'application/json',
          text: JSON.stringify(
            {
              running: stdio !== null,
              tools: tools.length,
              transport,
              ...(options.status?.() ?? {}),
              timestamp: new Date().toISOString(),
            },
            null,
            2,
          ),
        },
      ],
    }),
  );

  return {
    async start(): Promise<void> {
      if (stdio) {
        throw new Error('Server is already running');
      }

      const connecting = new StdioServerTransport();
      await server.connect(connecting);
      stdio = connecting;

      logger.info({ version: identity.version, transport, toolCount: tools.length }, 'MCP server started');
    },

    async stop(): Promise<void> {
      if (!stdio) return;

      await server.close();
      stdio = null;
      logger.info({ transport }, 'MCP server stopped');
    },

    getServer(): Server {
      return server.server;
    },

    getTools(): Array<{ name: string; description: string }> {
      return tools.map((t) => ({ name: t.name, description: t.description }));
    },
  };
}

/**
 * Split `_meta` off the call arguments and turn it into logger bindings
 */
function splitMeta(
  toolName: string,
  transport: string,
  params: Record<string, unknown>,
  extra: HandlerExtra,
): { args: Record<string, unknown>; metadata: ExecuteMetadata } {
  const { _meta: meta, ...args } = params;
  const loggerContext: Record<string, unknown> = { transport, tool: toolName };

  if (isRecord(meta)) {
    if (typeof meta.requestId === 'string') loggerContext.requestId = meta.requestId;
    if (typeof meta.invocationId === 'string') loggerContext.invocationId = meta.invocationId;
  }
  if (extra.requestId !== undefined) loggerContext.mcpRequestId = extra.requestId;

  return { args, metadata: { loggerContext } };
}

function createHandler(
  toolName: string,
  transport: string,
  outputFormat: OutputFormat,
  chainHintsMode: ChainHintsMode,
  execute: ToolExecutor,
) {
  return async (rawParams: Record<string, unknown> | undefined, extra: HandlerExtra) => {
    try {
      const { args, metadata } = splitMeta(toolName, transport, rawParams ?? {}, extra);
      const result = await execute({ toolName, params: args, metadata });

      if (!result.ok) {
        throw new McpError(ErrorCode.InternalError, describeFailure(result.error, result.guidance));
      }

      return {
        content: [{ type: 'text' as const, text: formatOutput(result.value, outputFormat, chainHintsMode) }],
      };
    } catch (error) {
      throw error instanceof McpError ? error : new McpError(ErrorCode.InternalError, extractErrorMessage(error));
    }
  };
}

/**
 * Register each tool on an MCP server, with its raw zod shape as the input
 * schema and the orchestrator as executor
 */
export function registerToolsWithServer<TTool extends Tool>(options: RegisterOptions<TTool>): void {
  const { server, tools, transport, execute, outputFormat, chainHintsMode = CHAINHINTSMODE.ENABLED } = options;

  for (const tool of tools) {
    const handler = createHandler(tool.name, transport, outputFormat, chainHintsMode, execute);

    // The SDK's generic tool() signature hits TS2589 on these shapes; the
    // orchestrator parses arguments with zod before any handler runs
    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    (server as McpServer & { tool: any }).tool(tool.name, tool.description, tool.inputSchema, handler);
  }
}

/**
 * Render a tool result in the requested format
 */
export function formatOutput(
  output: unknown,
  format: OutputFormat,
  chainHintsMode: ChainHintsMode = CHAINHINTSMODE.ENABLED,
): string {
  switch (format) {
    case OUTPUTFORMAT.NATURAL_LANGUAGE:
      return formatAsNaturalLanguage(output, chainHintsMode);

    case OUTPUTFORMAT.MARKDOWN: {
      if (isRecord(output) && typeof output.summary === 'string') {
        const { summary, ...rest } = output;
        return `${summary}\n\n<details>\n<summary>View detailed output</summary>\n\n\`\`\`json\n${JSON.stringify(rest, null, 2)}\n\`\`\`\n</details>`;
      }
      return `\`\`\`json\n${JSON.stringify(output, null, 2)}\n\`\`\``;
    }

    case OUTPUTFORMAT.TEXT:
      if (isRecord(output) && typeof output.summary === 'string') {
        return output.summary;
      }
      return typeof output === 'object' && output !== null ? JSON.stringify(output, null, 2) : String(output);

    case OUTPUTFORMAT.JSON:
    default:
      return JSON.stringify(output, null, 2);
  }
}

function formatAsNaturalLanguage(output: unknown, chainHintsMode: ChainHintsMode): string {
  if (!isRecord(output)) {
    return String(output);
  }

  // Most specific shape first
  if (isValidationReport(output)) return formatValidationReportNarrative(output, chainHintsMode);
  if (isCheckReconcilerResult(output)) return formatCheckReconcilerNarrative(output, chainHintsMode);
  if (isListContextsResult(output)) return formatListContextsNarrative(output, chainHintsMode);
  if (isSelectContextResult(output)) return formatSelectContextNarrative(output, chainHintsMode);

  return typeof output.summary === 'string' ? output.summary : JSON.stringify(output, null, 2);
}

function isValidationReport(output: Record<string, unknown>): output is ValidationReport & Record<string, unknown> {
  return 'pipeline' in output && Array.isArray(output.entries) && 'preStages' in output;
}

function isCheckReconcilerResult(
  output: Record<string, unknown>,
): output is CheckReconcilerResult & Record<string, unknown> {
  return typeof output.healthy === 'boolean' && 'outcome' in output && 'output' in output;
}

function isListContextsResult(output: Record<string, unknown>): output is ListContextsResult & Record<string, unknown> {
  return Array.isArray(output.contexts) && 'cliCurrent' in output;
}

function isSelectContextResult(
  output: Record<string, unknown>,
): output is SelectContextResult & Record<string, unknown> {
  return typeof output.selected === 'string' && 'previous' in output;
}
