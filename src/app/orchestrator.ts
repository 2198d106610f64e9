/**
 * Tool Orchestrator
 * Validates parameters, enforces the context gate and runs tool handlers
 */

import type { z } from 'zod';
import type { Logger } from 'pino';
import { type Result, Success, Failure } from '@/types/index';
import { createLogger } from '@/lib/logger';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import { createToolContext, type ContextServices } from '@/core/context';
import { requireContext } from '@/session/context-store';
import type { Tool } from '@/types/tool';
import {
  type ToolOrchestrator,
  type OrchestratorConfig,
  type ExecuteRequest,
  CHAINHINTSMODE,
} from './orchestrator-types';

interface ExecutionEnvironment {
  logger: Logger;
  config: OrchestratorConfig;
  services: ContextServices;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A successful run can still carry a negative verdict (a failing report,
 * an unhealthy reconciler)
 */
function reportsProblem(value: Record<string, unknown>): boolean {
  return value.ok === false || value.healthy === false;
}

/**
 * Create a tool orchestrator
 */
export function createOrchestrator(options: {
  registry: Map<string, Tool>;
  services: ContextServices;
  logger?: Logger;
  config?: OrchestratorConfig;
}): ToolOrchestrator {
  const { registry, services, config = { chainHintsMode: CHAINHINTSMODE.ENABLED } } = options;
  const logger = options.logger || createLogger({ name: 'orchestrator' });

  async function execute(request: ExecuteRequest): Promise<Result<unknown>> {
    const { toolName } = request;
    const tool = registry.get(toolName);

    if (!tool) {
      return Failure(ERROR_MESSAGES.TOOL_NOT_FOUND(toolName));
    }

    const contextualLogger = logger.child({
      tool: tool.name,
      ...(request.metadata?.loggerContext ?? {}),
    });

    return await executeWithOrchestration(tool, request, {
      logger: contextualLogger,
      config,
      services,
    });
  }

  return { execute };
}

/**
 * Execute a single tool: validate, gate, run, annotate
 */
async function executeWithOrchestration(
  tool: Tool,
  request: ExecuteRequest,
  env: ExecutionEnvironment,
): Promise<Result<unknown>> {
  const { logger } = env;

  // Validate parameters using Zod safeParse
  const validation = validateParams(request.params, tool.schema);
  if (!validation.ok) return validation;
  const validatedParams = validation.value;

  // Cluster-facing tools never reach a subprocess without a selection
  if (tool.requiresContext) {
    const selected = requireContext(env.services.contexts);
    if (!selected.ok) {
      logger.warn('Tool requires a selected context');
      return withFailureHint(selected, tool, env.config);
    }
  }

  const toolContext = createToolContext(logger, env.services);
  const startTime = Date.now();

  try {
    const result = await tool.handler(validatedParams, toolContext);
    const durationMs = Date.now() - startTime;

    logger.debug({ durationMs, success: result.ok }, 'Tool execution finished');

    if (!result.ok) {
      logger.info({ durationMs, error: result.error }, 'Tool returned a failure');
      return withFailureHint(result, tool, env.config);
    }

    if (env.config.chainHintsMode === CHAINHINTSMODE.ENABLED && tool.chainHints && isRecord(result.value)) {
      const nextSteps = reportsProblem(result.value) ? tool.chainHints.failure : tool.chainHints.success;
      return Success({ ...result.value, nextSteps });
    }
    return result;
  } catch (error) {
    const errorMessage = extractErrorMessage(error) || 'Unknown error';
    logger.error({ error: errorMessage, durationMs: Date.now() - startTime }, 'Tool execution failed');
    return Failure(errorMessage);
  }
}

/**
 * Attach the tool's failure chain hint as `details.nextSteps`
 */
function withFailureHint<T>(result: Result<T>, tool: Tool, config: OrchestratorConfig): Result<T> {
  if (result.ok || !tool.chainHints || config.chainHintsMode !== CHAINHINTSMODE.ENABLED) {
    return result;
  }
  const guidance = result.guidance ?? {};
  return Failure(result.error, {
    ...guidance,
    details: { ...guidance.details, nextSteps: tool.chainHints.failure },
  });
}

/**
 * Validate parameters against schema using safeParse
 */
function validateParams<T extends z.ZodTypeAny>(params: unknown, schema: T): Result<z.infer<T>> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    return Failure(ERROR_MESSAGES.VALIDATION_FAILED(issues), {
      message: 'Invalid tool parameters',
      hint: issues,
      resolution: 'Check the parameter names and types against the tool input schema',
    });
  }
  return Success(parsed.data);
}
