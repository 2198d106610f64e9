/**
 * Per-execution helpers for tool handlers
 */

import type { Logger } from 'pino';
import type { ToolContext } from '@/core/context';
import { extractErrorMessage } from './errors';

export interface ToolTimer {
  /** Log completion with elapsed time and optional result fields */
  end(fields?: Record<string, unknown>): void;
  error(error: unknown): void;
}

export function createToolTimer(logger: Logger, toolName: string): ToolTimer {
  const startedAt = Date.now();
  return {
    end(fields = {}) {
      logger.info({ tool: toolName, durationMs: Date.now() - startedAt, ...fields }, 'Tool completed');
    },
    error(error) {
      logger.error(
        { tool: toolName, durationMs: Date.now() - startedAt, error: extractErrorMessage(error) },
        'Tool failed',
      );
    },
  };
}

/**
 * Logger and timer for one handler run
 */
export function setupToolContext(
  ctx: ToolContext,
  toolName: string,
): { logger: Logger; timer: ToolTimer } {
  return { logger: ctx.logger, timer: createToolTimer(ctx.logger, toolName) };
}
