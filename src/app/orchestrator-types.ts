/**
 * Orchestrator Types
 * Types for tool orchestration
 */

import type { Result } from '@/types/index';

/**
 * Request to execute a tool
 */
export interface ExecuteRequest {
  toolName: string;
  params: unknown;
  metadata?: ExecuteMetadata;
}

/**
 * Optional execution metadata supplied by transports or callers
 */
export interface ExecuteMetadata {
  /** Extra bindings for the per-execution child logger (transport, requestId) */
  loggerContext?: Record<string, unknown>;
}

/**
 * Orchestrator interface
 */
export interface ToolOrchestrator {
  execute(request: ExecuteRequest): Promise<Result<unknown>>;
}

export const CHAINHINTSMODE = {
  ENABLED: 'enabled',
  DISABLED: 'disabled',
} as const;
export type ChainHintsMode = (typeof CHAINHINTSMODE)[keyof typeof CHAINHINTSMODE];

/**
 * Orchestrator configuration
 */
export interface OrchestratorConfig {
  chainHintsMode: ChainHintsMode;
}
