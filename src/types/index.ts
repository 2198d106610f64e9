/**
 * Core type definitions for the preflight validation server.
 * Provides the Result type for error handling and tool system interfaces.
 */

export * from './core';
export * from './tool';

/**
 * Tool execution context
 *
 * @remarks
 * ToolContext provides what every tool handler needs:
 * - `logger`: Structured logging with Pino
 * - `contexts`: The process-wide cluster context selection
 * - `runner`: The external tool adapter
 * - `config`: Timeouts and tool options
 *
 * @public
 */
export type { ToolContext } from '../core/context';
