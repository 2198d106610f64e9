/**
 * Core Module Exports
 *
 * Foundational types and utilities with no MCP dependencies.
 */

export type { ToolContext, ContextServices } from './context';
export { createToolContext } from './context';
