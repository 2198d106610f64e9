import type { z, ZodRawShape } from 'zod';
import type { Result } from './core';
import type { ToolContext } from '@/core/context';
import type { ToolName } from '@/tools';

/**
 * Tool grouping used by `--list-tools` and the runtime listing
 */
export type ToolCategory = 'context' | 'cluster' | 'offline' | 'reconciler';

/**
 * Chain hints for tool workflow guidance
 */
export interface ChainHints {
  /** Guidance message shown after successful execution */
  success: string;
  /** Guidance message shown after failed execution */
  failure: string;
}

/**
 * Tool interface for all MCP tools
 */
export interface Tool<
  TSchema extends z.ZodObject<ZodRawShape> = z.ZodObject<ZodRawShape>,
  TOut = unknown,
> {
  /** Unique tool identifier - must be a valid ToolName */
  name: ToolName;

  /** Human-readable description, shown to the calling agent */
  description: string;

  category?: ToolCategory;

  version?: string;

  /** Whether the tool refuses to run until a cluster context is selected */
  requiresContext: boolean;

  /** Raw Zod schema shape for MCP registration */
  inputSchema: ZodRawShape;

  /** Zod schema for validation (kept internally for parsing) */
  schema: TSchema;

  /** Optional workflow guidance hints for tool chaining */
  chainHints?: ChainHints;

  /** Parse and validate untyped arguments to strongly-typed input (matches Zod API) */
  parse(args: unknown): z.infer<TSchema>;

  /**
   * Tool handler with pre-validated, strongly-typed input.
   * Declared as a method so concrete tools fit a `Tool[]` registry.
   */
  handler(input: z.infer<TSchema>, context: ToolContext): Promise<Result<TOut>>;
}

/**
 * Lightweight helper to create tools with reduced boilerplate
 * Automatically extracts inputSchema and creates parse method from Zod schema
 */
export function tool<TSchema extends z.ZodObject<ZodRawShape>, TOut>(config: {
  name: ToolName;
  description: string;
  schema: TSchema;
  requiresContext: boolean;
  handler: (input: z.infer<TSchema>, context: ToolContext) => Promise<Result<TOut>>;
  category?: ToolCategory;
  version?: string;
  chainHints?: ChainHints;
}): Tool<TSchema, TOut> {
  return {
    ...config,
    inputSchema: config.schema.shape,
    parse: (args: unknown) => config.schema.parse(args),
  };
}
