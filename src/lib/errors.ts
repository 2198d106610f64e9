/**
 * Error message helpers shared across layers
 */

/**
 * Normalize any thrown value into a readable message
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

export const ERROR_MESSAGES = {
  TOOL_NOT_FOUND: (name: string): string => `Tool not found: ${name}`,
  VALIDATION_FAILED: (issues: string): string => `Validation failed: ${issues}`,
  NO_CONTEXT_SELECTED:
    'No context selected. Call select-context first. Use list-contexts to see available contexts.',
} as const;
