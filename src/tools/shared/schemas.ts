/**
 * Shared Zod schemas for tool parameters
 * Common building blocks to reduce duplication across tools
 */

import { z } from 'zod';

// Paths
export const manifestPath = z
  .string()
  .trim()
  .min(1, 'Path cannot be empty')
  .describe(
    'Path to a YAML file or a directory of manifests. `~` is expanded and relative paths resolve against the server working directory',
  );

export const contextName = z
  .string()
  .trim()
  .min(1, 'Context name cannot be empty')
  .describe('Name of a kubeconfig context, as listed by list-contexts');

export const namespaceOptional = z
  .string()
  .trim()
  .min(1)
  .optional()
  .describe('Kubernetes namespace passed to helm template');
