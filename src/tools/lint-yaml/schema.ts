import { z } from 'zod';
import { manifestPath } from '../shared/schemas';

export const lintYamlSchema = z.object({
  path: manifestPath,
});

export type LintYamlParams = z.infer<typeof lintYamlSchema>;
