import { z } from 'zod';
import { KUBECONFORM } from '@/config/constants';
import { manifestPath } from '../shared/schemas';

export const validateSchemaSchema = z.object({
  path: manifestPath,
  kubernetesVersion: z
    .string()
    .trim()
    .min(1)
    .default(KUBECONFORM.DEFAULT_KUBERNETES_VERSION)
    .describe('Kubernetes version whose schemas are used, e.g. 1.29.0 (default: master)'),
  strict: z.boolean().default(false).describe('Reject properties not defined in the schema'),
});

export type ValidateSchemaParams = z.infer<typeof validateSchemaSchema>;
