import { z } from 'zod';
import { HELM } from '@/config/constants';
import { namespaceOptional } from '../shared/schemas';

export const validateChartSchema = z.object({
  chartPath: z.string().trim().min(1, 'Chart path cannot be empty').describe('Helm chart directory (containing Chart.yaml)'),
  valuesFile: z.string().trim().min(1).optional().describe('Values file passed to helm with -f'),
  namespace: namespaceOptional,
  releaseName: z
    .string()
    .trim()
    .min(1)
    .default(HELM.DEFAULT_RELEASE_NAME)
    .describe('Release name used when rendering templates'),
});

export type ValidateChartParams = z.infer<typeof validateChartSchema>;
