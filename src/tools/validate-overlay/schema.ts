import { z } from 'zod';

export const validateOverlaySchema = z.object({
  path: z
    .string()
    .trim()
    .min(1, 'Path cannot be empty')
    .describe('Kustomize overlay directory, or the kustomization.yaml inside it'),
});

export type ValidateOverlayParams = z.infer<typeof validateOverlaySchema>;
