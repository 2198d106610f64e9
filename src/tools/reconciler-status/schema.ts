import { z } from 'zod';

export const reconcilerStatusSchema = z.object({});

export type ReconcilerStatusParams = z.infer<typeof reconcilerStatusSchema>;
