import { z } from 'zod';

export const checkReconcilerSchema = z.object({});

export type CheckReconcilerParams = z.infer<typeof checkReconcilerSchema>;
