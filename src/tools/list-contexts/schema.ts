import { z } from 'zod';

export const listContextsSchema = z.object({});

export type ListContextsParams = z.infer<typeof listContextsSchema>;
