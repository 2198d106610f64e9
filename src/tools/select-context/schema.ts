import { z } from 'zod';
import { contextName } from '../shared/schemas';

export const selectContextSchema = z.object({
  context: contextName,
});

export type SelectContextParams = z.infer<typeof selectContextSchema>;
