import { z } from 'zod';
import { manifestPath } from '../shared/schemas';

export const validateManifestSchema = z.object({
  path: manifestPath,
});

export type ValidateManifestParams = z.infer<typeof validateManifestSchema>;
