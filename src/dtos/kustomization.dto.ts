import { z } from 'zod';
import { ImageOverrideSchema } from './application.dto';

export const KUSTOMIZATION_FILE = 'kustomization.yaml';

export const KustomizationSchema = z.object({
  namespace: z.string().min(1).optional(),
  resources: z.array(z.string().min(1)).default([]),
  patches: z
    .array(z.union([z.string().min(1), z.object({ path: z.string().min(1) })]))
    .default([])
    .transform((patches) => patches.map((patch) => (typeof patch === 'string' ? patch : patch.path))),
  commonLabels: z.record(z.string()).optional(),
  images: z.array(ImageOverrideSchema).optional(),
});

export type Kustomization = z.infer<typeof KustomizationSchema>;
