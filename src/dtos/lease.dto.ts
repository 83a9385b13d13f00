import { z } from 'zod';

export const LeaseSpecSchema = z
  .object({
    holderIdentity: z.string().optional(),
    leaseDurationSeconds: z.number().int().positive().optional(),
    acquireTime: z.string().optional(),
    renewTime: z.string().optional(),
  })
  .passthrough();

export type LeaseSpecDto = z.infer<typeof LeaseSpecSchema>;
