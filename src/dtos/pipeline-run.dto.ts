import { z } from 'zod';

export const PipelineRunConditionSchema = z
  .object({
    type: z.string(),
    status: z.enum(['True', 'False', 'Unknown']),
    reason: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export const PipelineRunStatusSchema = z
  .object({
    conditions: z.array(PipelineRunConditionSchema).default([]),
    results: z.array(z.object({ name: z.string(), value: z.unknown() })).default([]),
    completionTime: z.string().optional(),
  })
  .passthrough();

export type PipelineRunStatusDto = z.infer<typeof PipelineRunStatusSchema>;
