import { z } from 'zod';

const DNS_SUBDOMAIN = /^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/;

export const ObjectMetadataSchema = z
  .object({
    name: z.string().min(1).max(253).regex(DNS_SUBDOMAIN, 'must be a lowercase DNS subdomain'),
    namespace: z.string().min(1).max(63).regex(DNS_SUBDOMAIN, 'must be a lowercase DNS label').optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  })
  .passthrough();

export const ManifestObjectSchema = z
  .object({
    apiVersion: z.string().min(1),
    kind: z.string().regex(/^[A-Z][A-Za-z0-9]*$/, 'must be a CamelCase kind'),
    metadata: ObjectMetadataSchema,
  })
  .passthrough();

export type ManifestObjectDto = z.infer<typeof ManifestObjectSchema>;
