import { HealthStatus, SyncState } from '@/enums/health-status.enum';
import { ObjectOutcome } from '@/enums/object-action.enum';
import { ReconcilePhase } from '@/enums/reconcile-phase.enum';
import { z } from 'zod';

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export const ApplicationKind = 'Application' as const;

export const ImageOverrideSchema = z.object({
  name: z.string().min(1),
  newName: z.string().min(1).optional(),
  newTag: z.string().min(1).optional(),
  digest: z
    .string()
    .regex(/^sha256:[a-f0-9]{64}$/, 'must be a sha256 digest')
    .optional(),
});

export const SyncPolicySchema = z.object({
  mode: z.enum(['manual', 'automated']).default('manual'),
  selfHeal: z.boolean().default(false),
  prune: z.boolean().default(false),
});

export const ApplicationSpecSchema = z.object({
  source: z.object({
    repoURL: z.string().min(1),
    path: z.string().min(1).default('.'),
    targetRevision: z.string().min(1).default('HEAD'),
    images: z.array(ImageOverrideSchema).optional(),
  }),
  destination: z.object({
    namespace: z.string().max(63).regex(DNS_LABEL, 'must be a lowercase DNS label'),
  }),
  syncPolicy: SyncPolicySchema.default({}),
  imagePromotion: z.object({ image: z.string().min(1) }).optional(),
});

export const ErrorSummarySchema = z.object({
  kind: z.enum(['NotFound', 'ValidationError', 'ConflictError', 'RenderError', 'TransientIOError', 'Fatal']),
  message: z.string(),
});

export const ResourceResultSchema = z.object({
  kind: z.string(),
  namespace: z.string().optional(),
  name: z.string(),
  outcome: z.nativeEnum(ObjectOutcome),
  attempts: z.number().int().nonnegative(),
  health: z.nativeEnum(HealthStatus),
  message: z.string().optional(),
});

export const SyncResultSchema = z.object({
  fingerprint: z.string().optional(),
  revision: z.string().optional(),
  phase: z.nativeEnum(ReconcilePhase),
  health: z.nativeEnum(HealthStatus),
  sync: z.nativeEnum(SyncState),
  finishedAt: z.string(),
  error: ErrorSummarySchema.optional(),
});

export const SyncStatusSchema = z.object({
  phase: z.nativeEnum(ReconcilePhase).default(ReconcilePhase.Idle),
  health: z.nativeEnum(HealthStatus).default(HealthStatus.Unknown),
  sync: z.nativeEnum(SyncState).default(SyncState.Unknown),
  lastAttemptedFingerprint: z.string().optional(),
  lastSyncedFingerprint: z.string().optional(),
  revision: z.string().optional(),
  resources: z.array(ResourceResultSchema).default([]),
  lastError: ErrorSummarySchema.optional(),
  reconciledAt: z.string().optional(),
  history: z.array(SyncResultSchema).default([]),
});

export const ApplicationMetadataSchema = z
  .object({
    name: z.string().min(1).max(63).regex(DNS_LABEL, 'must be a lowercase DNS label'),
    namespace: z.string().min(1).optional(),
    resourceVersion: z.string().optional(),
    deletionTimestamp: z.string().optional(),
  })
  .passthrough();

export const ApplicationSchema = z.object({
  apiVersion: z.string().min(1),
  kind: z.literal(ApplicationKind),
  metadata: ApplicationMetadataSchema,
  spec: ApplicationSpecSchema,
  status: SyncStatusSchema.optional(),
});

export type ImageOverride = z.infer<typeof ImageOverrideSchema>;
export type SyncPolicy = z.infer<typeof SyncPolicySchema>;
export type ApplicationSpec = z.infer<typeof ApplicationSpecSchema>;
export type ApplicationSpecInput = z.input<typeof ApplicationSpecSchema>;
export type ErrorSummary = z.infer<typeof ErrorSummarySchema>;
export type ResourceResult = z.infer<typeof ResourceResultSchema>;
export type SyncResult = z.infer<typeof SyncResultSchema>;
export type SyncStatus = z.infer<typeof SyncStatusSchema>;
export type ApplicationDto = z.infer<typeof ApplicationSchema>;
