import { z } from 'zod';
import { formatUtcSeconds } from './exportWindow.js';

/**
 * A single audited action, as written to the raw export.
 */
export interface AuditEvent {
  readonly id: string;
  /** Second-precision UTC ISO-8601 */
  readonly timestamp: string;
  readonly actor: string;
  readonly action: string;
  readonly target: string;
  /** JSON of the provider's event data */
  readonly detail: string;
}

/** Events in retrieval order */
export type ExportBatch = readonly AuditEvent[];

const ReferenceSchema = z.object({
  guid: z.string(),
  type: z.string(),
  name: z.string().nullable().default(''),
});

/**
 * Cloud Controller v3 audit event resource (fields we consume).
 */
export const CfAuditEventSchema = z.object({
  guid: z.string().min(1),
  created_at: z.string().datetime({ offset: true }),
  type: z.string().min(1),
  actor: ReferenceSchema,
  target: ReferenceSchema,
  data: z.record(z.unknown()).nullable().default({}),
});

export const CfAuditEventPageSchema = z.object({
  pagination: z.object({
    total_results: z.number().int().nonnegative(),
    next: z.object({ href: z.string() }).nullable(),
  }),
  resources: z.array(CfAuditEventSchema),
});

export const CfErrorBodySchema = z.object({
  errors: z
    .array(
      z.object({
        code: z.number().optional(),
        title: z.string().optional(),
        detail: z.string().optional(),
      })
    )
    .min(1),
});

export type CfAuditEvent = z.infer<typeof CfAuditEventSchema>;
export type CfAuditEventPage = z.infer<typeof CfAuditEventPageSchema>;

export function toAuditEvent(resource: CfAuditEvent): AuditEvent {
  return Object.freeze({
    id: resource.guid,
    timestamp: formatUtcSeconds(new Date(resource.created_at)),
    actor: resource.actor.name ?? '',
    action: resource.type,
    target: resource.target.name ?? '',
    detail: JSON.stringify(resource.data ?? {}),
  });
}
