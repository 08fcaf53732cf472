import { z } from 'zod'

export const AuditCategorySchema = z.enum(['label', 'render', 'config'])

export const AuditSeveritySchema = z.enum([
  'debug',
  'info',
  'warning',
  'alert',
  'critical',
])

/**
 * Audit entry schema.
 *
 * Timestamps are coerced: a Date becomes an ISO string in JSONL and is read
 * back as a Date.
 */
export const AuditEntrySchema = z.object({
  id: z.string(),
  timestamp: z.coerce.date(),
  category: AuditCategorySchema,
  action: z.string(),
  severity: AuditSeveritySchema,
  metadata: z.record(z.unknown()).optional(),
})

export type AuditEntry = z.infer<typeof AuditEntrySchema>
