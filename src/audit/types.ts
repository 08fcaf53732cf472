/**
 * Audit event categories.
 */
export type AuditCategory =
  | 'label' // Label changes and clearance violations
  | 'render' // Render mode decisions
  | 'config' // Configuration loading and validation

/**
 * Audit event severity levels, lowest first.
 */
export type AuditSeverity =
  | 'debug'
  | 'info'
  | 'warning'
  | 'alert'
  | 'critical'

export const SEVERITY_ORDER: Record<AuditSeverity, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  alert: 3,
  critical: 4,
}

// NOTE: AuditEntry is defined in schema.ts and re-exported from index.ts
