// Schema and types
export {
  AuditEntrySchema,
  AuditCategorySchema,
  AuditSeveritySchema,
  type AuditEntry,
} from './schema.js'
export { SEVERITY_ORDER, type AuditCategory, type AuditSeverity } from './types.js'

// Redaction
export { sanitizeAuditEntry, sanitizeErrorMessage } from './redaction.js'

// Store
export { JsonlAuditStore, type AuditStore } from './store/index.js'

// Service
export {
  AuditLogger,
  type AuditOptions,
  type AuditLoggerOptions,
} from './service.js'
