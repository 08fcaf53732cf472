import type { AuditEntry } from './schema.js'

/**
 * Metadata keys that must never reach the audit log, at any depth.
 * Labeled payloads and whole documents stay out of the trail; labels and
 * keys may be logged.
 */
const NEVER_LOG_KEYS = new Set(['payload', 'value', 'document'])

/**
 * Maximum length for error messages in audit logs.
 */
const MAX_ERROR_MESSAGE_LENGTH = 500

/**
 * Sanitize an audit entry before it is written.
 *
 * Every store calls this on append.
 */
export function sanitizeAuditEntry(entry: AuditEntry): AuditEntry {
  if (!entry.metadata) return { ...entry }

  const metadata = stripNeverLog(entry.metadata)
  if (typeof metadata.errorMessage === 'string') {
    metadata.errorMessage = sanitizeErrorMessage(metadata.errorMessage)
  }

  return { ...entry, metadata }
}

/**
 * Truncate an error message to the audit limit.
 */
export function sanitizeErrorMessage(msg: string): string {
  return msg.slice(0, MAX_ERROR_MESSAGE_LENGTH)
}

function stripNeverLog(
  record: Record<string, unknown>
): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(record)) {
    if (NEVER_LOG_KEYS.has(key)) continue
    out[key] = isPlainRecord(value) ? stripNeverLog(value) : value
  }

  return out
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
