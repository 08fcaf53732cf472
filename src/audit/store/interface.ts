import type { AuditEntry } from '../schema.js'

/**
 * Where audit entries are written. The log is append-only; reading it
 * back is left to operators and their tools.
 */
export interface AuditStore {
  /** Append one entry. Stores sanitize it before writing. */
  append(entry: AuditEntry): Promise<void>
}
