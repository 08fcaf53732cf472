import { randomUUID } from 'crypto'
import type { AuditEntry } from './schema.js'
import { SEVERITY_ORDER, type AuditCategory, type AuditSeverity } from './types.js'
import type { AuditStore } from './store/interface.js'
import { JsonlAuditStore } from './store/jsonl.js'
import { getAuditPath } from '../config/paths.js'

/**
 * Options for creating an audit entry.
 */
export interface AuditOptions {
  category: AuditCategory
  action: string
  severity?: AuditSeverity
  metadata?: Record<string, unknown>
}

export interface AuditLoggerOptions {
  /** Entries below this severity are dropped. Defaults to 'debug'. */
  minSeverity?: AuditSeverity
}

/**
 * Audit logger service.
 *
 * All entries are sanitized by the store before they are written.
 */
export class AuditLogger {
  private readonly store: AuditStore
  private readonly minSeverity: AuditSeverity

  constructor(store?: AuditStore, options: AuditLoggerOptions = {}) {
    this.store = store ?? new JsonlAuditStore(getAuditPath())
    this.minSeverity = options.minSeverity ?? 'debug'
  }

  /**
   * Log an audit entry.
   */
  async log(options: AuditOptions): Promise<void> {
    const severity = options.severity ?? 'info'
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.minSeverity]) return

    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: new Date(),
      category: options.category,
      action: options.action,
      severity,
      metadata: options.metadata,
    }

    await this.store.append(entry)
  }

  async debug(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'debug', metadata })
  }

  async info(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'info', metadata })
  }

  async warning(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'warning', metadata })
  }

  async alert(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'alert', metadata })
  }

  async critical(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    await this.log({ category, action, severity: 'critical', metadata })
  }
}
