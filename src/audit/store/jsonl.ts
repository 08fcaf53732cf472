import { mkdir, appendFile } from 'fs/promises'
import path from 'path'
import { AuditEntrySchema, type AuditEntry } from '../schema.js'
import { sanitizeAuditEntry } from '../redaction.js'
import type { AuditStore } from './interface.js'

/**
 * JSONL audit store with one file per day.
 *
 * File naming: audit-YYYY-MM-DD.jsonl (local date of the entry)
 * Location: LBSON_HOME/logs/audit/ unless configured otherwise
 */
export class JsonlAuditStore implements AuditStore {
  private initialized = false

  constructor(private readonly baseDir: string) {}

  private async ensureDir(): Promise<void> {
    if (this.initialized) return
    await mkdir(this.baseDir, { recursive: true })
    this.initialized = true
  }

  private getFilename(date: Date): string {
    const yyyy = date.getFullYear()
    const mm = String(date.getMonth() + 1).padStart(2, '0')
    const dd = String(date.getDate()).padStart(2, '0')
    return `audit-${yyyy}-${mm}-${dd}.jsonl`
  }

  /**
   * Append an audit entry. The entry is sanitized and validated before
   * writing; an invalid entry throws and nothing is written.
   */
  async append(entry: AuditEntry): Promise<void> {
    const sanitized = AuditEntrySchema.parse(sanitizeAuditEntry(entry))

    await this.ensureDir()
    const filePath = path.join(this.baseDir, this.getFilename(sanitized.timestamp))

    await appendFile(filePath, JSON.stringify(sanitized) + '\n', 'utf-8')
  }
}
