import { describe, it, expect } from 'vitest'
import { sanitizeAuditEntry, sanitizeErrorMessage } from '../../src/audit/redaction.js'
import type { AuditEntry } from '../../src/audit/schema.js'

const createEntry = (metadata?: Record<string, unknown>): AuditEntry => ({
  id: 'entry-1',
  timestamp: new Date('2026-01-15T10:00:00Z'),
  category: 'label',
  action: 'taint',
  severity: 'debug',
  metadata,
})

describe('sanitizeAuditEntry', () => {
  it('removes payload, value and document keys at any depth', () => {
    const entry = createEntry({
      key: 'ssn',
      payload: 'do-not-log',
      field: { label: 'secret/user', value: 'do-not-log' },
      document: [{ key: 'a' }],
    })

    expect(sanitizeAuditEntry(entry).metadata).toEqual({
      key: 'ssn',
      field: { label: 'secret/user' },
    })
  })

  it('truncates error messages', () => {
    const entry = createEntry({ errorMessage: 'x'.repeat(600) })
    expect(sanitizeAuditEntry(entry).metadata?.errorMessage).toBe('x'.repeat(500))
  })

  it('does not mutate the original entry', () => {
    const entry = createEntry({ payload: 'kept-here' })
    sanitizeAuditEntry(entry)
    expect(entry.metadata).toEqual({ payload: 'kept-here' })
  })

  it('passes entries without metadata through', () => {
    const entry = createEntry()
    expect(sanitizeAuditEntry(entry)).toEqual(entry)
  })
})

describe('sanitizeErrorMessage', () => {
  it('keeps short messages unchanged', () => {
    expect(sanitizeErrorMessage('expected "age"')).toBe('expected "age"')
  })
})
