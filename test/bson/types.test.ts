import { describe, it, expect } from 'vitest'
import { isBsonDocument, timestamp, ObjectId, Int32 } from '../../src/bson/types.js'

describe('isBsonDocument', () => {
  it('accepts plain objects', () => {
    expect(isBsonDocument({ a: 1 })).toBe(true)
    expect(isBsonDocument({})).toBe(true)
  })

  it('rejects arrays, null and BSON class instances', () => {
    expect(isBsonDocument([])).toBe(false)
    expect(isBsonDocument(null)).toBe(false)
    expect(isBsonDocument(new Int32(1))).toBe(false)
    expect(isBsonDocument(new ObjectId())).toBe(false)
  })
})

describe('timestamp', () => {
  it('returns the creation time embedded in an object id', () => {
    const oid = ObjectId.createFromTime(1_700_000_000)
    expect(timestamp(oid)).toEqual(new Date(1_700_000_000_000))
  })
})
