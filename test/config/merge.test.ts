import { describe, it, expect } from 'vitest'
import { deepMerge, setPath, isRecord } from '../../src/config/merge.js'

describe('deepMerge', () => {
  it('merges flat objects', () => {
    expect(deepMerge({ a: 1, b: 2 }, { b: 3, c: 4 })).toEqual({ a: 1, b: 3, c: 4 })
  })

  it('merges nested objects', () => {
    const target = { logging: { level: 'info', audit: { enabled: true } } }
    const source = { logging: { audit: { enabled: false } } }
    expect(deepMerge(target, source)).toEqual({
      logging: { level: 'info', audit: { enabled: false } },
    })
  })

  it('replaces arrays (does not merge)', () => {
    expect(deepMerge({ items: [1, 2, 3] }, { items: [4, 5] })).toEqual({ items: [4, 5] })
  })

  it('ignores undefined values in source', () => {
    expect(deepMerge({ a: 1, b: 2 }, { a: undefined, c: 3 })).toEqual({ a: 1, b: 2, c: 3 })
  })

  it('lets null override an object', () => {
    expect(deepMerge({ a: { nested: 1 } }, { a: null })).toEqual({ a: null })
  })

  it('does not mutate target', () => {
    const target = { a: 1, b: { c: 0 } }
    deepMerge(target, { b: { c: 2 } })
    expect(target).toEqual({ a: 1, b: { c: 0 } })
  })
})

describe('setPath', () => {
  it('sets top-level values', () => {
    const obj: Record<string, unknown> = {}
    setPath(obj, 'environment', 'test')
    expect(obj).toEqual({ environment: 'test' })
  })

  it('creates intermediate objects', () => {
    const obj: Record<string, unknown> = {}
    setPath(obj, 'logging.audit.enabled', false)
    expect(obj).toEqual({ logging: { audit: { enabled: false } } })
  })

  it('keeps sibling values', () => {
    const obj: Record<string, unknown> = { logging: { level: 'info' } }
    setPath(obj, 'logging.audit.dir', '/tmp')
    expect(obj).toEqual({ logging: { level: 'info', audit: { dir: '/tmp' } } })
  })

  it('replaces non-object intermediates', () => {
    const obj: Record<string, unknown> = { rendering: true }
    setPath(obj, 'rendering.debug', true)
    expect(obj).toEqual({ rendering: { debug: true } })
  })
})

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true)
    expect(isRecord([])).toBe(false)
    expect(isRecord(null)).toBe(false)
    expect(isRecord('x')).toBe(false)
  })
})
