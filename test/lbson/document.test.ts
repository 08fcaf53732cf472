import { describe, it, expect } from 'vitest'
import {
  at,
  documentEquals,
  documentLabel,
  exclude,
  include,
  look,
  lookup,
  merge,
  renderDocument,
  valueAt,
  type Document,
} from '../../src/lbson/document.js'
import { field } from '../../src/lbson/field.js'
import { labeledVal } from '../../src/lbson/val.js'
import { pl, pu } from '../../src/lbson/policy-labeled.js'
import { LbsonError } from '../../src/lbson/errors.js'
import { bsonTypes } from '../../src/bson/codec.js'
import { SecurityLabel } from '../../src/lio/label.js'
import { labelTCB, unlabelTCB } from '../../src/lio/tcb.js'

type L = SecurityLabel

const secret = new SecurityLabel('secret', 'user')

const abc: Document<L> = [field('a', 1), field('b', 2), field('c', 3)]

describe('look', () => {
  it('finds the value of a key', () => {
    const found = look('b', abc)
    expect(found.success).toBe(true)
    if (found.success) expect(renderDocument<L>([{ key: 'b', value: found.value }])).toBe('[b: 2]')
  })

  it('fails with key_not_found on a missing key', () => {
    const found = look('z', abc)
    expect(found.success).toBe(false)
    if (!found.success) {
      expect(found.error.code).toBe('key_not_found')
      expect(found.error.key).toBe('z')
      expect(found.error.message).toBe('expected "z"')
    }
  })

  it('resolves duplicate keys to the first match', () => {
    const doc: Document<L> = [field('a', 1), field('a', 2)]
    expect(lookup('a', doc, bsonTypes.number)).toEqual({ success: true, value: 1 })
  })
})

describe('lookup', () => {
  it('looks up and casts', () => {
    expect(lookup('c', abc, bsonTypes.number)).toEqual({ success: true, value: 3 })
  })

  it('reports a type mismatch', () => {
    const found = lookup('c', abc, bsonTypes.string)
    expect(found.success).toBe(false)
    if (!found.success) {
      expect(found.error.code).toBe('type_mismatch')
      expect(found.error.message).toBe('expected string: 3')
    }
  })

  it('reports a missing key before any cast', () => {
    const found = lookup('z', abc, bsonTypes.string)
    expect(found.success).toBe(false)
    if (!found.success) expect(found.error.code).toBe('key_not_found')
  })
})

describe('valueAt', () => {
  it('returns the value', () => {
    expect(valueAt('a', abc).kind).toBe('plain')
  })

  it('throws on a missing key', () => {
    expect(() => valueAt('z', abc)).toThrow(LbsonError)
  })
})

describe('at', () => {
  it('returns the typed value', () => {
    expect(at('a', abc, bsonTypes.number)).toBe(1)
  })

  it('throws naming the key, type and document', () => {
    expect(() => at('z', abc, bsonTypes.number)).toThrow('expected ("z" :: number) in [a: 1, b: 2, c: 3]')
    expect(() => at('a', abc, bsonTypes.string)).toThrow('expected ("a" :: string) in [a: 1, b: 2, c: 3]')
  })

  it('keeps the failure code', () => {
    try {
      at('a', abc, bsonTypes.string)
      expect.unreachable()
    } catch (error) {
      expect(error).toMatchObject({ code: 'type_mismatch', key: 'a', expected: 'string' })
    }
  })

  it('reads labeled fields through a labeled witness', () => {
    const doc: Document<L> = [field('ssn', labelTCB(secret, '000-00-0000'))]
    const lv = at('ssn', doc, labeledVal<L, string>(bsonTypes.string))
    expect(lv.label).toBe(secret)
    expect(unlabelTCB(lv)).toBe('000-00-0000')
  })
})

describe('include', () => {
  it('projects in the order of keys, dropping absent keys', () => {
    expect(renderDocument(include(['b', 'a'], abc))).toBe('[b: 2, a: 1]')
    expect(renderDocument(include(['z', 'c'], abc))).toBe('[c: 3]')
  })

  it('is idempotent', () => {
    const keys = ['c', 'a']
    const once = include(keys, abc)
    expect(documentEquals(include(keys, once), once)).toBe(true)
  })

  it('returns a new document', () => {
    const projected = include(['a', 'b', 'c'], abc)
    expect(projected).not.toBe(abc)
    expect(documentEquals(projected, abc)).toBe(true)
  })
})

describe('exclude', () => {
  it('removes listed keys, preserving document order', () => {
    expect(renderDocument(exclude(['b'], abc))).toBe('[a: 1, c: 3]')
    expect(renderDocument(exclude(['z'], abc))).toBe('[a: 1, b: 2, c: 3]')
  })
})

describe('merge', () => {
  it('prefers the first document at the position in the second', () => {
    const a: Document<L> = [field('a', 10)]
    const b: Document<L> = [field('a', 1), field('b', 2)]
    expect(renderDocument(merge(a, b))).toBe('[a: 10, b: 2]')
  })

  it('appends keys the second document lacks', () => {
    const a: Document<L> = [field('c', 3)]
    const b: Document<L> = [field('a', 1)]
    expect(renderDocument(merge(a, b))).toBe('[a: 1, c: 3]')
  })

  it('replaces only the first occurrence of a duplicate key', () => {
    const a: Document<L> = [field('a', 10)]
    const b: Document<L> = [field('a', 1), field('b', 2), field('a', 3)]
    expect(renderDocument(merge(a, b))).toBe('[a: 10, b: 2, a: 3]')
  })

  it('leaves its inputs unchanged', () => {
    const a: Document<L> = [field('a', 10)]
    const b: Document<L> = [field('a', 1)]
    merge(a, b)
    expect(renderDocument(b)).toBe('[a: 1]')
  })
})

describe('documentEquals', () => {
  it('compares fields in order', () => {
    const reversed: Document<L> = [field('c', 3), field('b', 2), field('a', 1)]
    expect(documentEquals<L>([field('a', 1), field('b', 2), field('c', 3)], abc)).toBe(true)
    expect(documentEquals(reversed, abc)).toBe(false)
    expect(documentEquals(include(['a'], abc), abc)).toBe(false)
  })

  it('is false for documents holding labeled values', () => {
    const doc: Document<L> = [field('ssn', labelTCB(secret, 'x'))]
    expect(documentEquals(doc, doc)).toBe(false)
  })
})

describe('renderDocument', () => {
  it('renders an empty document', () => {
    expect(renderDocument<L>([])).toBe('[]')
  })

  it('hides labeled values', () => {
    const doc: Document<L> = [field('name', 'alice'), field('ssn', labelTCB(secret, 'x'))]
    expect(renderDocument(doc)).toBe('[name: "alice", ssn: {- HIDING DATA -}]')
  })
})

describe('documentLabel', () => {
  it('joins the labels of labeled and applied fields', () => {
    const doc: Document<L> = [
      field('name', 'alice'),
      field('ssn', labelTCB(new SecurityLabel('sensitive', 'user'), 'x')),
      field('email', pl(labelTCB(new SecurityLabel('internal', 'verified'), 'y'))),
      field('phone', pu('z')),
    ]
    expect(documentLabel(doc, SecurityLabel.bottom()).toString()).toBe('sensitive/verified')
  })

  it('is bottom for plain documents', () => {
    expect(documentLabel(abc, SecurityLabel.bottom()).toString()).toBe('public/system')
  })
})
