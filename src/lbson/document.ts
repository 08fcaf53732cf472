import type { Labeled } from '../lio/labeled.js'
import { joinLabels, type Label } from '../lio/label.js'
import { LbsonError, type Lookup } from './errors.js'
import { fieldEquals, renderField, type Field, type Key } from './field.js'
import { cast, toVal, type Target } from './val.js'
import type { Value } from './value.js'

/**
 * An ordered list of fields.
 *
 * Order decides merge placement and rendering, not lookup. Duplicate keys
 * are tolerated; every accessor resolves them to the first occurrence.
 */
export type Document<L extends Label<L>> = readonly Field<L>[]

/**
 * A whole document under one label.
 */
export type LabeledDocument<L extends Label<L>> = Labeled<L, Document<L>>

/**
 * Value of the first field named `key`, or a `key_not_found` failure.
 */
export function look<L extends Label<L>>(key: Key, doc: Document<L>): Lookup<Value<L>> {
  const found = doc.find((f) => f.key === key)
  if (!found) {
    return {
      success: false,
      error: new LbsonError(`expected ${JSON.stringify(key)}`, 'key_not_found', key),
    }
  }
  return { success: true, value: found.value }
}

/**
 * Value of the first field named `key`, cast to `T`. Fails if the key is
 * missing or the value does not hold a `T`.
 */
export function lookup<L extends Label<L>, T>(
  key: Key,
  doc: Document<L>,
  target: Target<L, T>
): Lookup<T> {
  const found = look(key, doc)
  if (!found.success) return found
  return cast(found.value, target)
}

/**
 * Value of the first field named `key`. Throws if it is missing: use where
 * a schema already guarantees the key.
 */
export function valueAt<L extends Label<L>>(key: Key, doc: Document<L>): Value<L> {
  const found = look(key, doc)
  if (!found.success) throw found.error
  return found.value
}

/**
 * Typed value of the first field named `key`. Throws if it is missing or
 * of the wrong type.
 */
export function at<L extends Label<L>, T>(
  key: Key,
  doc: Document<L>,
  target: Target<L, T>
): T {
  const type = toVal(target)
  const found = lookup(key, doc, type)
  if (found.success) return found.value

  throw new LbsonError(
    `expected (${JSON.stringify(key)} :: ${type.name}) in ${renderDocument(doc)}`,
    found.error.code,
    key,
    type.name
  )
}

/**
 * Only the fields named in `keys`, in the order of `keys`. Keys absent from
 * the document are dropped.
 */
export function include<L extends Label<L>>(
  keys: readonly Key[],
  doc: Document<L>
): Document<L> {
  return keys.flatMap((key) => {
    const found = doc.find((f) => f.key === key)
    return found ? [found] : []
  })
}

/**
 * The fields not named in `keys`, in document order.
 */
export function exclude<L extends Label<L>>(
  keys: readonly Key[],
  doc: Document<L>
): Document<L> {
  return doc.filter((f) => !keys.includes(f.key))
}

/**
 * Merge two documents, preferring the first.
 *
 * Each field of `a` replaces the first field of `b` with the same key, in
 * place, or is appended when `b` has no such key. Fields of `b` whose key
 * `a` does not mention stay where they were.
 */
export function merge<L extends Label<L>>(a: Document<L>, b: Document<L>): Document<L> {
  return a.reduce<Document<L>>((doc, f) => {
    const i = doc.findIndex((g) => g.key === f.key)
    return i === -1 ? [...doc, f] : [...doc.slice(0, i), f, ...doc.slice(i + 1)]
  }, b)
}

export function documentEquals<L extends Label<L>>(
  a: Document<L>,
  b: Document<L>
): boolean {
  return a.length === b.length && a.every((f, i) => fieldEquals(f, b[i]))
}

export function renderDocument<L extends Label<L>>(doc: Document<L>): string {
  return `[${doc.map((f) => renderField(f)).join(', ')}]`
}

/**
 * Join of the labels carried by a document's fields: labeled values and
 * applied policies. Plain and unapplied fields contribute nothing.
 */
export function documentLabel<L extends Label<L>>(doc: Document<L>, bottom: L): L {
  const labels: L[] = []

  for (const { value } of doc) {
    if (value.kind === 'labeled') {
      labels.push(value.value.label)
    } else if (value.kind === 'policyLabeled' && value.value.kind === 'applied') {
      labels.push(value.value.labeled.label)
    }
  }

  return joinLabels(labels, bottom)
}
