import type { Label } from '../lio/label.js'
import { toValue, val, type Bridgeable, type Target } from './val.js'
import { renderValue, valueEquals, type Value } from './value.js'

/**
 * A field name. Unique keys within a document are a caller convention.
 */
export type Key = string

/**
 * A key-value pair, the atomic unit of a document.
 */
export interface Field<L extends Label<L>> {
  readonly key: Key
  readonly value: Value<L>
}

/**
 * Field with the given key, injecting `x` by its runtime kind.
 */
export function field<L extends Label<L>>(key: Key, x: Bridgeable<L>): Field<L> {
  return { key, value: toValue(x) }
}

/**
 * Field with the given key, injecting `x` through a witness.
 */
export function typedField<L extends Label<L>, T>(
  key: Key,
  x: T,
  target: Target<L, T>
): Field<L> {
  return { key, value: val(x, target) }
}

/**
 * One-field document when `x` is present, empty document otherwise.
 */
export function optionalField<L extends Label<L>>(
  key: Key,
  x: Bridgeable<L> | undefined
): Field<L>[] {
  return x === undefined ? [] : [field(key, x)]
}

export function optionalTypedField<L extends Label<L>, T>(
  key: Key,
  x: T | undefined,
  target: Target<L, T>
): Field<L>[] {
  return x === undefined ? [] : [typedField(key, x, target)]
}

export function fieldEquals<L extends Label<L>>(a: Field<L>, b: Field<L>): boolean {
  return a.key === b.key && valueEquals(a.value, b.value)
}

export function renderField<L extends Label<L>>(f: Field<L>): string {
  return `${f.key}: ${renderValue(f.value)}`
}
