import type { BsonType } from '../bson/codec.js'
import type { BsonValue } from '../bson/types.js'
import { Labeled, labelOf } from '../lio/labeled.js'
import { labelTCB, unlabelTCB } from '../lio/tcb.js'
import type { Label } from '../lio/label.js'
import { LbsonError, type Lookup } from './errors.js'
import { Applied, Unapplied, pl, pu, type PolicyLabeled } from './policy-labeled.js'
import {
  LabeledValue,
  PlainValue,
  PolicyLabeledValue,
  renderValue,
  type Value,
} from './value.js'

/**
 * Two-way bridge between a host type `T` and `Value<L>`.
 *
 * `val` is total. `castMaybe` returns undefined when the value does not
 * hold a `T`.
 */
export interface Val<L extends Label<L>, T> {
  readonly name: string
  val(x: T): Value<L>
  castMaybe(v: Value<L>): T | undefined
}

/**
 * What a typed operation accepts: a `Val`, or a bare `BsonType`, which
 * stands for `plainVal(type)`.
 */
export type Target<L extends Label<L>, T> = Val<L, T> | BsonType<T>

/**
 * Anything `toValue` can inject without a witness.
 */
export type Bridgeable<L extends Label<L>> =
  | Value<L>
  | Labeled<L, BsonValue>
  | PolicyLabeled<L, BsonValue>
  | BsonValue

// Instances, most specific first: identity, Labeled, PolicyLabeled, then
// the plain fallback. A call site picks one by passing its witness.

/**
 * Identity: every value is a `Value`.
 */
export function valueVal<L extends Label<L>>(): Val<L, Value<L>> {
  return {
    name: 'Value',
    val: (x) => x,
    castMaybe: (v) => v,
  }
}

/**
 * Labeled payloads of type `A`. Only labeled values match; the label is
 * carried across unchanged.
 */
export function labeledVal<L extends Label<L>, A>(
  type: BsonType<A>
): Val<L, Labeled<L, A>> {
  return {
    name: `Labeled<${type.name}>`,
    val: (lv) => new LabeledValue(mapLabeled(lv, (x) => type.toBson(x))),
    castMaybe: (v) =>
      v.kind === 'labeled'
        ? traverseLabeled(v.value, (x) => type.fromBson(x))
        : undefined,
  }
}

/**
 * Policy-labeled payloads of type `A`, applied or not. Only policy-labeled
 * values match.
 */
export function policyLabeledVal<L extends Label<L>, A>(
  type: BsonType<A>
): Val<L, PolicyLabeled<L, A>> {
  return {
    name: `PolicyLabeled<${type.name}>`,
    val: (p) =>
      new PolicyLabeledValue(
        p.kind === 'unapplied'
          ? pu(type.toBson(p.value))
          : pl(mapLabeled(p.labeled, (x) => type.toBson(x)))
      ),
    castMaybe: (v) => {
      if (v.kind !== 'policyLabeled') return undefined
      const p = v.value

      if (p.kind === 'unapplied') {
        const x = type.fromBson(p.value)
        return x === undefined ? undefined : pu(x)
      }

      const lv = traverseLabeled(p.labeled, (x) => type.fromBson(x))
      return lv === undefined ? undefined : pl(lv)
    },
  }
}

/**
 * Unlabeled BSON values of type `T`. Only plain values match.
 */
export function plainVal<L extends Label<L>, T>(type: BsonType<T>): Val<L, T> {
  return {
    name: type.name,
    val: (x) => new PlainValue(type.toBson(x)),
    castMaybe: (v) => (v.kind === 'plain' ? type.fromBson(v.value) : undefined),
  }
}

export function toVal<L extends Label<L>, T>(target: Target<L, T>): Val<L, T> {
  return 'castMaybe' in target ? target : plainVal(target)
}

/**
 * Inject a value without a witness, in the same priority order as the
 * instances: a `Value` passes through, then `Labeled`, then
 * `PolicyLabeled`, and anything else is a plain BSON value.
 */
export function toValue<L extends Label<L>>(x: Bridgeable<L>): Value<L> {
  if (
    x instanceof PlainValue ||
    x instanceof LabeledValue ||
    x instanceof PolicyLabeledValue
  ) {
    return x
  }
  if (x instanceof Labeled) return new LabeledValue(x)
  if (x instanceof Unapplied || x instanceof Applied) {
    return new PolicyLabeledValue(x)
  }
  return new PlainValue(x)
}

/**
 * Inject a typed value.
 */
export function val<L extends Label<L>, T>(x: T, target: Target<L, T>): Value<L> {
  return toVal(target).val(x)
}

/**
 * Convert a value to `T`, or undefined if it does not hold one.
 */
export function castMaybe<L extends Label<L>, T>(
  v: Value<L>,
  target: Target<L, T>
): T | undefined {
  return toVal(target).castMaybe(v)
}

/**
 * Convert a value to `T`, failing with `type_mismatch` if it does not
 * hold one.
 */
export function cast<L extends Label<L>, T>(
  v: Value<L>,
  target: Target<L, T>
): Lookup<T> {
  const type = toVal(target)
  const x = type.castMaybe(v)

  if (x === undefined) {
    return {
      success: false,
      error: new LbsonError(
        `expected ${type.name}: ${renderValue(v)}`,
        'type_mismatch',
        undefined,
        type.name
      ),
    }
  }

  return { success: true, value: x }
}

/**
 * Convert a value already known to hold a `T`. Throws on a mismatch.
 */
export function typed<L extends Label<L>, T>(v: Value<L>, target: Target<L, T>): T {
  const result = cast(v, target)
  if (!result.success) throw result.error
  return result.value
}

function mapLabeled<L extends Label<L>, A, B>(
  lv: Labeled<L, A>,
  f: (x: A) => B
): Labeled<L, B> {
  return labelTCB(labelOf(lv), f(unlabelTCB(lv)))
}

function traverseLabeled<L extends Label<L>, A, B>(
  lv: Labeled<L, A>,
  f: (x: A) => B | undefined
): Labeled<L, B> | undefined {
  const inner = f(unlabelTCB(lv))
  return inner === undefined ? undefined : labelTCB(labelOf(lv), inner)
}
