import { bsonEquals } from '../bson/equality.js'
import { renderBson } from '../bson/render.js'
import type { BsonValue } from '../bson/types.js'
import { isDebugRendering } from '../render-mode.js'
import { renderLabeled, type Labeled } from '../lio/labeled.js'
import type { Label } from '../lio/label.js'
import { renderPolicyLabeled, type PolicyLabeled } from './policy-labeled.js'

/**
 * What protected-mode rendering shows instead of labeled content.
 */
export const HIDDEN_PLACEHOLDER = '{- HIDING DATA -}'

/** An unlabeled BSON value. */
export class PlainValue {
  readonly kind = 'plain' as const

  constructor(readonly value: BsonValue) {}

  toString(): string {
    return renderValue(this)
  }
}

/** A BSON value under a label. */
export class LabeledValue<L extends Label<L>> {
  readonly kind = 'labeled' as const

  constructor(readonly value: Labeled<L, BsonValue>) {}

  toString(): string {
    return renderValue(this)
  }
}

/** A BSON value with or without its policy applied. */
export class PolicyLabeledValue<L extends Label<L>> {
  readonly kind = 'policyLabeled' as const

  constructor(readonly value: PolicyLabeled<L, BsonValue>) {}

  toString(): string {
    return renderValue(this)
  }
}

/**
 * The value of a document field.
 */
export type Value<L extends Label<L>> =
  | PlainValue
  | LabeledValue<L>
  | PolicyLabeledValue<L>

export function plain<L extends Label<L>>(value: BsonValue): Value<L> {
  return new PlainValue(value)
}

export function labeledValue<L extends Label<L>>(value: Labeled<L, BsonValue>): Value<L> {
  return new LabeledValue(value)
}

export function policyLabeledValue<L extends Label<L>>(
  value: PolicyLabeled<L, BsonValue>
): Value<L> {
  return new PolicyLabeledValue(value)
}

export function isValue<L extends Label<L>>(x: unknown): x is Value<L> {
  return (
    x instanceof PlainValue ||
    x instanceof LabeledValue ||
    x instanceof PolicyLabeledValue
  )
}

/**
 * Equality on values. Only plain values compare: a labeled or
 * policy-labeled operand is never equal to anything, itself included.
 */
export function valueEquals<L extends Label<L>>(a: Value<L>, b: Value<L>): boolean {
  return a.kind === 'plain' && b.kind === 'plain' && bsonEquals(a.value, b.value)
}

/**
 * Render a value. Labeled content shows only in debug mode.
 */
export function renderValue<L extends Label<L>>(v: Value<L>): string {
  switch (v.kind) {
    case 'plain':
      return renderBson(v.value)
    case 'labeled':
      return isDebugRendering() ? renderLabeled(v.value, renderBson) : HIDDEN_PLACEHOLDER
    case 'policyLabeled':
      return isDebugRendering()
        ? renderPolicyLabeled(v.value, renderBson)
        : HIDDEN_PLACEHOLDER
  }
}
