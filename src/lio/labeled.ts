import { inspect } from 'util'
import { isDebugRendering } from '../render-mode.js'
import { LabelError } from './errors.js'
import { Guarded } from './guarded.js'
import type { Label } from './label.js'

let construct: <L extends Label<L>, A>(label: L, value: A) => Labeled<L, A>
let extract: <L extends Label<L>, A>(lv: Labeled<L, A>) => A

/**
 * A payload paired with the label that protects it.
 *
 * The payload is held in a private field. Ordinary code reads it only
 * through `LIOContext.unlabel`, which taints the reader. The trusted bridge
 * in `tcb.ts` is the only other way in.
 */
export class Labeled<L extends Label<L>, A> extends Guarded {
  readonly #label: L
  readonly #value: A

  static {
    construct = (label, value) => new Labeled(label, value)
    extract = (lv) => lv.#value
  }

  private constructor(label: L, value: A) {
    super()
    this.#label = label
    this.#value = value
  }

  get label(): L {
    return this.#label
  }

  protected describe(): string {
    return renderLabeled(this, (x) => inspect(x))
  }
}

/**
 * The label protecting a labeled value. Labels are public.
 */
export function labelOf<L extends Label<L>, A>(lv: Labeled<L, A>): L {
  return lv.label
}

/**
 * Debug rendering: `payload {label}`. Throws outside debug mode.
 */
export function renderLabeled<L extends Label<L>, A>(
  lv: Labeled<L, A>,
  renderPayload: (payload: A) => string
): string {
  if (!isDebugRendering()) {
    throw new LabelError(
      'Labeled content cannot be rendered outside debug mode',
      'protected_render'
    )
  }
  return `${renderPayload(extract(lv))} {${lv.label.toString()}}`
}

/**
 * Pair a value with a label without any label check.
 *
 * Trusted: reached through `tcb.ts` only.
 */
export function labelTCB<L extends Label<L>, A>(
  label: L,
  value: A
): Labeled<L, A> {
  return construct(label, value)
}

/**
 * Read a labeled payload without tainting anyone.
 *
 * Trusted: reached through `tcb.ts` only.
 */
export function unlabelTCB<L extends Label<L>, A>(lv: Labeled<L, A>): A {
  return extract(lv)
}
