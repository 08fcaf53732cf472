import { inspect } from 'util'
import { isDebugRendering } from '../render-mode.js'
import { Guarded } from '../lio/guarded.js'
import { LabelError } from '../lio/errors.js'
import { renderLabeled, type Labeled } from '../lio/labeled.js'
import type { Label } from '../lio/label.js'

/**
 * A payload whose policy has not been applied yet.
 */
export class Unapplied<A> extends Guarded {
  readonly kind = 'unapplied' as const

  constructor(readonly value: A) {
    super()
  }

  protected describe(): string {
    return inspect(this.value)
  }
}

/**
 * A payload whose policy has been applied: it now carries a label.
 */
export class Applied<L extends Label<L>, A> extends Guarded {
  readonly kind = 'applied' as const

  constructor(readonly labeled: Labeled<L, A>) {
    super()
  }

  protected describe(): string {
    return renderLabeled(this.labeled, (x) => inspect(x))
  }
}

/**
 * A value a labeling policy either has or has not been applied to.
 *
 * There is no equality on policy-labeled values.
 */
export type PolicyLabeled<L extends Label<L>, A> = Unapplied<A> | Applied<L, A>

/**
 * Wrap a value whose policy is still to be applied.
 */
export function pu<A>(value: A): Unapplied<A> {
  return new Unapplied(value)
}

/**
 * Wrap an already-labeled value.
 */
export function pl<L extends Label<L>, A>(labeled: Labeled<L, A>): Applied<L, A> {
  return new Applied(labeled)
}

/**
 * Debug rendering of a policy-labeled value. Throws outside debug mode.
 */
export function renderPolicyLabeled<L extends Label<L>, A>(
  p: PolicyLabeled<L, A>,
  renderPayload: (payload: A) => string
): string {
  if (!isDebugRendering()) {
    throw new LabelError(
      'Policy-labeled content cannot be rendered outside debug mode',
      'protected_render'
    )
  }
  return p.kind === 'unapplied'
    ? renderPayload(p.value)
    : renderLabeled(p.labeled, renderPayload)
}
