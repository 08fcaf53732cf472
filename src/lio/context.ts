import type { AuditLogger } from '../audit/service.js'
import { LabelError } from './errors.js'
import type { Label } from './label.js'
import type { Labeled } from './labeled.js'
import { labelTCB, unlabelTCB } from './tcb.js'

export interface LIOOptions<L, P, S> {
  /** Starting current label. */
  label: L
  /** Upper bound the current label may never exceed. */
  clearance: L
  privileges: P
  state: S
  audit?: AuditLogger
}

/**
 * Labeled computation context.
 *
 * Tracks the current label and clearance of one computation and runs its
 * effects strictly in submission order. Privileges and state are carried
 * for the caller; this context does not interpret them.
 */
export class LIOContext<L extends Label<L>, P = undefined, S = undefined> {
  private current: L
  private readonly clearanceLabel: L
  private readonly audit?: AuditLogger
  private tail: Promise<void> = Promise.resolve()

  readonly privileges: P
  readonly state: S

  constructor(options: LIOOptions<L, P, S>) {
    this.current = options.label
    this.clearanceLabel = options.clearance
    this.privileges = options.privileges
    this.state = options.state
    this.audit = options.audit
  }

  get currentLabel(): L {
    return this.current
  }

  get clearance(): L {
    return this.clearanceLabel
  }

  /**
   * Run an effect after every effect submitted before it.
   *
   * Trusted: the action runs without label checks. A failing action
   * rejects the returned promise and does not stall later effects.
   */
  ioTCB<T>(action: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(action)
    this.tail = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  /**
   * Label a value at `label`, which must lie between the current label
   * and the clearance.
   */
  label<A>(label: L, value: A): Promise<Labeled<L, A>> {
    return this.ioTCB(async () => {
      if (
        !this.current.canFlowTo(label) ||
        !label.canFlowTo(this.clearanceLabel)
      ) {
        await this.audit?.alert('label', 'label_out_of_range', {
          requested: label.toString(),
          current: this.current.toString(),
          clearance: this.clearanceLabel.toString(),
        })
        throw new LabelError(
          `Cannot label at ${label.toString()}: outside [${this.current.toString()}, ${this.clearanceLabel.toString()}]`,
          'label_out_of_range'
        )
      }
      return labelTCB(label, value)
    })
  }

  /**
   * Read a labeled value, raising the current label to cover it.
   */
  unlabel<A>(lv: Labeled<L, A>): Promise<A> {
    return this.ioTCB(async () => {
      await this.raise(lv.label)
      return unlabelTCB(lv)
    })
  }

  /**
   * Raise the current label to its join with `label`.
   */
  taint(label: L): Promise<void> {
    return this.ioTCB(() => this.raise(label))
  }

  private async raise(label: L): Promise<void> {
    const next = this.current.join(label)

    if (!next.canFlowTo(this.clearanceLabel)) {
      await this.audit?.alert('label', 'clearance_exceeded', {
        current: this.current.toString(),
        requested: label.toString(),
        clearance: this.clearanceLabel.toString(),
      })
      throw new LabelError(
        `Label ${next.toString()} exceeds clearance ${this.clearanceLabel.toString()}`,
        'clearance_exceeded'
      )
    }

    if (!next.equals(this.current)) {
      await this.audit?.debug('label', 'taint', {
        from: this.current.toString(),
        to: next.toString(),
      })
      this.current = next
    }
  }
}
