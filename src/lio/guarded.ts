import { inspect } from 'util'
import { isDebugRendering } from '../render-mode.js'
import { LabelError } from './errors.js'

/**
 * Base for wrappers whose content must not leak through default
 * conversions.
 *
 * In debug mode `toString`, `toJSON` and `util.inspect` render the content
 * via `describe()`. In protected mode they throw. `valueOf` always throws,
 * so relational operators and arithmetic cannot observe the content.
 * There is no equality.
 */
export abstract class Guarded {
  protected abstract describe(): string

  toString(): string {
    if (!isDebugRendering()) {
      throw new LabelError(
        `${this.constructor.name} content cannot be rendered outside debug mode`,
        'protected_render'
      )
    }
    return this.describe()
  }

  toJSON(): string {
    return this.toString()
  }

  [inspect.custom](): string {
    return this.toString()
  }

  valueOf(): never {
    throw new LabelError(
      `${this.constructor.name} values cannot be compared or coerced`,
      'unsupported_comparison'
    )
  }
}
