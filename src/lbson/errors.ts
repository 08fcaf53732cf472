import type { Key } from './field.js'

/**
 * Error codes for document access failures.
 */
export type LbsonErrorCode = 'key_not_found' | 'type_mismatch'

/**
 * Error describing a missing key or a value of the wrong type.
 *
 * Soft accessors return it inside a failed `Lookup`; hard accessors
 * (`valueAt`, `at`, `typed`) throw it.
 */
export class LbsonError extends Error {
  constructor(
    message: string,
    public readonly code: LbsonErrorCode,
    public readonly key?: Key,
    public readonly expected?: string
  ) {
    super(message)
    this.name = 'LbsonError'
  }
}

/**
 * Outcome of a soft accessor.
 */
export type Lookup<T> =
  | { success: true; value: T }
  | { success: false; error: LbsonError }
