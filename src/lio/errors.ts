/**
 * Error codes for labeled-value runtime failures.
 */
export type LabelErrorCode =
  | 'clearance_exceeded' // current label would rise above the clearance
  | 'label_out_of_range' // requested label outside [current, clearance]
  | 'protected_render' // labeled content rendered outside debug mode
  | 'unsupported_comparison' // labeled wrapper compared or coerced

/**
 * Error raised by the labeled-value runtime.
 *
 * `protected_render` and `unsupported_comparison` mark misuse of a labeled
 * wrapper and are not meant to be caught.
 */
export class LabelError extends Error {
  constructor(
    message: string,
    public readonly code: LabelErrorCode
  ) {
    super(message)
    this.name = 'LabelError'
  }
}
