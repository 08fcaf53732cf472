/**
 * Trusted bridge into labeled values.
 *
 * These bypass every label check. They exist so value bridging can
 * re-wrap a payload under its original label; policy code must go through
 * `LIOContext` instead. Nothing in the public barrel re-exports them.
 */
export { labelTCB, unlabelTCB } from './labeled.js'
