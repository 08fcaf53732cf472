// Label lattice
export {
  type Label,
  type TrustLevel,
  type DataClass,
  TRUST_ORDER,
  DATA_CLASS_ORDER,
  SecurityLabel,
  minTrust,
  maxTrust,
  maxSensitivity,
  minSensitivity,
  meetsTrustRequirement,
  withinDataClass,
  joinLabels,
} from './label.js'

// Labeled values (the trusted bridge lives in tcb.ts)
export { Labeled, labelOf, renderLabeled } from './labeled.js'
export { Guarded } from './guarded.js'

// Computation context
export { LIOContext, type LIOOptions } from './context.js'

// Errors
export { LabelError, type LabelErrorCode } from './errors.js'
