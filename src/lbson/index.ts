// Errors
export { LbsonError, type LbsonErrorCode, type Lookup } from './errors.js'

// Policy-labeled values
export {
  Unapplied,
  Applied,
  pu,
  pl,
  renderPolicyLabeled,
  type PolicyLabeled,
} from './policy-labeled.js'

// Values
export {
  PlainValue,
  LabeledValue,
  PolicyLabeledValue,
  HIDDEN_PLACEHOLDER,
  plain,
  labeledValue,
  policyLabeledValue,
  isValue,
  valueEquals,
  renderValue,
  type Value,
} from './value.js'

// Typed bridge
export {
  valueVal,
  labeledVal,
  policyLabeledVal,
  plainVal,
  toVal,
  toValue,
  val,
  castMaybe,
  cast,
  typed,
  type Val,
  type Target,
  type Bridgeable,
} from './val.js'

// Fields
export {
  field,
  typedField,
  optionalField,
  optionalTypedField,
  fieldEquals,
  renderField,
  type Field,
  type Key,
} from './field.js'

// Documents
export {
  look,
  lookup,
  valueAt,
  at,
  include,
  exclude,
  merge,
  documentEquals,
  renderDocument,
  documentLabel,
  type Document,
  type LabeledDocument,
} from './document.js'

// Object ids
export { genObjectId } from './object-id.js'
