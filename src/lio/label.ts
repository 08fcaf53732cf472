/**
 * Lattice capability every label type provides.
 *
 * Generic code takes `L extends Label<L>`.
 */
export interface Label<L> {
  /** Least upper bound. */
  join(other: L): L
  /** Greatest lower bound. */
  meet(other: L): L
  /** Partial order: may data labeled `this` flow to `other`? */
  canFlowTo(other: L): boolean
  equals(other: L): boolean
  toString(): string
}

/**
 * Trust level - where did this content come from?
 *
 * Ordering: untrusted < verified < user < system
 */
export type TrustLevel = 'untrusted' | 'verified' | 'user' | 'system'

/**
 * Data class - how sensitive is this content?
 *
 * Ordering: public < internal < sensitive < secret
 */
export type DataClass = 'public' | 'internal' | 'sensitive' | 'secret'

export const TRUST_ORDER: Record<TrustLevel, number> = {
  untrusted: 0,
  verified: 1,
  user: 2,
  system: 3,
}

export const DATA_CLASS_ORDER: Record<DataClass, number> = {
  public: 0,
  internal: 1,
  sensitive: 2,
  secret: 3,
}

/**
 * Get the minimum (least trusted) of two trust levels.
 */
export function minTrust(a: TrustLevel, b: TrustLevel): TrustLevel {
  return TRUST_ORDER[a] < TRUST_ORDER[b] ? a : b
}

export function maxTrust(a: TrustLevel, b: TrustLevel): TrustLevel {
  return TRUST_ORDER[a] > TRUST_ORDER[b] ? a : b
}

/**
 * Get the maximum (most sensitive) of two data classes.
 */
export function maxSensitivity(a: DataClass, b: DataClass): DataClass {
  return DATA_CLASS_ORDER[a] > DATA_CLASS_ORDER[b] ? a : b
}

export function minSensitivity(a: DataClass, b: DataClass): DataClass {
  return DATA_CLASS_ORDER[a] < DATA_CLASS_ORDER[b] ? a : b
}

/**
 * Check if a trust level meets a minimum requirement.
 */
export function meetsTrustRequirement(
  actual: TrustLevel,
  required: TrustLevel
): boolean {
  return TRUST_ORDER[actual] >= TRUST_ORDER[required]
}

/**
 * Check if a data class is at or below a maximum.
 */
export function withinDataClass(
  actual: DataClass,
  maximum: DataClass
): boolean {
  return DATA_CLASS_ORDER[actual] <= DATA_CLASS_ORDER[maximum]
}

/**
 * Confidentiality × integrity label.
 *
 * Combining labels is conservative: the most sensitive data class and the
 * least trusted source win. Data flows only towards labels that are at
 * least as sensitive and no more trusted.
 */
export class SecurityLabel implements Label<SecurityLabel> {
  constructor(
    readonly dataClass: DataClass,
    readonly trustLevel: TrustLevel
  ) {}

  /** Public data from the system: flows anywhere. */
  static bottom(): SecurityLabel {
    return new SecurityLabel('public', 'system')
  }

  /** Secret data from an untrusted source: flows nowhere else. */
  static top(): SecurityLabel {
    return new SecurityLabel('secret', 'untrusted')
  }

  join(other: SecurityLabel): SecurityLabel {
    return new SecurityLabel(
      maxSensitivity(this.dataClass, other.dataClass),
      minTrust(this.trustLevel, other.trustLevel)
    )
  }

  meet(other: SecurityLabel): SecurityLabel {
    return new SecurityLabel(
      minSensitivity(this.dataClass, other.dataClass),
      maxTrust(this.trustLevel, other.trustLevel)
    )
  }

  canFlowTo(other: SecurityLabel): boolean {
    return (
      withinDataClass(this.dataClass, other.dataClass) &&
      meetsTrustRequirement(this.trustLevel, other.trustLevel)
    )
  }

  equals(other: SecurityLabel): boolean {
    return (
      this.dataClass === other.dataClass &&
      this.trustLevel === other.trustLevel
    )
  }

  toString(): string {
    return `${this.dataClass}/${this.trustLevel}`
  }
}

/**
 * Join a list of labels, starting from `bottom`.
 */
export function joinLabels<L extends Label<L>>(
  labels: readonly L[],
  bottom: L
): L {
  return labels.reduce((acc, label) => acc.join(label), bottom)
}
