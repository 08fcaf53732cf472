import { serialize } from 'bson'
import type { BsonValue } from './types.js'

/**
 * Structural BSON equality: both values must encode to the same BSON type
 * and bytes. `1` and `new Double(1)` are different values; so are two
 * documents holding the same fields in a different order.
 */
export function bsonEquals(a: BsonValue, b: BsonValue): boolean {
  const left = serialize({ v: a })
  const right = serialize({ v: b })

  if (left.length !== right.length) return false
  return left.every((byte, i) => byte === right[i])
}
