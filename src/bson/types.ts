import {
  Binary,
  BSONRegExp,
  BSONSymbol,
  Code,
  Decimal128,
  Double,
  Int32,
  Long,
  MaxKey,
  MinKey,
  ObjectId,
  Timestamp,
  UUID,
} from 'bson'

/**
 * A BSON value as the `bson` package represents it in memory.
 *
 * Plain JS numbers serialize as int32 when integral and in range, as double
 * otherwise. `bigint` serializes as int64.
 */
export type BsonValue =
  | number
  | string
  | boolean
  | null
  | bigint
  | Date
  | ObjectId
  | Binary
  | Long
  | Int32
  | Double
  | Decimal128
  | Timestamp
  | Code
  | BSONRegExp
  | BSONSymbol
  | MinKey
  | MaxKey
  | BsonValue[]
  | BsonDocument

/**
 * A nested BSON document. Key order is insertion order.
 */
export interface BsonDocument {
  [key: string]: BsonValue
}

/**
 * True for plain objects, which are the only values `bson` treats as
 * embedded documents.
 */
export function isBsonDocument(value: BsonValue): value is BsonDocument {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Creation time embedded in an ObjectId (second precision).
 */
export function timestamp(oid: ObjectId): Date {
  return oid.getTimestamp()
}

// Special value types come straight from the bson package.
export {
  Binary,
  BSONRegExp,
  BSONSymbol,
  Code,
  Decimal128,
  Double,
  Int32,
  Long,
  MaxKey,
  MinKey,
  ObjectId,
  Timestamp,
  UUID,
}
