import { z } from 'zod'
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
import { isBsonDocument } from './types.js'
import type { BsonDocument, BsonValue } from './types.js'

/**
 * Runtime witness for a host type that can live inside a BSON value.
 *
 * `toBson` is total. `fromBson` returns undefined when the BSON value does
 * not hold a `T`; it never throws.
 */
export interface BsonType<T> {
  readonly name: string
  toBson(x: T): BsonValue
  fromBson(v: BsonValue): T | undefined
}

const INT32_MIN = -2147483648
const INT32_MAX = 2147483647

/**
 * Witness for a value that is stored as-is and recognised by a zod schema.
 */
function fromSchema<T extends BsonValue>(
  name: string,
  schema: z.ZodType<T>
): BsonType<T> {
  return {
    name,
    toBson: (x) => x,
    fromBson: (v) => {
      const parsed = schema.safeParse(v)
      return parsed.success ? parsed.data : undefined
    },
  }
}

/**
 * Witness for raw bytes stored as a Binary of one subtype.
 */
function binarySubtype(name: string, subtype: number): BsonType<Uint8Array> {
  return {
    name,
    toBson: (bytes) => new Binary(bytes, subtype),
    fromBson: (v) =>
      v instanceof Binary && v.sub_type === subtype
        ? v.read(0, v.length())
        : undefined,
  }
}

const int32Schema = z.number().int().min(INT32_MIN).max(INT32_MAX)

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

const anyValue: BsonType<BsonValue> = {
  name: 'BsonValue',
  toBson: (x) => x,
  fromBson: (v) => v,
}

const numberType: BsonType<number> = {
  name: 'number',
  toBson: (x) => x,
  fromBson: (v) => {
    if (typeof v === 'number') return v
    if (v instanceof Double || v instanceof Int32) return v.value
    if (v instanceof Long && !(v instanceof Timestamp)) {
      const n = v.toNumber()
      return Number.isSafeInteger(n) ? n : undefined
    }
    return undefined
  },
}

const doubleType: BsonType<number> = {
  name: 'double',
  toBson: (x) => new Double(x),
  fromBson: (v) => {
    if (v instanceof Double) return v.value
    return typeof v === 'number' ? v : undefined
  },
}

/**
 * 32-bit integers as `Int32`, so every host value is already in range.
 * Integral JS numbers within range are read as int32, which is how `bson`
 * encodes them.
 */
const int32Type: BsonType<Int32> = {
  name: 'int32',
  toBson: (x) => x,
  fromBson: (v) => {
    if (v instanceof Int32) return v
    const parsed = int32Schema.safeParse(v)
    return parsed.success ? new Int32(parsed.data) : undefined
  },
}

/**
 * 64-bit integers as `Long`. Smaller integers widen; bigints outside the
 * signed 64-bit range do not match.
 */
const int64Type: BsonType<Long> = {
  name: 'int64',
  toBson: (x) => x,
  fromBson: (v) => {
    if (v instanceof Long && !(v instanceof Timestamp)) return v
    if (v instanceof Int32) return Long.fromNumber(v.value)
    if (typeof v === 'number' && Number.isSafeInteger(v)) return Long.fromNumber(v)
    if (typeof v === 'bigint' && v >= INT64_MIN && v <= INT64_MAX) {
      return Long.fromBigInt(v)
    }
    return undefined
  },
}

/** Any Date, including an invalid one. */
const dateType: BsonType<Date> = {
  name: 'date',
  toBson: (x) => x,
  fromBson: (v) => (v instanceof Date ? v : undefined),
}

const uuidType: BsonType<UUID> = {
  name: 'uuid',
  toBson: (x) => x,
  fromBson: (v) => {
    if (v instanceof UUID) return v
    if (v instanceof Binary && v.sub_type === Binary.SUBTYPE_UUID && v.length() === 16) {
      return new UUID(v.read(0, 16))
    }
    return undefined
  },
}

const documentType: BsonType<BsonDocument> = {
  name: 'document',
  toBson: (x) => x,
  fromBson: (v) => (isBsonDocument(v) ? v : undefined),
}

export const bsonTypes = {
  /** Any BSON value, unchanged. */
  value: anyValue,
  /** Any numeric value that fits a JS number. */
  number: numberType,
  double: doubleType,
  int32: int32Type,
  int64: int64Type,
  decimal128: fromSchema('decimal128', z.instanceof(Decimal128)),
  string: fromSchema('string', z.string()),
  boolean: fromSchema('boolean', z.boolean()),
  date: dateType,
  null: fromSchema('null', z.null()),
  objectId: fromSchema('objectId', z.instanceof(ObjectId)),

  /** Binary of any subtype, including UUIDs. */
  binary: fromSchema('binary', z.instanceof(Binary)),
  bytes: binarySubtype('bytes', Binary.SUBTYPE_DEFAULT),
  func: binarySubtype('function', Binary.SUBTYPE_FUNCTION),
  md5: binarySubtype('md5', Binary.SUBTYPE_MD5),
  userDefined: binarySubtype('userDefined', Binary.SUBTYPE_USER_DEFINED),

  uuid: uuidType,

  regex: fromSchema('regex', z.instanceof(BSONRegExp)),
  code: fromSchema('code', z.instanceof(Code)),
  symbol: fromSchema('symbol', z.instanceof(BSONSymbol)),
  timestamp: fromSchema('timestamp', z.instanceof(Timestamp)),
  minMaxKey: fromSchema(
    'minMaxKey',
    z.union([z.instanceof(MinKey), z.instanceof(MaxKey)])
  ),

  document: documentType,

  /**
   * Array whose every element holds a `T`. One mismatched element fails the
   * whole cast.
   */
  array<T>(element: BsonType<T>): BsonType<T[]> {
    return {
      name: `[${element.name}]`,
      toBson: (xs) => xs.map((x) => element.toBson(x)),
      fromBson: (v) => {
        if (!Array.isArray(v)) return undefined
        const out: T[] = []
        for (const item of v) {
          const x = element.fromBson(item)
          if (x === undefined) return undefined
          out.push(x)
        }
        return out
      },
    }
  },

  /** `T` or BSON null. */
  nullable<T>(inner: BsonType<T>): BsonType<T | null> {
    return {
      name: `${inner.name} | null`,
      toBson: (x) => (x === null ? null : inner.toBson(x)),
      fromBson: (v) => (v === null ? null : inner.fromBson(v)),
    }
  },
}
