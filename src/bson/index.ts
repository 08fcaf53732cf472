export {
  type BsonValue,
  type BsonDocument,
  isBsonDocument,
  timestamp,
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
} from './types.js'

export { bsonTypes, type BsonType } from './codec.js'
export { bsonEquals } from './equality.js'
export { renderBson } from './render.js'
