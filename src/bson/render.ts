import { EJSON } from 'bson'
import type { BsonValue } from './types.js'

/**
 * Render a BSON value as relaxed Extended JSON.
 */
export function renderBson(value: BsonValue): string {
  return EJSON.stringify(value, { relaxed: true })
}
