import { ObjectId } from 'bson'
import type { LIOContext } from '../lio/context.js'
import type { Label } from '../lio/label.js'

/**
 * Generate a fresh ObjectId as an effect of `ctx`, ordered after the
 * effects already submitted to it.
 */
export function genObjectId<L extends Label<L>, P, S>(
  ctx: LIOContext<L, P, S>
): Promise<ObjectId> {
  return ctx.ioTCB(() => new ObjectId())
}
