/**
 * Logical timestamp with a replica tie-break.
 *
 * The LWW-Set and LWW-Graph accept any timestamp type with an `Order`. When
 * several replicas issue timestamps from independent logical counters,
 * equal counters from different replicas would otherwise collide; pairing
 * the counter with the replica ID makes every timestamp distinct and totally
 * ordered. Issuing counters stays with the caller.
 *
 * @since 0.1.0
 */
import * as Data from "effect/Data"
import * as order from "effect/Order"
import * as Schema from "effect/Schema"
import { type ReplicaId, ReplicaIdSchema } from "./CRDT.js"

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export interface Timestamp {
  readonly counter: number
  readonly replicaId: ReplicaId
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a timestamp. The result is a `Data` value, so equal timestamps
 * compare equal with `Equal.equals`.
 *
 * @example
 * ```ts
 * import * as Timestamp from "lww-graph-crdt/Timestamp"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 *
 * const t = Timestamp.make(7, ReplicaId("replica-1"))
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (counter: number, replicaId: ReplicaId): Timestamp => Data.struct({ counter, replicaId })

// =============================================================================
// Instances
// =============================================================================

/**
 * Orders by counter, then by replica ID.
 *
 * @since 0.1.0
 * @category instances
 */
export const Order: order.Order<Timestamp> = order.combine(
  order.mapInput(order.number, (self: Timestamp) => self.counter),
  order.mapInput(order.string, (self: Timestamp) => self.replicaId)
)

// =============================================================================
// Schemas
// =============================================================================

/**
 * @since 0.1.0
 * @category schemas
 */
export const TimestampSchema = Schema.Struct({
  counter: Schema.Number,
  replicaId: ReplicaIdSchema
}).pipe(
  Schema.Data,
  Schema.annotations({
    identifier: "Timestamp",
    description: "Logical counter paired with the replica that issued it"
  })
)
