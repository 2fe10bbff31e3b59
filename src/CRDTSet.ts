/**
 * Set CRDT state types and schemas.
 *
 * Provides the state snapshot of an LWW-Set. Snapshots are what replicas
 * exchange: `LWWSet.query` produces one and `LWWSet.merge` consumes one.
 *
 * @since 0.1.0
 */
import type * as HashMap from "effect/HashMap"
import * as Schema from "effect/Schema"

// =============================================================================
// Models
// =============================================================================

/**
 * State of an LWW-Set (last-writer-wins element set) CRDT.
 *
 * `adds` holds the greatest add-timestamp observed for each element and
 * `removes` the greatest remove-timestamp. An element is present when its
 * add-timestamp is strictly greater than its remove-timestamp, or when it
 * was never removed. Entries are never dropped: a remove-timestamp is the
 * tombstone that lets later merges resolve correctly.
 *
 * @since 0.1.0
 * @category models
 */
export interface LWWSetState<E, T> {
  readonly type: "LWWSet"
  readonly adds: HashMap.HashMap<E, T>
  readonly removes: HashMap.HashMap<E, T>
}

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema for LWWSetState.
 *
 * Both timestamp maps are encoded as arrays of `[element, timestamp]` pairs.
 * Decoded states are `Data` values and compare structurally.
 *
 * @example
 * ```ts
 * import * as CRDTSet from "lww-graph-crdt/CRDTSet"
 * import * as Schema from "effect/Schema"
 *
 * const schema = CRDTSet.LWWSetState(Schema.String, Schema.Number)
 * const state = Schema.decodeUnknownSync(schema)({
 *   type: "LWWSet",
 *   adds: [["apple", 3]],
 *   removes: []
 * })
 * ```
 *
 * @since 0.1.0
 * @category schemas
 */
export const LWWSetState = <E extends Schema.Schema.Any, T extends Schema.Schema.Any>(
  element: E,
  timestamp: T
) =>
  Schema.Struct({
    type: Schema.Literal("LWWSet"),
    adds: Schema.HashMap({ key: element, value: timestamp }),
    removes: Schema.HashMap({ key: element, value: timestamp })
  }).pipe(
    Schema.Data,
    Schema.annotations({
      identifier: "LWWSetState",
      title: "LWW-Set State",
      description: "State of a last-writer-wins element set CRDT"
    })
  )
