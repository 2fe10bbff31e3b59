/**
 * Graph CRDT state types and schemas.
 *
 * @since 0.1.0
 */
import type * as HashMap from "effect/HashMap"
import * as Schema from "effect/Schema"
import { LWWSetState as LWWSetStateSchema } from "./CRDTSet.js"
import type { LWWSetState } from "./CRDTSet.js"

// =============================================================================
// Models
// =============================================================================

/**
 * State of an LWW-Graph (last-writer-wins directed graph) CRDT.
 *
 * `vertices` is the LWW-Set state of vertex keys. `edges` maps each source
 * vertex to the LWW-Set state of its destinations. Edge entries exist
 * independently of the vertex set; whether an edge is visible is decided at
 * read time from both (see `LWWGraph.hasEdge`).
 *
 * @since 0.1.0
 * @category models
 */
export interface LWWGraphState<E, T> {
  readonly type: "LWWGraph"
  readonly vertices: LWWSetState<E, T>
  readonly edges: HashMap.HashMap<E, LWWSetState<E, T>>
}

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema for LWWGraphState.
 *
 * @since 0.1.0
 * @category schemas
 */
export const LWWGraphState = <E extends Schema.Schema.Any, T extends Schema.Schema.Any>(
  element: E,
  timestamp: T
) =>
  Schema.Struct({
    type: Schema.Literal("LWWGraph"),
    vertices: LWWSetStateSchema(element, timestamp),
    edges: Schema.HashMap({ key: element, value: LWWSetStateSchema(element, timestamp) })
  }).pipe(
    Schema.Data,
    Schema.annotations({
      identifier: "LWWGraphState",
      title: "LWW-Graph State",
      description: "State of a last-writer-wins directed graph CRDT"
    })
  )
