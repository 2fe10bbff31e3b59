/**
 * LWW-Graph (Last-Writer-Wins Element Graph) CRDT implementation.
 *
 * An LWW-Graph is a state-based CRDT for a directed graph built from LWW-Sets:
 * one set of vertices and, for every source vertex, one set of destination
 * vertices. Vertices and edges can be added and removed with caller-supplied
 * timestamps, and replicas that observed the same operations in any order,
 * through any sequence of merges, hold the same state.
 *
 * Properties:
 * - Last-writer-wins resolution for vertices and edges, remove wins ties
 * - Edges are only visible while both endpoints are
 * - Tombstones are kept, nothing is physically deleted
 * - Commutative merge operation
 * - Associative merge operation
 * - Idempotent merge operation
 * - Eventually consistent across all replicas
 *
 * Edge validity:
 * - the edge is present in the edge set of its source
 * - both endpoints are present in the vertex set
 * - neither endpoint was removed at or after the edge's add-timestamp
 * - the edge's add-timestamp is not older than either endpoint's
 *
 * @since 0.1.0
 */

import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import { dual, pipe } from "effect/Function"
import * as HashSet from "effect/HashSet"
import * as Layer from "effect/Layer"
import type * as Order from "effect/Order"
import * as Predicate from "effect/Predicate"
import * as STM from "effect/STM"
import * as TRef from "effect/TRef"
import type { Mutable } from "effect/Types"
import type { ReplicaId } from "./CRDT.js"
import type { LWWGraphState } from "./CRDTGraph.js"
import * as State from "./internal/lwwGraph.js"
import { makeProtoBase } from "./internal/proto.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * LWW-Graph type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const LWWGraphTypeId: unique symbol = Symbol.for("lww-graph-crdt/LWWGraph")

/**
 * LWW-Graph type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type LWWGraphTypeId = typeof LWWGraphTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * LWW-Graph replica.
 *
 * @since 0.1.0
 * @category models
 */
export interface LWWGraph<E, T> {
  readonly [LWWGraphTypeId]: LWWGraphTypeId
  readonly replicaId: ReplicaId
  readonly order: Order.Order<T>
  readonly stateRef: TRef.TRef<LWWGraphState<E, T>>
}

/**
 * Re-export LWWGraphState from CRDTGraph for convenience.
 *
 * @since 0.1.0
 * @category models
 */
export type { LWWGraphState } from "./CRDTGraph.js"

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is an LWWGraph.
 *
 * @since 0.1.0
 * @category guards
 */
export const isLWWGraph = (u: unknown): u is LWWGraph<unknown, unknown> =>
  Predicate.hasProperty(u, LWWGraphTypeId)

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoLWWGraph = makeProtoBase(LWWGraphTypeId, "LWWGraph")

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a new, empty LWW-Graph.
 *
 * @example
 * ```ts
 * import * as LWWGraph from "lww-graph-crdt/LWWGraph"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const graph = yield* LWWGraph.make<string, number>(ReplicaId("replica-1"), Order.number)
 *
 *   yield* LWWGraph.addVertex(graph, "a", 1)
 *   yield* LWWGraph.addVertex(graph, "b", 1)
 *   yield* LWWGraph.addEdge(graph, "a", "b", 2)
 *
 *   console.log(yield* LWWGraph.anyPath(graph, "a", "b")) // ["a", "b"]
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = <E, T>(replicaId: ReplicaId, order: Order.Order<T>): STM.STM<LWWGraph<E, T>> =>
  fromState(State.empty<E, T>(), replicaId, order)

/**
 * Creates an LWW-Graph replica from an existing state snapshot.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromState = <E, T>(
  state: LWWGraphState<E, T>,
  replicaId: ReplicaId,
  order: Order.Order<T>
): STM.STM<LWWGraph<E, T>> =>
  STM.gen(function* () {
    const stateRef = yield* TRef.make(State.make(state.vertices, state.edges))
    const graph: Mutable<LWWGraph<E, T>> = Object.create(ProtoLWWGraph)
    graph.replicaId = replicaId
    graph.order = order
    graph.stateRef = stateRef
    return graph
  })

// =============================================================================
// Operations
// =============================================================================

/**
 * Record an addition of `vertex` at `timestamp`.
 *
 * @since 0.1.0
 * @category operations
 */
export const addVertex: {
  <E, T>(vertex: E, timestamp: T): (self: LWWGraph<E, T>) => STM.STM<LWWGraph<E, T>>
  <E, T>(self: LWWGraph<E, T>, vertex: E, timestamp: T): STM.STM<LWWGraph<E, T>>
} = dual(
  3,
  <E, T>(self: LWWGraph<E, T>, vertex: E, timestamp: T): STM.STM<LWWGraph<E, T>> =>
    modify(self, (state) => State.addVertex(self.order, state, vertex, timestamp))
)

/**
 * Record a removal of `vertex` at `timestamp`.
 *
 * Edges touching the vertex are not deleted. They stop being visible when
 * they were added at or before `timestamp`.
 *
 * @since 0.1.0
 * @category operations
 */
export const removeVertex: {
  <E, T>(vertex: E, timestamp: T): (self: LWWGraph<E, T>) => STM.STM<LWWGraph<E, T>>
  <E, T>(self: LWWGraph<E, T>, vertex: E, timestamp: T): STM.STM<LWWGraph<E, T>>
} = dual(
  3,
  <E, T>(self: LWWGraph<E, T>, vertex: E, timestamp: T): STM.STM<LWWGraph<E, T>> =>
    modify(self, (state) => State.removeVertex(self.order, state, vertex, timestamp))
)

/**
 * Record an addition of the directed edge `from -> to` at `timestamp`.
 *
 * The edge is recorded whatever the state of its endpoints. It is only
 * visible once both endpoints exist with an add-timestamp no newer than
 * `timestamp`.
 *
 * @example
 * ```ts
 * import * as LWWGraph from "lww-graph-crdt/LWWGraph"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 * import { pipe } from "effect/Function"
 *
 * const program = Effect.gen(function* () {
 *   const graph = yield* LWWGraph.make<number, number>(ReplicaId("replica-1"), Order.number)
 *
 *   yield* LWWGraph.addEdge(graph, 0, 1, 0)
 *   console.log(yield* LWWGraph.hasEdge(graph, 0, 1)) // false
 *
 *   yield* pipe(graph, LWWGraph.addVertex(0, 0))
 *   yield* pipe(graph, LWWGraph.addVertex(1, 0))
 *   console.log(yield* LWWGraph.hasEdge(graph, 0, 1)) // true
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const addEdge: {
  <E, T>(from: E, to: E, timestamp: T): (self: LWWGraph<E, T>) => STM.STM<LWWGraph<E, T>>
  <E, T>(self: LWWGraph<E, T>, from: E, to: E, timestamp: T): STM.STM<LWWGraph<E, T>>
} = dual(
  4,
  <E, T>(self: LWWGraph<E, T>, from: E, to: E, timestamp: T): STM.STM<LWWGraph<E, T>> =>
    modify(self, (state) => State.addEdge(self.order, state, from, to, timestamp))
)

/**
 * Record a removal of the directed edge `from -> to` at `timestamp`.
 *
 * @since 0.1.0
 * @category operations
 */
export const removeEdge: {
  <E, T>(from: E, to: E, timestamp: T): (self: LWWGraph<E, T>) => STM.STM<LWWGraph<E, T>>
  <E, T>(self: LWWGraph<E, T>, from: E, to: E, timestamp: T): STM.STM<LWWGraph<E, T>>
} = dual(
  4,
  <E, T>(self: LWWGraph<E, T>, from: E, to: E, timestamp: T): STM.STM<LWWGraph<E, T>> =>
    modify(self, (state) => State.removeEdge(self.order, state, from, to, timestamp))
)

/**
 * Merge another replica's state into this graph.
 *
 * Joins the vertex sets, then joins every edge set of `other` into the local
 * edge set with the same source vertex.
 *
 * @example
 * ```ts
 * import * as LWWGraph from "lww-graph-crdt/LWWGraph"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const graph1 = yield* LWWGraph.make<string, number>(ReplicaId("replica-1"), Order.number)
 *   const graph2 = yield* LWWGraph.make<string, number>(ReplicaId("replica-2"), Order.number)
 *
 *   yield* LWWGraph.addVertex(graph1, "a", 0)
 *   yield* LWWGraph.addVertex(graph2, "b", 1)
 *
 *   yield* LWWGraph.merge(graph1, yield* LWWGraph.query(graph2))
 *
 *   console.log(yield* LWWGraph.hasVertex(graph1, "b")) // true
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const merge: {
  <E, T>(other: LWWGraphState<E, T>): (self: LWWGraph<E, T>) => STM.STM<LWWGraph<E, T>>
  <E, T>(self: LWWGraph<E, T>, other: LWWGraphState<E, T>): STM.STM<LWWGraph<E, T>>
} = dual(
  2,
  <E, T>(self: LWWGraph<E, T>, other: LWWGraphState<E, T>): STM.STM<LWWGraph<E, T>> =>
    modify(self, (state) => State.join(self.order, state, other))
)

const modify = <E, T>(
  self: LWWGraph<E, T>,
  f: (state: LWWGraphState<E, T>) => LWWGraphState<E, T>
): STM.STM<LWWGraph<E, T>> => TRef.update(self.stateRef, f).pipe(STM.as(self))

const read = <E, T, A>(
  self: LWWGraph<E, T>,
  f: (state: LWWGraphState<E, T>) => A
): STM.STM<A> => pipe(TRef.get(self.stateRef), STM.map(f))

// =============================================================================
// Getters
// =============================================================================

/**
 * Check if a graph contains a vertex.
 *
 * @since 0.1.0
 * @category getters
 */
export const hasVertex: {
  <E>(vertex: E): <T>(self: LWWGraph<E, T>) => STM.STM<boolean>
  <E, T>(self: LWWGraph<E, T>, vertex: E): STM.STM<boolean>
} = dual(
  2,
  <E, T>(self: LWWGraph<E, T>, vertex: E): STM.STM<boolean> =>
    read(self, (state) => State.hasVertex(self.order, state, vertex))
)

/**
 * Check if a graph contains the directed edge `from -> to`.
 *
 * The edge must be present in its own set, both endpoints must be present,
 * neither endpoint may have a remove-timestamp at or after the edge's
 * add-timestamp, and the edge's add-timestamp may not be older than either
 * endpoint's add-timestamp.
 *
 * @since 0.1.0
 * @category getters
 */
export const hasEdge: {
  <E>(from: E, to: E): <T>(self: LWWGraph<E, T>) => STM.STM<boolean>
  <E, T>(self: LWWGraph<E, T>, from: E, to: E): STM.STM<boolean>
} = dual(
  3,
  <E, T>(self: LWWGraph<E, T>, from: E, to: E): STM.STM<boolean> =>
    read(self, (state) => State.hasEdge(self.order, state, from, to))
)

/**
 * All vertices joined to `vertex` by a valid edge in either direction.
 *
 * Scans every recorded edge, so the cost grows with the total number of
 * edges rather than with the degree of `vertex`.
 *
 * @since 0.1.0
 * @category getters
 */
export const allConnectedVertices: {
  <E>(vertex: E): <T>(self: LWWGraph<E, T>) => STM.STM<HashSet.HashSet<E>>
  <E, T>(self: LWWGraph<E, T>, vertex: E): STM.STM<HashSet.HashSet<E>>
} = dual(
  2,
  <E, T>(self: LWWGraph<E, T>, vertex: E): STM.STM<HashSet.HashSet<E>> =>
    read(self, (state) => State.connectedVertices(self.order, state, vertex))
)

/**
 * Find a shortest path from `from` to `to` over valid directed edges.
 *
 * Returns the vertices of the path including both ends, `[from]` when
 * `from` and `to` are the same vertex, and an empty array when either end is
 * not in the graph or `to` cannot be reached. When several shortest paths
 * exist, any one of them may be returned.
 *
 * @example
 * ```ts
 * import * as LWWGraph from "lww-graph-crdt/LWWGraph"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const graph = yield* LWWGraph.make<number, number>(ReplicaId("replica-1"), Order.number)
 *
 *   for (const vertex of [0, 1, 2]) {
 *     yield* LWWGraph.addVertex(graph, vertex, 0)
 *   }
 *   yield* LWWGraph.addEdge(graph, 0, 1, 1)
 *   yield* LWWGraph.addEdge(graph, 1, 2, 1)
 *
 *   console.log(yield* LWWGraph.anyPath(graph, 0, 2)) // [0, 1, 2]
 *   console.log(yield* LWWGraph.anyPath(graph, 2, 0)) // []
 * })
 * ```
 *
 * @since 0.1.0
 * @category getters
 */
export const anyPath: {
  <E>(from: E, to: E): <T>(self: LWWGraph<E, T>) => STM.STM<Array<E>>
  <E, T>(self: LWWGraph<E, T>, from: E, to: E): STM.STM<Array<E>>
} = dual(
  3,
  <E, T>(self: LWWGraph<E, T>, from: E, to: E): STM.STM<Array<E>> =>
    read(self, (state) => State.anyPath(self.order, state, from, to))
)

/**
 * Get all vertices currently present in a graph.
 *
 * @since 0.1.0
 * @category getters
 */
export const vertices = <E, T>(self: LWWGraph<E, T>): STM.STM<HashSet.HashSet<E>> =>
  read(self, (state) => HashSet.fromIterable(State.vertices(self.order, state)))

/**
 * Get all currently valid edges of a graph as `[from, to]` pairs.
 *
 * @since 0.1.0
 * @category getters
 */
export const edges = <E, T>(self: LWWGraph<E, T>): STM.STM<Array<readonly [E, E]>> =>
  read(self, (state) => State.edges(self.order, state))

/**
 * Get the current state of a graph.
 *
 * Returns a snapshot that can be merged into other replicas or encoded with
 * `CRDTGraph.LWWGraphState`.
 *
 * @since 0.1.0
 * @category getters
 */
export const query = <E, T>(self: LWWGraph<E, T>): STM.STM<LWWGraphState<E, T>> => TRef.get(self.stateRef)

/**
 * Compare two replicas by their vertex sets and full edge mappings.
 *
 * The comparison is on recorded timestamps, including tombstones and edges
 * that are currently invisible.
 *
 * @since 0.1.0
 * @category getters
 */
export const equals: {
  <E, T>(that: LWWGraph<E, T>): (self: LWWGraph<E, T>) => STM.STM<boolean>
  <E, T>(self: LWWGraph<E, T>, that: LWWGraph<E, T>): STM.STM<boolean>
} = dual(
  2,
  <E, T>(self: LWWGraph<E, T>, that: LWWGraph<E, T>): STM.STM<boolean> =>
    STM.zipWith(TRef.get(self.stateRef), TRef.get(that.stateRef), State.equals)
)

// =============================================================================
// Tags
// =============================================================================

/**
 * LWWGraph service tag for dependency injection.
 *
 * @since 0.1.0
 * @category tags
 */
export const Tag = <E, T>() => Context.GenericTag<LWWGraph<E, T>>("lww-graph-crdt/LWWGraph")

// =============================================================================
// Layers
// =============================================================================

/**
 * Creates a live layer with no persistence.
 *
 * @example
 * ```ts
 * import * as LWWGraph from "lww-graph-crdt/LWWGraph"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const GraphTag = LWWGraph.Tag<string, number>()
 *
 * const program = Effect.gen(function* () {
 *   const graph = yield* GraphTag
 *   yield* LWWGraph.addVertex(graph, "a", 1)
 * })
 *
 * Effect.runPromise(
 *   program.pipe(Effect.provide(LWWGraph.Live(GraphTag, ReplicaId("replica-1"), Order.number)))
 * )
 * ```
 *
 * @since 0.1.0
 * @category layers
 */
export const Live = <E, T>(
  tag: Context.Tag<LWWGraph<E, T>, LWWGraph<E, T>>,
  replicaId: ReplicaId,
  order: Order.Order<T>
): Layer.Layer<LWWGraph<E, T>> =>
  Layer.effect(
    tag,
    pipe(
      make<E, T>(replicaId, order),
      STM.commit,
      Effect.tap(() => Effect.logDebug("LWW-Graph replica created")),
      Effect.annotateLogs({ replicaId })
    )
  )
