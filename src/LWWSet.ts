/**
 * LWW-Set (Last-Writer-Wins Element Set) CRDT implementation.
 *
 * An LWW-Set is a state-based CRDT that records, for every element, the
 * greatest timestamp at which it was added and the greatest timestamp at
 * which it was removed. An element is present when it was added and either
 * never removed or added strictly later than it was removed. Unlike a
 * 2P-Set, an element can be re-added after removal by using a newer
 * timestamp.
 *
 * Properties:
 * - Timestamp-based conflict resolution
 * - Remove wins when add and remove carry equal timestamps
 * - Commutative merge operation
 * - Associative merge operation
 * - Idempotent merge operation
 * - Eventually consistent across all replicas
 *
 * Semantics:
 * - Add operation: keep max(add-timestamp, t)
 * - Remove operation: keep max(remove-timestamp, t)
 * - Member check: added AND (never removed OR add-timestamp > remove-timestamp)
 * - Merge: pointwise maximum of both timestamp maps
 *
 * Timestamps are supplied by the caller and compared with the `Order` given
 * at construction. Elements are compared with Effect's `Equal`, so use
 * primitives or `Data` values as elements.
 *
 * @since 0.1.0
 */

import * as Context from "effect/Context"
import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import { dual, pipe } from "effect/Function"
import * as HashMap from "effect/HashMap"
import * as HashSet from "effect/HashSet"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import type * as Order from "effect/Order"
import * as Predicate from "effect/Predicate"
import * as STM from "effect/STM"
import * as TRef from "effect/TRef"
import type { Mutable } from "effect/Types"
import type { ReplicaId } from "./CRDT.js"
import type { LWWSetState } from "./CRDTSet.js"
import * as State from "./internal/lwwSet.js"
import { makeProtoBase } from "./internal/proto.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * LWW-Set type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const LWWSetTypeId: unique symbol = Symbol.for("lww-graph-crdt/LWWSet")

/**
 * LWW-Set type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type LWWSetTypeId = typeof LWWSetTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * LWW-Set replica.
 *
 * @since 0.1.0
 * @category models
 */
export interface LWWSet<E, T> {
  readonly [LWWSetTypeId]: LWWSetTypeId
  readonly replicaId: ReplicaId
  readonly order: Order.Order<T>
  readonly stateRef: TRef.TRef<LWWSetState<E, T>>
}

/**
 * Re-export LWWSetState from CRDTSet for convenience.
 *
 * @since 0.1.0
 * @category models
 */
export type { LWWSetState } from "./CRDTSet.js"

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when the add- or remove-timestamp of an element that was never
 * added (or never removed) is requested. Guard with `addExists` /
 * `removeExists` first.
 *
 * @since 0.1.0
 * @category errors
 */
export class TimestampNotFoundError extends Data.TaggedError("TimestampNotFoundError")<{
  readonly operation: "add" | "remove"
  readonly element: unknown
  readonly message: string
}> { }

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is an LWWSet.
 *
 * @since 0.1.0
 * @category guards
 */
export const isLWWSet = (u: unknown): u is LWWSet<unknown, unknown> =>
  Predicate.hasProperty(u, LWWSetTypeId)

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoLWWSet = makeProtoBase(LWWSetTypeId, "LWWSet")

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a new, empty LWW-Set.
 *
 * @example
 * ```ts
 * import * as LWWSet from "lww-graph-crdt/LWWSet"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* LWWSet.make<string, number>(ReplicaId("replica-1"), Order.number)
 *
 *   yield* LWWSet.add(set, "apple", 1)
 *   yield* LWWSet.remove(set, "apple", 2)
 *   yield* LWWSet.add(set, "apple", 3)
 *
 *   console.log(yield* LWWSet.has(set, "apple")) // true
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = <E, T>(replicaId: ReplicaId, order: Order.Order<T>): STM.STM<LWWSet<E, T>> =>
  fromState(State.empty<E, T>(), replicaId, order)

/**
 * Creates an LWW-Set replica from an existing state snapshot.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromState = <E, T>(
  state: LWWSetState<E, T>,
  replicaId: ReplicaId,
  order: Order.Order<T>
): STM.STM<LWWSet<E, T>> =>
  STM.gen(function* () {
    const stateRef = yield* TRef.make(State.make(state.adds, state.removes))
    const set: Mutable<LWWSet<E, T>> = Object.create(ProtoLWWSet)
    set.replicaId = replicaId
    set.order = order
    set.stateRef = stateRef
    return set
  })

// =============================================================================
// Operations
// =============================================================================

/**
 * Record an addition of `element` at `timestamp`.
 *
 * Keeps the greater of the stored add-timestamp and `timestamp`, so applying
 * the same addition twice has no further effect.
 *
 * @example
 * ```ts
 * import * as LWWSet from "lww-graph-crdt/LWWSet"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 * import { pipe } from "effect/Function"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* LWWSet.make<string, number>(ReplicaId("replica-1"), Order.number)
 *
 *   // Data-first
 *   yield* LWWSet.add(set, "apple", 1)
 *
 *   // Data-last (with pipe)
 *   yield* pipe(set, LWWSet.add("banana", 2))
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const add: {
  <E, T>(element: E, timestamp: T): (self: LWWSet<E, T>) => STM.STM<LWWSet<E, T>>
  <E, T>(self: LWWSet<E, T>, element: E, timestamp: T): STM.STM<LWWSet<E, T>>
} = dual(
  3,
  <E, T>(self: LWWSet<E, T>, element: E, timestamp: T): STM.STM<LWWSet<E, T>> =>
    TRef.update(self.stateRef, (state) => State.add(self.order, state, element, timestamp)).pipe(STM.as(self))
)

/**
 * Record a removal of `element` at `timestamp`.
 *
 * A removal hides the element for every addition with the same or an older
 * timestamp.
 *
 * @since 0.1.0
 * @category operations
 */
export const remove: {
  <E, T>(element: E, timestamp: T): (self: LWWSet<E, T>) => STM.STM<LWWSet<E, T>>
  <E, T>(self: LWWSet<E, T>, element: E, timestamp: T): STM.STM<LWWSet<E, T>>
} = dual(
  3,
  <E, T>(self: LWWSet<E, T>, element: E, timestamp: T): STM.STM<LWWSet<E, T>> =>
    TRef.update(self.stateRef, (state) => State.remove(self.order, state, element, timestamp)).pipe(STM.as(self))
)

/**
 * Merge another replica's state into this set.
 *
 * Every add-timestamp of `other` is applied with `add` and every
 * remove-timestamp with `remove`, which is the pointwise maximum of both
 * timestamp maps.
 *
 * @example
 * ```ts
 * import * as LWWSet from "lww-graph-crdt/LWWSet"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const set1 = yield* LWWSet.make<string, number>(ReplicaId("replica-1"), Order.number)
 *   const set2 = yield* LWWSet.make<string, number>(ReplicaId("replica-2"), Order.number)
 *
 *   yield* LWWSet.add(set1, "apple", 1)
 *   yield* LWWSet.remove(set2, "apple", 2)
 *
 *   yield* LWWSet.merge(set1, yield* LWWSet.query(set2))
 *
 *   console.log(yield* LWWSet.has(set1, "apple")) // false
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const merge: {
  <E, T>(other: LWWSetState<E, T>): (self: LWWSet<E, T>) => STM.STM<LWWSet<E, T>>
  <E, T>(self: LWWSet<E, T>, other: LWWSetState<E, T>): STM.STM<LWWSet<E, T>>
} = dual(
  2,
  <E, T>(self: LWWSet<E, T>, other: LWWSetState<E, T>): STM.STM<LWWSet<E, T>> =>
    TRef.update(self.stateRef, (state) => State.join(self.order, state, other)).pipe(STM.as(self))
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Check if a set contains an element.
 *
 * Returns `false` if the element was never added, `true` if it was never
 * removed, and otherwise whether its add-timestamp is strictly greater than
 * its remove-timestamp. An add and a remove at the same timestamp leave the
 * element absent.
 *
 * @since 0.1.0
 * @category getters
 */
export const has: {
  <E>(element: E): <T>(self: LWWSet<E, T>) => STM.STM<boolean>
  <E, T>(self: LWWSet<E, T>, element: E): STM.STM<boolean>
} = dual(
  2,
  <E, T>(self: LWWSet<E, T>, element: E): STM.STM<boolean> =>
    pipe(
      TRef.get(self.stateRef),
      STM.map((state) => State.contains(self.order, state, element))
    )
)

/**
 * Whether an addition of `element` was ever recorded.
 *
 * @since 0.1.0
 * @category getters
 */
export const addExists: {
  <E>(element: E): <T>(self: LWWSet<E, T>) => STM.STM<boolean>
  <E, T>(self: LWWSet<E, T>, element: E): STM.STM<boolean>
} = dual(
  2,
  <E, T>(self: LWWSet<E, T>, element: E): STM.STM<boolean> =>
    pipe(
      TRef.get(self.stateRef),
      STM.map((state) => HashMap.has(state.adds, element))
    )
)

/**
 * Whether a removal of `element` was ever recorded.
 *
 * @since 0.1.0
 * @category getters
 */
export const removeExists: {
  <E>(element: E): <T>(self: LWWSet<E, T>) => STM.STM<boolean>
  <E, T>(self: LWWSet<E, T>, element: E): STM.STM<boolean>
} = dual(
  2,
  <E, T>(self: LWWSet<E, T>, element: E): STM.STM<boolean> =>
    pipe(
      TRef.get(self.stateRef),
      STM.map((state) => HashMap.has(state.removes, element))
    )
)

/**
 * The greatest add-timestamp recorded for `element`.
 *
 * Fails with `TimestampNotFoundError` if the element was never added.
 *
 * @example
 * ```ts
 * import * as LWWSet from "lww-graph-crdt/LWWSet"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* LWWSet.make<string, number>(ReplicaId("replica-1"), Order.number)
 *   yield* LWWSet.add(set, "apple", 4)
 *   yield* LWWSet.add(set, "apple", 2)
 *
 *   console.log(yield* LWWSet.addTimestamp(set, "apple")) // 4
 * })
 * ```
 *
 * @since 0.1.0
 * @category getters
 */
export const addTimestamp: {
  <E>(element: E): <T>(self: LWWSet<E, T>) => STM.STM<T, TimestampNotFoundError>
  <E, T>(self: LWWSet<E, T>, element: E): STM.STM<T, TimestampNotFoundError>
} = dual(
  2,
  <E, T>(self: LWWSet<E, T>, element: E): STM.STM<T, TimestampNotFoundError> =>
    pipe(
      TRef.get(self.stateRef),
      STM.flatMap((state) => lookupTimestamp(state.adds, element, "add"))
    )
)

/**
 * The greatest remove-timestamp recorded for `element`.
 *
 * Fails with `TimestampNotFoundError` if the element was never removed.
 *
 * @since 0.1.0
 * @category getters
 */
export const removeTimestamp: {
  <E>(element: E): <T>(self: LWWSet<E, T>) => STM.STM<T, TimestampNotFoundError>
  <E, T>(self: LWWSet<E, T>, element: E): STM.STM<T, TimestampNotFoundError>
} = dual(
  2,
  <E, T>(self: LWWSet<E, T>, element: E): STM.STM<T, TimestampNotFoundError> =>
    pipe(
      TRef.get(self.stateRef),
      STM.flatMap((state) => lookupTimestamp(state.removes, element, "remove"))
    )
)

const lookupTimestamp = <E, T>(
  timestamps: HashMap.HashMap<E, T>,
  element: E,
  operation: "add" | "remove"
): STM.STM<T, TimestampNotFoundError> =>
  Option.match(HashMap.get(timestamps, element), {
    onNone: () =>
      STM.fail(
        new TimestampNotFoundError({
          operation,
          element,
          message: `No ${operation} timestamp recorded for element ${String(element)}`
        })
      ),
    onSome: (timestamp) => STM.succeed(timestamp)
  })

/**
 * Get all elements currently present in a set.
 *
 * @since 0.1.0
 * @category getters
 */
export const values = <E, T>(self: LWWSet<E, T>): STM.STM<HashSet.HashSet<E>> =>
  pipe(
    TRef.get(self.stateRef),
    STM.map((state) => HashSet.fromIterable(State.elements(self.order, state)))
  )

/**
 * Get the number of elements currently present in a set.
 *
 * @since 0.1.0
 * @category getters
 */
export const size = <E, T>(self: LWWSet<E, T>): STM.STM<number> =>
  pipe(
    values(self),
    STM.map(HashSet.size)
  )

/**
 * Get the current state of a set.
 *
 * Returns a snapshot that can be merged into other replicas or encoded with
 * `CRDTSet.LWWSetState`.
 *
 * @since 0.1.0
 * @category getters
 */
export const query = <E, T>(self: LWWSet<E, T>): STM.STM<LWWSetState<E, T>> => TRef.get(self.stateRef)

/**
 * Compare two replicas by their raw add and remove maps.
 *
 * Two sets that show the same elements but hold different timestamps are
 * not equal.
 *
 * @since 0.1.0
 * @category getters
 */
export const equals: {
  <E, T>(that: LWWSet<E, T>): (self: LWWSet<E, T>) => STM.STM<boolean>
  <E, T>(self: LWWSet<E, T>, that: LWWSet<E, T>): STM.STM<boolean>
} = dual(
  2,
  <E, T>(self: LWWSet<E, T>, that: LWWSet<E, T>): STM.STM<boolean> =>
    STM.zipWith(TRef.get(self.stateRef), TRef.get(that.stateRef), State.equals)
)

// =============================================================================
// Tags
// =============================================================================

/**
 * LWWSet service tag for dependency injection.
 *
 * @since 0.1.0
 * @category tags
 */
export const Tag = <E, T>() => Context.GenericTag<LWWSet<E, T>>("lww-graph-crdt/LWWSet")

// =============================================================================
// Layers
// =============================================================================

/**
 * Creates a live layer with no persistence.
 *
 * @example
 * ```ts
 * import * as LWWSet from "lww-graph-crdt/LWWSet"
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const SetTag = LWWSet.Tag<string, number>()
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* SetTag
 *   yield* LWWSet.add(set, "apple", 1)
 * })
 *
 * Effect.runPromise(
 *   program.pipe(Effect.provide(LWWSet.Live(SetTag, ReplicaId("replica-1"), Order.number)))
 * )
 * ```
 *
 * @since 0.1.0
 * @category layers
 */
export const Live = <E, T>(
  tag: Context.Tag<LWWSet<E, T>, LWWSet<E, T>>,
  replicaId: ReplicaId,
  order: Order.Order<T>
): Layer.Layer<LWWSet<E, T>> =>
  Layer.effect(
    tag,
    pipe(
      make<E, T>(replicaId, order),
      STM.commit,
      Effect.tap(() => Effect.logDebug("LWW-Set replica created")),
      Effect.annotateLogs({ replicaId })
    )
  )
