/**
 * Pure algebra and read-only queries over LWW-Graph states.
 *
 * @since 0.1.0
 * @internal
 */

import * as Data from "effect/Data"
import * as Equal from "effect/Equal"
import * as HashMap from "effect/HashMap"
import * as HashSet from "effect/HashSet"
import * as MutableHashMap from "effect/MutableHashMap"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import type { LWWGraphState } from "../CRDTGraph.js"
import type { LWWSetState } from "../CRDTSet.js"
import * as LWWSet from "./lwwSet.js"
import { mergeHashMaps } from "./merge.js"

/** @internal */
export const make = <E, T>(
  vertices: LWWSetState<E, T>,
  edges: HashMap.HashMap<E, LWWSetState<E, T>>
): LWWGraphState<E, T> => Data.struct({ type: "LWWGraph" as const, vertices, edges })

/** @internal */
export const empty = <E, T>(): LWWGraphState<E, T> => make(LWWSet.empty(), HashMap.empty())

// =============================================================================
// Mutations
// =============================================================================

/** @internal */
export const addVertex = <E, T>(
  order: Order.Order<T>,
  self: LWWGraphState<E, T>,
  vertex: E,
  timestamp: T
): LWWGraphState<E, T> => withVertices(self, LWWSet.add(order, self.vertices, vertex, timestamp))

/** @internal */
export const removeVertex = <E, T>(
  order: Order.Order<T>,
  self: LWWGraphState<E, T>,
  vertex: E,
  timestamp: T
): LWWGraphState<E, T> => withVertices(self, LWWSet.remove(order, self.vertices, vertex, timestamp))

/** @internal */
export const addEdge = <E, T>(
  order: Order.Order<T>,
  self: LWWGraphState<E, T>,
  from: E,
  to: E,
  timestamp: T
): LWWGraphState<E, T> => withOutgoing(self, from, (outgoing) => LWWSet.add(order, outgoing, to, timestamp))

/** @internal */
export const removeEdge = <E, T>(
  order: Order.Order<T>,
  self: LWWGraphState<E, T>,
  from: E,
  to: E,
  timestamp: T
): LWWGraphState<E, T> => withOutgoing(self, from, (outgoing) => LWWSet.remove(order, outgoing, to, timestamp))

/**
 * Joins the vertex sets, then every edge set of `that` into the edge set
 * with the same source, creating it when absent.
 *
 * @internal
 */
export const join = <E, T>(
  order: Order.Order<T>,
  self: LWWGraphState<E, T>,
  that: LWWGraphState<E, T>
): LWWGraphState<E, T> => {
  const vertices = LWWSet.join(order, self.vertices, that.vertices)
  const edges = mergeHashMaps(self.edges, that.edges, (mine, theirs) => LWWSet.join(order, mine, theirs))
  return vertices === self.vertices && edges === self.edges ? self : make(vertices, edges)
}

const withVertices = <E, T>(
  self: LWWGraphState<E, T>,
  vertices: LWWSetState<E, T>
): LWWGraphState<E, T> => vertices === self.vertices ? self : make(vertices, self.edges)

const withOutgoing = <E, T>(
  self: LWWGraphState<E, T>,
  from: E,
  f: (outgoing: LWWSetState<E, T>) => LWWSetState<E, T>
): LWWGraphState<E, T> => {
  const existing = HashMap.get(self.edges, from)
  const current = Option.getOrElse(existing, () => LWWSet.empty<E, T>())
  const updated = f(current)
  return Option.isSome(existing) && updated === current
    ? self
    : make(self.vertices, HashMap.set(self.edges, from, updated))
}

// =============================================================================
// Queries
// =============================================================================

/** @internal */
export const hasVertex = <E, T>(order: Order.Order<T>, self: LWWGraphState<E, T>, vertex: E): boolean =>
  LWWSet.contains(order, self.vertices, vertex)

/**
 * Edge validity. The edge must be present in its own set, both endpoints
 * must be present, neither endpoint may have been removed at or after the
 * edge was added, and the edge may not be older than either endpoint.
 *
 * @internal
 */
export const hasEdge = <E, T>(order: Order.Order<T>, self: LWWGraphState<E, T>, from: E, to: E): boolean => {
  const outgoing = HashMap.get(self.edges, from)
  if (Option.isNone(outgoing) || !LWWSet.contains(order, outgoing.value, to)) {
    return false
  }
  if (!hasVertex(order, self, from) || !hasVertex(order, self, to)) {
    return false
  }
  const edgeAddedAt = HashMap.get(outgoing.value.adds, to)
  if (Option.isNone(edgeAddedAt)) {
    return false
  }
  const addedAt = edgeAddedAt.value
  const removedSinceEdge = (vertex: E) =>
    Option.exists(
      HashMap.get(self.vertices.removes, vertex),
      (removedAt) => Order.lessThanOrEqualTo(order)(addedAt, removedAt)
    )
  const addedAfterEdge = (vertex: E) =>
    Option.exists(
      HashMap.get(self.vertices.adds, vertex),
      (vertexAddedAt) => Order.lessThan(order)(addedAt, vertexAddedAt)
    )
  if (removedSinceEdge(from) || removedSinceEdge(to)) {
    return false
  }
  return !addedAfterEdge(from) && !addedAfterEdge(to)
}

/**
 * Neighbours over valid edges in both directions. Scans every structural
 * edge since there is no reverse index.
 *
 * @internal
 */
export const connectedVertices = <E, T>(
  order: Order.Order<T>,
  self: LWWGraphState<E, T>,
  vertex: E
): HashSet.HashSet<E> =>
  HashSet.mutate(HashSet.empty<E>(), (connected) => {
    for (const [from, outgoing] of self.edges) {
      if (Equal.equals(from, vertex)) {
        for (const to of HashMap.keys(outgoing.adds)) {
          if (hasEdge(order, self, from, to)) {
            HashSet.add(connected, to)
          }
        }
      } else if (HashMap.has(outgoing.adds, vertex) && hasEdge(order, self, from, vertex)) {
        HashSet.add(connected, from)
      }
    }
  })

/**
 * Breadth-first search over valid directed edges. Returns the shortest path
 * including both endpoints, or an empty array.
 *
 * @internal
 */
export const anyPath = <E, T>(
  order: Order.Order<T>,
  self: LWWGraphState<E, T>,
  from: E,
  to: E
): Array<E> => {
  if (!hasVertex(order, self, from) || !hasVertex(order, self, to)) {
    return []
  }

  const previous = MutableHashMap.empty<E, E>()
  MutableHashMap.set(previous, from, from)
  const queue: Array<E> = [from]
  let head = 0

  while (head < queue.length) {
    const current = queue[head++]

    if (Equal.equals(current, to)) {
      return tracePath(previous, from, current)
    }

    const outgoing = HashMap.get(self.edges, current)
    if (Option.isNone(outgoing)) {
      continue
    }
    for (const next of HashMap.keys(outgoing.value.adds)) {
      if (!MutableHashMap.has(previous, next) && hasEdge(order, self, current, next)) {
        MutableHashMap.set(previous, next, current)
        queue.push(next)
      }
    }
  }

  return []
}

const tracePath = <E>(previous: MutableHashMap.MutableHashMap<E, E>, from: E, to: E): Array<E> => {
  const path: Array<E> = [to]
  let step = to
  while (!Equal.equals(step, from)) {
    step = Option.getOrThrow(MutableHashMap.get(previous, step))
    path.push(step)
  }
  return path.reverse()
}

/** @internal */
export const vertices = <E, T>(order: Order.Order<T>, self: LWWGraphState<E, T>): Array<E> =>
  LWWSet.elements(order, self.vertices)

/** @internal */
export const edges = <E, T>(order: Order.Order<T>, self: LWWGraphState<E, T>): Array<readonly [E, E]> => {
  const valid: Array<readonly [E, E]> = []
  for (const [from, outgoing] of self.edges) {
    for (const to of HashMap.keys(outgoing.adds)) {
      if (hasEdge(order, self, from, to)) {
        valid.push([from, to])
      }
    }
  }
  return valid
}

/**
 * Structural equality of the vertex set and the whole edge mapping.
 *
 * @internal
 */
export const equals = <E, T>(self: LWWGraphState<E, T>, that: LWWGraphState<E, T>): boolean => {
  if (!LWWSet.equals(self.vertices, that.vertices) || HashMap.size(self.edges) !== HashMap.size(that.edges)) {
    return false
  }
  for (const [from, outgoing] of self.edges) {
    const other = HashMap.get(that.edges, from)
    if (Option.isNone(other) || !LWWSet.equals(outgoing, other.value)) {
      return false
    }
  }
  return true
}
