/**
 * Pure algebra over LWW-Set states.
 *
 * Shared by the `LWWSet` replica and by the vertex and edge sets of the
 * `LWWGraph`, which keeps its sets as plain states inside a single `TRef`.
 *
 * @since 0.1.0
 * @internal
 */

import * as Data from "effect/Data"
import * as Equal from "effect/Equal"
import * as HashMap from "effect/HashMap"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import type { LWWSetState } from "../CRDTSet.js"
import { joinTimestamps, keepLatest } from "./merge.js"

/** @internal */
export const make = <E, T>(
  adds: HashMap.HashMap<E, T>,
  removes: HashMap.HashMap<E, T>
): LWWSetState<E, T> => Data.struct({ type: "LWWSet" as const, adds, removes })

/** @internal */
export const empty = <E, T>(): LWWSetState<E, T> => make(HashMap.empty(), HashMap.empty())

/** @internal */
export const add = <E, T>(
  order: Order.Order<T>,
  self: LWWSetState<E, T>,
  element: E,
  timestamp: T
): LWWSetState<E, T> => {
  const adds = keepLatest(order, self.adds, element, timestamp)
  return adds === self.adds ? self : make(adds, self.removes)
}

/** @internal */
export const remove = <E, T>(
  order: Order.Order<T>,
  self: LWWSetState<E, T>,
  element: E,
  timestamp: T
): LWWSetState<E, T> => {
  const removes = keepLatest(order, self.removes, element, timestamp)
  return removes === self.removes ? self : make(self.adds, removes)
}

/**
 * Membership test. At equal timestamps the removal wins.
 *
 * @internal
 */
export const contains = <E, T>(
  order: Order.Order<T>,
  self: LWWSetState<E, T>,
  element: E
): boolean => {
  const addedAt = HashMap.get(self.adds, element)
  if (Option.isNone(addedAt)) {
    return false
  }
  const removedAt = HashMap.get(self.removes, element)
  if (Option.isNone(removedAt)) {
    return true
  }
  return Order.greaterThan(order)(addedAt.value, removedAt.value)
}

/** @internal */
export const join = <E, T>(
  order: Order.Order<T>,
  self: LWWSetState<E, T>,
  that: LWWSetState<E, T>
): LWWSetState<E, T> => {
  const adds = joinTimestamps(order, self.adds, that.adds)
  const removes = joinTimestamps(order, self.removes, that.removes)
  return adds === self.adds && removes === self.removes ? self : make(adds, removes)
}

/**
 * Equality of the raw timestamp maps, not of the visible elements.
 *
 * @internal
 */
export const equals = <E, T>(self: LWWSetState<E, T>, that: LWWSetState<E, T>): boolean =>
  Equal.equals(self.adds, that.adds) && Equal.equals(self.removes, that.removes)

/** @internal */
export const elements = <E, T>(order: Order.Order<T>, self: LWWSetState<E, T>): Array<E> => {
  const present: Array<E> = []
  for (const element of HashMap.keys(self.adds)) {
    if (contains(order, self, element)) {
      present.push(element)
    }
  }
  return present
}
