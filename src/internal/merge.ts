/**
 * Internal utilities for joining CRDT states.
 *
 * @since 0.1.0
 * @internal
 */

import { pipe } from "effect/Function"
import * as HashMap from "effect/HashMap"
import * as Option from "effect/Option"
import * as Order from "effect/Order"

/**
 * Writes `value` under `key`, combining it with the existing value if there
 * is one.
 *
 * @internal
 */
export const upsert = <K, V>(
  self: HashMap.HashMap<K, V>,
  key: K,
  value: V,
  combine: (existing: V, incoming: V) => V
): HashMap.HashMap<K, V> =>
  pipe(
    HashMap.get(self, key),
    Option.match({
      onNone: () => HashMap.set(self, key, value),
      onSome: (existing) => {
        const combined = combine(existing, value)
        return combined === existing ? self : HashMap.set(self, key, combined)
      }
    })
  )

/**
 * Merges two hash maps using a custom merge function for conflicting keys.
 *
 * @internal
 */
export const mergeHashMaps = <K, V>(
  self: HashMap.HashMap<K, V>,
  that: HashMap.HashMap<K, V>,
  combine: (existing: V, incoming: V) => V
): HashMap.HashMap<K, V> =>
  HashMap.reduce(that, self, (acc, value, key) => upsert(acc, key, value, combine))

/**
 * Records `timestamp` for `key`, keeping the greater of the stored and the
 * incoming timestamp.
 *
 * @internal
 */
export const keepLatest = <K, T>(
  order: Order.Order<T>,
  self: HashMap.HashMap<K, T>,
  key: K,
  timestamp: T
): HashMap.HashMap<K, T> => upsert(self, key, timestamp, Order.max(order))

/**
 * Pointwise maximum of two timestamp maps.
 *
 * @internal
 */
export const joinTimestamps = <K, T>(
  order: Order.Order<T>,
  self: HashMap.HashMap<K, T>,
  that: HashMap.HashMap<K, T>
): HashMap.HashMap<K, T> => mergeHashMaps(self, that, Order.max(order))
