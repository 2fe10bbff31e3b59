/**
 * Unit tests for LWW-Set CRDT.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as HashSet from "effect/HashSet"
import * as Order from "effect/Order"
import * as LWWSet from "./LWWSet"
import { ReplicaId } from "./CRDT"

const makeSet = (replica: string) => LWWSet.make<string, number>(ReplicaId(replica), Order.number)

describe("LWWSet", () => {
  it("should start empty", async () => {
    const program = Effect.gen(function* () {
      const set = yield* makeSet("replica-1")
      const size = yield* LWWSet.size(set)
      const hasApple = yield* LWWSet.has(set, "apple")
      return { size, hasApple }
    })

    const result = await Effect.runPromise(program)
    expect(result.size).toBe(0)
    expect(result.hasApple).toBe(false)
  })

  it("should add elements", async () => {
    const program = Effect.gen(function* () {
      const set = yield* makeSet("replica-1")

      yield* LWWSet.add(set, "apple", 1)
      yield* pipe(set, LWWSet.add("banana", 2))

      const hasApple = yield* LWWSet.has(set, "apple")
      const hasBanana = yield* pipe(set, LWWSet.has("banana"))
      const size = yield* LWWSet.size(set)

      return { hasApple, hasBanana, size }
    })

    const result = await Effect.runPromise(program)
    expect(result.hasApple).toBe(true)
    expect(result.hasBanana).toBe(true)
    expect(result.size).toBe(2)
  })

  it("should let remove win when timestamps are equal", async () => {
    const program = Effect.gen(function* () {
      const set = yield* makeSet("replica-1")

      yield* LWWSet.add(set, "apple", 5)
      yield* LWWSet.remove(set, "apple", 5)

      return yield* LWWSet.has(set, "apple")
    })

    expect(await Effect.runPromise(program)).toBe(false)
  })

  it("should allow re-adding with a newer timestamp", async () => {
    const program = Effect.gen(function* () {
      const set = yield* makeSet("replica-1")

      yield* LWWSet.add(set, "apple", 1)
      yield* LWWSet.remove(set, "apple", 2)
      const afterRemove = yield* LWWSet.has(set, "apple")

      yield* LWWSet.add(set, "apple", 3)
      const afterReAdd = yield* LWWSet.has(set, "apple")

      return { afterRemove, afterReAdd }
    })

    const result = await Effect.runPromise(program)
    expect(result.afterRemove).toBe(false)
    expect(result.afterReAdd).toBe(true)
  })

  it("should ignore operations older than the recorded ones", async () => {
    const program = Effect.gen(function* () {
      const set = yield* makeSet("replica-1")

      yield* LWWSet.add(set, "apple", 4)
      yield* LWWSet.add(set, "apple", 2)
      yield* LWWSet.remove(set, "apple", 3)
      yield* LWWSet.remove(set, "apple", 1)

      const addedAt = yield* LWWSet.addTimestamp(set, "apple")
      const removedAt = yield* LWWSet.removeTimestamp(set, "apple")
      const present = yield* LWWSet.has(set, "apple")

      return { addedAt, removedAt, present }
    })

    const result = await Effect.runPromise(program)
    expect(result.addedAt).toBe(4)
    expect(result.removedAt).toBe(3)
    expect(result.present).toBe(true)
  })

  it("should be idempotent for repeated operations", async () => {
    const program = Effect.gen(function* () {
      const once = yield* makeSet("replica-1")
      const twice = yield* makeSet("replica-2")

      yield* LWWSet.add(once, "apple", 1)
      yield* LWWSet.remove(once, "apple", 2)

      yield* LWWSet.add(twice, "apple", 1)
      yield* LWWSet.add(twice, "apple", 1)
      yield* LWWSet.remove(twice, "apple", 2)
      yield* LWWSet.remove(twice, "apple", 2)

      return yield* LWWSet.equals(once, twice)
    })

    expect(await Effect.runPromise(program)).toBe(true)
  })

  it("should report whether timestamps were recorded", async () => {
    const program = Effect.gen(function* () {
      const set = yield* makeSet("replica-1")

      yield* LWWSet.add(set, "apple", 1)
      yield* LWWSet.remove(set, "banana", 1)

      return {
        appleAdded: yield* LWWSet.addExists(set, "apple"),
        appleRemoved: yield* LWWSet.removeExists(set, "apple"),
        bananaAdded: yield* LWWSet.addExists(set, "banana"),
        bananaRemoved: yield* LWWSet.removeExists(set, "banana"),
        bananaPresent: yield* LWWSet.has(set, "banana")
      }
    })

    const result = await Effect.runPromise(program)
    expect(result).toEqual({
      appleAdded: true,
      appleRemoved: false,
      bananaAdded: false,
      bananaRemoved: true,
      bananaPresent: false
    })
  })

  it("should fail with TimestampNotFoundError for unknown elements", async () => {
    const program = Effect.gen(function* () {
      const set = yield* makeSet("replica-1")
      yield* LWWSet.add(set, "apple", 1)

      const missingAdd = yield* Effect.flip(LWWSet.addTimestamp(set, "ghost"))
      const missingRemove = yield* Effect.flip(LWWSet.removeTimestamp(set, "apple"))

      return { missingAdd, missingRemove }
    })

    const result = await Effect.runPromise(program)
    expect(result.missingAdd._tag).toBe("TimestampNotFoundError")
    expect(result.missingAdd.operation).toBe("add")
    expect(result.missingAdd.element).toBe("ghost")
    expect(result.missingAdd.message).toBe("No add timestamp recorded for element ghost")
    expect(result.missingRemove.operation).toBe("remove")
    expect(result.missingRemove.message).toBe("No remove timestamp recorded for element apple")
  })

  it("should merge states by keeping the latest timestamps", async () => {
    const program = Effect.gen(function* () {
      const set1 = yield* makeSet("replica-1")
      const set2 = yield* makeSet("replica-2")

      // Set1: apple added late, banana added early
      yield* LWWSet.add(set1, "apple", 5)
      yield* LWWSet.add(set1, "banana", 1)

      // Set2: apple removed earlier, banana removed later, cherry added
      yield* LWWSet.remove(set2, "apple", 3)
      yield* LWWSet.remove(set2, "banana", 2)
      yield* LWWSet.add(set2, "cherry", 4)

      const state2 = yield* LWWSet.query(set2)
      yield* LWWSet.merge(set1, state2)

      const vals = yield* LWWSet.values(set1)
      const appleRemovedAt = yield* LWWSet.removeTimestamp(set1, "apple")
      return { vals: Array.from(vals).sort(), appleRemovedAt }
    })

    const result = await Effect.runPromise(program)
    // apple: added at 5, removed at 3 -> present
    // banana: added at 1, removed at 2 -> removed
    // cherry: added at 4 -> present
    expect(result.vals).toEqual(["apple", "cherry"])
    expect(result.appleRemovedAt).toBe(3)
  })

  it("should converge regardless of merge direction", async () => {
    const program = Effect.gen(function* () {
      const set1 = yield* makeSet("replica-1")
      const set2 = yield* makeSet("replica-2")

      yield* LWWSet.add(set1, "apple", 1)
      yield* LWWSet.remove(set1, "banana", 6)
      yield* LWWSet.add(set2, "apple", 2)
      yield* LWWSet.add(set2, "banana", 3)

      const state1 = yield* LWWSet.query(set1)
      const state2 = yield* LWWSet.query(set2)

      yield* LWWSet.merge(set1, state2)
      yield* LWWSet.merge(set2, state1)

      return {
        equal: yield* LWWSet.equals(set1, set2),
        values: Array.from(yield* LWWSet.values(set1))
      }
    })

    const result = await Effect.runPromise(program)
    expect(result.equal).toBe(true)
    expect(result.values).toEqual(["apple"])
  })

  it("should compare raw timestamps rather than visible elements", async () => {
    const program = Effect.gen(function* () {
      const set1 = yield* makeSet("replica-1")
      const set2 = yield* makeSet("replica-2")

      yield* LWWSet.add(set1, "apple", 1)
      yield* LWWSet.add(set2, "apple", 2)

      const sameValues = HashSet.size(yield* LWWSet.values(set1)) === HashSet.size(yield* LWWSet.values(set2))
      const equal = yield* pipe(set1, LWWSet.equals(set2))
      return { sameValues, equal }
    })

    const result = await Effect.runPromise(program)
    expect(result.sameValues).toBe(true)
    expect(result.equal).toBe(false)
  })

  it("should restore a replica from a state snapshot", async () => {
    const program = Effect.gen(function* () {
      const original = yield* makeSet("replica-1")
      yield* LWWSet.add(original, "apple", 1)
      yield* LWWSet.add(original, "banana", 1)
      yield* LWWSet.remove(original, "banana", 2)

      const state = yield* LWWSet.query(original)
      const restored = yield* LWWSet.fromState(state, ReplicaId("replica-2"), Order.number)

      return {
        equal: yield* LWWSet.equals(original, restored),
        replicaId: restored.replicaId,
        size: yield* LWWSet.size(restored)
      }
    })

    const result = await Effect.runPromise(program)
    expect(result.equal).toBe(true)
    expect(result.replicaId).toBe("replica-2")
    expect(result.size).toBe(1)
  })

  it("should be provided through a layer", async () => {
    const SetTag = LWWSet.Tag<string, number>()

    const program = Effect.gen(function* () {
      const set = yield* SetTag
      yield* LWWSet.add(set, "apple", 1)
      return {
        isSet: LWWSet.isLWWSet(set),
        json: JSON.stringify(set),
        hasApple: yield* LWWSet.has(set, "apple")
      }
    }).pipe(Effect.provide(LWWSet.Live(SetTag, ReplicaId("replica-1"), Order.number)))

    const result = await Effect.runPromise(program)
    expect(result.isSet).toBe(true)
    expect(result.json).toBe("{\"_id\":\"LWWSet\",\"replicaId\":\"replica-1\"}")
    expect(result.hasApple).toBe(true)
    expect(LWWSet.isLWWSet({ replicaId: "replica-1" })).toBe(false)
  })
})
