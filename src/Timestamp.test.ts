/**
 * Unit tests for Timestamp.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Effect from "effect/Effect"
import * as Equal from "effect/Equal"
import * as Schema from "effect/Schema"
import * as LWWGraph from "./LWWGraph"
import * as Timestamp from "./Timestamp"
import { ReplicaId } from "./CRDT"

const alice = ReplicaId("alice")
const bob = ReplicaId("bob")

describe("Timestamp", () => {
  it("should order by counter first", () => {
    expect(Timestamp.Order(Timestamp.make(1, bob), Timestamp.make(2, alice))).toBe(-1)
    expect(Timestamp.Order(Timestamp.make(3, alice), Timestamp.make(2, bob))).toBe(1)
  })

  it("should break counter ties by replica ID", () => {
    expect(Timestamp.Order(Timestamp.make(1, alice), Timestamp.make(1, bob))).toBe(-1)
    expect(Timestamp.Order(Timestamp.make(1, bob), Timestamp.make(1, bob))).toBe(0)
  })

  it("should compare structurally", () => {
    expect(Equal.equals(Timestamp.make(4, alice), Timestamp.make(4, alice))).toBe(true)
    expect(Equal.equals(Timestamp.make(4, alice), Timestamp.make(4, bob))).toBe(false)
  })

  it("should decode into comparable values", () => {
    const decoded = Schema.decodeUnknownSync(Timestamp.TimestampSchema)({ counter: 7, replicaId: "alice" })
    expect(Equal.equals(decoded, Timestamp.make(7, alice))).toBe(true)
  })

  it("should resolve concurrent graph operations deterministically", async () => {
    const program = Effect.gen(function* () {
      const onAlice = yield* LWWGraph.make<string, Timestamp.Timestamp>(alice, Timestamp.Order)
      const onBob = yield* LWWGraph.make<string, Timestamp.Timestamp>(bob, Timestamp.Order)

      // Both replicas act at logical time 1
      yield* LWWGraph.addVertex(onAlice, "kitchen", Timestamp.make(1, alice))
      yield* LWWGraph.addVertex(onBob, "kitchen", Timestamp.make(0, bob))
      yield* LWWGraph.removeVertex(onBob, "kitchen", Timestamp.make(1, bob))

      yield* LWWGraph.merge(onAlice, yield* LWWGraph.query(onBob))
      yield* LWWGraph.merge(onBob, yield* LWWGraph.query(onAlice))

      return {
        onAlice: yield* LWWGraph.hasVertex(onAlice, "kitchen"),
        onBob: yield* LWWGraph.hasVertex(onBob, "kitchen"),
        equal: yield* LWWGraph.equals(onAlice, onBob)
      }
    })

    // bob's removal at (1, bob) is later than alice's addition at (1, alice)
    const result = await Effect.runPromise(program)
    expect(result).toEqual({ onAlice: false, onBob: false, equal: true })
  })
})
