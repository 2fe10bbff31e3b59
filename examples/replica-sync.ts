/**
 * Example: Several replicas editing a route graph and converging by merge.
 *
 * Each replica builds part of a chain of stops, one replica closes a stop,
 * and after exchanging states every replica agrees on the same graph.
 *
 * Run with `REPLICA_COUNT=4 ROUTE_LENGTH=8 npm run example`.
 *
 * @since 0.1.0
 */

import * as Array from "effect/Array"
import * as Config from "effect/Config"
import * as Console from "effect/Console"
import * as Effect from "effect/Effect"
import * as LWWGraph from "../src/LWWGraph.js"
import * as Timestamp from "../src/Timestamp.js"
import { ReplicaId } from "../src/CRDT.js"

type Stop = string
type RouteGraph = LWWGraph.LWWGraph<Stop, Timestamp.Timestamp>

const stop = (index: number): Stop => `stop-${index}`

const ExampleConfig = Config.all({
  replicaCount: Config.integer("REPLICA_COUNT").pipe(Config.withDefault(3)),
  routeLength: Config.integer("ROUTE_LENGTH").pipe(Config.withDefault(6))
})

// Replica i adds every stop and leg whose index is congruent to i
const buildShare = (replica: RouteGraph, replicaIndex: number, replicaCount: number, routeLength: number) =>
  Effect.gen(function* () {
    for (let index = replicaIndex; index < routeLength; index += replicaCount) {
      yield* LWWGraph.addVertex(replica, stop(index), Timestamp.make(index, replica.replicaId))
    }
    // Legs are stamped after every stop so they are never older than their endpoints
    for (let index = replicaIndex; index < routeLength - 1; index += replicaCount) {
      yield* LWWGraph.addEdge(
        replica,
        stop(index),
        stop(index + 1),
        Timestamp.make(routeLength + index, replica.replicaId)
      )
    }
  })

const syncAll = (replicas: ReadonlyArray<RouteGraph>) =>
  Effect.gen(function* () {
    const states = yield* Effect.forEach(replicas, (replica) => LWWGraph.query(replica))
    yield* Effect.forEach(replicas, (replica) => Effect.forEach(states, (state) => LWWGraph.merge(replica, state)), {
      discard: true
    })
  })

const program = Effect.gen(function* () {
  const { replicaCount, routeLength } = yield* ExampleConfig
  yield* Console.log(`=== Route graph across ${replicaCount} replicas ===`)

  const replicas = yield* Effect.forEach(
    Array.range(1, replicaCount),
    (n) => LWWGraph.make<Stop, Timestamp.Timestamp>(ReplicaId(`replica-${n}`), Timestamp.Order)
  )

  yield* Effect.forEach(replicas, (replica, i) => buildShare(replica, i, replicaCount, routeLength), {
    discard: true
  })

  const first = stop(0)
  const last = stop(routeLength - 1)

  const before = yield* LWWGraph.anyPath(replicas[0], first, last)
  yield* Console.log("Path on replica-1 before sync:", before.length === 0 ? "none" : before.join(" -> "))

  yield* syncAll(replicas)
  yield* Console.log("Path on replica-1 after sync:", (yield* LWWGraph.anyPath(replicas[0], first, last)).join(" -> "))

  // The last replica closes a stop in the middle of the route
  const closing = replicas[replicas.length - 1]
  const closed = stop(Math.floor(routeLength / 2))
  yield* LWWGraph.removeVertex(closing, closed, Timestamp.make(2 * routeLength, closing.replicaId))
  yield* Effect.logInfo("Stop closed").pipe(Effect.annotateLogs({ replicaId: closing.replicaId, stop: closed }))

  yield* syncAll(replicas)

  const paths = yield* Effect.forEach(replicas, (replica) => LWWGraph.anyPath(replica, first, last))
  yield* Console.log("Path after closing", closed, "on every replica:", paths.map((path) => path.length))

  const converged = yield* Effect.forEach(replicas, (replica) => LWWGraph.equals(replica, replicas[0]))
  yield* Console.log("Replicas converged:", Array.every(converged, (equal) => equal))

  const neighbours = yield* LWWGraph.allConnectedVertices(replicas[0], stop(1))
  yield* Console.log(`Stops connected to ${stop(1)}:`, Array.fromIterable(neighbours).sort())
})

Effect.runPromise(program).catch(console.error)
