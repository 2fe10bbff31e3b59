/**
 * Shared Proto object utilities for CRDT replicas.
 *
 * @since 0.1.0
 * @internal
 */

import { format, NodeInspectSymbol } from "effect/Inspectable"
import { pipeArguments } from "effect/Pipeable"
import { CRDTTypeId, type ReplicaId } from "../CRDT.js"

/**
 * Fields every replica object exposes to the proto methods.
 * @internal
 */
interface Replica {
  readonly replicaId: ReplicaId
}

/**
 * Creates the Proto object shared by replicas of one CRDT kind.
 *
 * Replicas are inspected and printed through `toJSON`, which shows the kind
 * and the replica ID. The transactional state is left out.
 *
 * @internal
 */
export const makeProtoBase = (typeId: symbol, name: string) => {
  const describe = (self: Replica) => ({ _id: name, replicaId: self.replicaId })
  return {
    [CRDTTypeId]: CRDTTypeId,
    [typeId]: typeId,
    toJSON(this: Replica) {
      return describe(this)
    },
    [NodeInspectSymbol](this: Replica) {
      return describe(this)
    },
    toString(this: Replica) {
      return format(describe(this))
    },
    pipe() {
      return pipeArguments(this, arguments)
    }
  }
}
