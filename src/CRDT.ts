/**
 * Core CRDT types shared by the LWW-Set and the LWW-Graph.
 *
 * Every replica carries a replica ID so that callers can tell replicas apart
 * when exchanging state snapshots. The ID is not part of the replicated
 * state: two replicas that observed the same operations hold equal states.
 *
 * @since 0.1.0
 */
import * as Brand from "effect/Brand"
import * as Predicate from "effect/Predicate"
import * as Schema from "effect/Schema"

// =============================================================================
// Symbols
// =============================================================================

/**
 * Core CRDT type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const CRDTTypeId: unique symbol = Symbol.for("lww-graph-crdt/CRDT")

/**
 * Core CRDT type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type CRDTTypeId = typeof CRDTTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * Identifier of a single replica.
 *
 * @since 0.1.0
 * @category models
 */
export type ReplicaId = Brand.Branded<string, "ReplicaId">

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks whether a value is a replica of any CRDT in this package.
 *
 * @since 0.1.0
 * @category guards
 */
export const isCRDT = (u: unknown): u is { readonly [CRDTTypeId]: CRDTTypeId } =>
  Predicate.hasProperty(u, CRDTTypeId)

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a replica ID from a string.
 *
 * @example
 * ```ts
 * import { ReplicaId } from "lww-graph-crdt/CRDT"
 *
 * const laptop = ReplicaId("laptop")
 * const phone = ReplicaId("phone")
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const ReplicaId = Brand.nominal<ReplicaId>()

// =============================================================================
// Schemas
// =============================================================================

/**
 * @since 0.1.0
 * @category schemas
 */
export const ReplicaIdSchema = Schema.String.pipe(Schema.fromBrand(ReplicaId))
