/**
 * @since 0.1.0
 */

/**
 * @since 0.1.0
 */
export * as CRDT from "./CRDT.js"

/**
 * @since 0.1.0
 */
export * as CRDTGraph from "./CRDTGraph.js"

/**
 * @since 0.1.0
 */
export * as CRDTSet from "./CRDTSet.js"

/**
 * @since 0.1.0
 */
export * as LWWGraph from "./LWWGraph.js"

/**
 * @since 0.1.0
 */
export * as LWWSet from "./LWWSet.js"

/**
 * @since 0.1.0
 */
export * as Timestamp from "./Timestamp.js"

/**
 * @since 0.1.0
 */
export { ReplicaId } from "./CRDT.js"
