/**
 * Arc Store Types
 *
 * Core data structures shared by the list and matrix backends.
 */

/**
 * Backend identifier, chosen once at graph construction.
 */
export type BackendKind = 'list' | 'matrix'

/**
 * A neighbor reached by one outgoing arc.
 */
export interface Neighbor<A> {
  /** Target node index */
  node: number
  /** Arc weight */
  weight: A
}

/**
 * One stored directed arc.
 */
export interface Arc<A> {
  from: number
  to: number
  weight: A
}

/**
 * Directed arc storage over a fixed node set.
 *
 * Stores never mirror writes and never check indices: the graph facade
 * handles undirected pairs and existence rules, the caller handles bounds.
 */
export interface ArcStore<A> {
  readonly kind: BackendKind
  readonly nodeCount: number

  /** Store an arc the caller knows to be absent. */
  insert(from: number, to: number, weight: A): void
  /** Replace the weight of a stored arc. Returns false when absent. */
  update(from: number, to: number, weight: A): boolean
  /** Stored weight, or undefined when absent. */
  get(from: number, to: number): A | undefined
  has(from: number, to: number): boolean
  /** Drop a stored arc. Returns false when absent. */
  remove(from: number, to: number): boolean
  /** Lazy pass over the outgoing arcs of a node, one pass per call. */
  neighbors(node: number): IterableIterator<Neighbor<A>>
  /** Number of stored directed entries. */
  arcCount(): number
}
