/**
 * Graph
 *
 * The single caller-visible graph type. Owns the node weights, the
 * directedness flag and one arc store, and keeps undirected pairs in sync
 * whichever backend holds them.
 */

import { ArcAlreadyExistsError, ArcNotFoundError, SizeMismatchError } from '../errors'
import { createArcStore, type Arc, type ArcStore, type BackendKind, type Neighbor } from '../store'
import { createLogger } from '../utils'
import { numericGraphAlgebra, type GraphAlgebra } from '../weight'
import {
  parseGraphConfig,
  type EmptyGraphOptions,
  type EmptyNumericGraphOptions,
  type GraphConfig,
  type GraphOptions,
  type NumericGraphOptions,
} from './options'

const log = createLogger('graph')

/**
 * A node index with its current weight.
 */
export interface NodeEntry<N> {
  index: number
  weight: N
}

/**
 * Weighted graph over a fixed node set.
 *
 * Node indices are trusted: every index passed in must lie in
 * `[0, nodeCount)`. Nothing checks it.
 *
 * In an undirected graph every write goes to `(from, to)` first and then to
 * its mirror `(to, from)`. A self-loop `(v, v)` is a single entry.
 */
export class Graph<N, A> {
  private readonly weights: N[]
  private readonly store: ArcStore<A>

  private constructor(
    private readonly config: GraphConfig,
    nodeWeights: readonly N[],
    readonly algebra: GraphAlgebra<N, A>,
  ) {
    if (nodeWeights.length !== config.nodeCount) {
      throw new SizeMismatchError(config.nodeCount, nodeWeights.length)
    }

    this.weights = [...nodeWeights]
    this.store = createArcStore<A>(config.backend, config.nodeCount)

    log.debug(
      `Created ${config.directed ? 'directed' : 'undirected'} ${config.backend} graph with ${config.nodeCount} nodes`,
    )
  }

  // ===========================================================================
  // CONSTRUCTION
  // ===========================================================================

  /**
   * Create a graph from one weight per node.
   * @throws SizeMismatchError if `nodeWeights.length !== nodeCount`
   * @throws InvalidOptionsError if the configuration is invalid
   */
  static create(options: NumericGraphOptions): Graph<number, number>
  static create<N, A>(options: GraphOptions<N, A>): Graph<N, A>
  static create<N, A>(options: GraphOptions<N, A> | NumericGraphOptions): Graph<N, A> | Graph<number, number> {
    const config = parseGraphConfig(options)
    if (options.algebra !== undefined) {
      return new Graph(config, options.nodeWeights, options.algebra)
    }
    return new Graph(config, options.nodeWeights, numericGraphAlgebra)
  }

  /**
   * Create a graph whose node weights all start at the algebra's zero.
   */
  static empty(options: EmptyNumericGraphOptions): Graph<number, number>
  static empty<N, A>(options: EmptyGraphOptions<N, A>): Graph<N, A>
  static empty<N, A>(
    options: EmptyGraphOptions<N, A> | EmptyNumericGraphOptions,
  ): Graph<N, A> | Graph<number, number> {
    const config = parseGraphConfig(options)
    const algebra = options.algebra
    if (algebra !== undefined) {
      const zeros = Array.from({ length: config.nodeCount }, () => algebra.node.zero())
      return new Graph(config, zeros, algebra)
    }
    return new Graph(config, new Array<number>(config.nodeCount).fill(0), numericGraphAlgebra)
  }

  get nodeCount(): number {
    return this.config.nodeCount
  }

  get directed(): boolean {
    return this.config.directed
  }

  get backend(): BackendKind {
    return this.config.backend
  }

  // ===========================================================================
  // NODE OPERATIONS
  // ===========================================================================

  getNodeWeight(index: number): N {
    return this.weights[index]
  }

  setNodeWeight(index: number, weight: N): void {
    this.weights[index] = weight
  }

  /**
   * Lazy pass over every node in index order.
   */
  *nodes(): IterableIterator<NodeEntry<N>> {
    for (let index = 0; index < this.weights.length; index++) {
      yield { index, weight: this.weights[index] }
    }
  }

  /**
   * Replace every node weight with `fn(index, weight)`.
   */
  updateAllNodeWeights(fn: (index: number, weight: N) => N): void {
    for (let index = 0; index < this.weights.length; index++) {
      this.weights[index] = fn(index, this.weights[index])
    }
  }

  // ===========================================================================
  // ARC OPERATIONS
  // ===========================================================================

  /**
   * Create a new arc (and its mirror in an undirected graph).
   * @throws ArcAlreadyExistsError if the arc is already stored
   */
  insertArc(from: number, to: number, weight: A): void {
    if (this.store.has(from, to)) {
      throw new ArcAlreadyExistsError(from, to)
    }

    this.store.insert(from, to, weight)
    if (this.mirrors(from, to)) {
      this.store.insert(to, from, weight)
    }
  }

  /**
   * Create a new arc weighted with the arc algebra's zero.
   * @throws ArcAlreadyExistsError if the arc is already stored
   */
  insertDefaultArc(from: number, to: number): void {
    this.insertArc(from, to, this.algebra.arc.zero())
  }

  /**
   * Replace the weight of an existing arc. Never inserts.
   * @throws ArcNotFoundError if the arc is not stored
   */
  updateArc(from: number, to: number, weight: A): void {
    if (!this.store.update(from, to, weight)) {
      throw new ArcNotFoundError(from, to)
    }
    if (this.mirrors(from, to)) {
      this.store.update(to, from, weight)
    }
  }

  /**
   * Remove an arc (and its mirror in an undirected graph).
   * @throws ArcNotFoundError if the arc is not stored
   */
  removeArc(from: number, to: number): void {
    if (!this.store.remove(from, to)) {
      throw new ArcNotFoundError(from, to)
    }
    if (this.mirrors(from, to)) {
      this.store.remove(to, from)
    }
  }

  /**
   * @throws ArcNotFoundError if the arc is not stored
   */
  getArc(from: number, to: number): A {
    const weight = this.store.get(from, to)
    if (weight === undefined) {
      throw new ArcNotFoundError(from, to)
    }
    return weight
  }

  findArc(from: number, to: number): A | undefined {
    return this.store.get(from, to)
  }

  hasArc(from: number, to: number): boolean {
    return this.store.has(from, to)
  }

  /**
   * Lazy pass over the outgoing arcs of a node, in backend order:
   * insertion order for lists, ascending target index for matrices.
   * Do not mutate the graph while iterating.
   */
  neighbors(node: number): IterableIterator<Neighbor<A>> {
    return this.store.neighbors(node)
  }

  /**
   * Lazy pass over every stored direction: nodes in index order, each
   * node's arcs in backend order. Undirected pairs appear twice.
   */
  *arcs(): IterableIterator<Arc<A>> {
    for (let from = 0; from < this.config.nodeCount; from++) {
      for (const { node, weight } of this.store.neighbors(from)) {
        yield { from, to: node, weight }
      }
    }
  }

  /**
   * Number of stored directed entries. An undirected pair counts twice,
   * a self-loop once.
   */
  arcCount(): number {
    return this.store.arcCount()
  }

  /**
   * Number of logical arcs. An undirected pair counts once.
   */
  edgeCount(): number {
    if (this.config.directed) return this.store.arcCount()

    let count = 0
    for (const arc of this.arcs()) {
      if (arc.from <= arc.to) count++
    }
    return count
  }

  /**
   * Replace every arc weight with `fn(from, to, weight)`.
   *
   * In an undirected graph `fn` runs once per pair, with `from <= to`,
   * and the result is written to both directions.
   */
  updateAllArcWeights(fn: (from: number, to: number, weight: A) => A): void {
    const pending = [...this.arcs()].filter((arc) => this.config.directed || arc.from <= arc.to)
    for (const arc of pending) {
      this.updateArc(arc.from, arc.to, fn(arc.from, arc.to, arc.weight))
    }
  }

  private mirrors(from: number, to: number): boolean {
    return !this.config.directed && from !== to
  }
}

/**
 * Create a graph from one weight per node.
 *
 * @example
 * ```typescript
 * const graph = createGraph({ nodeCount: 3, directed: true, nodeWeights: [1, 2, 3] })
 * graph.insertArc(0, 1, 10)
 * graph.getArc(0, 1) // 10
 * ```
 */
export function createGraph(options: NumericGraphOptions): Graph<number, number>
export function createGraph<N, A>(options: GraphOptions<N, A>): Graph<N, A>
export function createGraph<N, A>(
  options: GraphOptions<N, A> | NumericGraphOptions,
): Graph<N, A> | Graph<number, number> {
  // Narrowing on algebra selects the matching Graph.create overload
  if (options.algebra !== undefined) {
    return Graph.create(options)
  }
  return Graph.create(options)
}
