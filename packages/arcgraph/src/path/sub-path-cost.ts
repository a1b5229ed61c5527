/**
 * Sub-path Costs
 *
 * Cost (length) of every forward sub-path of a node path.
 */

import type { Graph } from '../graph'

export interface SubPathCost<A> {
  /** First node of the sub-path */
  from: number
  /** Last node of the sub-path */
  to: number
  /** Sum of the arc weights along the sub-path */
  cost: A
}

/**
 * Iterate the cost of every sub-path `path[i] .. path[j]` with `i < j`,
 * ordered by `i` then `j`. Only forward sub-paths are produced, which is what
 * a directed graph needs; for an undirected graph the reverse costs are the
 * same values.
 *
 * Costs accumulate with the graph's arc algebra, so each arc is read once
 * per starting position.
 *
 * @example
 * ```typescript
 * // arcs 0->1 (1), 1->2 (2), 2->3 (3)
 * [...subPathCosts(graph, [0, 1, 2, 3])].map((s) => s.cost) // [1, 3, 6, 2, 5, 3]
 * ```
 *
 * @throws ArcNotFoundError when two consecutive path nodes are not joined by an arc
 */
export function* subPathCosts<N, A>(
  graph: Graph<N, A>,
  path: readonly number[],
): IterableIterator<SubPathCost<A>> {
  const algebra = graph.algebra.arc

  for (let start = 0; start < path.length - 1; start++) {
    let cost = algebra.zero()
    for (let end = start + 1; end < path.length; end++) {
      cost = algebra.add(cost, graph.getArc(path[end - 1], path[end]))
      yield { from: path[start], to: path[end], cost }
    }
  }
}
