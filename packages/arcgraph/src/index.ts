/**
 * arcgraph - Weighted Graph Storage
 *
 * Nodes and weighted arcs over a fixed node set, directed or undirected,
 * stored in an adjacency list or an adjacency matrix behind one API.
 *
 * @example
 * ```typescript
 * import { createGraph } from '@arcgraph/core';
 *
 * const graph = createGraph({ nodeCount: 3, directed: false, backend: 'matrix', nodeWeights: [1, 2, 3] });
 *
 * graph.insertArc(0, 1, 10);
 * graph.getArc(1, 0); // 10, the mirror of (0, 1)
 * graph.updateArc(1, 0, 15);
 * graph.getArc(0, 1); // 15
 *
 * for (const { node, weight } of graph.neighbors(0)) {
 *   console.log(node, weight);
 * }
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// GRAPH
// =============================================================================

export { Graph, createGraph, graphConfigSchema, parseGraphConfig } from './graph'
export type {
  NodeEntry,
  GraphConfig,
  GraphConfigInput,
  GraphOptions,
  NumericGraphOptions,
  EmptyGraphOptions,
  EmptyNumericGraphOptions,
} from './graph'

// =============================================================================
// STORES
// =============================================================================

export { ListArcStore, MatrixArcStore, createArcStore } from './store'
export type { ArcStore, BackendKind, Neighbor, Arc } from './store'

// =============================================================================
// WEIGHTS
// =============================================================================

export { numberAlgebra, bigintAlgebra, numericGraphAlgebra } from './weight'
export type { WeightAlgebra, GraphAlgebra } from './weight'

// =============================================================================
// PATHS
// =============================================================================

export { subPathCosts } from './path'
export type { SubPathCost } from './path'

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphError,
  SizeMismatchError,
  ArcNotFoundError,
  ArcAlreadyExistsError,
  InvalidOptionsError,
} from './errors'
export type { OptionIssue } from './errors'

// =============================================================================
// UTILITIES
// =============================================================================

export { logger, createLogger, setLogLevel, LogLevels, issuesOf, parseOptions } from './utils'
