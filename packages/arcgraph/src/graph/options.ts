/**
 * Graph Options
 *
 * Construction-time configuration, validated with zod.
 */

import { z } from 'zod'
import { parseOptions } from '../utils'
import type { GraphAlgebra } from '../weight'

export const graphConfigSchema = z.object({
  /** Fixed number of nodes */
  nodeCount: z.number().int().nonnegative(),
  /** Directed graphs keep (u, v) and (v, u) independent */
  directed: z.boolean().default(true),
  /** Arc storage strategy */
  backend: z.enum(['list', 'matrix']).default('list'),
})

/** Validated configuration with defaults applied. */
export type GraphConfig = z.output<typeof graphConfigSchema>

/** Configuration as accepted from callers. */
export type GraphConfigInput = z.input<typeof graphConfigSchema>

/**
 * Options for a graph with caller-chosen weight types.
 */
export type GraphOptions<N, A> = GraphConfigInput & {
  /** One weight per node, in index order */
  nodeWeights: readonly N[]
  algebra: GraphAlgebra<N, A>
}

/**
 * Options for a graph whose node and arc weights are plain numbers.
 */
export type NumericGraphOptions = GraphConfigInput & {
  nodeWeights: readonly number[]
  algebra?: undefined
}

export type EmptyGraphOptions<N, A> = GraphConfigInput & {
  algebra: GraphAlgebra<N, A>
}

export type EmptyNumericGraphOptions = GraphConfigInput & {
  algebra?: undefined
}

/**
 * Validate and default a graph configuration.
 * @throws InvalidOptionsError if the configuration does not match the schema
 */
export function parseGraphConfig(input: unknown): GraphConfig {
  return parseOptions(graphConfigSchema, input, 'graph')
}
