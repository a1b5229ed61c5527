/**
 * Graph Module
 */

export { Graph, createGraph } from './graph'
export type { NodeEntry } from './graph'
export { graphConfigSchema, parseGraphConfig } from './options'
export type {
  GraphConfig,
  GraphConfigInput,
  GraphOptions,
  NumericGraphOptions,
  EmptyGraphOptions,
  EmptyNumericGraphOptions,
} from './options'
