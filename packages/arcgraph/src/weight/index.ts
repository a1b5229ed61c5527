/**
 * Weight Module
 */

export type { WeightAlgebra, GraphAlgebra } from './algebra'
export { numberAlgebra, bigintAlgebra, numericGraphAlgebra } from './algebra'
