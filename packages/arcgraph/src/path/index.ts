/**
 * Path Module
 */

export { subPathCosts } from './sub-path-cost'
export type { SubPathCost } from './sub-path-cost'
