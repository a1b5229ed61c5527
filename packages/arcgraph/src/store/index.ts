/**
 * Arc Stores
 */

import { ListArcStore } from './list-store'
import { MatrixArcStore } from './matrix-store'
import type { ArcStore, BackendKind } from './types'

export { ListArcStore } from './list-store'
export { MatrixArcStore } from './matrix-store'
export type { ArcStore, BackendKind, Neighbor, Arc } from './types'

/**
 * Create an empty arc store of the given kind for a fixed node count.
 */
export function createArcStore<A>(kind: BackendKind, nodeCount: number): ArcStore<A> {
  switch (kind) {
    case 'list':
      return new ListArcStore<A>(nodeCount)
    case 'matrix':
      return new MatrixArcStore<A>(nodeCount)
  }
}
