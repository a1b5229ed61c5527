/**
 * Adjacency Matrix Store
 *
 * Dense arc storage: a single row-major array of N*N cells, each holding a
 * weight or the EMPTY sentinel. Point operations are O(1), neighbor scans
 * walk the whole row (O(N)) and memory is O(N^2) whatever the arc count.
 */

import type { ArcStore, Neighbor } from './types'

/** Presence sentinel for cells without an arc. */
const EMPTY: unique symbol = Symbol('empty')

type Cell<A> = A | typeof EMPTY

export class MatrixArcStore<A> implements ArcStore<A> {
  readonly kind = 'matrix' as const

  private readonly cells: Cell<A>[]

  private count = 0

  constructor(readonly nodeCount: number) {
    this.cells = new Array<Cell<A>>(nodeCount * nodeCount).fill(EMPTY)
  }

  insert(from: number, to: number, weight: A): void {
    const offset = this.offset(from, to)
    if (this.cells[offset] === EMPTY) this.count++
    this.cells[offset] = weight
  }

  update(from: number, to: number, weight: A): boolean {
    const offset = this.offset(from, to)
    if (this.cells[offset] === EMPTY) return false
    this.cells[offset] = weight
    return true
  }

  get(from: number, to: number): A | undefined {
    const cell = this.cells[this.offset(from, to)]
    return cell === EMPTY ? undefined : cell
  }

  has(from: number, to: number): boolean {
    return this.cells[this.offset(from, to)] !== EMPTY
  }

  remove(from: number, to: number): boolean {
    const offset = this.offset(from, to)
    if (this.cells[offset] === EMPTY) return false
    this.cells[offset] = EMPTY
    this.count--
    return true
  }

  *neighbors(node: number): IterableIterator<Neighbor<A>> {
    const rowStart = node * this.nodeCount
    for (let column = 0; column < this.nodeCount; column++) {
      const cell = this.cells[rowStart + column]
      if (cell !== EMPTY) {
        yield { node: column, weight: cell }
      }
    }
  }

  arcCount(): number {
    return this.count
  }

  private offset(from: number, to: number): number {
    return from * this.nodeCount + to
  }
}
