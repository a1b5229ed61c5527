/**
 * Adjacency List Store
 *
 * Sparse arc storage: one array of outgoing entries per node, kept in
 * insertion order. Lookups scan the source node's entries, so point
 * operations cost O(degree) and memory grows with the arc count.
 */

import type { ArcStore, Neighbor } from './types'

interface ListEntry<A> {
  target: number
  weight: A
}

export class ListArcStore<A> implements ArcStore<A> {
  readonly kind = 'list' as const

  /** Outgoing entries per node: nodeIndex -> entries */
  private readonly lists: ListEntry<A>[][]

  private count = 0

  constructor(readonly nodeCount: number) {
    this.lists = Array.from({ length: nodeCount }, () => [])
  }

  insert(from: number, to: number, weight: A): void {
    this.lists[from].push({ target: to, weight })
    this.count++
  }

  update(from: number, to: number, weight: A): boolean {
    const entry = this.find(from, to)
    if (!entry) return false
    entry.weight = weight
    return true
  }

  get(from: number, to: number): A | undefined {
    return this.find(from, to)?.weight
  }

  has(from: number, to: number): boolean {
    return this.find(from, to) !== undefined
  }

  remove(from: number, to: number): boolean {
    const list = this.lists[from]
    const position = list.findIndex((entry) => entry.target === to)
    if (position === -1) return false

    list.splice(position, 1)
    this.count--
    return true
  }

  *neighbors(node: number): IterableIterator<Neighbor<A>> {
    for (const entry of this.lists[node]) {
      yield { node: entry.target, weight: entry.weight }
    }
  }

  arcCount(): number {
    return this.count
  }

  private find(from: number, to: number): ListEntry<A> | undefined {
    return this.lists[from].find((entry) => entry.target === to)
  }
}
