/**
 * Arc Store Specification Tests
 *
 * The two backends on their own, and their equivalence behind the graph.
 */

import { describe, it, expect } from 'vitest'
import {
  ArcAlreadyExistsError,
  ArcNotFoundError,
  ListArcStore,
  MatrixArcStore,
  createArcStore,
  type ArcStore,
  type Graph,
} from '../../src'
import { indexedGraph, sequence } from './fixtures/graphs'

describe('createArcStore()', () => {
  it('builds the requested backend', () => {
    expect(createArcStore<number>('list', 3)).toBeInstanceOf(ListArcStore)
    expect(createArcStore<number>('matrix', 3)).toBeInstanceOf(MatrixArcStore)
    expect(createArcStore<number>('matrix', 3).kind).toBe('matrix')
  })
})

const factories: Array<{ kind: string; make: (n: number) => ArcStore<number> }> = [
  { kind: 'list', make: (n) => new ListArcStore<number>(n) },
  { kind: 'matrix', make: (n) => new MatrixArcStore<number>(n) },
]

describe.each(factories)('$kind store', ({ make }) => {
  it('reports absent arcs', () => {
    const store = make(3)

    expect(store.get(0, 1)).toBeUndefined()
    expect(store.has(0, 1)).toBe(false)
    expect(store.update(0, 1, 1)).toBe(false)
    expect(store.remove(0, 1)).toBe(false)
    expect(store.arcCount()).toBe(0)
  })

  it('never mirrors writes', () => {
    const store = make(3)
    store.insert(0, 1, 4)

    expect(store.get(0, 1)).toBe(4)
    expect(store.has(1, 0)).toBe(false)
  })

  it('updates and removes stored arcs', () => {
    const store = make(3)
    store.insert(2, 1, 4)

    expect(store.update(2, 1, 6)).toBe(true)
    expect(store.get(2, 1)).toBe(6)
    expect(store.remove(2, 1)).toBe(true)
    expect(store.has(2, 1)).toBe(false)
    expect(store.arcCount()).toBe(0)
  })
})

describe('neighbor order', () => {
  it('follows insertion order in the list store', () => {
    const store = new ListArcStore<number>(4)
    store.insert(0, 3, 30)
    store.insert(0, 1, 10)
    store.insert(0, 2, 20)

    expect([...store.neighbors(0)].map((n) => n.node)).toEqual([3, 1, 2])
  })

  it('keeps the order of the remaining entries after a removal', () => {
    const store = new ListArcStore<number>(4)
    store.insert(0, 3, 30)
    store.insert(0, 1, 10)
    store.insert(0, 2, 20)
    store.remove(0, 1)

    expect([...store.neighbors(0)]).toEqual([
      { node: 3, weight: 30 },
      { node: 2, weight: 20 },
    ])
  })

  it('follows column order in the matrix store', () => {
    const store = new MatrixArcStore<number>(4)
    store.insert(0, 3, 30)
    store.insert(0, 1, 10)
    store.insert(0, 2, 20)

    expect([...store.neighbors(0)].map((n) => n.node)).toEqual([1, 2, 3])
  })

  it('keeps rows apart in the matrix store', () => {
    const store = new MatrixArcStore<number>(3)
    store.insert(0, 2, 1)
    store.insert(1, 0, 2)

    expect([...store.neighbors(0)]).toEqual([{ node: 2, weight: 1 }])
    expect([...store.neighbors(1)]).toEqual([{ node: 0, weight: 2 }])
    expect([...store.neighbors(2)]).toEqual([])
  })
})

// =============================================================================
// BACKEND EQUIVALENCE
// =============================================================================

type Outcome = number | 'ArcNotFoundError' | 'ArcAlreadyExistsError' | 'ok'

function attempt(fn: () => number | void): Outcome {
  try {
    const value = fn()
    return typeof value === 'number' ? value : 'ok'
  } catch (error) {
    if (error instanceof ArcNotFoundError) return 'ArcNotFoundError'
    if (error instanceof ArcAlreadyExistsError) return 'ArcAlreadyExistsError'
    throw error
  }
}

/**
 * Apply the same pseudo-random script to a graph and record every outcome.
 */
function runScript(graph: Graph<number, number>, seed: number, steps: number): Outcome[] {
  const next = sequence(seed)
  const n = graph.nodeCount
  const outcomes: Outcome[] = []

  for (let step = 0; step < steps; step++) {
    const op = next() % 5
    const from = next() % n
    const to = next() % n
    const weight = next() % 100

    switch (op) {
      case 0:
      case 1:
        outcomes.push(attempt(() => graph.insertArc(from, to, weight)))
        break
      case 2:
        outcomes.push(attempt(() => graph.updateArc(from, to, weight)))
        break
      case 3:
        outcomes.push(attempt(() => graph.getArc(from, to)))
        break
      case 4:
        outcomes.push(attempt(() => graph.removeArc(from, to)))
        break
    }
  }

  return outcomes
}

function snapshot(graph: Graph<number, number>) {
  const rows: Array<Array<number | undefined>> = []
  const neighbors: Array<Array<[number, number]>> = []
  for (let u = 0; u < graph.nodeCount; u++) {
    const row: Array<number | undefined> = []
    for (let v = 0; v < graph.nodeCount; v++) {
      row.push(graph.findArc(u, v))
    }
    rows.push(row)
    neighbors.push(
      [...graph.neighbors(u)]
        .map((n): [number, number] => [n.node, n.weight])
        .sort((a, b) => a[0] - b[0]),
    )
  }
  return { rows, neighbors, arcCount: graph.arcCount(), edgeCount: graph.edgeCount() }
}

describe.each([true, false])('backend equivalence (directed: %s)', (directed) => {
  it.each([1, 7, 42, 2024])('answers every query the same way (seed %i)', (seed) => {
    const list = indexedGraph(6, directed, 'list')
    const matrix = indexedGraph(6, directed, 'matrix')

    const listOutcomes = runScript(list, seed, 300)
    const matrixOutcomes = runScript(matrix, seed, 300)

    expect(matrixOutcomes).toEqual(listOutcomes)
    expect(snapshot(matrix)).toEqual(snapshot(list))
  })
})

describe.each(['list', 'matrix'] as const)('undirected symmetry (%s)', (backend) => {
  it('holds after a long script', () => {
    const graph = indexedGraph(5, false, backend)
    runScript(graph, 99, 200)

    for (let u = 0; u < 5; u++) {
      for (let v = 0; v < 5; v++) {
        expect(graph.findArc(u, v)).toBe(graph.findArc(v, u))
      }
    }
  })
})
