/**
 * Undirected Graph Specification Tests
 *
 * Every write to (u, v) must leave (v, u) with the same weight.
 */

import { describe, it, expect } from 'vitest'
import { ArcAlreadyExistsError, ArcNotFoundError, type BackendKind } from '../../src'
import { backends, cycleGraph, indexedGraph } from './fixtures/graphs'

describe.each(backends)('undirected graph (%s backend)', (backend: BackendKind) => {
  describe('mirror writes', () => {
    it('stores both directions with the same weight', () => {
      const n = 4
      for (let u = 0; u < n; u++) {
        for (let v = 0; v < n; v++) {
          if (u === v) continue
          const graph = indexedGraph(n, false, backend)
          graph.insertArc(u, v, 3)

          expect(graph.getArc(u, v)).toBe(3)
          expect(graph.getArc(v, u)).toBe(3)
        }
      }
    })

    it('mirrors updates made from either side', () => {
      const graph = indexedGraph(3, false, backend)
      graph.insertArc(0, 2, 1)

      graph.updateArc(0, 2, 5)
      expect(graph.getArc(0, 2)).toBe(5)
      expect(graph.getArc(2, 0)).toBe(5)

      graph.updateArc(2, 0, 8)
      expect(graph.getArc(0, 2)).toBe(8)
      expect(graph.getArc(2, 0)).toBe(8)
    })

    it('rejects the mirror of an existing arc', () => {
      const graph = indexedGraph(3, false, backend)
      graph.insertArc(0, 1, 1)

      expect(() => graph.insertArc(1, 0, 2)).toThrow(ArcAlreadyExistsError)
      expect(graph.getArc(0, 1)).toBe(1)
      expect(graph.getArc(1, 0)).toBe(1)
    })

    it('removes both directions', () => {
      const graph = indexedGraph(3, false, backend)
      graph.insertArc(0, 1, 1)
      graph.insertArc(1, 2, 2)

      graph.removeArc(1, 0)

      expect(graph.hasArc(0, 1)).toBe(false)
      expect(graph.hasArc(1, 0)).toBe(false)
      expect(graph.getArc(2, 1)).toBe(2)
      expect(graph.arcCount()).toBe(2)
    })

    it('fails an update on a missing pair without writing either side', () => {
      const graph = indexedGraph(3, false, backend)

      expect(() => graph.updateArc(1, 2, 4)).toThrow(ArcNotFoundError)
      expect(graph.hasArc(1, 2)).toBe(false)
      expect(graph.hasArc(2, 1)).toBe(false)
    })
  })

  describe('self-loops', () => {
    it('are stored as a single entry', () => {
      const graph = indexedGraph(3, false, backend)
      graph.insertArc(2, 2, 6)

      expect(graph.getArc(2, 2)).toBe(6)
      expect([...graph.neighbors(2)]).toEqual([{ node: 2, weight: 6 }])
      expect(graph.arcCount()).toBe(1)
      expect(graph.edgeCount()).toBe(1)
    })

    it('update and remove in place', () => {
      const graph = indexedGraph(3, false, backend)
      graph.insertArc(1, 1, 1)

      graph.updateArc(1, 1, 2)
      expect(graph.getArc(1, 1)).toBe(2)

      graph.removeArc(1, 1)
      expect(graph.arcCount()).toBe(0)
    })
  })

  describe('counting and iteration', () => {
    it('stores each pair in both adjacency entries', () => {
      const graph = cycleGraph(false, backend)

      for (let node = 0; node < 4; node++) {
        expect([...graph.neighbors(node)]).toHaveLength(2)
      }
      expect(graph.arcCount()).toBe(8)
      expect(graph.edgeCount()).toBe(4)
    })

    it('lists every stored direction in arcs()', () => {
      const graph = indexedGraph(3, false, backend)
      graph.insertArc(0, 2, 4)

      expect([...graph.arcs()]).toEqual([
        { from: 0, to: 2, weight: 4 },
        { from: 2, to: 0, weight: 4 },
      ])
    })
  })
})

describe('mirror write order', () => {
  it('writes the primary direction before the mirror', () => {
    const graph = indexedGraph(3, false, 'list')

    // Target outside the node set: the mirror row does not exist
    expect(() => graph.insertArc(0, 5, 1)).toThrow(TypeError)
    expect(graph.hasArc(0, 5)).toBe(true)
    expect(graph.arcCount()).toBe(1)
  })
})
