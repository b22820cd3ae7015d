/**
 * Calculated Attributes
 *
 * Degree and neighbor sets derived from the edge store. Each attribute
 * carries its own stale flag: a deferred mutation marks both stale, a
 * recomputation pass makes the recomputed attribute fresh again.
 */

import type { Identifier } from '../identifier'
import type { StoredCouple } from '../store/types'
import type { GraphVariant } from '../variants'

export type CalculatedAttribute = 'degree' | 'neighbors'

export class CalculatedAttributes {
  private readonly degrees = new Map<Identifier, number>()
  private readonly neighborSets = new Map<Identifier, Set<Identifier>>()
  private readonly stale = new Set<CalculatedAttribute>()

  /** True while any calculated attribute may disagree with the edge store */
  get isStale(): boolean {
    return this.stale.size > 0
  }

  staleAttributes(): CalculatedAttribute[] {
    return Array.from(this.stale)
  }

  degree(id: Identifier): number | undefined {
    return this.degrees.get(id)
  }

  neighbors(id: Identifier): ReadonlySet<Identifier> | undefined {
    return this.neighborSets.get(id)
  }

  markStale(): void {
    this.stale.add('degree')
    this.stale.add('neighbors')
  }

  /**
   * Start tracking a node with degree 0 and no neighbors, unless tracked already.
   */
  register(id: Identifier): void {
    if (!this.degrees.has(id)) this.degrees.set(id, 0)
    if (!this.neighborSets.has(id)) this.neighborSets.set(id, new Set())
  }

  forget(id: Identifier): void {
    this.degrees.delete(id)
    this.neighborSets.delete(id)
  }

  reset(): void {
    this.degrees.clear()
    this.neighborSets.clear()
    this.stale.clear()
  }

  // ===========================================================================
  // DEGREE
  // ===========================================================================

  /**
   * Set every degree to 0. Fresh only when the graph has no edges.
   */
  clearDegree(nodes: Iterable<Identifier>, hasEdges: boolean): void {
    this.degrees.clear()
    for (const id of nodes) {
      this.degrees.set(id, 0)
    }
    this.setStale('degree', hasEdges)
  }

  /**
   * Both endpoints of every couple gain its parallel-edge count.
   */
  calcDegree(nodes: Iterable<Identifier>, couples: Iterable<StoredCouple>): void {
    this.clearDegree(nodes, false)
    for (const { couple, multiples } of couples) {
      for (const endpoint of couple) {
        this.degrees.set(endpoint, (this.degrees.get(endpoint) ?? 0) + multiples.size)
      }
    }
  }

  // ===========================================================================
  // NEIGHBORS
  // ===========================================================================

  clearNeighbors(nodes: Iterable<Identifier>, hasEdges: boolean): void {
    this.neighborSets.clear()
    for (const id of nodes) {
      this.neighborSets.set(id, new Set())
    }
    this.setStale('neighbors', hasEdges)
  }

  calcNeighbors(nodes: Iterable<Identifier>, couples: Iterable<StoredCouple>, variant: GraphVariant): void {
    this.clearNeighbors(nodes, false)
    for (const { couple } of couples) {
      for (const [owner, neighbor] of variant.neighborPairs(couple)) {
        let set = this.neighborSets.get(owner)
        if (!set) {
          set = new Set()
          this.neighborSets.set(owner, set)
        }
        set.add(neighbor)
      }
    }
  }

  private setStale(attribute: CalculatedAttribute, stale: boolean): void {
    if (stale) {
      this.stale.add(attribute)
    } else {
      this.stale.delete(attribute)
    }
  }
}
