/**
 * Edge Store
 *
 * Mapping from canonical couple to its parallel edges, with an incidence
 * index (node -> couples touching it) so cascading deletes cost O(degree).
 * Couples handed to the store must already be canonical.
 */

import type { Identifier } from '../identifier'
import { type Attributes, type Couple, type StoredCouple, coupleKey } from './types'

export class EdgeStore {
  /** All couples by key */
  private readonly couples = new Map<string, StoredCouple>()

  /** Couples per endpoint: nodeId -> Set<coupleKey> */
  private readonly incidence = new Map<Identifier, Set<string>>()

  // ===========================================================================
  // COUPLES
  // ===========================================================================

  /** Number of distinct couples */
  get size(): number {
    return this.couples.size
  }

  /** Number of edges, counting parallel edges */
  get edgeCount(): number {
    let count = 0
    for (const { multiples } of this.couples.values()) {
      count += multiples.size
    }
    return count
  }

  getCouple(couple: Couple): StoredCouple | undefined {
    return this.couples.get(coupleKey(couple))
  }

  hasCouple(couple: Couple): boolean {
    return this.couples.has(coupleKey(couple))
  }

  /**
   * Delete a couple with all its parallel edges.
   */
  deleteCouple(couple: Couple): boolean {
    const key = coupleKey(couple)
    const stored = this.couples.get(key)
    if (!stored) return false

    this.couples.delete(key)
    this.unindex(stored.couple[0], key)
    this.unindex(stored.couple[1], key)
    return true
  }

  /**
   * Couples with the given node at either position.
   */
  incidentCouples(nodeId: Identifier): Couple[] {
    const keys = this.incidence.get(nodeId)
    if (!keys) return []
    const result: Couple[] = []
    for (const key of keys) {
      const stored = this.couples.get(key)
      if (stored) result.push(stored.couple)
    }
    return result
  }

  values(): IterableIterator<StoredCouple> {
    return this.couples.values()
  }

  // ===========================================================================
  // EDGES
  // ===========================================================================

  hasEdge(couple: Couple, edgeId: Identifier): boolean {
    return this.getCouple(couple)?.multiples.has(edgeId) ?? false
  }

  /**
   * Insert or overwrite one edge of a couple.
   */
  setEdge(couple: Couple, edgeId: Identifier, attributes: Attributes): void {
    const key = coupleKey(couple)
    let stored = this.couples.get(key)
    if (!stored) {
      stored = { couple: [couple[0], couple[1]], multiples: new Map() }
      this.couples.set(key, stored)
      this.index(couple[0], key)
      this.index(couple[1], key)
    }
    stored.multiples.set(edgeId, attributes)
  }

  /**
   * Delete one edge. The couple goes with its last edge.
   */
  deleteEdge(couple: Couple, edgeId: Identifier): boolean {
    const stored = this.getCouple(couple)
    if (!stored || !stored.multiples.delete(edgeId)) return false

    if (stored.multiples.size === 0) {
      this.deleteCouple(couple)
    }
    return true
  }

  clear(): void {
    this.couples.clear()
    this.incidence.clear()
  }

  // ===========================================================================
  // INCIDENCE INDEX
  // ===========================================================================

  private index(nodeId: Identifier, key: string): void {
    let keys = this.incidence.get(nodeId)
    if (!keys) {
      keys = new Set()
      this.incidence.set(nodeId, keys)
    }
    keys.add(key)
  }

  private unindex(nodeId: Identifier, key: string): void {
    const keys = this.incidence.get(nodeId)
    if (!keys) return
    keys.delete(key)
    if (keys.size === 0) {
      this.incidence.delete(nodeId)
    }
  }
}
