/**
 * Read-only view of the edge store. Lookups take endpoint pairs in any
 * order the variant accepts and canonicalize them first.
 */

import type { Identifier } from '../identifier'
import type { EdgeStore } from '../store/edge-store'
import type { Couple, Multiples } from '../store/types'
import type { GraphVariant } from '../variants'

export class EdgesView implements Iterable<[Couple, Multiples]> {
  constructor(
    private readonly store: EdgeStore,
    private readonly variant: GraphVariant,
  ) {}

  /** Number of distinct couples */
  get size(): number {
    return this.store.size
  }

  /**
   * Parallel edges between two nodes.
   */
  get(left: Identifier, right: Identifier): Multiples | undefined {
    return this.store.getCouple(this.variant.canonicalize(left, right))?.multiples
  }

  has(left: Identifier, right: Identifier, edgeId?: Identifier): boolean {
    const couple = this.variant.canonicalize(left, right)
    return edgeId === undefined ? this.store.hasCouple(couple) : this.store.hasEdge(couple, edgeId)
  }

  *couples(): IterableIterator<Couple> {
    for (const { couple } of this.store.values()) {
      yield couple
    }
  }

  *entries(): IterableIterator<[Couple, Multiples]> {
    for (const { couple, multiples } of this.store.values()) {
      yield [couple, multiples]
    }
  }

  [Symbol.iterator](): IterableIterator<[Couple, Multiples]> {
    return this.entries()
  }
}
