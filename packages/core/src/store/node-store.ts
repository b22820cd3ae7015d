/**
 * Node Store
 *
 * Mapping from node identifier to attribute record.
 */

import type { Identifier } from '../identifier'
import type { Attributes } from './types'

export class NodeStore {
  /** All nodes by ID */
  private readonly nodes = new Map<Identifier, Attributes>()

  get size(): number {
    return this.nodes.size
  }

  has(id: Identifier): boolean {
    return this.nodes.has(id)
  }

  get(id: Identifier): Readonly<Attributes> | undefined {
    return this.nodes.get(id)
  }

  /**
   * Insert or overwrite a node's attributes.
   */
  set(id: Identifier, attributes: Attributes): void {
    this.nodes.set(id, attributes)
  }

  delete(id: Identifier): boolean {
    return this.nodes.delete(id)
  }

  clear(): void {
    this.nodes.clear()
  }

  ids(): IterableIterator<Identifier> {
    return this.nodes.keys()
  }

  /**
   * Read-only view of the store.
   */
  view(): ReadonlyMap<Identifier, Readonly<Attributes>> {
    return this.nodes
  }
}
