/**
 * Graph Variants
 *
 * The two points where directed and undirected graphs differ: how an
 * endpoint pair becomes a couple, and which neighbor each couple contributes.
 */

import { type Identifier, compareIdentifiers } from '../identifier'
import type { Couple } from '../store/types'

export type VariantName = 'directed' | 'undirected'

/**
 * Capability interface the graph engine is parameterized over.
 */
export interface GraphVariant {
  readonly name: VariantName
  /** Display label used by describe() */
  readonly label: string
  /** Canonical couple for an endpoint pair */
  canonicalize(left: Identifier, right: Identifier): Couple
  /** `[owner, neighbor]` pairs a couple adds to the neighbor sets */
  neighborPairs(couple: Couple): Iterable<readonly [Identifier, Identifier]>
}

/**
 * Couples keep their direction; neighbors are successors.
 */
export const directed: GraphVariant = {
  name: 'directed',
  label: 'Directed Graph',
  canonicalize: (left, right) => [left, right],
  neighborPairs: ([left, right]) => [[left, right]],
}

/**
 * Couples are sorted; neighbors are symmetric.
 */
export const undirected: GraphVariant = {
  name: 'undirected',
  label: 'Undirected Graph',
  canonicalize: (left, right) => (compareIdentifiers(left, right) <= 0 ? [left, right] : [right, left]),
  neighborPairs: ([left, right]) => [
    [left, right],
    [right, left],
  ],
}
