/**
 * Graph Factories
 */

import { Graph, type GraphConfig, type GraphInit } from './engine'
import { type GraphVariant, type VariantName, directed, undirected } from './variants'

const variants: Record<VariantName, GraphVariant> = { directed, undirected }

/**
 * Directed multigraph: couples keep their order, neighbors are successors.
 */
export function directedGraph(init?: GraphInit, config?: GraphConfig): Graph {
  return new Graph(directed, init, config)
}

/**
 * Undirected multigraph: (a, b) and (b, a) are the same couple.
 */
export function undirectedGraph(init?: GraphInit, config?: GraphConfig): Graph {
  return new Graph(undirected, init, config)
}

/**
 * Graph of the variant with the given name.
 */
export function createGraph(variant: VariantName, init?: GraphInit, config?: GraphConfig): Graph {
  return new Graph(variants[variant], init, config)
}
