/**
 * Multigraph - in-memory directed and undirected multigraphs
 *
 * Attributed nodes, parallel edges and loops, generated identifiers,
 * degree and neighbor sets kept in step with the edges, subgraphs and
 * structural classification.
 *
 * @example
 * ```typescript
 * import { directedGraph, type Couple, type MultiplesInput } from '@multigraph/core';
 *
 * const graph = directedGraph({
 *   nodes: { alice: { age: 19 }, bob: { age: 21 } },
 *   edges: new Map<Couple, MultiplesInput>([[['bob', 'alice'], { t1: { amount: 1400 } }]]),
 * });
 *
 * graph.addEdge('bob', 'alice', { attributes: { amount: 2700 } });
 * graph.degree('alice'); // 2
 * graph.neighbors('bob'); // Set { 'alice' }
 *
 * // Batch mutations, then recompute once
 * graph.addEdge('alice', 'carol', { recalculate: false });
 * graph.calculated.isStale; // true
 * graph.recalculate();
 *
 * graph.describe().multigraph; // true
 * const sub = graph.getSubgraph(['alice', 'bob']);
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// GRAPHS
// =============================================================================

export { directedGraph, undirectedGraph, createGraph } from './graph'
export { Graph, EdgesView, CalculatedAttributes, validateNodes, validateEdges, NOT_AVAILABLE } from './engine'
export type {
  CalculatedAttribute,
  NodesInput,
  EdgesInput,
  MultiplesInput,
  NodeEntry,
  EdgeEntry,
  GraphConfig,
  GraphInit,
  RecalculateOptions,
  AddNodeInput,
  AddEdgeInput,
  DeleteEdgeOptions,
  SubgraphOptions,
  GraphDescription,
  NotAvailable,
} from './engine'

// =============================================================================
// VARIANTS
// =============================================================================

export { directed, undirected } from './variants'
export type { GraphVariant, VariantName } from './variants'

// =============================================================================
// IDENTIFIERS & STORE TYPES
// =============================================================================

export {
  IdentifierSchema,
  generateIdentifier,
  defaultIdGenerator,
  isIdentifier,
  compareIdentifiers,
} from './identifier'
export type { Identifier, IdentifierKind, IdGenerator } from './identifier'

export { AttributesSchema, cloneAttributes } from './store'
export type { Attributes, Couple, Multiples } from './store'

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphErrorKind,
  GraphError,
  NodesValidationError,
  EdgesValidationError,
  DuplicationInEdgeIdentifiersError,
  ObjectAlreadyExistsError,
  NodeAlreadyExistsError,
  EdgeAlreadyExistsError,
  ObjectNotFoundError,
  NodeNotFoundError,
  CoupleNotFoundError,
  EdgeNotFoundError,
  isGraphError,
} from './errors'
export type { NodesValidationKind, EdgesValidationKind } from './errors'

// =============================================================================
// LOGGING
// =============================================================================

export { logger, createLogger, setLogLevel, LogLevels } from './logger'
