/**
 * Graph Engine Types
 */

import type { IdGenerator, Identifier } from '../identifier'
import type { Attributes } from '../store/types'
import type { EdgesInput, NodesInput } from './validation'

// =============================================================================
// CONFIG
// =============================================================================

export interface GraphConfig {
  /** ID generator (defaults to UUID-based) */
  idGenerator?: IdGenerator
}

/**
 * Initial content, validated and bulk-loaded by the constructor.
 */
export interface GraphInit {
  nodes?: NodesInput
  edges?: EdgesInput
}

// =============================================================================
// OPERATION OPTIONS
// =============================================================================

export interface RecalculateOptions {
  /**
   * Recompute degree and neighbors right away (default: true).
   * Batched callers pass false and call recalculate() once at the end.
   */
  recalculate?: boolean
}

export interface AddNodeInput {
  /** Node identifier (generated when omitted) */
  id?: Identifier
  attributes?: Attributes
  /** Overwrite an existing node's attributes (default: false) */
  replace?: boolean
}

export interface AddEdgeInput extends RecalculateOptions {
  /** Edge identifier (generated when omitted) */
  id?: Identifier
  attributes?: Attributes
  /** Overwrite an existing edge's attributes (default: false) */
  replace?: boolean
  /** Create endpoints that are not in the graph yet (default: true) */
  addMissingIncidentNodes?: boolean
}

export interface DeleteEdgeOptions extends RecalculateOptions {
  /** Edge to remove; when omitted the whole couple goes */
  id?: Identifier
}

export interface SubgraphOptions {
  /**
   * Keep a couple only when both endpoints are selected (default: true);
   * false keeps couples with at least one selected endpoint.
   */
  fullmatch?: boolean
}

// =============================================================================
// DESCRIPTION
// =============================================================================

/**
 * Marker for a structural property that is not computed.
 */
export const NOT_AVAILABLE = 'not-available'
export type NotAvailable = typeof NOT_AVAILABLE

export interface GraphDescription {
  type: string
  numberOfNodes: number
  /** Distinct couples, parallel edges not counted */
  numberOfEdges: number
  multigraph: boolean
  pseudograph: boolean
  complete: boolean
  connected: NotAvailable
}
