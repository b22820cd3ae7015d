/**
 * Custom Error Classes
 */

import type { Identifier } from '../identifier'
import type { Couple } from '../store/types'

/**
 * Closed enumeration of every failure the graph reports.
 *
 * There is no WrongLengthOfMultipleEdges: an empty multiples mapping is
 * accepted and stands for one edge with a generated identifier, so no bulk
 * input can fail on the number of parallel edges.
 */
export const GraphErrorKind = {
  WrongTypeOfNodes: 'WrongTypeOfNodes',
  WrongTypeOfNodeIdentifier: 'WrongTypeOfNodeIdentifier',
  WrongTypeOfNodeAttributes: 'WrongTypeOfNodeAttributes',
  WrongTypeOfEdges: 'WrongTypeOfEdges',
  WrongTypeOfCouple: 'WrongTypeOfCouple',
  WrongLengthOfCouple: 'WrongLengthOfCouple',
  WrongTypeOfNodeIdentifierInCouple: 'WrongTypeOfNodeIdentifierInCouple',
  WrongTypeOfMultipleEdges: 'WrongTypeOfMultipleEdges',
  WrongTypeOfEdgeIdentifier: 'WrongTypeOfEdgeIdentifier',
  WrongTypeOfEdgeAttributes: 'WrongTypeOfEdgeAttributes',
  DuplicationInEdgeIdentifiers: 'DuplicationInEdgeIdentifiers',
  NodeAlreadyExists: 'NodeAlreadyExists',
  EdgeAlreadyExists: 'EdgeAlreadyExists',
  NodeNotFound: 'NodeNotFound',
  CoupleNotFound: 'CoupleNotFound',
  EdgeNotFound: 'EdgeNotFound',
} as const

export type GraphErrorKind = (typeof GraphErrorKind)[keyof typeof GraphErrorKind]

export type NodesValidationKind =
  | typeof GraphErrorKind.WrongTypeOfNodes
  | typeof GraphErrorKind.WrongTypeOfNodeIdentifier
  | typeof GraphErrorKind.WrongTypeOfNodeAttributes

export type EdgesValidationKind =
  | typeof GraphErrorKind.WrongTypeOfEdges
  | typeof GraphErrorKind.WrongTypeOfCouple
  | typeof GraphErrorKind.WrongLengthOfCouple
  | typeof GraphErrorKind.WrongTypeOfNodeIdentifierInCouple
  | typeof GraphErrorKind.WrongTypeOfMultipleEdges
  | typeof GraphErrorKind.WrongTypeOfEdgeIdentifier
  | typeof GraphErrorKind.WrongTypeOfEdgeAttributes

const validationMessages: Record<NodesValidationKind | EdgesValidationKind, string> = {
  WrongTypeOfNodes: 'nodes must be a Map, a plain object or an iterable of identifiers',
  WrongTypeOfNodeIdentifier: 'node identifier must be a string or a finite number',
  WrongTypeOfNodeAttributes: 'node attributes must be a plain object',
  WrongTypeOfEdges: 'edges must be a Map of couples or an iterable of couples',
  WrongTypeOfCouple: 'couple must be an array',
  WrongLengthOfCouple: 'couple must have exactly 2 elements',
  WrongTypeOfNodeIdentifierInCouple: 'node identifier in couple must be a string or a finite number',
  WrongTypeOfMultipleEdges: 'multiple edges must be a Map or a plain object',
  WrongTypeOfEdgeIdentifier: 'edge identifier must be a string or a finite number',
  WrongTypeOfEdgeAttributes: 'edge attributes must be a plain object',
}

function formatCouple(couple: Couple): string {
  return `(${String(couple[0])}, ${String(couple[1])})`
}

/**
 * Base error for all graph errors.
 */
export class GraphError extends Error {
  public override readonly cause?: Error

  constructor(
    message: string,
    public readonly kind: GraphErrorKind,
    cause?: Error,
  ) {
    super(message)
    this.name = 'GraphError'
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Bulk node input failed a type or shape check.
 */
export class NodesValidationError extends GraphError {
  constructor(
    kind: NodesValidationKind,
    public readonly received?: unknown,
  ) {
    super(`Nodes validation failed: ${validationMessages[kind]}`, kind)
    this.name = 'NodesValidationError'
  }
}

/**
 * Bulk edge input failed a type or shape check.
 */
export class EdgesValidationError extends GraphError {
  constructor(
    kind: EdgesValidationKind | typeof GraphErrorKind.DuplicationInEdgeIdentifiers,
    message: string,
    public readonly received?: unknown,
    cause?: Error,
  ) {
    super(`Edges validation failed: ${message}`, kind, cause)
    this.name = 'EdgesValidationError'
  }

  static of(kind: EdgesValidationKind, received?: unknown): EdgesValidationError {
    return new EdgesValidationError(kind, validationMessages[kind], received)
  }
}

/**
 * The same edge identifier appeared twice for one couple during a bulk load.
 */
export class DuplicationInEdgeIdentifiersError extends EdgesValidationError {
  constructor(
    public readonly couple: Couple,
    public readonly edgeId: Identifier,
    cause?: Error,
  ) {
    super(
      GraphErrorKind.DuplicationInEdgeIdentifiers,
      `duplicate edge identifier '${String(edgeId)}' for couple ${formatCouple(couple)}`,
      edgeId,
      cause,
    )
    this.name = 'DuplicationInEdgeIdentifiersError'
  }
}

// =============================================================================
// ALREADY EXISTS
// =============================================================================

export class ObjectAlreadyExistsError extends GraphError {
  constructor(
    message: string,
    kind: typeof GraphErrorKind.NodeAlreadyExists | typeof GraphErrorKind.EdgeAlreadyExists,
  ) {
    super(message, kind)
    this.name = 'ObjectAlreadyExistsError'
  }
}

export class NodeAlreadyExistsError extends ObjectAlreadyExistsError {
  constructor(public readonly nodeId: Identifier) {
    super(`Node already exists: '${String(nodeId)}'`, GraphErrorKind.NodeAlreadyExists)
    this.name = 'NodeAlreadyExistsError'
  }
}

export class EdgeAlreadyExistsError extends ObjectAlreadyExistsError {
  constructor(
    public readonly couple: Couple,
    public readonly edgeId: Identifier,
  ) {
    super(
      `Edge already exists: '${String(edgeId)}' on couple ${formatCouple(couple)}`,
      GraphErrorKind.EdgeAlreadyExists,
    )
    this.name = 'EdgeAlreadyExistsError'
  }
}

// =============================================================================
// NOT FOUND
// =============================================================================

export class ObjectNotFoundError extends GraphError {
  constructor(
    message: string,
    kind:
      | typeof GraphErrorKind.NodeNotFound
      | typeof GraphErrorKind.CoupleNotFound
      | typeof GraphErrorKind.EdgeNotFound,
  ) {
    super(message, kind)
    this.name = 'ObjectNotFoundError'
  }
}

export class NodeNotFoundError extends ObjectNotFoundError {
  constructor(public readonly nodeId: Identifier) {
    super(`Node not found: '${String(nodeId)}'`, GraphErrorKind.NodeNotFound)
    this.name = 'NodeNotFoundError'
  }
}

export class CoupleNotFoundError extends ObjectNotFoundError {
  constructor(public readonly couple: Couple) {
    super(`Couple not found: ${formatCouple(couple)}`, GraphErrorKind.CoupleNotFound)
    this.name = 'CoupleNotFoundError'
  }
}

export class EdgeNotFoundError extends ObjectNotFoundError {
  constructor(
    public readonly couple: Couple,
    public readonly edgeId: Identifier,
  ) {
    super(
      `Edge not found: '${String(edgeId)}' on couple ${formatCouple(couple)}`,
      GraphErrorKind.EdgeNotFound,
    )
    this.name = 'EdgeNotFoundError'
  }
}

/**
 * Check whether a value is a graph error, optionally of one kind.
 */
export function isGraphError(value: unknown, kind?: GraphErrorKind): value is GraphError {
  return value instanceof GraphError && (kind === undefined || value.kind === kind)
}
