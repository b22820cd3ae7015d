/**
 * Bulk Input Validation
 *
 * Pre-scans node and edge input before anything is stored. Each check runs
 * over every element before the next check starts, so the first failing
 * check (in the order below) decides the error kind:
 *
 * nodes: container -> identifier -> attributes
 * edges: container -> couple type -> couple length -> endpoint identifiers
 *        -> multiples container -> edge identifiers -> edge attributes
 */

import { type Identifier, isIdentifier } from '../identifier'
import { EdgesValidationError, GraphErrorKind, NodesValidationError } from '../errors'
import { type Attributes, type Couple, AttributesSchema, isPlainObject } from '../store/types'

// =============================================================================
// INPUT SHAPES
// =============================================================================

/**
 * Bulk node input: identifier -> attributes, or a sequence of identifiers.
 */
export type NodesInput =
  | ReadonlyMap<Identifier, Attributes>
  | Readonly<Record<string, Attributes>>
  | Iterable<Identifier>

/**
 * Parallel edges of one couple. Empty means one edge with a generated identifier.
 */
export type MultiplesInput = ReadonlyMap<Identifier, Attributes> | Readonly<Record<string, Attributes>>

/**
 * Bulk edge input: couple -> parallel edges, or a sequence of couples.
 */
export type EdgesInput = ReadonlyMap<Couple, MultiplesInput> | Iterable<Couple>

// =============================================================================
// VALIDATED PLANS
// =============================================================================

export interface NodeEntry {
  id: Identifier
  attributes: Attributes
  /** Sequences may repeat an identifier; later entries replace earlier ones */
  replace: boolean
}

export interface EdgeEntry {
  left: Identifier
  right: Identifier
  /** Absent when the identifier is generated */
  id?: Identifier
  attributes: Attributes
}

function isAttributes(value: unknown): value is Attributes {
  return AttributesSchema.safeParse(value).success
}

function isSequence(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Map) &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  )
}

function entriesOf(mapping: Map<unknown, unknown> | Record<string, unknown>): Array<[unknown, unknown]> {
  return mapping instanceof Map ? Array.from(mapping.entries()) : Object.entries(mapping)
}

// =============================================================================
// NODES
// =============================================================================

/**
 * Validate bulk node input.
 * @throws NodesValidationError on the first failing check
 */
export function validateNodes(input: unknown): NodeEntry[] {
  if (input instanceof Map || isPlainObject(input)) {
    const entries = entriesOf(input)

    const badId = entries.findIndex(([id]) => !isIdentifier(id))
    if (badId >= 0) throw new NodesValidationError(GraphErrorKind.WrongTypeOfNodeIdentifier, entries[badId]?.[0])

    const result: NodeEntry[] = []
    for (const [id, attributes] of entries) {
      if (!isIdentifier(id)) continue
      if (!isAttributes(attributes)) {
        throw new NodesValidationError(GraphErrorKind.WrongTypeOfNodeAttributes, attributes)
      }
      result.push({ id, attributes, replace: false })
    }
    return result
  }

  if (isSequence(input)) {
    const ids = Array.from(input)
    const result: NodeEntry[] = []
    for (const id of ids) {
      if (!isIdentifier(id)) throw new NodesValidationError(GraphErrorKind.WrongTypeOfNodeIdentifier, id)
      result.push({ id, attributes: {}, replace: true })
    }
    return result
  }

  throw new NodesValidationError(GraphErrorKind.WrongTypeOfNodes, input)
}

// =============================================================================
// EDGES
// =============================================================================

function checkCouples(couples: unknown[]): Couple[] {
  const notArray = couples.findIndex((couple) => !Array.isArray(couple))
  if (notArray >= 0) throw EdgesValidationError.of(GraphErrorKind.WrongTypeOfCouple, couples[notArray])

  const arrays = couples.filter((couple): couple is unknown[] => Array.isArray(couple))

  const wrongLength = arrays.find((couple) => couple.length !== 2)
  if (wrongLength) throw EdgesValidationError.of(GraphErrorKind.WrongLengthOfCouple, wrongLength)

  const result: Couple[] = []
  for (const [left, right] of arrays) {
    if (!isIdentifier(left) || !isIdentifier(right)) {
      throw EdgesValidationError.of(GraphErrorKind.WrongTypeOfNodeIdentifierInCouple, [left, right])
    }
    result.push([left, right])
  }
  return result
}

/**
 * Validate bulk edge input.
 * @throws EdgesValidationError on the first failing check
 */
export function validateEdges(input: unknown): EdgeEntry[] {
  if (input instanceof Map) {
    const entries = Array.from(input.entries())
    const couples = checkCouples(entries.map(([couple]) => couple))

    const multiples = entries.map(([, value]) => value)
    const notMapping = multiples.findIndex((value) => !(value instanceof Map) && !isPlainObject(value))
    if (notMapping >= 0) {
      throw EdgesValidationError.of(GraphErrorKind.WrongTypeOfMultipleEdges, multiples[notMapping])
    }

    const edgeLists = multiples.map((value) =>
      value instanceof Map || isPlainObject(value) ? entriesOf(value) : [],
    )

    for (const edges of edgeLists) {
      const badId = edges.find(([id]) => !isIdentifier(id))
      if (badId) throw EdgesValidationError.of(GraphErrorKind.WrongTypeOfEdgeIdentifier, badId[0])
    }

    for (const edges of edgeLists) {
      const badAttributes = edges.find(([, attributes]) => !isAttributes(attributes))
      if (badAttributes) {
        throw EdgesValidationError.of(GraphErrorKind.WrongTypeOfEdgeAttributes, badAttributes[1])
      }
    }

    const result: EdgeEntry[] = []
    couples.forEach(([left, right], index) => {
      const edges = edgeLists[index] ?? []
      if (edges.length === 0) {
        result.push({ left, right, attributes: {} })
        return
      }
      for (const [id, attributes] of edges) {
        if (isIdentifier(id) && isAttributes(attributes)) {
          result.push({ left, right, id, attributes })
        }
      }
    })
    return result
  }

  if (isSequence(input)) {
    return checkCouples(Array.from(input)).map(([left, right]) => ({ left, right, attributes: {} }))
  }

  throw EdgesValidationError.of(GraphErrorKind.WrongTypeOfEdges, input)
}
