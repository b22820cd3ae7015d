/**
 * Graph Snapshots
 *
 * JSON-safe picture of a graph. Nodes and edges are entry lists rather than
 * objects so numeric identifiers survive; decoding goes back through the
 * graph's bulk-input shapes (node map, couple -> edge map).
 */

import { z } from 'zod'
import {
  type Couple,
  type Graph,
  type GraphConfig,
  type Identifier,
  type MultiplesInput,
  IdentifierSchema,
  cloneAttributes,
  createGraph,
  createLogger,
} from '@multigraph/core'
import { InvalidSnapshotError } from './errors'

const log = createLogger('snapshot')

export const SNAPSHOT_VERSION = 1

const AttributesSchema = z.record(z.unknown())

export const GraphSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  type: z.enum(['directed', 'undirected']),
  nodes: z.array(z.tuple([IdentifierSchema, AttributesSchema])),
  edges: z.array(
    z.tuple([z.tuple([IdentifierSchema, IdentifierSchema]), z.array(z.tuple([IdentifierSchema, AttributesSchema]))]),
  ),
})

export type GraphSnapshot = z.infer<typeof GraphSnapshotSchema>

type AttributesEntry = [Identifier, Record<string, unknown>]

function copyEntry([id, attributes]: [Identifier, Readonly<Record<string, unknown>>]): AttributesEntry {
  return [id, cloneAttributes(attributes)]
}

/**
 * Snapshot of a graph; attributes are deep copies.
 */
export function toSnapshot(graph: Graph): GraphSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    type: graph.variant.name,
    nodes: Array.from(graph.nodes, copyEntry),
    edges: Array.from(graph.edges, ([[left, right], multiples]): GraphSnapshot['edges'][number] => [
      [left, right],
      Array.from(multiples, copyEntry),
    ]),
  }
}

/**
 * Rebuild a graph from a snapshot.
 * @throws InvalidSnapshotError when the data is not a snapshot
 */
export function fromSnapshot(data: unknown, config?: GraphConfig): Graph {
  const result = GraphSnapshotSchema.safeParse(data)
  if (!result.success) {
    const issue = result.error.errors[0]
    throw new InvalidSnapshotError(issue?.message ?? 'validation failed', issue?.path)
  }

  const snapshot = result.data
  const nodes = new Map<Identifier, Record<string, unknown>>(snapshot.nodes)
  const edges = new Map<Couple, MultiplesInput>(
    snapshot.edges.map(([couple, multiples]) => [couple, new Map(multiples)]),
  )

  log.debug(`Decoding ${snapshot.type} snapshot with ${nodes.size} nodes and ${edges.size} couples`)
  return createGraph(snapshot.type, { nodes, edges }, config)
}

/**
 * Encode a graph as JSON text.
 */
export function serializeGraph(graph: Graph, space?: number): string {
  return JSON.stringify(toSnapshot(graph), null, space)
}

/**
 * Decode a graph from JSON text.
 * @throws InvalidSnapshotError when the text is not JSON or not a snapshot
 */
export function parseGraph(text: string, config?: GraphConfig): Graph {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    throw new InvalidSnapshotError('not valid JSON', [], error instanceof Error ? error : undefined)
  }
  return fromSnapshot(data, config)
}
