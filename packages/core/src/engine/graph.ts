/**
 * Graph Engine
 *
 * Multigraph with attributed nodes and parallel edges. Directed and
 * undirected graphs share this class; the variant only decides how an
 * endpoint pair becomes a couple and which neighbors a couple contributes.
 */

import { isDeepStrictEqual } from 'node:util'
import { type IdGenerator, type Identifier, defaultIdGenerator, isIdentifier } from '../identifier'
import {
  DuplicationInEdgeIdentifiersError,
  EdgeAlreadyExistsError,
  EdgeNotFoundError,
  EdgesValidationError,
  CoupleNotFoundError,
  GraphErrorKind,
  NodeAlreadyExistsError,
  NodeNotFoundError,
  NodesValidationError,
} from '../errors'
import { createLogger } from '../logger'
import { EdgeStore } from '../store/edge-store'
import { NodeStore } from '../store/node-store'
import { type Attributes, type Couple, AttributesSchema, cloneAttributes, coupleKey } from '../store/types'
import { type GraphVariant, undirected } from '../variants'
import { CalculatedAttributes } from './calculated'
import { EdgesView } from './edges-view'
import {
  type AddEdgeInput,
  type AddNodeInput,
  type DeleteEdgeOptions,
  type GraphConfig,
  type GraphDescription,
  type GraphInit,
  type RecalculateOptions,
  type SubgraphOptions,
  NOT_AVAILABLE,
} from './types'
import { validateEdges, validateNodes } from './validation'

const log = createLogger('graph')

export class Graph {
  private readonly idGenerator: IdGenerator
  private readonly nodeStore = new NodeStore()
  private readonly edgeStore = new EdgeStore()

  /** Degree and neighbor sets, with their stale flags */
  readonly calculated = new CalculatedAttributes()

  /** Read-only view of the edge store */
  readonly edges: EdgesView

  /**
   * Validate and bulk-load the initial content, then run one recomputation.
   *
   * @throws NodesValidationError | EdgesValidationError when the input is malformed (nothing loaded)
   * @throws DuplicationInEdgeIdentifiersError when one couple lists an edge identifier twice
   */
  constructor(
    readonly variant: GraphVariant,
    init: GraphInit = {},
    private readonly config: GraphConfig = {},
  ) {
    this.idGenerator = config.idGenerator ?? defaultIdGenerator
    this.edges = new EdgesView(this.edgeStore, variant)

    const nodes = init.nodes === undefined ? [] : validateNodes(init.nodes)
    const edges = init.edges === undefined ? [] : validateEdges(init.edges)

    for (const { id, attributes, replace } of nodes) {
      this.addNode({ id, attributes, replace })
    }
    for (const { left, right, id, attributes } of edges) {
      try {
        this.addEdge(left, right, { id, attributes, recalculate: false })
      } catch (error) {
        if (error instanceof EdgeAlreadyExistsError) {
          throw new DuplicationInEdgeIdentifiersError(error.couple, error.edgeId, error)
        }
        throw error
      }
    }

    this.recalculate()
    if (nodes.length > 0 || edges.length > 0) {
      log.debug(`Loaded ${this.nodeStore.size} nodes and ${this.edgeStore.size} couples`)
    }
  }

  // ===========================================================================
  // VIEWS
  // ===========================================================================

  /** Read-only view of the node store */
  get nodes(): ReadonlyMap<Identifier, Readonly<Attributes>> {
    return this.nodeStore.view()
  }

  /** Number of nodes */
  get size(): number {
    return this.nodeStore.size
  }

  /** Number of edges, counting parallel edges */
  get numberOfEdges(): number {
    return this.edgeStore.edgeCount
  }

  hasNode(id: Identifier): boolean {
    return this.nodeStore.has(id)
  }

  hasEdge(left: Identifier, right: Identifier, edgeId?: Identifier): boolean {
    return this.edges.has(left, right, edgeId)
  }

  /**
   * Degree as of the last recomputation.
   * @throws NodeNotFoundError
   */
  degree(id: Identifier): number {
    if (!this.nodeStore.has(id)) throw new NodeNotFoundError(id)
    return this.calculated.degree(id) ?? 0
  }

  /**
   * Neighbor set as of the last recomputation.
   * @throws NodeNotFoundError
   */
  neighbors(id: Identifier): ReadonlySet<Identifier> {
    if (!this.nodeStore.has(id)) throw new NodeNotFoundError(id)
    return this.calculated.neighbors(id) ?? new Set()
  }

  // ===========================================================================
  // NODES
  // ===========================================================================

  /**
   * Add a node, or overwrite its attributes with `replace`. Calculated
   * attributes of a replaced node are kept; nothing is recomputed.
   *
   * @returns the node identifier
   * @throws NodeAlreadyExistsError
   */
  addNode(input: AddNodeInput = {}): Identifier {
    const { attributes = {}, replace = false } = input
    if (input.id !== undefined && !isIdentifier(input.id)) {
      throw new NodesValidationError(GraphErrorKind.WrongTypeOfNodeIdentifier, input.id)
    }
    if (!AttributesSchema.safeParse(attributes).success) {
      throw new NodesValidationError(GraphErrorKind.WrongTypeOfNodeAttributes, attributes)
    }

    const id = input.id ?? this.idGenerator.generate('node')
    if (this.nodeStore.has(id) && !replace) {
      throw new NodeAlreadyExistsError(id)
    }

    this.nodeStore.set(id, { ...attributes })
    this.calculated.register(id)
    return id
  }

  /**
   * Remove a node together with every couple it belongs to.
   * @throws NodeNotFoundError
   */
  deleteNode(id: Identifier, options: RecalculateOptions = {}): void {
    const { recalculate = true } = options
    if (!this.nodeStore.has(id)) throw new NodeNotFoundError(id)

    const incident = this.edgeStore.incidentCouples(id)
    for (const couple of incident) {
      this.edgeStore.deleteCouple(couple)
    }
    this.nodeStore.delete(id)
    this.calculated.forget(id)

    if (incident.length > 0) {
      log.debug(`Deleted node '${String(id)}' with ${incident.length} incident couples`)
    }
    this.afterEdgeChange(recalculate)
  }

  /**
   * Remove every node. Edges go too, since none could keep its endpoints.
   */
  clearNodes(): void {
    log.debug(`Clearing ${this.nodeStore.size} nodes and ${this.edgeStore.size} couples`)
    this.edgeStore.clear()
    this.nodeStore.clear()
    this.calculated.reset()
  }

  // ===========================================================================
  // EDGES
  // ===========================================================================

  /**
   * Add an edge between two nodes; parallel edges get distinct identifiers.
   *
   * @returns the edge identifier
   * @throws EdgeAlreadyExistsError
   * @throws NodeNotFoundError when an endpoint is missing and may not be created
   */
  addEdge(left: Identifier, right: Identifier, input: AddEdgeInput = {}): Identifier {
    const { attributes = {}, replace = false, addMissingIncidentNodes = true, recalculate = true } = input
    if (!isIdentifier(left) || !isIdentifier(right)) {
      throw EdgesValidationError.of(GraphErrorKind.WrongTypeOfNodeIdentifierInCouple, [left, right])
    }
    if (input.id !== undefined && !isIdentifier(input.id)) {
      throw EdgesValidationError.of(GraphErrorKind.WrongTypeOfEdgeIdentifier, input.id)
    }
    if (!AttributesSchema.safeParse(attributes).success) {
      throw EdgesValidationError.of(GraphErrorKind.WrongTypeOfEdgeAttributes, attributes)
    }

    const couple = this.variant.canonicalize(left, right)
    if (!addMissingIncidentNodes) {
      for (const endpoint of couple) {
        if (!this.nodeStore.has(endpoint)) throw new NodeNotFoundError(endpoint)
      }
    }

    const id = input.id ?? this.idGenerator.generate('edge')
    if (this.edgeStore.hasEdge(couple, id) && !replace) {
      throw new EdgeAlreadyExistsError(couple, id)
    }

    this.edgeStore.setEdge(couple, id, { ...attributes })
    for (const endpoint of couple) {
      if (!this.nodeStore.has(endpoint)) {
        this.addNode({ id: endpoint })
      }
    }

    this.afterEdgeChange(recalculate)
    return id
  }

  /**
   * Remove one edge, or the whole couple when no edge identifier is given.
   *
   * @throws CoupleNotFoundError
   * @throws EdgeNotFoundError
   */
  deleteEdge(left: Identifier, right: Identifier, options: DeleteEdgeOptions = {}): void {
    const { id, recalculate = true } = options
    const couple = this.variant.canonicalize(left, right)
    if (!this.edgeStore.hasCouple(couple)) throw new CoupleNotFoundError(couple)

    if (id === undefined) {
      this.edgeStore.deleteCouple(couple)
    } else if (!this.edgeStore.deleteEdge(couple, id)) {
      throw new EdgeNotFoundError(couple, id)
    }

    this.afterEdgeChange(recalculate)
  }

  /**
   * Remove every edge; every node ends with degree 0 and no neighbors.
   */
  clearEdges(): void {
    this.edgeStore.clear()
    this.clearDegree()
    this.clearNeighbors()
  }

  // ===========================================================================
  // SUBGRAPH
  // ===========================================================================

  /**
   * New graph of the same variant holding the couples picked by the
   * selection. Nodes come along only through a kept couple; attributes are
   * copied with cloneAttributes.
   */
  getSubgraph(selection: Iterable<Identifier>, options: SubgraphOptions = {}): Graph {
    const { fullmatch = true } = options
    const selected = new Set<Identifier>()
    for (const id of selection) {
      if (this.nodeStore.has(id)) selected.add(id)
    }

    const keep = ([left, right]: Couple): boolean =>
      fullmatch ? selected.has(left) && selected.has(right) : selected.has(left) || selected.has(right)

    const subgraph = new Graph(this.variant, {}, this.config)
    for (const { couple, multiples } of this.edgeStore.values()) {
      if (!keep(couple)) continue

      for (const endpoint of couple) {
        if (!subgraph.hasNode(endpoint)) {
          subgraph.addNode({ id: endpoint, attributes: cloneAttributes(this.nodeStore.get(endpoint) ?? {}) })
        }
      }
      for (const [edgeId, attributes] of multiples) {
        subgraph.addEdge(couple[0], couple[1], {
          id: edgeId,
          attributes: cloneAttributes(attributes),
          addMissingIncidentNodes: false,
          recalculate: false,
        })
      }
    }

    subgraph.recalculate()
    log.debug(`Extracted subgraph with ${subgraph.size} nodes and ${subgraph.edges.size} couples`)
    return subgraph
  }

  // ===========================================================================
  // CALCULATED ATTRIBUTES
  // ===========================================================================

  calcDegree(): void {
    this.calculated.calcDegree(this.nodeStore.ids(), this.edgeStore.values())
  }

  clearDegree(): void {
    this.calculated.clearDegree(this.nodeStore.ids(), this.edgeStore.size > 0)
  }

  calcNeighbors(): void {
    this.calculated.calcNeighbors(this.nodeStore.ids(), this.edgeStore.values(), this.variant)
  }

  clearNeighbors(): void {
    this.calculated.clearNeighbors(this.nodeStore.ids(), this.edgeStore.size > 0)
  }

  /**
   * Recompute degree and neighbors from the edge store.
   */
  recalculate(): void {
    this.calcDegree()
    this.calcNeighbors()
  }

  private afterEdgeChange(recalculate: boolean): void {
    if (recalculate) {
      this.recalculate()
    } else {
      this.calculated.markStale()
    }
  }

  // ===========================================================================
  // STRUCTURE
  // ===========================================================================

  /**
   * Couples whose endpoints are equal, read from the edge store on every iteration.
   */
  findLoops(): Iterable<Couple> {
    return { [Symbol.iterator]: () => this.iterateLoops() }
  }

  private *iterateLoops(): Generator<Couple> {
    for (const { couple } of this.edgeStore.values()) {
      if (couple[0] === couple[1]) yield couple
    }
  }

  /**
   * Recompute calculated attributes and classify the graph.
   */
  describe(): GraphDescription {
    this.recalculate()
    return {
      type: this.variant.label,
      numberOfNodes: this.nodeStore.size,
      numberOfEdges: this.edgeStore.size,
      multigraph: this.isMulti(),
      pseudograph: this.isPseudo(),
      complete: this.isComplete(),
      connected: NOT_AVAILABLE,
    }
  }

  private isMulti(): boolean {
    for (const { multiples } of this.edgeStore.values()) {
      if (multiples.size > 1) return true
    }
    return false
  }

  private isPseudo(): boolean {
    return this.iterateLoops().next().done !== true
  }

  /**
   * Distinct unordered non-loop pairs == n(n-1)/2. Pairs are compared in
   * undirected form for both variants, so (a,b) and (b,a) count once.
   */
  private isComplete(): boolean {
    const pairs = new Set<string>()
    for (const { couple } of this.edgeStore.values()) {
      if (couple[0] !== couple[1]) {
        pairs.add(coupleKey(undirected.canonicalize(couple[0], couple[1])))
      }
    }
    const n = this.nodeStore.size
    return pairs.size === (n * (n - 1)) / 2
  }

  // ===========================================================================
  // EQUALITY
  // ===========================================================================

  /**
   * Same variant, same nodes and edges with deeply equal attributes.
   */
  equals(other: Graph): boolean {
    if (this.variant.name !== other.variant.name) return false
    if (this.nodeStore.size !== other.nodes.size || this.edgeStore.size !== other.edges.size) return false

    for (const [id, attributes] of this.nodeStore.view()) {
      const theirs = other.nodes.get(id)
      if (theirs === undefined || !isDeepStrictEqual(attributes, theirs)) return false
    }

    for (const { couple, multiples } of this.edgeStore.values()) {
      const theirs = other.edges.get(couple[0], couple[1])
      if (theirs === undefined || theirs.size !== multiples.size) return false
      for (const [edgeId, attributes] of multiples) {
        const theirAttributes = theirs.get(edgeId)
        if (theirAttributes === undefined || !isDeepStrictEqual(attributes, theirAttributes)) return false
      }
    }
    return true
  }

  /**
   * e.g. "Multi Directed Graph with 3 nodes and 2 edges".
   */
  toString(): string {
    const description = this.describe()

    let type = description.type
    if (description.multigraph) type = `Multi ${type}`
    if (description.pseudograph) type = `Pseudo ${type}`
    if (description.complete) type = `Complete ${type}`

    const plural = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? '' : 's'}`
    return `${type} with ${plural(description.numberOfNodes, 'node')} and ${plural(description.numberOfEdges, 'edge')}`
  }
}
