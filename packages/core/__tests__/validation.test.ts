import { describe, it, expect } from "vitest"
import {
  DuplicationInEdgeIdentifiersError,
  EdgeAlreadyExistsError,
  EdgesValidationError,
  GraphErrorKind,
  NodesValidationError,
  directedGraph,
  isGraphError,
  undirectedGraph,
  validateEdges,
  validateNodes,
  type Couple,
  type EdgesInput,
  type MultiplesInput,
  type NodesInput,
} from "../src"

/**
 * Kind of the error thrown by fn.
 */
function kindOf(fn: () => unknown): GraphErrorKind | undefined {
  try {
    fn()
  } catch (error) {
    if (isGraphError(error)) return error.kind
    throw error
  }
  return undefined
}

// Runtime input the static types would reject
function nodesInput(value: unknown): NodesInput {
  return value as NodesInput
}

function edgesInput(value: unknown): EdgesInput {
  return value as EdgesInput
}

// =============================================================================
// BULK LOAD
// =============================================================================

describe("bulk load", () => {
  it("should load nodes from a Map", () => {
    const graph = directedGraph({
      nodes: new Map([
        ["Elizabeth", { age: 19 }],
        ["Sebastian", { age: 21 }],
      ]),
    })

    expect(graph.size).toBe(2)
    expect(graph.nodes.get("Sebastian")).toEqual({ age: 21 })
  })

  it("should load nodes from a plain object", () => {
    const graph = directedGraph({ nodes: { a: { x: 1 }, b: {} } })

    expect(Array.from(graph.nodes.keys())).toEqual(["a", "b"])
    expect(graph.nodes.get("a")).toEqual({ x: 1 })
  })

  it("should load nodes from a sequence of identifiers", () => {
    const graph = directedGraph({ nodes: ["a", 2, "a"] })

    expect(graph.size).toBe(2)
    expect(graph.nodes.get(2)).toEqual({})
  })

  it("should load edges from a Map of couples", () => {
    const edges = new Map<Couple, MultiplesInput>([
      [["Sebastian", "Elizabeth"], new Map([["46f893e", { amount: 1400 }], ["206ij5s", { amount: 2700 }]])],
      [["Elizabeth", "Sebastian"], { "239af58": { amount: 1900 } }],
    ])

    const graph = directedGraph({ edges })

    expect(graph.edges.size).toBe(2)
    expect(graph.numberOfEdges).toBe(3)
    expect(graph.edges.get("Elizabeth", "Sebastian")?.get("239af58")).toEqual({ amount: 1900 })
    expect(graph.degree("Sebastian")).toBe(3)
    expect(graph.calculated.isStale).toBe(false)
  })

  it("should insert one generated edge for an empty multiples mapping", () => {
    const graph = directedGraph({ edges: new Map<Couple, MultiplesInput>([[["a", "b"], {}]]) })

    const multiples = graph.edges.get("a", "b")
    expect(multiples?.size).toBe(1)
    expect(Array.from(multiples?.values() ?? [])).toEqual([{}])
  })

  it("should load edges from a sequence of couples", () => {
    const graph = undirectedGraph({
      edges: [
        ["a", "b"],
        ["b", "a"],
        ["c", "c"],
      ],
    })

    expect(graph.edges.size).toBe(2)
    expect(graph.edges.get("a", "b")?.size).toBe(2)
    expect(graph.degree("c")).toBe(2)
  })

  it("should keep node attributes when edges reference loaded nodes", () => {
    const graph = directedGraph({
      nodes: { a: { label: "start" } },
      edges: [["a", "b"]],
    })

    expect(graph.nodes.get("a")).toEqual({ label: "start" })
    expect(graph.nodes.get("b")).toEqual({})
  })

  it("should report a duplicate edge identifier with its couple", () => {
    const edges = new Map<Couple, MultiplesInput>([
      [["b", "a"], { e1: {} }],
      [["a", "b"], { e1: { weight: 2 } }],
    ])

    let caught: unknown
    try {
      undirectedGraph({ edges })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(DuplicationInEdgeIdentifiersError)
    const duplication = caught as DuplicationInEdgeIdentifiersError
    expect(duplication.kind).toBe(GraphErrorKind.DuplicationInEdgeIdentifiers)
    expect(duplication.couple).toEqual(["a", "b"])
    expect(duplication.edgeId).toBe("e1")
    expect(duplication.cause).toBeInstanceOf(EdgeAlreadyExistsError)
    expect(duplication).toBeInstanceOf(EdgesValidationError)
  })
})

// =============================================================================
// NODE CHECKS
// =============================================================================

describe("node validation", () => {
  it("should reject a container that is neither mapping nor sequence", () => {
    expect(kindOf(() => directedGraph({ nodes: nodesInput(42) }))).toBe(GraphErrorKind.WrongTypeOfNodes)
    expect(kindOf(() => directedGraph({ nodes: nodesInput("abc") }))).toBe(GraphErrorKind.WrongTypeOfNodes)
  })

  it("should reject a bad identifier in a sequence", () => {
    expect(kindOf(() => directedGraph({ nodes: nodesInput(["a", {}]) }))).toBe(
      GraphErrorKind.WrongTypeOfNodeIdentifier,
    )
  })

  it("should reject a bad identifier in a Map", () => {
    const nodes = new Map<unknown, unknown>([[null, {}]])

    expect(kindOf(() => directedGraph({ nodes: nodesInput(nodes) }))).toBe(GraphErrorKind.WrongTypeOfNodeIdentifier)
  })

  it("should reject attributes that are not plain objects", () => {
    expect(kindOf(() => directedGraph({ nodes: nodesInput({ a: [1, 2] }) }))).toBe(
      GraphErrorKind.WrongTypeOfNodeAttributes,
    )
    expect(kindOf(() => directedGraph({ nodes: nodesInput({ a: null }) }))).toBe(
      GraphErrorKind.WrongTypeOfNodeAttributes,
    )
  })

  it("should check identifiers before attributes", () => {
    const nodes = new Map<unknown, unknown>([
      ["a", "not attributes"],
      [true, {}],
    ])

    expect(kindOf(() => validateNodes(nodes))).toBe(GraphErrorKind.WrongTypeOfNodeIdentifier)
  })

  it("should throw NodesValidationError carrying the offending value", () => {
    let caught: unknown
    try {
      validateNodes(["a", false])
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(NodesValidationError)
    expect((caught as NodesValidationError).received).toBe(false)
  })
})

// =============================================================================
// EDGE CHECKS
// =============================================================================

describe("edge validation", () => {
  it("should reject a container that is neither Map nor sequence", () => {
    expect(kindOf(() => validateEdges({ a: {} }))).toBe(GraphErrorKind.WrongTypeOfEdges)
    expect(kindOf(() => validateEdges(undefined))).toBe(GraphErrorKind.WrongTypeOfEdges)
  })

  it("should reject a couple that is not an array", () => {
    expect(kindOf(() => validateEdges([["a", "b"], "ab"]))).toBe(GraphErrorKind.WrongTypeOfCouple)
    expect(kindOf(() => validateEdges([undefined]))).toBe(GraphErrorKind.WrongTypeOfCouple)
  })

  it("should reject a couple without exactly two endpoints", () => {
    expect(kindOf(() => validateEdges([["a", "b", "c"]]))).toBe(GraphErrorKind.WrongLengthOfCouple)
    expect(kindOf(() => validateEdges(new Map([[["a"], {}]])))).toBe(GraphErrorKind.WrongLengthOfCouple)
  })

  it("should reject a bad endpoint identifier", () => {
    expect(kindOf(() => validateEdges([["a", null]]))).toBe(GraphErrorKind.WrongTypeOfNodeIdentifierInCouple)
  })

  it("should reject multiples that are not a mapping", () => {
    expect(kindOf(() => validateEdges(new Map([[["a", "b"], ["e1"]]])))).toBe(
      GraphErrorKind.WrongTypeOfMultipleEdges,
    )
  })

  it("should reject a bad edge identifier", () => {
    const edges = new Map([[["a", "b"], new Map<unknown, unknown>([[{}, {}]])]])

    expect(kindOf(() => validateEdges(edges))).toBe(GraphErrorKind.WrongTypeOfEdgeIdentifier)
  })

  it("should reject edge attributes that are not plain objects", () => {
    expect(kindOf(() => validateEdges(new Map([[["a", "b"], { e1: 5 }]])))).toBe(
      GraphErrorKind.WrongTypeOfEdgeAttributes,
    )
  })

  it("should run the couple checks over every couple before looking inside multiples", () => {
    const edges = new Map<unknown, unknown>([
      [["a", "b"], "not a mapping"],
      [["c"], {}],
    ])

    expect(kindOf(() => validateEdges(edges))).toBe(GraphErrorKind.WrongLengthOfCouple)
  })

  it("should leave nothing behind when validation fails", () => {
    expect(() =>
      directedGraph({
        nodes: ["a", "b"],
        edges: edgesInput([["a", "b"], ["c"]]),
      }),
    ).toThrow(EdgesValidationError)
  })

  it("should produce generated-id entries for couple sequences", () => {
    expect(validateEdges([[1, 2]])).toEqual([{ left: 1, right: 2, attributes: {} }])
  })
})
