import { describe, it, expect } from "vitest"
import {
  CoupleNotFoundError,
  EdgeNotFoundError,
  GraphError,
  GraphErrorKind,
  NodeAlreadyExistsError,
  NodeNotFoundError,
  ObjectAlreadyExistsError,
  ObjectNotFoundError,
  directedGraph,
  isGraphError,
  validateEdges,
} from "../src"

function caught(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}

describe("error hierarchy", () => {
  it("should share the GraphError base", () => {
    const error = new NodeNotFoundError(3)

    expect(error).toBeInstanceOf(ObjectNotFoundError)
    expect(error).toBeInstanceOf(GraphError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe("NodeNotFoundError")
    expect(error.message).toBe("Node not found: '3'")
  })

  it("should name the couple and edge that were not found", () => {
    const graph = directedGraph()
    graph.addEdge("a", "b", { id: "e1" })

    const error = caught(() => graph.deleteEdge("a", "b", { id: "e9" }))

    expect(error).toBeInstanceOf(EdgeNotFoundError)
    expect(isGraphError(error) && error.message).toBe("Edge not found: 'e9' on couple (a, b)")
  })

  it("should carry the couple that was not found", () => {
    const error = caught(() => directedGraph().deleteEdge(2, 1))

    expect(error).toBeInstanceOf(CoupleNotFoundError)
    expect(error instanceof CoupleNotFoundError && error.couple).toEqual([2, 1])
  })

  it("should describe an existing node", () => {
    const graph = directedGraph({ nodes: ["a"] })

    const error = caught(() => graph.addNode({ id: "a" }))

    expect(error).toBeInstanceOf(ObjectAlreadyExistsError)
    expect(error instanceof NodeAlreadyExistsError && error.message).toBe("Node already exists: 'a'")
  })

  it("should prefix validation messages", () => {
    const error = caught(() => validateEdges([["a"]]))

    expect(isGraphError(error) && error.name).toBe("EdgesValidationError")
    expect(isGraphError(error) && error.message).toBe("Edges validation failed: couple must have exactly 2 elements")
  })
})

describe("GraphErrorKind", () => {
  it("should have no kind for the number of parallel edges", () => {
    expect(Object.values(GraphErrorKind)).not.toContain("WrongLengthOfMultipleEdges")
    expect(validateEdges(new Map([[["a", "b"], {}]]))).toEqual([{ left: "a", right: "b", attributes: {} }])
  })
})

describe("isGraphError", () => {
  it("should filter by kind", () => {
    const error = new NodeNotFoundError("a")

    expect(isGraphError(error)).toBe(true)
    expect(isGraphError(error, GraphErrorKind.NodeNotFound)).toBe(true)
    expect(isGraphError(error, GraphErrorKind.EdgeNotFound)).toBe(false)
  })

  it("should reject other errors", () => {
    expect(isGraphError(new Error("boom"))).toBe(false)
    expect(isGraphError("NodeNotFound")).toBe(false)
  })
})
