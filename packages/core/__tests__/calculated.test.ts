import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { CalculatedAttributes, LogLevels, createLogger, directed, logger, setLogLevel, undirected } from "../src"

describe("CalculatedAttributes", () => {
  let calculated: CalculatedAttributes

  beforeEach(() => {
    calculated = new CalculatedAttributes()
  })

  it("should count a loop twice toward its node's degree", () => {
    calculated.calcDegree(["a", "b"], [{ couple: ["a", "a"], multiples: new Map([["l1", {}]]) }])

    expect(calculated.degree("a")).toBe(2)
    expect(calculated.degree("b")).toBe(0)
  })

  it("should add the parallel-edge count to both endpoints", () => {
    const multiples = new Map([
      ["e1", {}],
      ["e2", {}],
    ])

    calculated.calcDegree(["a", "b"], [{ couple: ["a", "b"], multiples }])

    expect(calculated.degree("a")).toBe(2)
    expect(calculated.degree("b")).toBe(2)
  })

  it("should derive neighbors through the variant", () => {
    const couples = [{ couple: ["a", "b"] as const, multiples: new Map([["e1", {}]]) }]

    calculated.calcNeighbors(["a", "b"], couples, directed)
    expect(calculated.neighbors("b")).toEqual(new Set())

    calculated.calcNeighbors(["a", "b"], couples, undirected)
    expect(calculated.neighbors("b")).toEqual(new Set(["a"]))
  })

  it("should keep a cleared attribute stale while edges exist", () => {
    calculated.clearDegree(["a"], true)

    expect(calculated.staleAttributes()).toEqual(["degree"])

    calculated.calcDegree(["a"], [])
    expect(calculated.isStale).toBe(false)
  })

  it("should register a node once", () => {
    calculated.calcDegree(["a", "b"], [{ couple: ["a", "b"], multiples: new Map([["e1", {}]]) }])

    calculated.register("a")
    calculated.register("c")

    expect(calculated.degree("a")).toBe(1)
    expect(calculated.degree("c")).toBe(0)
    expect(calculated.neighbors("c")).toEqual(new Set())
  })

  it("should forget nodes and reset everything", () => {
    calculated.register("a")
    calculated.markStale()

    calculated.forget("a")
    expect(calculated.degree("a")).toBeUndefined()

    calculated.reset()
    expect(calculated.isStale).toBe(false)
  })
})

describe("setLogLevel", () => {
  afterEach(() => {
    setLogLevel(LogLevels.info)
  })

  it("should reach the root logger and tagged loggers", () => {
    const child = createLogger("test")

    setLogLevel(LogLevels.debug)

    expect(logger.level).toBe(LogLevels.debug)
    expect(child.level).toBe(LogLevels.debug)
  })
})
