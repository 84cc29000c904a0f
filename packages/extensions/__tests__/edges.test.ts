import { mkdtempSync, readFileSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { GraphStore, TypeMismatchError, Vertex } from "graphdoc"
import { ColoredEdge, TimestampedEdge } from "../src"

describe("edge extensions", () => {
  let dir: string
  let path: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "graphdoc-edges-"))
    path = join(dir, "graph.json")
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
    vi.useRealTimers()
  })

  // ===========================================================================
  // TimestampedEdge
  // ===========================================================================

  describe("TimestampedEdge", () => {
    const options = () => ({ path, vertexFactory: Vertex.fromPack, edgeFactory: TimestampedEdge.fromPack })

    it("should record the insertion date", () => {
      vi.useFakeTimers()
      vi.setSystemTime(new Date("2024-05-01T12:00:00.000Z"))
      const store = new GraphStore(options())
      const v1 = new Vertex()
      const v2 = new Vertex()
      store.insert(v1)
      store.insert(v2)
      const edge = new TimestampedEdge(v1, v2)

      expect(edge.insertedAt).toBeNull()
      store.insertEdge(edge)

      expect(edge.insertedAt).toBe("2024-05-01T12:00:00.000Z")
    })

    it("should be built by makeEdge through the factory", () => {
      const store = new GraphStore(options())
      const v1 = new Vertex()
      const v2 = new Vertex()
      store.insert(v1)
      store.insert(v2)

      const edge = store.makeEdge(v1, v2, "follows")

      expect(edge).toBeInstanceOf(TimestampedEdge)
      expect(edge.insertedAt).not.toBeNull()
    })

    it("should not persist the date", () => {
      const first = new GraphStore(options())
      const v1 = new Vertex()
      const v2 = new Vertex()
      first.insert(v1)
      first.insert(v2)
      first.makeEdge(v1, v2)
      first.save()

      const [loaded] = [...new GraphStore(options()).edges()]

      expect(loaded).toBeInstanceOf(TimestampedEdge)
      expect(loaded?.insertedAt).toBeNull()
      expect(loaded?.isInserted).toBe(true)
    })
  })

  // ===========================================================================
  // ColoredEdge
  // ===========================================================================

  describe("ColoredEdge", () => {
    const options = () => ({ path, vertexFactory: Vertex.fromPack, edgeFactory: ColoredEdge.fromPack })

    function twoVertices(store: GraphStore<Vertex, ColoredEdge>): [Vertex, Vertex] {
      const v1 = new Vertex({ name: "one" })
      const v2 = new Vertex({ name: "two" })
      store.insert(v1)
      store.insert(v2)
      return [v1, v2]
    }

    it("should append its color to the pack", () => {
      const store = new GraphStore(options())
      const [v1, v2] = twoVertices(store)

      expect(new ColoredEdge(v1, v2, "", true, "red").pack()).toEqual([1, 2, "", true, "red"])
      expect(new ColoredEdge(v2, v1, "knows", false).pack()).toEqual([1, 2, "knows", false, null])
    })

    it("should ignore the color in equality", () => {
      const store = new GraphStore(options())
      const [v1, v2] = twoVertices(store)

      expect(new ColoredEdge(v1, v2, "", true, "red").equals(new ColoredEdge(v1, v2, "", true, "blue"))).toBe(true)
    })

    it("should save and restore the color", () => {
      const first = new GraphStore(options())
      const [v1, v2] = twoVertices(first)
      first.insertEdge(new ColoredEdge(v1, v2, "likes", true, "red"))
      first.save()

      const document: unknown = JSON.parse(readFileSync(path, "utf8"))
      expect(document).toMatchObject({ edges: [[1, 2, "likes", true, "red"]] })

      const second = new GraphStore(options())
      const [loaded] = [...second.edges()]

      expect(loaded).toBeInstanceOf(ColoredEdge)
      expect(loaded?.color).toBe("red")
      expect(loaded?.start).toBe(second.get(1))
    })

    it("should expose the color through edge searches", () => {
      const store = new GraphStore(options())
      const [v1, v2] = twoVertices(store)
      store.insertEdge(new ColoredEdge(v1, v2, "", true, "green"))

      const colors = [...store.searchEdge(v2, { direction: "in" })].map((view) => view.edge.color)

      expect(colors).toEqual(["green"])
    })

    it("should read a four-value pack as uncolored", () => {
      const store = new GraphStore(options())
      twoVertices(store)

      expect(ColoredEdge.fromPack([1, 2, "", true], store).color).toBeNull()
    })

    it("should refuse a color that is not a string", () => {
      const store = new GraphStore(options())
      twoVertices(store)

      expect(() => ColoredEdge.fromPack([1, 2, "", true, 3], store)).toThrow(TypeMismatchError)
    })
  })
})
