/**
 * Graph Store
 *
 * Owns the vertices and edges, hands out places, enforces the
 * insertion invariants, answers searches and persists everything to a
 * single JSON file.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs"
import { dirname } from "node:path"
import { Edge, type EdgeView, type PlaceLookup } from "../edge"
import {
  AlreadyInsertedError,
  InvalidDirectionError,
  MissingFieldError,
  NotFoundError,
  NotInsertedError,
  NotReadyError,
  StillConnectedError,
  TypeMismatchError,
} from "../errors"
import { createLogger, type Logger } from "../logger"
import { directionFilterSchema, type DirectionFilter, type VertexPack } from "../types"
import { Vertex } from "../vertex"
import { decodeDocument, encodeDocument } from "./codec"
import {
  resolveStoreOptions,
  type BaseStoreOptions,
  type EdgeFactory,
  type GraphStoreOptions,
  type ResolvedStoreOptions,
  type VertexFactory,
} from "./config"

/**
 * Filters for `searchEdge`. Each one given narrows the result.
 */
export interface EdgeSearchOptions {
  /** Keep edges whose other end is this very vertex */
  other?: Vertex
  /** Keep edges with exactly this label ("" matches unlabeled edges only) */
  label?: string
  /** Keep edges with this direction as seen from the anchor (default: "all") */
  direction?: DirectionFilter
}

/**
 * In-memory graph store backed by a JSON file:
 * - Places allocated from a counter that never goes back
 * - Edges kept in insertion order
 * - Lazy vertex and edge searches
 * - Pluggable factories to rebuild custom vertex and edge types
 *
 * Single-threaded and synchronous. Nothing guards the file against other
 * processes; the last save wins.
 */
export class GraphStore<V extends Vertex = Vertex, E extends Edge = Edge> implements PlaceLookup {
  /** Attached vertices by place */
  private vertices = new Map<number, V>()

  /** Inserted edges, in insertion order */
  private edgeList: E[] = []

  /** Place given to the next inserted vertex */
  private nextPlace = 1

  readonly path: string

  private readonly options: ResolvedStoreOptions
  private readonly vertexFactory: VertexFactory<V>
  private readonly edgeFactory: EdgeFactory<E>
  private readonly logger: Logger

  constructor(options: GraphStoreOptions<V, E>) {
    this.options = resolveStoreOptions(options)
    this.path = this.options.path
    this.vertexFactory = options.vertexFactory
    this.edgeFactory = options.edgeFactory
    this.logger = options.logger ?? createLogger("store")

    if (this.options.autoLoad) {
      this.load()
    }
  }

  // ===========================================================================
  // VERTEX OPERATIONS
  // ===========================================================================

  /**
   * Insert a detached vertex.
   *
   * @returns The place given to the vertex
   * @throws TypeMismatchError if `vertex` is not a Vertex
   * @throws AlreadyInsertedError if it is attached to a store
   * @throws NotReadyError if its readiness hook declines
   * @throws Whatever `onInsert` throws, leaving the vertex detached
   */
  insert(vertex: V): number {
    if (!(vertex instanceof Vertex)) {
      throw new TypeMismatchError("Only vertices can be inserted", "Vertex", vertex)
    }
    if (vertex.isInserted) {
      throw new AlreadyInsertedError(`Vertex is already inserted at place ${vertex.place}`, vertex.place)
    }
    if (!vertex.isReadyForInsertion()) {
      throw new NotReadyError()
    }

    const place = this.nextPlace++
    vertex.assignPlace(place)
    try {
      vertex.onInsert()
    } catch (error) {
      // The place stays retired
      vertex.assignPlace(0)
      throw error
    }
    this.vertices.set(place, vertex)

    this.logger.debug(`Inserted vertex ${place}`)
    return place
  }

  /**
   * Remove a vertex with no incident edge.
   *
   * @returns The place the vertex had
   * @throws TypeMismatchError if `vertex` is not a Vertex
   * @throws NotInsertedError if it is not in this store
   * @throws StillConnectedError if an edge still uses it
   */
  remove(vertex: V): number {
    if (!(vertex instanceof Vertex)) {
      throw new TypeMismatchError("Only vertices can be removed", "Vertex", vertex)
    }
    if (!this.has(vertex)) {
      throw new NotInsertedError("Vertex is not inserted in this store", vertex.place)
    }

    const incident = this.edgeList.filter((edge) => edge.hasVertex(vertex)).length
    if (incident > 0) {
      throw new StillConnectedError(vertex.place, incident)
    }

    const place = vertex.place
    this.vertices.delete(place)
    vertex.assignPlace(0)

    this.logger.debug(`Removed vertex ${place}`)
    return place
  }

  /**
   * Get the vertex at `place`.
   *
   * @throws TypeMismatchError if `place` is not an integer
   * @throws NotFoundError if no vertex holds it
   */
  get(place: number): V {
    if (!Number.isInteger(place)) {
      throw new TypeMismatchError("Place must be an integer", "integer", place)
    }
    const vertex = this.vertices.get(place)
    if (!vertex) {
      throw new NotFoundError(`Vertex not found at place ${place}`)
    }
    return vertex
  }

  /**
   * Whether this very vertex is attached to this store.
   */
  has(vertex: Vertex): boolean {
    return vertex.isInserted && this.vertices.get(vertex.place) === vertex
  }

  /**
   * Number of attached vertices.
   */
  get size(): number {
    return this.vertices.size
  }

  /**
   * Iterate over all attached vertices.
   */
  all(): IterableIterator<V> {
    return this.vertices.values()
  }

  /**
   * Lazily yield the vertices matching `predicate`. A vertex whose
   * predicate reads a missing field is skipped.
   */
  *search(predicate: (vertex: V) => boolean): Generator<V, void, undefined> {
    for (const vertex of this.all()) {
      let matches: boolean
      try {
        matches = predicate(vertex)
      } catch (error) {
        if (error instanceof MissingFieldError) continue
        throw error
      }
      if (matches) yield vertex
    }
  }

  // ===========================================================================
  // EDGE OPERATIONS
  // ===========================================================================

  /**
   * Insert an edge between two vertices of this store.
   *
   * @throws AlreadyInsertedError if the edge is already inserted
   * @throws NotInsertedError if an end is not in this store
   * @throws Whatever `onInsert` throws, leaving the edge detached
   */
  insertEdge(edge: E): void {
    if (edge.isInserted) {
      throw new AlreadyInsertedError(`${edge.toString()} is already inserted`)
    }
    if (!this.has(edge.start) || !this.has(edge.end)) {
      throw new NotInsertedError(`Both ends of ${edge.toString()} must be inserted in this store`)
    }

    edge.markInserted(true)
    try {
      edge.onInsert()
    } catch (error) {
      edge.markInserted(false)
      throw error
    }
    this.edgeList.push(edge)

    this.logger.debug(`Inserted ${edge.toString()}`)
  }

  /**
   * Build an edge with the edge factory and insert it.
   *
   * @throws NotInsertedError if an end is not in this store
   */
  makeEdge(start: V, end: V, label = "", hasDirection = true): E {
    if (!this.has(start) || !this.has(end)) {
      throw new NotInsertedError("Both vertices must be inserted in this store to make an edge")
    }
    const edge = this.edgeFactory([start.place, end.place, label, hasDirection], this)
    this.insertEdge(edge)
    return edge
  }

  /**
   * Remove the first inserted edge structurally equal to `edge`.
   *
   * @returns The removed edge
   * @throws NotFoundError if no inserted edge matches
   */
  removeEdge(edge: Edge): E {
    const index = this.edgeList.findIndex((candidate) => candidate.equals(edge))
    const removed = this.edgeList[index]
    if (index === -1 || !removed) {
      throw new NotFoundError(`Edge not found: ${edge.toString()}`)
    }

    this.edgeList.splice(index, 1)
    removed.markInserted(false)

    this.logger.debug(`Removed ${removed.toString()}`)
    return removed
  }

  /**
   * Iterate over all inserted edges, in insertion order.
   */
  edges(): IterableIterator<E> {
    return this.edgeList.values()
  }

  /**
   * Lazily yield the edges touching `anchor`, each seen from `anchor`.
   *
   * @throws InvalidDirectionError if `options.direction` is not a known token
   */
  searchEdge(anchor: Vertex, options: EdgeSearchOptions = {}): Generator<EdgeView<E>, void, undefined> {
    const direction = directionFilterSchema.safeParse(options.direction ?? "all")
    if (!direction.success) {
      throw new InvalidDirectionError(options.direction)
    }
    return this.walkEdges(anchor, options.other, options.label, direction.data)
  }

  private *walkEdges(
    anchor: Vertex,
    other: Vertex | undefined,
    label: string | undefined,
    direction: DirectionFilter,
  ): Generator<EdgeView<E>, void, undefined> {
    for (const edge of this.edgeList) {
      if (!edge.hasVertex(anchor)) continue
      const view = edge.changeAnchor(anchor)
      if (other !== undefined && view.other !== other) continue
      if (direction !== "all" && view.direction !== direction) continue
      if (label !== undefined && edge.label !== label) continue
      yield view
    }
  }

  // ===========================================================================
  // PERSISTENCE
  // ===========================================================================

  /**
   * Replace the content of the store with the content of the file. A
   * missing file leaves the store empty.
   *
   * If decoding fails the store is left half-loaded and should be discarded.
   *
   * @throws CorruptDocumentError if the file is not a valid document
   */
  load(): void {
    this.vertices.clear()
    this.edgeList = []
    this.nextPlace = 1

    if (!existsSync(this.path)) {
      this.logger.debug(`No file at ${this.path}, starting empty`)
      return
    }

    const document = decodeDocument(readFileSync(this.path, "utf8"), this.path)

    let highest = 0
    for (const [place, pack] of document.vertices) {
      const vertex = this.vertexFactory(pack)
      vertex.assignPlace(place)
      this.vertices.set(place, vertex)
      highest = Math.max(highest, place)
    }

    if (document.nextPlace === undefined) {
      this.logger.warn(`${this.path} has no _next_place, continuing after place ${highest}`)
    }
    this.nextPlace = Math.max(document.nextPlace ?? 1, highest + 1)

    for (const pack of document.edges) {
      const edge = this.edgeFactory(pack, this)
      edge.markInserted(true)
      this.edgeList.push(edge)
    }

    this.logger.debug(`Loaded ${this.vertices.size} vertices and ${this.edgeList.length} edges from ${this.path}`)
  }

  /**
   * Write the whole store to the file, creating missing directories.
   * The write is not atomic.
   */
  save(): void {
    const packs = Array.from(this.vertices, ([place, vertex]): [number, VertexPack] => [place, vertex.pack()])
    const text = encodeDocument(
      this.nextPlace,
      packs,
      this.edgeList.map((edge) => edge.pack()),
      this.options.indent,
    )

    mkdirSync(dirname(this.path), { recursive: true })
    writeFileSync(this.path, text, "utf8")

    this.logger.debug(`Saved ${this.vertices.size} vertices and ${this.edgeList.length} edges to ${this.path}`)
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /**
   * Get store statistics.
   */
  stats(): { vertices: number; edges: number; nextPlace: number } {
    return {
      vertices: this.vertices.size,
      edges: this.edgeList.length,
      nextPlace: this.nextPlace,
    }
  }

  toString(): string {
    return `GraphStore(${this.path})`
  }
}

/**
 * Create a store of plain vertices and edges.
 *
 * @example
 * ```typescript
 * const store = createGraphStore({ path: 'data/graph.json' })
 * const ruby = new Vertex({ name: 'Ruby' })
 * const weiss = new Vertex({ name: 'Weiss' })
 * store.insert(ruby)
 * store.insert(weiss)
 * store.makeEdge(ruby, weiss, 'partner', false)
 * store.save()
 * ```
 */
export function createGraphStore(options: BaseStoreOptions): GraphStore {
  return new GraphStore({
    ...options,
    vertexFactory: Vertex.fromPack,
    edgeFactory: Edge.fromPack,
  })
}
