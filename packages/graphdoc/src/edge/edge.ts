/**
 * Edge
 *
 * A labeled relation between two inserted vertices, directed or not.
 */

import { InvalidDirectionError, NotInsertedError } from "../errors"
import { directionSchema, type Direction, type EdgePack } from "../types"
import type { Vertex } from "../vertex"
import { anchorView, type EdgeView, type PlaceLookup } from "./view"

/**
 * An edge between two vertices of the same store.
 *
 * Undirected edges keep the end with the lowest place as `start`, so
 * `new Edge(a, b, '', false)` equals `new Edge(b, a, '', false)`.
 *
 * Subclasses that add state should append it to `pack()` and override
 * `fromPack` to consume it.
 */
export class Edge {
  readonly start: Vertex
  readonly end: Vertex
  readonly label: string
  readonly hasDirection: boolean

  private _isInserted = false

  /**
   * @throws NotInsertedError if either vertex is detached
   */
  constructor(start: Vertex, end: Vertex, label = "", hasDirection = true) {
    if (!start.isInserted || !end.isInserted) {
      throw new NotInsertedError("Both vertices must be inserted to make an edge")
    }

    if (!hasDirection && start.place > end.place) {
      this.start = end
      this.end = start
    } else {
      this.start = start
      this.end = end
    }
    this.label = label
    this.hasDirection = hasDirection
  }

  // ===========================================================================
  // FACTORIES
  // ===========================================================================

  /**
   * Create an edge from the point of view of `anchor`.
   *
   * @param direction - "out" makes `anchor` the start, "in" the end,
   *   "none" makes the edge undirected
   * @throws InvalidDirectionError for any other token
   */
  static fromAnchor(anchor: Vertex, other: Vertex, label = "", direction: Direction = "out"): Edge {
    const parsed = directionSchema.safeParse(direction)
    if (!parsed.success) {
      throw new InvalidDirectionError(direction)
    }

    switch (parsed.data) {
      case "out":
        return new Edge(anchor, other, label, true)
      case "in":
        return new Edge(other, anchor, label, true)
      case "none":
        return new Edge(anchor, other, label, false)
    }
  }

  /**
   * Rebuild an edge from its pack, resolving places through `lookup`.
   * Used as the default edge factory.
   */
  static fromPack(pack: EdgePack, lookup: PlaceLookup): Edge {
    const [startPlace, endPlace, label, hasDirection] = pack
    return new Edge(lookup.get(startPlace), lookup.get(endPlace), label, hasDirection)
  }

  // ===========================================================================
  // STATE
  // ===========================================================================

  get isInserted(): boolean {
    return this._isInserted
  }

  /**
   * Flipped by the store on insertion and removal.
   * @internal
   */
  markInserted(inserted: boolean): void {
    this._isInserted = inserted
  }

  hasVertex(vertex: Vertex): boolean {
    return this.start === vertex || this.end === vertex
  }

  /**
   * See the edge from `anchor`. Returns a new view on every call; the
   * edge itself keeps no perspective.
   *
   * @throws NotAnEndpointError if `anchor` is neither end
   */
  changeAnchor(anchor: Vertex): EdgeView<this> {
    return anchorView(this, anchor)
  }

  /**
   * Structural equality: same end instances, label and orientation.
   */
  equals(other: Edge): boolean {
    return (
      this.start === other.start &&
      this.end === other.end &&
      this.label === other.label &&
      this.hasDirection === other.hasDirection
    )
  }

  // ===========================================================================
  // HOOKS
  // ===========================================================================

  /**
   * Called by the store when the edge is inserted.
   */
  onInsert(): void {}

  // ===========================================================================
  // EXPORT
  // ===========================================================================

  pack(): EdgePack {
    return [this.start.place, this.end.place, this.label, this.hasDirection]
  }

  toString(): string {
    const arrow = this.hasDirection ? "->" : "--"
    return `Edge(${this.start.place} ${arrow} ${this.end.place}, ${JSON.stringify(this.label)})`
  }
}
