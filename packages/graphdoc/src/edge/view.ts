/**
 * Anchor-relative edge views.
 */

import { NotAnEndpointError } from "../errors"
import type { Direction } from "../types"
import type { Vertex } from "../vertex"

/**
 * Minimal structural shape of an edge needed to compute a view.
 */
interface Endpoints {
  readonly start: Vertex
  readonly end: Vertex
  readonly hasDirection: boolean
}

/**
 * An edge as seen from one of its ends.
 */
export interface EdgeView<E> {
  /** The viewed edge */
  readonly edge: E
  /** The end the edge is seen from */
  readonly anchor: Vertex
  /** The opposite end */
  readonly other: Vertex
  /** "out" if the anchor is the start of a directed edge, "in" if it is the end */
  readonly direction: Direction
}

/**
 * Resolves places to vertices. Implemented by the graph store.
 */
export interface PlaceLookup {
  get(place: number): Vertex
}

/**
 * Compute the view of `edge` from `anchor`.
 *
 * A self-loop is seen as outgoing.
 *
 * @throws NotAnEndpointError if `anchor` is neither end
 */
export function anchorView<E extends Endpoints>(edge: E, anchor: Vertex): EdgeView<E> {
  if (edge.start !== anchor && edge.end !== anchor) {
    throw new NotAnEndpointError(anchor.place)
  }

  const atStart = edge.start === anchor
  const other = atStart ? edge.end : edge.start
  const direction: Direction = !edge.hasDirection ? "none" : atStart ? "out" : "in"

  return Object.freeze({ edge, anchor, other, direction })
}
