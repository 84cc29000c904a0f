/**
 * Edge Subtypes
 */

import { Edge, TypeMismatchError, type EdgePack, type PlaceLookup, type Vertex } from "graphdoc"
import { z } from "zod"

/**
 * An edge remembering when it was inserted. The date is not persisted.
 */
export class TimestampedEdge extends Edge {
  insertedAt: string | null = null

  static override fromPack(pack: EdgePack, lookup: PlaceLookup): TimestampedEdge {
    const [startPlace, endPlace, label, hasDirection] = pack
    return new TimestampedEdge(lookup.get(startPlace), lookup.get(endPlace), label, hasDirection)
  }

  override onInsert(): void {
    this.insertedAt = new Date().toISOString()
  }
}

const colorSchema = z.string().nullable()

/**
 * An edge with a color, saved as a fifth value of its pack.
 */
export class ColoredEdge extends Edge {
  color: string | null

  constructor(start: Vertex, end: Vertex, label = "", hasDirection = true, color: string | null = null) {
    super(start, end, label, hasDirection)
    this.color = color
  }

  /**
   * A pack without a fifth value gives an uncolored edge.
   *
   * @throws TypeMismatchError if the fifth value is neither a string nor null
   */
  static override fromPack(pack: EdgePack, lookup: PlaceLookup): ColoredEdge {
    const [startPlace, endPlace, label, hasDirection, color = null] = pack
    const parsed = colorSchema.safeParse(color)
    if (!parsed.success) {
      throw new TypeMismatchError("Edge color must be a string or null", "string | null", color)
    }
    return new ColoredEdge(lookup.get(startPlace), lookup.get(endPlace), label, hasDirection, parsed.data)
  }

  override pack(): EdgePack {
    const pack = super.pack()
    pack.push(this.color)
    return pack
  }
}
