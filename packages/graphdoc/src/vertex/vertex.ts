/**
 * Vertex
 *
 * A document stored in a graph store: an insertion-ordered bag of named
 * fields plus the place the store gave it.
 */

import { MissingFieldError } from "../errors"
import type { FieldValue, VertexPack } from "../types"
import { clone } from "../utils/clone"

/**
 * A vertex. Subclass it to validate fields, add state outside the field
 * bag, or react to insertion; pair the subclass with a vertex factory
 * when creating the store so it comes back from disk as the same type.
 *
 * @example
 * ```typescript
 * const vertex = new Vertex({ name: 'Ruby', weapon: 'Crescent Rose' })
 * store.insert(vertex) // 1
 * vertex.get('name') // 'Ruby'
 * ```
 */
export class Vertex {
  private _place = 0
  private readonly elements = new Map<string, FieldValue>()

  constructor(init?: Readonly<Record<string, FieldValue>>) {
    if (init) {
      for (const [name, value] of Object.entries(clone(init))) {
        this.elements.set(name, value)
      }
    }
  }

  /**
   * Rebuild a vertex from its pack. Used as the default vertex factory.
   */
  static fromPack(pack: VertexPack): Vertex {
    return new Vertex(pack)
  }

  // ===========================================================================
  // IDENTITY
  // ===========================================================================

  /** Place in the store, 0 while detached */
  get place(): number {
    return this._place
  }

  get isInserted(): boolean {
    return this._place !== 0
  }

  /**
   * Set by the store on insertion and reset to 0 on removal.
   * @internal
   */
  assignPlace(place: number): void {
    this._place = place
  }

  // ===========================================================================
  // FIELDS
  // ===========================================================================

  /**
   * @throws MissingFieldError if the field is absent
   */
  get(name: string): FieldValue {
    if (!this.elements.has(name)) {
      throw new MissingFieldError(name)
    }
    return this.elements.get(name) ?? null
  }

  set(name: string, value: FieldValue): this {
    this.elements.set(name, value)
    return this
  }

  /**
   * @throws MissingFieldError if the field is absent
   */
  delete(name: string): void {
    if (!this.elements.delete(name)) {
      throw new MissingFieldError(name)
    }
  }

  has(name: string): boolean {
    return this.elements.has(name)
  }

  keys(): IterableIterator<string> {
    return this.elements.keys()
  }

  values(): IterableIterator<FieldValue> {
    return this.elements.values()
  }

  entries(): IterableIterator<[string, FieldValue]> {
    return this.elements.entries()
  }

  get size(): number {
    return this.elements.size
  }

  // ===========================================================================
  // HOOKS
  // ===========================================================================

  /**
   * Called once by the store right after the place is assigned.
   */
  onInsert(): void {}

  /**
   * Consulted by the store before insertion. Returning false aborts it.
   */
  isReadyForInsertion(): boolean {
    return true
  }

  // ===========================================================================
  // EXPORT
  // ===========================================================================

  /**
   * Deep copy of the fields, safe to serialize and to mutate.
   */
  pack(): VertexPack {
    return clone(Object.fromEntries(this.elements))
  }

  toString(): string {
    return `Vertex(${JSON.stringify(Object.fromEntries(this.elements))})`
  }
}
