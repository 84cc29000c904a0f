/**
 * graphdoc extensions
 *
 * Vertex and edge subtypes built on the store's extension points. Pass
 * their `fromPack` to the store so they come back as the same type:
 *
 * ```typescript
 * import { GraphStore } from 'graphdoc'
 * import { ColoredEdge, ListVertex } from 'graphdoc-extensions'
 *
 * const store = new GraphStore({
 *   path: 'data/lists.json',
 *   vertexFactory: ListVertex.fromPack,
 *   edgeFactory: ColoredEdge.fromPack,
 * })
 * ```
 *
 * @packageDocumentation
 */

export {
  IntegerVertex,
  MandatoryFieldsVertex,
  TimestampedVertex,
  ListVertex,
  IntListVertex,
  LIST_KEY,
} from "./vertices"

export { TimestampedEdge, ColoredEdge } from "./edges"
