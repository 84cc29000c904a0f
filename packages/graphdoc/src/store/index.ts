export { GraphStore, createGraphStore } from "./graph-store"
export type { EdgeSearchOptions } from "./graph-store"
export { resolveStoreOptions } from "./config"
export type {
  BaseStoreOptions,
  GraphStoreOptions,
  ResolvedStoreOptions,
  VertexFactory,
  EdgeFactory,
} from "./config"
export { decodeDocument, encodeDocument, NEXT_PLACE_KEY, EDGES_KEY } from "./codec"
export type { DecodedDocument } from "./codec"
