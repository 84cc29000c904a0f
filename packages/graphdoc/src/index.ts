/**
 * graphdoc
 *
 * Embedded document-plus-graph store: vertices holding free-form fields,
 * linked by labeled edges, kept in memory and saved as one JSON file.
 *
 * @example
 * ```typescript
 * import { createGraphStore, Vertex } from 'graphdoc'
 *
 * const store = createGraphStore({ path: 'data/team.json' })
 *
 * const ruby = new Vertex({ name: 'Ruby', weapon: 'Crescent Rose' })
 * const weiss = new Vertex({ name: 'Weiss', weapon: 'Myrtenaster' })
 * store.insert(ruby) // 1
 * store.insert(weiss) // 2
 * store.makeEdge(ruby, weiss, 'partner', false)
 *
 * for (const { other, direction } of store.searchEdge(ruby, { label: 'partner' })) {
 *   console.log(other.get('name'), direction) // Weiss none
 * }
 *
 * const armed = [...store.search((v) => v.get('weapon') === 'Myrtenaster')]
 *
 * store.save()
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// STORE
// =============================================================================

export { GraphStore, createGraphStore, resolveStoreOptions } from "./store"
export type {
  EdgeSearchOptions,
  BaseStoreOptions,
  GraphStoreOptions,
  ResolvedStoreOptions,
  VertexFactory,
  EdgeFactory,
} from "./store"

// =============================================================================
// MODEL
// =============================================================================

export { Vertex } from "./vertex"
export { Edge, anchorView } from "./edge"
export type { EdgeView, PlaceLookup } from "./edge"

export {
  fieldValueSchema,
  vertexPackSchema,
  edgePackSchema,
  directionSchema,
  directionFilterSchema,
} from "./types"
export type { FieldValue, VertexPack, EdgePack, Direction, DirectionFilter } from "./types"

// =============================================================================
// PERSISTENCE (for advanced use cases)
// =============================================================================

export { decodeDocument, encodeDocument, NEXT_PLACE_KEY, EDGES_KEY } from "./store"
export type { DecodedDocument } from "./store"

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphDocError,
  TypeMismatchError,
  InsertionStateError,
  AlreadyInsertedError,
  NotInsertedError,
  NotReadyError,
  StillConnectedError,
  NotFoundError,
  MissingFieldError,
  InvalidDirectionError,
  NotAnEndpointError,
  CorruptDocumentError,
  ConfigError,
} from "./errors"

// =============================================================================
// LOGGING
// =============================================================================

export { createLogger } from "./logger"
export type { Logger } from "./logger"

// =============================================================================
// UTILITIES
// =============================================================================

export { clone } from "./utils/clone"
