/**
 * Graph Store Configuration
 */

import { z } from "zod"
import type { Edge, PlaceLookup } from "../edge"
import { ConfigError } from "../errors"
import type { Logger } from "../logger"
import type { EdgePack, VertexPack } from "../types"
import type { Vertex } from "../vertex"

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Builds a vertex from its pack while loading.
 */
export type VertexFactory<V extends Vertex> = (pack: VertexPack) => V

/**
 * Builds an edge from its pack while loading. `lookup` is the store,
 * already holding every loaded vertex.
 */
export type EdgeFactory<E extends Edge> = (pack: EdgePack, lookup: PlaceLookup) => E

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Options accepted by every store.
 */
export interface BaseStoreOptions {
  /** File holding the persisted document */
  path: string
  /** Load the file on construction (default: true) */
  autoLoad?: boolean
  /** JSON indentation used by `save()`; 0 writes a single line (default: 0) */
  indent?: number
  /** Logger (default: consola tagged `graphdoc:store`) */
  logger?: Logger
}

/**
 * Options for a store of application-defined vertex and edge types.
 */
export interface GraphStoreOptions<V extends Vertex, E extends Edge> extends BaseStoreOptions {
  /** Rebuilds vertices on load */
  vertexFactory: VertexFactory<V>
  /** Rebuilds edges on load, and builds the edges made by `makeEdge` */
  edgeFactory: EdgeFactory<E>
}

const storeOptionsSchema = z.object({
  path: z.string().min(1, "path must not be empty"),
  autoLoad: z.boolean().default(true),
  indent: z.number().int().min(0).max(10).default(0),
})

export type ResolvedStoreOptions = z.output<typeof storeOptionsSchema>

/**
 * Validate the plain options and apply defaults.
 * @throws ConfigError on the first invalid option
 */
export function resolveStoreOptions(options: BaseStoreOptions): ResolvedStoreOptions {
  const result = storeOptionsSchema.safeParse({
    path: options.path,
    autoLoad: options.autoLoad,
    indent: options.indent,
  })
  if (!result.success) {
    const firstError = result.error.errors[0]
    const option = firstError?.path.join(".")
    throw new ConfigError(`Invalid store option ${option ?? ""}: ${firstError?.message ?? "validation failed"}`, option)
  }
  return result.data
}
