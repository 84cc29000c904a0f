/**
 * Core Type Definitions
 *
 * Field values, packs and direction tokens shared by vertices, edges
 * and the store, with the Zod schemas that check them at the edges of
 * the system (persisted documents, untyped callers).
 */

import { z } from "zod"

// =============================================================================
// FIELD VALUES
// =============================================================================

/**
 * A value a vertex field can hold. Anything JSON can carry.
 */
export type FieldValue = string | number | boolean | null | FieldValue[] | { [key: string]: FieldValue }

export const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(fieldValueSchema), z.record(fieldValueSchema)]),
)

// =============================================================================
// PACKS
// =============================================================================

/**
 * Storage-safe form of a vertex: its fields, plus whatever keys a subtype adds.
 */
export type VertexPack = Record<string, FieldValue>

export const vertexPackSchema: z.ZodType<VertexPack> = z.record(fieldValueSchema)

/**
 * Storage-safe form of an edge. Subtypes may append extra values.
 */
export type EdgePack = [start: number, end: number, label: string, hasDirection: boolean, ...extra: FieldValue[]]

export const edgePackSchema = z
  .tuple([z.number().int().positive(), z.number().int().positive(), z.string(), z.boolean()])
  .rest(fieldValueSchema)

// =============================================================================
// DIRECTIONS
// =============================================================================

/**
 * Direction of an edge as seen from its anchor.
 */
export type Direction = "out" | "in" | "none"

/**
 * Direction filter accepted by edge searches.
 */
export type DirectionFilter = Direction | "all"

export const directionSchema = z.enum(["out", "in", "none"])

export const directionFilterSchema = z.enum(["out", "in", "none", "all"])
