/**
 * Persistence Codec
 *
 * Converts between the persisted JSON document and the packs the store
 * rebuilds vertices and edges from.
 *
 * ```json
 * {
 *   "_next_place": 4,
 *   "edges": [[1, 2, "knows", false]],
 *   "1": { "name": "Ruby" },
 *   "2": { "name": "Weiss" }
 * }
 * ```
 */

import { z } from "zod"
import { CorruptDocumentError } from "../errors"
import { edgePackSchema, vertexPackSchema, type EdgePack, type VertexPack } from "../types"

export const NEXT_PLACE_KEY = "_next_place"
export const EDGES_KEY = "edges"

const PLACE_KEY = /^[1-9][0-9]*$/

const documentSchema = z.record(z.unknown())
const nextPlaceSchema = z.number().int().positive().optional()
const edgesSchema = z.array(edgePackSchema).default([])

/**
 * Content of a decoded document.
 */
export interface DecodedDocument {
  /** Next place to allocate, when the document records it */
  nextPlace: number | undefined
  /** Vertex packs with their place, in document order */
  vertices: Array<[place: number, pack: VertexPack]>
  /** Edge packs in document order */
  edges: EdgePack[]
}

/**
 * Parse and check a persisted document.
 *
 * @param path - File the text was read from, reported in errors
 * @throws CorruptDocumentError if the text is not JSON or not a valid document
 */
export function decodeDocument(text: string, path: string): DecodedDocument {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new CorruptDocumentError(
      `Invalid JSON in ${path}`,
      path,
      undefined,
      error instanceof Error ? error : undefined,
    )
  }

  const document = parseOrThrow(documentSchema, raw, path)
  const nextPlace = parseOrThrow(nextPlaceSchema, document[NEXT_PLACE_KEY], path, NEXT_PLACE_KEY)
  const edges = parseOrThrow(edgesSchema, document[EDGES_KEY], path, EDGES_KEY)

  const vertices: Array<[number, VertexPack]> = []
  for (const [key, value] of Object.entries(document)) {
    if (key === NEXT_PLACE_KEY || key === EDGES_KEY) continue
    if (!PLACE_KEY.test(key)) {
      throw new CorruptDocumentError(`Invalid place key '${key}' in ${path}`, path, key)
    }
    vertices.push([Number(key), parseOrThrow(vertexPackSchema, value, path, key)])
  }

  return { nextPlace, vertices, edges }
}

/**
 * Build the document text.
 */
export function encodeDocument(
  nextPlace: number,
  vertices: Iterable<[place: number, pack: VertexPack]>,
  edges: EdgePack[],
  indent = 0,
): string {
  const document: Record<string, unknown> = {
    [NEXT_PLACE_KEY]: nextPlace,
    [EDGES_KEY]: edges,
  }
  for (const [place, pack] of vertices) {
    document[String(place)] = pack
  }
  return JSON.stringify(document, null, indent || undefined)
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, path: string, key?: string): z.output<T> {
  const result = schema.safeParse(value)
  if (!result.success) {
    const firstError = result.error.errors[0]
    const at = [key, ...(firstError?.path ?? [])].filter((part) => part !== undefined).join(".")
    throw new CorruptDocumentError(
      `Invalid document ${path}${at ? ` at ${at}` : ""}: ${firstError?.message ?? "validation failed"}`,
      path,
      key,
    )
  }
  return result.data
}
