/**
 * Vertex Subtypes
 *
 * Ready-made vertices showing each extension point: field validation,
 * the readiness and insertion hooks, and state kept outside the field bag.
 */

import { TypeMismatchError, Vertex, clone, fieldValueSchema, type FieldValue, type VertexPack } from "graphdoc"
import { z } from "zod"

// =============================================================================
// FIELD VALIDATION
// =============================================================================

const integerSchema = z.number().int()
const integerFieldsSchema = z.record(integerSchema)

/**
 * A vertex whose fields can only hold integers.
 */
export class IntegerVertex extends Vertex {
  /**
   * @throws TypeMismatchError if a field of `init` is not an integer
   */
  constructor(init?: Readonly<Record<string, number>>) {
    super(parseIntegerFields(init ?? {}))
  }

  static override fromPack(pack: VertexPack): IntegerVertex {
    return new IntegerVertex(parseIntegerFields(pack))
  }

  /**
   * @throws TypeMismatchError if `value` is not an integer
   */
  override set(name: string, value: FieldValue): this {
    if (!integerSchema.safeParse(value).success) {
      throw new TypeMismatchError(`${JSON.stringify(value)} is not an integer`, "integer", value)
    }
    return super.set(name, value)
  }
}

function parseIntegerFields(fields: Readonly<Record<string, FieldValue>>): Record<string, number> {
  const result = integerFieldsSchema.safeParse(fields)
  if (!result.success) {
    const firstError = result.error.errors[0]
    const field = firstError?.path.join(".") ?? ""
    throw new TypeMismatchError(`Field '${field}' is not an integer`, "integer", fields[field])
  }
  return result.data
}

// =============================================================================
// READINESS HOOK
// =============================================================================

/**
 * A vertex the store refuses until it holds every mandatory field.
 * Subclasses can change the list.
 */
export class MandatoryFieldsVertex extends Vertex {
  protected readonly mandatoryFields: readonly string[] = ["name", "weapon", "semblance"]

  static override fromPack(pack: VertexPack): MandatoryFieldsVertex {
    return new MandatoryFieldsVertex(pack)
  }

  override isReadyForInsertion(): boolean {
    return this.mandatoryFields.every((field) => this.has(field))
  }
}

// =============================================================================
// INSERTION HOOK
// =============================================================================

/**
 * A vertex stamped with `insertedAt` (ISO date) when inserted.
 */
export class TimestampedVertex extends Vertex {
  static override fromPack(pack: VertexPack): TimestampedVertex {
    return new TimestampedVertex(pack)
  }

  override onInsert(): void {
    this.set("insertedAt", new Date().toISOString())
  }
}

// =============================================================================
// EXTRA STATE
// =============================================================================

export const LIST_KEY = "list"

const listSchema = z.array(fieldValueSchema)
const integerListSchema = z.array(integerSchema)

/**
 * A vertex carrying a list next to its fields. The list is saved under
 * the `list` key of the pack, so no field may take that name.
 */
export class ListVertex extends Vertex {
  list: FieldValue[] = []

  /**
   * @throws TypeMismatchError if `init` has a `list` field
   */
  constructor(init?: Readonly<Record<string, FieldValue>>) {
    if (init && LIST_KEY in init) {
      throw reservedFieldError()
    }
    super(init)
  }

  static override fromPack(pack: VertexPack): ListVertex {
    const { fields, list } = splitListPack(pack)
    const vertex = new ListVertex(fields)
    vertex.list = parseList(listSchema, list)
    return vertex
  }

  append(value: FieldValue): void {
    this.list.push(value)
  }

  /**
   * @throws TypeMismatchError if `name` is `list`
   */
  override set(name: string, value: FieldValue): this {
    if (name === LIST_KEY) {
      throw reservedFieldError()
    }
    return super.set(name, value)
  }

  override pack(): VertexPack {
    return { ...super.pack(), [LIST_KEY]: clone(this.list) }
  }
}

/**
 * A list vertex whose list only takes integers.
 */
export class IntListVertex extends ListVertex {
  /**
   * @throws TypeMismatchError if the packed list holds anything but integers
   */
  static override fromPack(pack: VertexPack): IntListVertex {
    const { fields, list } = splitListPack(pack)
    const vertex = new IntListVertex(fields)
    vertex.list = parseList(integerListSchema, list)
    return vertex
  }

  /**
   * @throws TypeMismatchError if `value` is not an integer
   */
  override append(value: FieldValue): void {
    if (!integerSchema.safeParse(value).success) {
      throw new TypeMismatchError("Only integers are accepted", "integer", value)
    }
    super.append(value)
  }
}

function reservedFieldError(): TypeMismatchError {
  return new TypeMismatchError(`'${LIST_KEY}' is reserved for the list`, "field name", LIST_KEY)
}

function splitListPack(pack: VertexPack): { fields: VertexPack; list: FieldValue | undefined } {
  const { [LIST_KEY]: list, ...fields } = pack
  return { fields, list }
}

function parseList<T extends FieldValue>(schema: z.ZodType<T[]>, list: FieldValue | undefined): T[] {
  const result = schema.safeParse(list)
  if (!result.success) {
    throw new TypeMismatchError(`Invalid '${LIST_KEY}' in pack`, "list", list)
  }
  return result.data
}
