/**
 * Custom Error Classes
 */

/**
 * Base error for everything thrown by the store.
 */
export class GraphDocError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "GraphDocError"
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === "function") {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Type mismatch error.
 * Thrown when an argument is not of the kind the operation works on.
 */
export class TypeMismatchError extends GraphDocError {
  constructor(
    message: string,
    public readonly expected: string,
    public readonly received?: unknown,
  ) {
    super(message)
    this.name = "TypeMismatchError"
  }
}

/**
 * Base error for a vertex or an edge in the wrong insertion state.
 */
export class InsertionStateError extends GraphDocError {
  constructor(
    message: string,
    public readonly place?: number,
  ) {
    super(message)
    this.name = "InsertionStateError"
  }
}

/**
 * Thrown when inserting something that is already inserted.
 */
export class AlreadyInsertedError extends InsertionStateError {
  constructor(message: string, place?: number) {
    super(message, place)
    this.name = "AlreadyInsertedError"
  }
}

/**
 * Thrown when an operation needs a vertex attached to a store (or to this store).
 */
export class NotInsertedError extends InsertionStateError {
  constructor(message: string, place?: number) {
    super(message, place)
    this.name = "NotInsertedError"
  }
}

/**
 * Thrown when a vertex's readiness hook declines insertion.
 */
export class NotReadyError extends GraphDocError {
  constructor() {
    super("Vertex is not ready for insertion")
    this.name = "NotReadyError"
  }
}

/**
 * Thrown when removing a vertex that still has incident edges.
 */
export class StillConnectedError extends GraphDocError {
  constructor(
    public readonly place: number,
    public readonly edgeCount: number,
  ) {
    super(`Vertex ${place} still has ${edgeCount} incident edge(s)`)
    this.name = "StillConnectedError"
  }
}

/**
 * Not found error.
 * Thrown when a lookup or a removal matches nothing.
 */
export class NotFoundError extends GraphDocError {
  constructor(message: string) {
    super(message)
    this.name = "NotFoundError"
  }
}

/**
 * Thrown when reading or deleting a field a vertex does not hold.
 */
export class MissingFieldError extends NotFoundError {
  constructor(public readonly field: string) {
    super(`Field not found: '${field}'`)
    this.name = "MissingFieldError"
  }
}

/**
 * Thrown for a direction token other than "out", "in" or "none"
 * ("all" is accepted where a filter is expected).
 */
export class InvalidDirectionError extends GraphDocError {
  constructor(public readonly direction: unknown) {
    super(`Invalid direction: ${String(direction)}`)
    this.name = "InvalidDirectionError"
  }
}

/**
 * Thrown when anchoring an edge on a vertex that is not one of its ends.
 */
export class NotAnEndpointError extends GraphDocError {
  constructor(public readonly place: number) {
    super(`Vertex ${place} is not an endpoint of the edge`)
    this.name = "NotAnEndpointError"
  }
}

/**
 * Thrown when a persisted document cannot be decoded.
 */
export class CorruptDocumentError extends GraphDocError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly key?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "CorruptDocumentError"
  }
}

/**
 * Thrown when store options are invalid.
 */
export class ConfigError extends GraphDocError {
  constructor(
    message: string,
    public readonly option?: string,
  ) {
    super(message)
    this.name = "ConfigError"
  }
}
