/**
 * Errors Module
 */

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
