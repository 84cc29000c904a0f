/**
 * Deep clone a value. Non-finite numbers survive the copy.
 */
export function clone<T>(value: T): T {
  return structuredClone(value)
}
